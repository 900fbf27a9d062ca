import { z } from "zod";
import { DEFAULT_BIND_HOST, DEFAULT_SHUTDOWN_TIMEOUT_MS, type TlsFiles } from "@starlane/replication";

export const DEFAULT_HTTP_PORT = 3000;
export const DEFAULT_HTTPS_PORT = 3443;
export const DEFAULT_UDP_PORT = 3001;
export const DEFAULT_BEACON_INTERVAL_MS = 1000;

/**
 * Process configuration, read from environment variables.
 */
export interface ServerConfig {
  /** HOST: address every listener binds to */
  host: string;
  /** HTTP_PORT: plain listener, or the redirect listener when TLS is configured */
  httpPort: number;
  /** HTTPS_PORT: encrypted listener, only used with TLS */
  httpsPort: number;
  /** UDP_PORT: datagram endpoint */
  udpPort: number;
  /** TLS_CERT_PATH + TLS_KEY_PATH, or null to serve plain HTTP only */
  tls: TlsFiles | null;
  /** SHUTDOWN_TIMEOUT_MS: bound on each listener's graceful shutdown */
  shutdownTimeoutMs: number;
  /** BEACON_INTERVAL_MS: how often the beacon publishes its uptime */
  beaconIntervalMs: number;
}

// Blank variables count as unset
const blankAsUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const integerVar = (name: string, fallback: number, min: number, max: number) => {
  const message = `${name} must be an integer in [${min}, ${max}]`;
  return z.preprocess(
    blankAsUndefined,
    z.coerce
      .number({ invalid_type_error: message })
      .int({ message })
      .min(min, { message })
      .max(max, { message })
      .default(fallback),
  );
};

const pathVar = z.preprocess(blankAsUndefined, z.string().trim().optional());

const envSchema = z
  .object({
    HOST: z.preprocess(blankAsUndefined, z.string().trim().default(DEFAULT_BIND_HOST)),
    HTTP_PORT: integerVar("HTTP_PORT", DEFAULT_HTTP_PORT, 0, 65535),
    HTTPS_PORT: integerVar("HTTPS_PORT", DEFAULT_HTTPS_PORT, 0, 65535),
    UDP_PORT: integerVar("UDP_PORT", DEFAULT_UDP_PORT, 0, 65535),
    TLS_CERT_PATH: pathVar,
    TLS_KEY_PATH: pathVar,
    SHUTDOWN_TIMEOUT_MS: integerVar("SHUTDOWN_TIMEOUT_MS", DEFAULT_SHUTDOWN_TIMEOUT_MS, 0, 60_000),
    BEACON_INTERVAL_MS: integerVar("BEACON_INTERVAL_MS", DEFAULT_BEACON_INTERVAL_MS, 1, 3_600_000),
  })
  .superRefine((env, ctx) => {
    if ((env.TLS_CERT_PATH === undefined) !== (env.TLS_KEY_PATH === undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "TLS_CERT_PATH and TLS_KEY_PATH must be set together" });
      return;
    }
    if (env.TLS_CERT_PATH !== undefined && env.HTTP_PORT !== 0 && env.HTTP_PORT === env.HTTPS_PORT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `HTTP_PORT and HTTPS_PORT must differ when TLS is enabled. Got: ${env.HTTP_PORT}`,
      });
    }
  })
  .transform(
    (env): ServerConfig => ({
      host: env.HOST,
      httpPort: env.HTTP_PORT,
      httpsPort: env.HTTPS_PORT,
      udpPort: env.UDP_PORT,
      tls:
        env.TLS_CERT_PATH !== undefined && env.TLS_KEY_PATH !== undefined
          ? { certPath: env.TLS_CERT_PATH, keyPath: env.TLS_KEY_PATH }
          : null,
      shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
      beaconIntervalMs: env.BEACON_INTERVAL_MS,
    }),
  );

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = envSchema.safeParse(env);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  if (!issue) {
    throw new Error(`[Config] Invalid environment: ${result.error.message}`);
  }
  const name = issue.path[0];
  const raw = typeof name === "string" ? env[name] : undefined;
  throw new Error(raw === undefined ? `[Config] ${issue.message}` : `[Config] ${issue.message}. Got: ${raw}`);
}
