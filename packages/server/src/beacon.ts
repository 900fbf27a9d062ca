import {
  integerCodec,
  textCodec,
  type Entity,
  type EntityDirectory,
  type ReplicatedProperty,
} from "@starlane/replication";

export const DEFAULT_MOTD = "Welcome aboard";
export const MAX_MOTD_LENGTH = 140;

export interface BeaconConfig {
  /** How often `uptime` is republished, in milliseconds */
  intervalMs: number;
  /** Clock (default: Date.now) */
  now?: () => number;
}

/**
 * Demonstration entity: publishes the server uptime in whole seconds and a
 * message of the day that clients may overwrite.
 */
export class Beacon {
  readonly entity: Entity;
  readonly uptime: ReplicatedProperty<bigint>;
  readonly motd: ReplicatedProperty<string>;
  private intervalMs: number;
  private now: () => number;
  private startedAt: number;
  private intervalId: NodeJS.Timeout | null = null;

  constructor(entities: EntityDirectory, config: BeaconConfig) {
    if (!Number.isFinite(config.intervalMs) || config.intervalMs <= 0) {
      throw new Error(`[Beacon] intervalMs must be a positive number. Got: ${config.intervalMs}`);
    }
    this.intervalMs = config.intervalMs;
    this.now = config.now ?? Date.now;
    this.startedAt = this.now();

    this.entity = entities.spawn();
    this.uptime = this.entity.defineProperty("uptime", { codec: integerCodec({ min: 0n }), initial: 0n });
    this.motd = this.entity.defineProperty("motd", {
      codec: textCodec({ maxLength: MAX_MOTD_LENGTH }),
      initial: DEFAULT_MOTD,
      remoteWritable: true,
    });
  }

  start(): void {
    if (this.intervalId) return;
    this.intervalId = setInterval(() => this.tick(), this.intervalMs);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  isRunning(): boolean {
    return this.intervalId !== null;
  }

  /**
   * Publish the current uptime. Only changed values reach subscribers.
   */
  tick(): void {
    const seconds = BigInt(Math.max(0, Math.floor((this.now() - this.startedAt) / 1000)));
    if (seconds !== this.uptime.read()) {
      this.uptime.update(seconds);
    }
  }
}
