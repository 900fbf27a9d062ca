import { Server } from "socket.io";
import {
  HttpListener,
  ReplicationServer,
  type DatagramEndpoint,
  type ListenerOptions,
} from "@starlane/replication";
import { Beacon } from "./beacon.js";
import type { ServerConfig } from "./config.js";
import { createRequestHandler } from "./routes.js";

/**
 * Handle on a started server process.
 */
export interface RunningServer {
  replication: ReplicationServer;
  beacon: Beacon;
  io: Server;
  /** Listener Socket.IO and the HTTP API are served on */
  primary: HttpListener;
  /** Every listener, primary first */
  listeners: HttpListener[];
  datagram: DatagramEndpoint;
  /** Stop the beacon, close every session and shut every listener down. Idempotent. */
  shutdown(): Promise<void>;
}

async function startListeners(
  config: ServerConfig,
  handler: ReturnType<typeof createRequestHandler>,
): Promise<HttpListener[]> {
  const options: ListenerOptions = { shutdownTimeoutMs: config.shutdownTimeoutMs };
  if (!config.tls) {
    return [await HttpListener.plain(handler, { host: config.host, port: config.httpPort }, options)];
  }

  const encrypted = await HttpListener.encrypted(handler, { host: config.host, port: config.httpsPort }, config.tls, options);
  try {
    const redirect = await HttpListener.redirect({ host: config.host, port: config.httpPort }, options);
    return [encrypted, redirect];
  } catch (error) {
    await encrypted.shutdown();
    throw error;
  }
}

/**
 * Bring up listeners, Socket.IO, the datagram endpoint and the beacon.
 * Anything already started is shut down again if a later step fails.
 */
export async function startServer(config: ServerConfig): Promise<RunningServer> {
  const replication = new ReplicationServer();
  const beacon = new Beacon(replication.entities, { intervalMs: config.beaconIntervalMs });
  const handler = createRequestHandler({
    replication,
    startTime: Date.now(),
    transports: config.tls ? ["websocket", "polling", "udp", "https"] : ["websocket", "polling", "udp"],
  });

  const listeners = await startListeners(config, handler);
  const primary = listeners[0];
  if (!primary) {
    throw new Error("[Server] No listener started");
  }

  const io = new Server(primary.server, {
    pingTimeout: 60000,
    pingInterval: 25000,
  });
  replication.attachSocketServer(io);

  let datagram: DatagramEndpoint;
  try {
    datagram = await replication.bindDatagramEndpoint({ host: config.host, port: config.udpPort });
  } catch (error) {
    await Promise.all(listeners.map((listener) => listener.shutdown()));
    throw error;
  }

  beacon.start();

  let stopping: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (!stopping) {
      stopping = (async () => {
        beacon.stop();
        await replication.close();
        const outcomes = await Promise.all(listeners.map((listener) => listener.shutdown()));
        await io.close();
        console.log(`[Server] Stopped (${outcomes.join(", ")})`);
      })();
    }
    return stopping;
  };

  return { replication, beacon, io, primary, listeners, datagram, shutdown };
}
