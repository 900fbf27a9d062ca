import { describeError } from "@starlane/replication";
import { startServer } from "./app.js";
import { loadConfig } from "./config.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const running = await startServer(config);

  for (const listener of running.listeners) {
    console.log(`🚀 ${listener.toString()}`);
  }
  const udp = running.datagram.address();
  console.log(`📡 Datagram endpoint on ${udp.address}:${udp.port}`);
  console.log(`🛰️  Beacon entity ${running.beacon.entity.id} publishing every ${config.beaconIntervalMs}ms`);

  const stop = (signal: NodeJS.Signals) => {
    console.log(`🛑 Received ${signal}, shutting down`);
    running.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(`❌ Shutdown failed: ${describeError(error)}`);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
}

main().catch((error: unknown) => {
  console.error(`❌ Failed to start server: ${describeError(error)}`);
  process.exit(1);
});
