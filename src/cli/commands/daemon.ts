/**
 * Daemon commands: `serve` runs the mesh in the foreground, `health` asks a
 * running daemon for its status over the Unix socket.
 */

import { join } from "node:path";
import type { Command } from "commander";
import { loadMeshConfig } from "../../config/manager.js";
import { startMeshDaemon } from "../../daemon/daemon.js";
import { queryStatus } from "../../daemon/server.js";
import { errorMessage } from "../../events/console.js";
import { configPathOf } from "./config-commands.js";

export function registerDaemonCommands(program: Command): void {
  program
    .command("serve")
    .description("Run the mesh daemon (bus, registry, distributor, health socket)")
    .option("--socket <path>", "Health socket path (default: <dataDir>/daemon.sock)")
    .option("--no-health", "Disable the health server")
    .action(async (opts: { socket?: string; health: boolean }) => {
      try {
        const config = await loadMeshConfig(configPathOf(program));
        const daemon = await startMeshDaemon({
          config,
          socketPath: opts.socket,
          enableHealthServer: opts.health,
        });
        const socket = opts.socket ?? join(config.dataDir, "daemon.sock");
        console.log(`Mesh daemon started (PID: ${process.pid})`);
        if (daemon.healthServer) console.log(`Health: ${socket}`);
        console.log(`Devices: ${config.devices.length} registered from config`);
      } catch (err) {
        console.error(`❌ ${errorMessage(err)}`);
        process.exitCode = 1;
      }
    });

  program
    .command("health")
    .description("Query a running daemon's /status endpoint")
    .option("--socket <path>", "Health socket path (default: <dataDir>/daemon.sock)")
    .action(async (opts: { socket?: string }) => {
      try {
        const socket = opts.socket ?? join((await loadMeshConfig(configPathOf(program))).dataDir, "daemon.sock");
        const { statusCode, body } = await queryStatus(socket);
        console.log(JSON.stringify(body, null, 2));
        if (statusCode !== 200) process.exitCode = 1;
      } catch (err) {
        console.error(`❌ Daemon not reachable: ${errorMessage(err)}`);
        process.exitCode = 1;
      }
    });
}
