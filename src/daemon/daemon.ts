import { join } from "node:path";
import { existsSync, readFileSync, unlinkSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import type { Server } from "node:http";
import writeFileAtomic from "write-file-atomic";
import { MeshService, type MeshServiceDependencies } from "../service/mesh-service.js";
import type { MeshConfigInput } from "../schemas/config.js";
import { errorMessage } from "../events/console.js";
import { getHealthStatus, setShuttingDown, type HealthStatus } from "./health.js";
import { createHealthServer, selfCheck } from "./server.js";

export const DAEMON_VERSION = "0.1.0";

export interface MeshDaemonOptions extends MeshServiceDependencies {
  config?: MeshConfigInput;
  /** Pre-built service; `config` is ignored when set. */
  service?: MeshService;
  /** Path to Unix domain socket for health server. Default: join(dataDir, "daemon.sock"). */
  socketPath?: string;
  enableHealthServer?: boolean;
  /** Install SIGTERM/SIGINT drain handlers. Default: true. */
  handleSignals?: boolean;
}

export interface MeshDaemonContext {
  service: MeshService;
  healthServer?: Server;
  health(): HealthStatus;
  /** Drain the service, close the health server, remove PID and socket files. */
  shutdown(): Promise<void>;
}

function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0); // Signal 0 checks existence
    return true;
  } catch {
    return false;
  }
}

function removeIfPresent(path: string): void {
  if (existsSync(path)) unlinkSync(path);
}

export async function startMeshDaemon(opts: MeshDaemonOptions = {}): Promise<MeshDaemonContext> {
  const service = opts.service ?? new MeshService(opts.config ?? {}, opts);
  const dataDir = service.config.dataDir;
  const socketPath = opts.socketPath ?? join(dataDir, "daemon.sock");
  const lockFile = join(dataDir, "daemon.pid");
  const startTime = Date.now();

  // Reset shutdown flag from any previous run in this process (important for tests)
  setShuttingDown(false);
  await mkdir(dataDir, { recursive: true });

  // --- Crash recovery detection ---
  let previousPid: number | undefined;
  if (existsSync(lockFile)) {
    const pid = parseInt(readFileSync(lockFile, "utf-8").trim(), 10);
    if (!isNaN(pid) && isProcessRunning(pid)) {
      throw new Error(`Mesh daemon already running (PID: ${pid})`);
    }
    // Stale PID file — previous instance crashed
    previousPid = isNaN(pid) ? undefined : pid;
    unlinkSync(lockFile);
  }

  const health = (): HealthStatus =>
    getHealthStatus(service.getStatus(), {
      version: DAEMON_VERSION,
      uptime: Date.now() - startTime,
      lastEventAt: service.events?.lastEventAt,
      eventLoggerEnabled: service.events !== undefined,
    });

  let healthServer: Server | undefined;
  if (opts.enableHealthServer ?? true) {
    const server = createHealthServer(health, socketPath);
    await new Promise<void>((resolve, reject) => {
      server.once("listening", resolve);
      server.once("error", reject);
    });

    if (!(await selfCheck(socketPath))) {
      server.close();
      throw new Error("Health server failed to start");
    }
    healthServer = server;
  }

  // PID file only after the self-check succeeds
  await writeFileAtomic(lockFile, String(process.pid));
  await service.start();

  if (previousPid !== undefined) {
    console.info(`[mesh] Recovered from crash (previous PID: ${previousPid})`);
    try {
      await service.events?.logSystem("system.crash_recovery", {
        previousPid,
        recoveredAt: new Date().toISOString(),
      });
    } catch (err) {
      // Logging errors should not block startup
      console.warn(`[mesh] Failed to log crash recovery: ${errorMessage(err)}`);
    }
  }

  let stopping: Promise<void> | undefined;
  const shutdown = (): Promise<void> => {
    stopping ??= (async () => {
      setShuttingDown(true);
      await service.stop();
      if (healthServer) {
        const server = healthServer;
        await new Promise<void>((resolve) => server.close(() => resolve()));
      }
      removeIfPresent(lockFile);
      if (healthServer) removeIfPresent(socketPath);
    })();
    return stopping;
  };

  if (opts.handleSignals ?? true) {
    const drainAndExit = async () => {
      await shutdown();
      process.exit(0);
    };
    process.once("SIGTERM", () => { void drainAndExit(); });
    process.once("SIGINT", () => { void drainAndExit(); });
  }

  return { service, healthServer, health, shutdown };
}
