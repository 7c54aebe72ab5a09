import type { MeshServiceStatus } from "../service/mesh-service.js";

export type ComponentState = "running" | "stopped" | "dead";

export interface HealthStatus {
  status: "healthy" | "degraded" | "unhealthy";
  version: string;
  uptime: number;
  lastEventAt: number;
  taskCounts: {
    queued: number;
    distributed: number;
    completed: number;
    failed: number;
  };
  queues: {
    bus: number;
    distributor: number;
    backingOff: number;
  };
  components: {
    bus: ComponentState;
    distributor: ComponentState;
    eventLogger: "ok" | "disabled";
  };
  devices: {
    registered: number;
    active: number;
  };
}

/** Extra context for rich /status responses. */
export interface DaemonStatusContext {
  version: string;
  uptime: number;
  lastEventAt?: number;
  eventLoggerEnabled: boolean;
}

/** Whether the daemon process is in shutdown mode. */
let shuttingDown = false;

/** Mark the daemon as shutting down (liveness will report error). */
export function setShuttingDown(value: boolean): void {
  shuttingDown = value;
}

/**
 * Minimal liveness check for supervisor watchdog.
 * No async work -- returns synchronously.
 */
export function getLivenessStatus(): { status: "ok" | "error" } {
  return { status: shuttingDown ? "error" : "ok" };
}

/** A loop that should be running but has exited is dead. */
function componentState(shouldRun: boolean, loopAlive: boolean): ComponentState {
  if (loopAlive) return "running";
  return shouldRun ? "dead" : "stopped";
}

/**
 * Derive health from a service status snapshot.
 *
 * - unhealthy: a background loop died while the service is running
 * - degraded: tasks are waiting but no device is active
 */
export function getHealthStatus(service: MeshServiceStatus, context: DaemonStatusContext): HealthStatus {
  const bus = componentState(service.running, service.bus.loopAlive);
  const distributor = componentState(service.running, service.distributor.loopAlive);
  const { byStatus } = service.distributor;

  let status: HealthStatus["status"] = "healthy";
  if (bus === "dead" || distributor === "dead") status = "unhealthy";
  else if (byStatus.queued > 0 && service.devices.active === 0) status = "degraded";

  return {
    status,
    version: context.version,
    uptime: context.uptime,
    lastEventAt: context.lastEventAt ?? 0,
    taskCounts: {
      queued: byStatus.queued,
      distributed: byStatus.distributed,
      completed: service.distributor.completed,
      failed: service.distributor.failed,
    },
    queues: {
      bus: service.bus.queued,
      distributor: service.distributor.queueDepth,
      backingOff: service.distributor.backingOff,
    },
    components: {
      bus,
      distributor,
      eventLogger: context.eventLoggerEnabled ? "ok" : "disabled",
    },
    devices: {
      registered: service.devices.registered,
      active: service.devices.active,
    },
  };
}
