import { describe, it, expect, afterEach } from "vitest";
import { getHealthStatus, getLivenessStatus, setShuttingDown } from "../health.js";
import { MeshService, type MeshServiceStatus } from "../../service/mesh-service.js";
import { silentLogger } from "../../events/console.js";

const context = { version: "0.1.0", uptime: 5_000, eventLoggerEnabled: false };

function idleStatus(): MeshServiceStatus {
  return new MeshService({ eventLog: { enabled: false } }, { logger: silentLogger }).getStatus();
}

describe("liveness", () => {
  afterEach(() => {
    setShuttingDown(false);
  });

  it("reports ok until shutdown begins", () => {
    expect(getLivenessStatus()).toEqual({ status: "ok" });
    setShuttingDown(true);
    expect(getLivenessStatus()).toEqual({ status: "error" });
  });
});

describe("getHealthStatus", () => {
  it("reports a stopped service as healthy with stopped components", () => {
    const health = getHealthStatus(idleStatus(), context);
    expect(health).toEqual({
      status: "healthy",
      version: "0.1.0",
      uptime: 5_000,
      lastEventAt: 0,
      taskCounts: { queued: 0, distributed: 0, completed: 0, failed: 0 },
      queues: { bus: 0, distributor: 0, backingOff: 0 },
      components: { bus: "stopped", distributor: "stopped", eventLogger: "disabled" },
      devices: { registered: 0, active: 0 },
    });
  });

  it("is degraded when tasks wait and no device is active", () => {
    const service = new MeshService({ eventLog: { enabled: false } }, { logger: silentLogger });
    service.submitTask({ taskType: "normalize", priority: 1, data: [1] });

    const health = getHealthStatus(service.getStatus(), { ...context, eventLoggerEnabled: true, lastEventAt: 42 });
    expect(health.status).toBe("degraded");
    expect(health.taskCounts.queued).toBe(1);
    expect(health.queues.distributor).toBe(1);
    expect(health.components.eventLogger).toBe("ok");
    expect(health.lastEventAt).toBe(42);
  });

  it("is unhealthy when a loop died while running", () => {
    const status = idleStatus();
    const dead: MeshServiceStatus = {
      ...status,
      running: true,
      bus: { ...status.bus, running: true, loopAlive: true },
      distributor: { ...status.distributor, loopAlive: false },
    };

    const health = getHealthStatus(dead, context);
    expect(health.status).toBe("unhealthy");
    expect(health.components).toEqual({ bus: "running", distributor: "dead", eventLogger: "disabled" });
  });
});
