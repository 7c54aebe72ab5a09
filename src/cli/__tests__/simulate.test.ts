import { describe, it, expect } from "vitest";
import { demoExecutor, runSimulation, toCelsius } from "../simulate.js";
import { formatTaskLine } from "../commands/simulate.js";
import { MeshConfig, type MeshConfigInput } from "../../schemas/config.js";
import { silentLogger } from "../../events/console.js";

function configWith(input: MeshConfigInput = {}): MeshConfig {
  return MeshConfig.parse({
    eventLog: { enabled: false },
    bus: { idleWaitMs: 10 },
    distributor: { idleWaitMs: 10 },
    ...input,
  });
}

const config = configWith();

const job = { subtaskId: "t:0", taskId: "t", replyTo: "agent.distributor" };

describe("demo executors", () => {
  it("converts Fahrenheit readings to Celsius", () => {
    expect(toCelsius(212)).toBe(100);
    expect(toCelsius(45.5)).toBe(7.5);
    expect(demoExecutor(0)({ ...job, taskType: "normalize", data: [32, "n/a", 50] })).toEqual([0, null, 10]);
  });

  it("gives each device its own forecast", () => {
    expect(demoExecutor(1)({ ...job, taskType: "forecast", data: {} })).toEqual({ temperatureC: 19, condition: "rain" });
    expect(demoExecutor(2)({ ...job, taskType: "forecast", data: {} })).toEqual({ temperatureC: 20, condition: "sun" });
  });

  it("rejects unknown task types", () => {
    expect(() => demoExecutor(0)({ ...job, taskType: "render", data: {} })).toThrow("Unsupported task type: render");
  });
});

describe("runSimulation", () => {
  it("runs the demo tasks on the demo fleet", async () => {
    const [forecast, normalize] = await runSimulation({ config, logger: silentLogger });

    expect(forecast?.status).toBe("completed");
    expect(forecast?.subtasks.map((s) => s.deviceId)).toEqual(["edge-server-1", "desktop-1", "laptop-1"]);
    expect(forecast?.result).toEqual({ temperatureC: 19, condition: "rain" });

    expect(normalize?.status).toBe("completed");
    expect(normalize?.subtasks.map((s) => s.deviceId)).toEqual(["tablet-1", "laptop-1", "desktop-1"]);
    expect(normalize?.result).toEqual([5, 7.5, 10, 12, 15, 17, 20, 22, 25, 27]);
  });

  it("uses the configured devices and tasks", async () => {
    const tasks = await runSimulation({
      config: configWith({ devices: [{ id: "solo", type: "laptop" }] }),
      tasks: [{ taskType: "normalize", priority: 5, data: [32] }],
      logger: silentLogger,
    });

    expect(tasks.map((t) => [t.status, t.result])).toEqual([["completed", [0]]]);
  });
});

describe("formatTaskLine", () => {
  it("summarizes completed and failed tasks", async () => {
    const [forecast] = await runSimulation({
      config,
      tasks: [{ taskType: "forecast", priority: 0, data: { station: "x" }, requiredResources: { maxDevices: 1 } }],
      logger: silentLogger,
    });
    if (!forecast) throw new Error("no task returned");

    expect(formatTaskLine(forecast)).toBe(
      '✅ forecast (1 subtask(s) on edge-server-1): {"temperatureC":18,"condition":"rain"}',
    );
    expect(
      formatTaskLine({
        ...forecast,
        status: "failed",
        error: { reason: "no_capacity", message: "No device matched after 6 attempts" },
      }),
    ).toBe("❌ forecast failed: no_capacity: No device matched after 6 attempts");
  });
});
