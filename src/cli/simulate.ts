/**
 * In-process simulation: a small device fleet running demo executors, fed a
 * few tasks, printed once every task has finalized.
 */

import { MeshService } from "../service/mesh-service.js";
import type { TaskExecutor } from "../agents/device-agent.js";
import type { Logger } from "../events/console.js";
import type { DeviceProfileInput, MeshConfig } from "../schemas/config.js";
import type { SubmitTaskInput } from "../dispatch/task-distributor.js";
import type { TaskRecord } from "../schemas/task.js";

/** Fleet used when the config lists no devices. */
export const DEMO_DEVICES: DeviceProfileInput[] = [
  { id: "edge-server-1", type: "server", capabilities: ["forecast", "normalize"], cpuCores: 16, memoryMb: 32_768, gpu: true, performanceScore: 90 },
  { id: "desktop-1", type: "desktop", capabilities: ["forecast", "normalize"], cpuCores: 8, memoryMb: 16_384, performanceScore: 70 },
  { id: "laptop-1", type: "laptop", capabilities: ["forecast", "normalize"], cpuCores: 4, memoryMb: 8_192, performanceScore: 55 },
  { id: "tablet-1", type: "tablet", capabilities: ["normalize"], cpuCores: 4, memoryMb: 4_096, performanceScore: 35 },
];

export const DEMO_TASKS: Array<Omit<SubmitTaskInput, "callback">> = [
  {
    taskType: "forecast",
    priority: 0,
    data: { station: "city-centre", horizonHours: 24 },
    requiredResources: { capabilities: ["forecast"], maxDevices: 3 },
  },
  {
    taskType: "normalize",
    priority: 2,
    data: [41, 45.5, 50, 53.6, 59, 62.6, 68, 71.6, 77, 80.6],
    requiredResources: { capabilities: ["normalize"] },
  },
];

/** Fahrenheit → Celsius, one decimal. */
export function toCelsius(fahrenheit: number): number {
  return Math.round(((fahrenheit - 32) * 5) / 9 * 10) / 10;
}

/**
 * Demo executor for one device. `forecast` answers with a device-specific
 * reading so replicas disagree a little; `normalize` converts readings.
 */
export function demoExecutor(deviceIndex: number): TaskExecutor {
  return (job) => {
    switch (job.taskType) {
      case "forecast":
        return {
          temperatureC: 18 + deviceIndex,
          condition: deviceIndex % 3 === 2 ? "sun" : "rain",
        };
      case "normalize": {
        if (!Array.isArray(job.data)) throw new Error("normalize expects an array of readings");
        return job.data.map((v) => (typeof v === "number" ? toCelsius(v) : null));
      }
      default:
        throw new Error(`Unsupported task type: ${job.taskType}`);
    }
  };
}

export interface SimulationOptions {
  config: MeshConfig;
  tasks?: Array<Omit<SubmitTaskInput, "callback">>;
  logger?: Logger;
}

export async function runSimulation(opts: SimulationOptions): Promise<TaskRecord[]> {
  const devices = opts.config.devices.length > 0 ? opts.config.devices : DEMO_DEVICES;
  const service = new MeshService({ ...opts.config, devices: [] }, { logger: opts.logger });
  devices.forEach((device, index) => service.attachDevice(device, demoExecutor(index)));

  await service.start();
  try {
    const ids = (opts.tasks ?? DEMO_TASKS).map((task) => service.submitTask(task));
    return await Promise.all(ids.map((id) => service.distributor.waitForTask(id)));
  } finally {
    await service.stop();
  }
}
