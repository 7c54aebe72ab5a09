/**
 * MeshService — wires the bus, device registry, distributor and any local
 * device agents from one `MeshConfig`, and owns their start/stop order.
 */

import { join } from "node:path";
import { MessageBus } from "../bus/message-bus.js";
import { InMemoryDeviceRegistry } from "../devices/registry.js";
import { TaskDistributor, type SubmitTaskInput } from "../dispatch/task-distributor.js";
import type { AggregationRegistry } from "../dispatch/aggregation.js";
import { createDeviceAgent, type TaskExecutor } from "../agents/device-agent.js";
import type { Agent } from "../agents/agent.js";
import { EventLogger } from "../events/logger.js";
import { consoleLogger, errorMessage, type Logger } from "../events/console.js";
import { MeshConfig, type DeviceProfileInput, type MeshConfigInput } from "../schemas/config.js";

export interface MeshServiceDependencies {
  logger?: Logger;
  events?: EventLogger;
  aggregators?: AggregationRegistry;
  now?: () => number;
}

export interface MeshServiceStatus {
  running: boolean;
  startedAt?: string;
  bus: ReturnType<MessageBus["getStats"]>;
  distributor: ReturnType<TaskDistributor["getStats"]>;
  devices: { registered: number; active: number; localAgents: number };
}

export class MeshService {
  readonly config: MeshConfig;
  readonly bus: MessageBus;
  readonly registry: InMemoryDeviceRegistry;
  readonly distributor: TaskDistributor;
  readonly events?: EventLogger;
  private readonly logger: Logger;
  private readonly agents = new Map<string, Agent>();
  private running = false;
  private startedAt?: number;

  constructor(config: MeshConfigInput = {}, deps: MeshServiceDependencies = {}) {
    this.config = MeshConfig.parse(config);
    this.logger = deps.logger ?? consoleLogger;
    this.events = deps.events
      ?? (this.config.eventLog.enabled ? new EventLogger(join(this.config.dataDir, "events")) : undefined);

    this.bus = new MessageBus({ ...this.config.bus, logger: this.logger, events: this.events });
    this.registry = new InMemoryDeviceRegistry({ ...this.config.registry, now: deps.now });
    for (const device of this.config.devices) this.registry.register(device);

    this.distributor = new TaskDistributor({
      bus: this.bus,
      registry: this.registry,
      config: this.config.distributor,
      logger: this.logger,
      events: this.events,
      aggregators: deps.aggregators,
      now: deps.now,
    });
  }

  /** Start the bus first so the distributor's first publish has a consumer. */
  async start(): Promise<void> {
    if (this.running) return;
    this.bus.start();
    for (const agent of this.agents.values()) agent.start();
    this.distributor.start();
    this.running = true;
    this.startedAt = Date.now();
    await this.logSystem("system.startup", { devices: this.registry.list().length });
  }

  /** Stop intake first, then let the bus drain. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await this.distributor.stop();
    for (const agent of this.agents.values()) agent.stop();
    await this.bus.stop();
    await this.logSystem("system.shutdown", { stats: this.distributor.getStats() });
  }

  /**
   * Register a device and run an in-process agent for it. The agent starts
   * immediately when the service is running, otherwise with `start()`.
   */
  attachDevice(profile: DeviceProfileInput, executor: TaskExecutor): Agent {
    this.detachDevice(profile.id);
    const deviceId = this.registry.register(profile).profile.id;
    const agent = createDeviceAgent({ bus: this.bus, deviceId, executor, logger: this.logger });
    this.agents.set(deviceId, agent);
    if (this.running) agent.start();
    return agent;
  }

  detachDevice(deviceId: string): boolean {
    const agent = this.agents.get(deviceId);
    if (!agent) return false;
    agent.stop();
    this.agents.delete(deviceId);
    this.registry.setAvailability(deviceId, false);
    return true;
  }

  submitTask(input: SubmitTaskInput): string {
    return this.distributor.submitTask(input);
  }

  getStatus(): MeshServiceStatus {
    const system = this.registry.getSystemStats();
    return {
      running: this.running,
      ...(this.startedAt !== undefined ? { startedAt: new Date(this.startedAt).toISOString() } : {}),
      bus: this.bus.getStats(),
      distributor: this.distributor.getStats(),
      devices: { registered: system.deviceCount, active: system.activeDevices, localAgents: this.agents.size },
    };
  }

  private async logSystem(type: "system.startup" | "system.shutdown", payload: Record<string, unknown>): Promise<void> {
    if (!this.events) return;
    try {
      await this.events.logSystem(type, payload);
    } catch (err) {
      // Event log failures must not block startup or shutdown
      this.logger.warn("Failed to write system event", { type, error: errorMessage(err) });
    }
  }
}
