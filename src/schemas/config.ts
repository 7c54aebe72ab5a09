/**
 * Mesh configuration schema.
 *
 * Config is a single YAML file validated against these schemas; every section
 * has defaults so an empty file is a valid config.
 */

import { z } from "zod";
import { DeviceType } from "./task.js";

/** Message bus configuration. */
export const BusConfig = z.object({
  /** How long the dispatch loop sleeps on an empty queue before re-checking shutdown (ms). */
  idleWaitMs: z.number().int().positive().default(1_000),
  /** Max time `stop()` waits for the queue to drain (ms). */
  drainTimeoutMs: z.number().int().nonnegative().default(5_000),
});
export type BusConfig = z.infer<typeof BusConfig>;

/** Task distributor configuration. */
export const DistributorConfig = z.object({
  /** Topic devices publish `subtask_result` messages on. */
  resultTopic: z.string().min(1).default("agent.distributor"),
  /** Sleep on an empty priority queue (ms). */
  idleWaitMs: z.number().int().positive().default(1_000),
  /** Max time `stop()` waits for the distribution loop to exit (ms). */
  drainTimeoutMs: z.number().int().nonnegative().default(5_000),
  /** No-capacity requeues allowed before a task fails with `no_capacity`. */
  maxRequeues: z.number().int().nonnegative().default(5),
  /** Priority demotion applied on each no-capacity requeue. */
  requeuePriorityStep: z.number().positive().default(1),
  /** Base delay before a requeued task re-enters the queue; doubles per attempt (ms). */
  requeueBackoffMs: z.number().int().nonnegative().default(500),
  /** Cap on the requeue delay (ms). */
  maxRequeueBackoffMs: z.number().int().nonnegative().default(30_000),
  /** Deadline for a distributed task; 0 disables the deadline sweep (ms). */
  taskTimeoutMs: z.number().int().nonnegative().default(300_000),
  /** How often the loop sweeps for expired tasks (ms). */
  sweepIntervalMs: z.number().int().positive().default(1_000),
  /** Finished tasks kept for inspection after their callback fired. */
  finishedTaskRetention: z.number().int().nonnegative().default(1_000),
});
export type DistributorConfig = z.infer<typeof DistributorConfig>;

/** In-memory device registry configuration. */
export const RegistryConfig = z.object({
  /** Devices silent for longer than this are not offered work (ms). */
  heartbeatTtlMs: z.number().int().positive().default(3_600_000),
  /** Default cap on devices per task when the task sets none. */
  maxDevicesPerTask: z.number().int().positive().default(3),
  /** Devices scoring at or above this are reserved for urgent tasks. */
  reservedPerformanceScore: z.number().min(0).max(100).default(80),
  /** Highest (numerically) priority still allowed onto reserved devices. */
  reservedMaxPriority: z.number().default(1),
});
export type RegistryConfig = z.infer<typeof RegistryConfig>;

/** Static device seeded into the registry at startup. */
export const DeviceProfile = z.object({
  id: z.string().min(1),
  type: DeviceType,
  capabilities: z.array(z.string().min(1)).default([]),
  cpuCores: z.number().int().positive().default(1),
  memoryMb: z.number().int().positive().default(1_024),
  gpu: z.boolean().default(false),
  /** 0–100; higher is faster. */
  performanceScore: z.number().min(0).max(100).default(50),
});
export type DeviceProfile = z.infer<typeof DeviceProfile>;
export type DeviceProfileInput = z.input<typeof DeviceProfile>;

/** Event log configuration. */
export const EventLogConfig = z.object({
  /** Enable the JSONL event log under `<dataDir>/events`. */
  enabled: z.boolean().default(true),
});
export type EventLogConfig = z.infer<typeof EventLogConfig>;

/** Top-level mesh configuration. */
export const MeshConfig = z.object({
  schemaVersion: z.literal(1).default(1),
  /** Root directory for runtime data (events, pid file, socket). */
  dataDir: z.string().default(".mesh"),
  bus: BusConfig.default({}),
  distributor: DistributorConfig.default({}),
  registry: RegistryConfig.default({}),
  eventLog: EventLogConfig.default({}),
  devices: z.array(DeviceProfile).default([]),
});
export type MeshConfig = z.infer<typeof MeshConfig>;
export type MeshConfigInput = z.input<typeof MeshConfig>;
