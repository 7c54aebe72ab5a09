import { z } from "zod";

/** Random UUID assigned at submission. */
export const TaskId = z.string().min(1);
export type TaskId = z.infer<typeof TaskId>;

export const TaskStatus = z.enum(["queued", "distributed", "completed", "failed"]);
export type TaskStatus = z.infer<typeof TaskStatus>;

export const SubtaskStatus = z.enum(["assigned", "completed", "failed"]);
export type SubtaskStatus = z.infer<typeof SubtaskStatus>;

/** How a subtask's data was derived from the task payload. */
export const PartitionMode = z.enum(["split", "replica"]);
export type PartitionMode = z.infer<typeof PartitionMode>;

/** Device classes known to the registry, from most to least capable. */
export const DeviceType = z.enum(["server", "desktop", "laptop", "tablet", "mobile"]);
export type DeviceType = z.infer<typeof DeviceType>;

/** Resource requirements a task places on the devices it runs on. */
export const ResourceRequirements = z.object({
  /** Task types every matched device must be able to run. */
  capabilities: z.array(z.string().min(1)).default([]),
  /** Restrict to these device classes. Empty means any. */
  deviceTypes: z.array(DeviceType).default([]),
  minCpuCores: z.number().int().positive().optional(),
  minMemoryMb: z.number().int().positive().optional(),
  gpu: z.boolean().optional(),
  /** Upper bound on matched devices (and therefore subtasks). */
  maxDevices: z.number().int().positive().optional(),
});
export type ResourceRequirements = z.infer<typeof ResourceRequirements>;
export type ResourceRequirementsInput = z.input<typeof ResourceRequirements>;

export interface Subtask {
  /** `<taskId>:<index>`. */
  subtaskId: string;
  taskId: string;
  index: number;
  deviceId: string;
  mode: PartitionMode;
  data: unknown;
  status: SubtaskStatus;
  result?: unknown;
  error?: string;
  assignedAt: string;
  finishedAt?: string;
}

/** Diagnostic payload attached to failed tasks. */
export interface TaskFailure {
  reason: "no_capacity" | "all_subtasks_failed" | "timeout" | "invalid_payload";
  message: string;
  attempts?: number;
  failures?: Array<{ subtaskId: string; deviceId: string; error: string }>;
}

/** Read-only view of a task handed to callbacks and inspection APIs. */
export interface TaskRecord {
  taskId: TaskId;
  taskType: string;
  priority: number;
  originalPriority: number;
  data: unknown;
  requiredResources: ResourceRequirements;
  status: TaskStatus;
  /** Number of no-capacity requeues so far. */
  attempts: number;
  createdAt: string;
  updatedAt: string;
  distributedAt?: string;
  finishedAt?: string;
  deadlineAt?: string;
  subtasks: Subtask[];
  result?: unknown;
  error?: TaskFailure;
}

export type TaskCallback = (task: TaskRecord) => void | Promise<void>;

export function isTerminalTaskStatus(status: TaskStatus): boolean {
  return status === "completed" || status === "failed";
}

export function isTerminalSubtaskStatus(status: SubtaskStatus): boolean {
  return status === "completed" || status === "failed";
}
