/**
 * Task Distributor — priority queue of submitted tasks, matched to devices,
 * split into subtasks, and folded back into one result.
 *
 * Responsibilities:
 * - Validate and enqueue submissions by (priority, arrival order)
 * - Drain the queue on a single background loop: match devices through the
 *   registry, partition, publish `execute_task` to `device.<id>`
 * - Requeue no-capacity tasks demoted and backed off, failing them once
 *   `maxRequeues` is exceeded
 * - Record `subtask_result` messages under a per-task lock and finalize the
 *   task exactly once when every subtask is terminal
 * - Fail subtasks still outstanding at the task deadline
 */

import { randomUUID } from "node:crypto";
import type { MessageBus, SubscriptionHandle } from "../bus/message-bus.js";
import { WakeSignal, settleWithin } from "../bus/wake-signal.js";
import type { DeviceRegistry } from "../devices/registry.js";
import type { EventLogger } from "../events/logger.js";
import type { EventType } from "../schemas/event.js";
import { consoleLogger, errorMessage, type Logger } from "../events/console.js";
import { DistributorConfig } from "../schemas/config.js";
import {
  SubtaskResultContent,
  createMessage,
  deviceTopic,
  formatIssues,
  type ExecuteTaskContent,
  type Message,
} from "../schemas/message.js";
import {
  ResourceRequirements,
  isTerminalSubtaskStatus,
  isTerminalTaskStatus,
  type ResourceRequirementsInput,
  type Subtask,
  type TaskCallback,
  type TaskFailure,
  type TaskRecord,
  type TaskStatus,
} from "../schemas/task.js";
import { AggregationRegistry } from "./aggregation.js";
import { partitionPayload, type SubtaskPlan } from "./partition.js";
import { PriorityQueue } from "./priority-queue.js";
import { InMemoryTaskLockManager, type TaskLockManager } from "./task-lock.js";

export const DISTRIBUTOR_AGENT_TYPE = "distributor";

export interface SubmitTaskInput {
  taskType: string;
  /** Lower runs first. */
  priority: number;
  data: unknown;
  requiredResources?: ResourceRequirementsInput;
  /** Invoked once with the final record. */
  callback?: TaskCallback;
}

export type DistributionAction = "distributed" | "requeued" | "failed" | "skipped";

export interface DistributionOutcome {
  taskId: string;
  action: DistributionAction;
  deviceIds?: string[];
}

export type SubtaskResultOutcome =
  | "recorded"
  | "finalized"
  | "duplicate"
  | "malformed"
  | "unsupported"
  | "unknown_task"
  | "unknown_subtask";

export interface TaskDistributorOptions {
  bus: MessageBus;
  registry: DeviceRegistry;
  config?: Partial<DistributorConfig>;
  id?: string;
  logger?: Logger;
  events?: EventLogger;
  aggregators?: AggregationRegistry;
  locks?: TaskLockManager;
  /** Epoch-ms clock; injectable for deadline tests. */
  now?: () => number;
}

export interface DistributorStats {
  running: boolean;
  loopAlive: boolean;
  queueDepth: number;
  backingOff: number;
  active: number;
  byStatus: Record<TaskStatus, number>;
  submitted: number;
  completed: number;
  failed: number;
  requeues: number;
}

interface TaskEntry {
  record: TaskRecord;
  callback?: TaskCallback;
  /** Epoch ms; set on distribution when a timeout is configured. */
  deadline?: number;
  expired: boolean;
}

function snapshot(record: TaskRecord): TaskRecord {
  return {
    ...record,
    requiredResources: {
      ...record.requiredResources,
      capabilities: [...record.requiredResources.capabilities],
      deviceTypes: [...record.requiredResources.deviceTypes],
    },
    subtasks: record.subtasks.map((s) => ({ ...s })),
    ...(record.error ? { error: { ...record.error } } : {}),
  };
}

export class TaskDistributor {
  readonly id: string;
  private readonly bus: MessageBus;
  private readonly registry: DeviceRegistry;
  private readonly config: DistributorConfig;
  private readonly logger: Logger;
  private readonly events?: EventLogger;
  private readonly aggregators: AggregationRegistry;
  private readonly locks: TaskLockManager;
  private readonly now: () => number;

  private readonly queue = new PriorityQueue<string>();
  private readonly active = new Map<string, TaskEntry>();
  private readonly finished = new Map<string, TaskRecord>();
  private readonly backoffTimers = new Map<string, NodeJS.Timeout>();
  private readonly waiters = new Map<string, Array<(task: TaskRecord) => void>>();
  private readonly wake = new WakeSignal();

  private running = false;
  private loop?: Promise<void>;
  private loopAlive = false;
  private generation = 0;
  private subscription?: SubscriptionHandle;
  private lastSweepAt = 0;

  private submitted = 0;
  private completed = 0;
  private failed = 0;
  private requeues = 0;

  /** Error that terminated the distribution loop, if any. */
  lastError?: Error;

  constructor(opts: TaskDistributorOptions) {
    this.bus = opts.bus;
    this.registry = opts.registry;
    this.config = DistributorConfig.parse(opts.config ?? {});
    this.id = opts.id ?? `${DISTRIBUTOR_AGENT_TYPE}-${randomUUID().slice(0, 8)}`;
    this.logger = opts.logger ?? consoleLogger;
    this.events = opts.events;
    this.aggregators = opts.aggregators ?? new AggregationRegistry();
    this.locks = opts.locks ?? new InMemoryTaskLockManager();
    this.now = opts.now ?? Date.now;
  }

  get resultTopic(): string {
    return this.config.resultTopic;
  }

  // --- Lifecycle ---

  /**
   * Subscribe to the result topic and launch the distribution loop. A loop
   * still finishing a step after a timed-out `stop()` is resumed instead.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.subscription = this.bus.subscribe(this.config.resultTopic, async (message) => {
      await this.handleSubtaskResult(message);
    });
    if (this.loopAlive && !this.lastError) return;
    this.lastError = undefined;
    this.loopAlive = true;
    this.loop = this.runLoop(++this.generation);
  }

  /**
   * Stop the loop, waiting up to `drainTimeoutMs`. Tasks backing off are put
   * straight back on the queue so nothing is lost across a restart.
   */
  async stop(): Promise<boolean> {
    if (!this.running) return true;
    this.running = false;
    if (this.subscription) {
      this.bus.unsubscribe(this.subscription.topic, this.subscription);
      this.subscription = undefined;
    }
    this.wake.notify();

    const drained = this.loop ? await settleWithin(this.loop, this.config.drainTimeoutMs) : true;
    if (!drained) {
      this.logger.warn("Task distributor loop did not exit before timeout", {
        drainTimeoutMs: this.config.drainTimeoutMs,
      });
    }

    for (const [taskId, timer] of this.backoffTimers) {
      clearTimeout(timer);
      const entry = this.active.get(taskId);
      if (entry) this.queue.push(taskId, entry.record.priority);
    }
    this.backoffTimers.clear();
    return drained;
  }

  isRunning(): boolean {
    return this.running;
  }

  isLoopAlive(): boolean {
    return this.loopAlive;
  }

  // --- Ingress ---

  /** Validate and enqueue a task. Returns immediately with its ID. */
  submitTask(input: SubmitTaskInput): string {
    if (typeof input.taskType !== "string" || input.taskType.trim() === "") {
      throw new Error("taskType must be a non-empty string");
    }
    if (typeof input.priority !== "number" || !Number.isFinite(input.priority)) {
      throw new Error(`priority must be a finite number, got ${String(input.priority)}`);
    }
    if (input.data === null || input.data === undefined) {
      throw new Error("data must not be null or undefined");
    }
    const resources = ResourceRequirements.safeParse(input.requiredResources ?? {});
    if (!resources.success) {
      throw new Error(`Invalid requiredResources: ${formatIssues(resources.error).join("; ")}`);
    }

    const taskId = randomUUID();
    const createdAt = new Date(this.now()).toISOString();
    const record: TaskRecord = {
      taskId,
      taskType: input.taskType,
      priority: input.priority,
      originalPriority: input.priority,
      data: input.data,
      requiredResources: resources.data,
      status: "queued",
      attempts: 0,
      createdAt,
      updatedAt: createdAt,
      subtasks: [],
    };

    this.active.set(taskId, { record, callback: input.callback, expired: false });
    this.queue.push(taskId, record.priority);
    this.submitted++;
    this.wake.notify();
    void this.emit("task.submitted", taskId, { taskType: record.taskType, priority: record.priority });
    return taskId;
  }

  /**
   * Record one `subtask_result` message. Malformed, unknown and duplicate
   * results are logged and dropped; the returned outcome says which.
   */
  async handleSubtaskResult(message: Message): Promise<SubtaskResultOutcome> {
    if (message.messageType !== "subtask_result") {
      this.logger.warn(`Distributor ignored "${message.messageType}" message`, { senderId: message.senderId });
      return "unsupported";
    }

    const parsed = SubtaskResultContent.safeParse(message.content);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      this.logger.warn("Dropped malformed subtask result", { senderId: message.senderId, issues });
      void this.emit("subtask.rejected", undefined, { reason: "malformed", senderId: message.senderId, issues });
      return "malformed";
    }
    const content = parsed.data;

    return this.locks.withLock(content.taskId, async (): Promise<SubtaskResultOutcome> => {
      const entry = this.active.get(content.taskId);
      if (!entry) {
        this.logger.warn("Dropped result for unknown or finished task", {
          taskId: content.taskId,
          subtaskId: content.subtaskId,
        });
        await this.emit("subtask.rejected", content.taskId, { reason: "unknown_task", subtaskId: content.subtaskId });
        return "unknown_task";
      }

      const subtask = entry.record.subtasks.find((s) => s.subtaskId === content.subtaskId);
      if (!subtask) {
        this.logger.warn("Dropped result for unknown subtask", {
          taskId: content.taskId,
          subtaskId: content.subtaskId,
        });
        await this.emit("subtask.rejected", content.taskId, { reason: "unknown_subtask", subtaskId: content.subtaskId });
        return "unknown_subtask";
      }

      if (isTerminalSubtaskStatus(subtask.status)) {
        this.logger.info("Ignored duplicate subtask result", { taskId: content.taskId, subtaskId: content.subtaskId });
        return "duplicate";
      }

      subtask.status = content.status;
      subtask.finishedAt = new Date(this.now()).toISOString();
      if (content.status === "completed") subtask.result = content.result;
      else subtask.error = content.error ?? "device reported failure";
      entry.record.updatedAt = subtask.finishedAt;

      this.reportToRegistry(subtask, content.computationTimeMs);
      await this.emit("subtask.result", content.taskId, {
        subtaskId: subtask.subtaskId,
        deviceId: subtask.deviceId,
        status: subtask.status,
      });

      if (!entry.record.subtasks.every((s) => isTerminalSubtaskStatus(s.status))) return "recorded";
      await this.finalize(entry);
      return "finalized";
    });
  }

  // --- Distribution ---

  /**
   * Pop and process the next queued task. Returns undefined on an empty
   * queue. The background loop calls this; tests may drive it directly.
   */
  async distributeNext(): Promise<DistributionOutcome | undefined> {
    const taskId = this.queue.pop();
    if (taskId === undefined) return undefined;
    return this.locks.withLock(taskId, () => this.distribute(taskId));
  }

  private async distribute(taskId: string): Promise<DistributionOutcome> {
    const entry = this.active.get(taskId);
    // Already handled through another path (finalized, or a stale queue entry).
    if (!entry || entry.record.status !== "queued") return { taskId, action: "skipped" };
    const task = entry.record;

    let deviceIds: string[];
    try {
      deviceIds = await this.registry.findAvailableDevices(task.requiredResources, task.priority);
    } catch (err) {
      this.logger.error("Device registry lookup failed; treating as no capacity", {
        taskId,
        error: errorMessage(err),
      });
      deviceIds = [];
    }

    if (deviceIds.length === 0) return this.requeueNoCapacity(entry);

    let plans: SubtaskPlan[];
    try {
      plans = partitionPayload(task.data, deviceIds);
    } catch (err) {
      await this.finalize(entry, {
        reason: "invalid_payload",
        message: `Payload could not be partitioned: ${errorMessage(err)}`,
      });
      return { taskId, action: "failed" };
    }

    const now = this.now();
    const assignedAt = new Date(now).toISOString();
    task.subtasks = plans.map(
      (plan): Subtask => ({
        subtaskId: `${taskId}:${plan.index}`,
        taskId,
        index: plan.index,
        deviceId: plan.deviceId,
        mode: plan.mode,
        data: plan.data,
        status: "assigned",
        assignedAt,
      }),
    );
    task.status = "distributed";
    task.distributedAt = assignedAt;
    task.updatedAt = assignedAt;
    if (this.config.taskTimeoutMs > 0) {
      entry.deadline = now + this.config.taskTimeoutMs;
      task.deadlineAt = new Date(entry.deadline).toISOString();
    }

    for (const subtask of task.subtasks) {
      const content: ExecuteTaskContent = {
        subtaskId: subtask.subtaskId,
        taskId,
        taskType: task.taskType,
        data: subtask.data,
        replyTo: this.config.resultTopic,
      };
      this.bus.publish(
        deviceTopic(subtask.deviceId),
        createMessage(this.id, DISTRIBUTOR_AGENT_TYPE, "execute_task", content, new Date(now)),
      );
    }

    const used = task.subtasks.map((s) => s.deviceId);
    await this.emit("task.distributed", taskId, {
      mode: task.subtasks[0]?.mode,
      subtasks: task.subtasks.length,
      deviceIds: used,
    });
    return { taskId, action: "distributed", deviceIds: used };
  }

  private async requeueNoCapacity(entry: TaskEntry): Promise<DistributionOutcome> {
    const task = entry.record;
    task.attempts++;

    if (task.attempts > this.config.maxRequeues) {
      await this.finalize(entry, {
        reason: "no_capacity",
        message: `No device matched after ${task.attempts} attempts`,
        attempts: task.attempts,
      });
      return { taskId: task.taskId, action: "failed" };
    }

    task.priority += this.config.requeuePriorityStep;
    task.updatedAt = new Date(this.now()).toISOString();
    this.requeues++;

    const delayMs = this.backoffDelay(task.attempts);
    if (delayMs === 0) {
      this.queue.push(task.taskId, task.priority);
    } else {
      const timer = setTimeout(() => {
        this.backoffTimers.delete(task.taskId);
        const current = this.active.get(task.taskId);
        if (!current || current.record.status !== "queued") return;
        this.queue.push(task.taskId, current.record.priority);
        this.wake.notify();
      }, delayMs);
      this.backoffTimers.set(task.taskId, timer);
    }

    this.logger.info("No device available; task requeued", {
      taskId: task.taskId,
      priority: task.priority,
      attempts: task.attempts,
      delayMs,
    });
    await this.emit("task.requeued", task.taskId, { priority: task.priority, attempts: task.attempts, delayMs });
    return { taskId: task.taskId, action: "requeued" };
  }

  /** `requeueBackoffMs * 2^(attempts-1)`, capped at `maxRequeueBackoffMs`. */
  backoffDelay(attempts: number): number {
    const base = this.config.requeueBackoffMs;
    if (base === 0) return 0;
    return Math.min(this.config.maxRequeueBackoffMs, base * 2 ** Math.max(0, attempts - 1));
  }

  // --- Deadlines ---

  /** Fail the outstanding subtasks of every distributed task past its deadline. */
  async sweepExpired(): Promise<string[]> {
    const now = this.now();
    this.lastSweepAt = now;
    const due = [...this.active.values()]
      .filter((e) => e.record.status === "distributed" && e.deadline !== undefined && e.deadline <= now)
      .map((e) => e.record.taskId);

    const expired: string[] = [];
    for (const taskId of due) {
      await this.locks.withLock(taskId, async () => {
        const entry = this.active.get(taskId);
        if (!entry || entry.record.status !== "distributed") return;
        const finishedAt = new Date(now).toISOString();
        for (const subtask of entry.record.subtasks) {
          if (isTerminalSubtaskStatus(subtask.status)) continue;
          subtask.status = "failed";
          subtask.error = "deadline exceeded";
          subtask.finishedAt = finishedAt;
          this.reportToRegistry(subtask);
        }
        entry.expired = true;
        entry.record.updatedAt = finishedAt;
        this.logger.warn("Task deadline exceeded", { taskId, deadlineAt: entry.record.deadlineAt });
        await this.emit("task.expired", taskId, { deadlineAt: entry.record.deadlineAt });
        await this.finalize(entry);
        expired.push(taskId);
      });
    }
    return expired;
  }

  // --- Finalization ---

  /** Caller holds the task's lock. */
  private async finalize(entry: TaskEntry, failure?: TaskFailure): Promise<void> {
    const task = entry.record;
    if (isTerminalTaskStatus(task.status)) return;

    if (failure) {
      task.status = "failed";
      task.error = failure;
    } else {
      const successes = task.subtasks.filter((s) => s.status === "completed");
      if (successes.length === 0) {
        task.status = "failed";
        task.error = {
          reason: entry.expired ? "timeout" : "all_subtasks_failed",
          message: `All ${task.subtasks.length} subtasks failed`,
          failures: task.subtasks.map((s) => ({
            subtaskId: s.subtaskId,
            deviceId: s.deviceId,
            error: s.error ?? "unknown error",
          })),
        };
      } else {
        task.status = "completed";
        task.result = this.aggregate(task.taskType, successes.map((s) => s.result));
      }
    }

    const finishedAt = new Date(this.now()).toISOString();
    task.finishedAt = finishedAt;
    task.updatedAt = finishedAt;
    if (task.status === "completed") this.completed++;
    else this.failed++;

    const timer = this.backoffTimers.get(task.taskId);
    if (timer) {
      clearTimeout(timer);
      this.backoffTimers.delete(task.taskId);
    }
    this.active.delete(task.taskId);
    this.retain(task);

    await this.emit(task.status === "completed" ? "task.completed" : "task.failed", task.taskId, {
      subtasks: task.subtasks.length,
      succeeded: task.subtasks.filter((s) => s.status === "completed").length,
      ...(task.error ? { reason: task.error.reason } : {}),
    });

    const final = snapshot(task);
    const waiters = this.waiters.get(task.taskId) ?? [];
    this.waiters.delete(task.taskId);
    for (const resolve of waiters) resolve(final);

    if (!entry.callback) return;
    try {
      await entry.callback(snapshot(task));
    } catch (err) {
      this.logger.error("Task callback failed", { taskId: task.taskId, error: errorMessage(err) });
      await this.emit("callback.failed", task.taskId, { error: errorMessage(err) });
    }
  }

  private aggregate(taskType: string, results: unknown[]): unknown {
    try {
      return this.aggregators.aggregate(taskType, results);
    } catch (err) {
      this.logger.error("Aggregator failed; returning raw results", { taskType, error: errorMessage(err) });
      return [...results];
    }
  }

  private retain(task: TaskRecord): void {
    if (this.config.finishedTaskRetention === 0) return;
    this.finished.set(task.taskId, task);
    while (this.finished.size > this.config.finishedTaskRetention) {
      const oldest = this.finished.keys().next();
      if (oldest.done) break;
      this.finished.delete(oldest.value);
    }
  }

  private reportToRegistry(subtask: Subtask, computationTimeMs?: number): void {
    if (!this.registry.recordSubtaskOutcome) return;
    if (subtask.status === "assigned") return;
    try {
      this.registry.recordSubtaskOutcome({
        deviceId: subtask.deviceId,
        taskId: subtask.taskId,
        subtaskId: subtask.subtaskId,
        status: subtask.status,
        ...(computationTimeMs !== undefined ? { computationTimeMs } : {}),
      });
    } catch (err) {
      this.logger.warn("Device registry rejected subtask outcome", {
        subtaskId: subtask.subtaskId,
        error: errorMessage(err),
      });
    }
  }

  // --- Inspection ---

  getTask(taskId: string): TaskRecord | undefined {
    const record = this.active.get(taskId)?.record ?? this.finished.get(taskId);
    return record ? snapshot(record) : undefined;
  }

  listTasks(status?: TaskStatus): TaskRecord[] {
    const all = [...[...this.active.values()].map((e) => e.record), ...this.finished.values()];
    return (status ? all.filter((t) => t.status === status) : all).map(snapshot);
  }

  /**
   * Resolves with the final record once the task finalizes. Rejects for an
   * ID that is neither active nor retained.
   */
  waitForTask(taskId: string): Promise<TaskRecord> {
    const done = this.finished.get(taskId);
    if (done) return Promise.resolve(snapshot(done));
    if (!this.active.has(taskId)) return Promise.reject(new Error(`Unknown task: ${taskId}`));
    return new Promise<TaskRecord>((resolve) => {
      const list = this.waiters.get(taskId);
      if (list) list.push(resolve);
      else this.waiters.set(taskId, [resolve]);
    });
  }

  getStats(): DistributorStats {
    const byStatus: Record<TaskStatus, number> = { queued: 0, distributed: 0, completed: 0, failed: 0 };
    for (const entry of this.active.values()) byStatus[entry.record.status]++;
    for (const record of this.finished.values()) byStatus[record.status]++;
    return {
      running: this.running,
      loopAlive: this.loopAlive,
      queueDepth: this.queue.size,
      backingOff: this.backoffTimers.size,
      active: this.active.size,
      byStatus,
      submitted: this.submitted,
      completed: this.completed,
      failed: this.failed,
      requeues: this.requeues,
    };
  }

  // --- Loop ---

  private async runLoop(generation: number): Promise<void> {
    try {
      while (this.running && generation === this.generation) {
        if (this.config.taskTimeoutMs > 0 && this.now() - this.lastSweepAt >= this.config.sweepIntervalMs) {
          await this.sweepExpired();
        }

        let outcome: DistributionOutcome | undefined;
        try {
          outcome = await this.distributeNext();
        } catch (err) {
          this.logger.error("Distribution step failed", { error: errorMessage(err) });
          continue;
        }

        if (!outcome) {
          const waitMs = this.config.taskTimeoutMs > 0
            ? Math.min(this.config.idleWaitMs, this.config.sweepIntervalMs)
            : this.config.idleWaitMs;
          // Unfinished tasks keep the process alive until they finalize.
          await this.wake.wait(waitMs, this.active.size > 0);
        }
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error("Task distributor loop died", { error: error.message });
      if (generation === this.generation) {
        this.lastError = error;
        this.running = false;
      }
    } finally {
      if (generation === this.generation) this.loopAlive = false;
    }
  }

  private async emit(type: EventType, taskId: string | undefined, payload: Record<string, unknown>): Promise<void> {
    if (!this.events) return;
    try {
      await this.events.log(type, this.id, { ...(taskId !== undefined ? { taskId } : {}), payload });
    } catch (err) {
      // Logging errors should not crash the distributor
      this.logger.warn("Failed to write distributor event", { type, error: errorMessage(err) });
    }
  }
}
