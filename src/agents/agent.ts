/**
 * Agent runtime.
 *
 * One concrete class; what an agent does is described by its capabilities:
 * the topics it listens on and a handler table keyed by message type.
 * Handlers are registered with a zod schema for their content, so a handler
 * only ever sees content of the shape it declared.
 */

import { randomUUID } from "node:crypto";
import type { z } from "zod";
import type { MessageBus, SubscriptionHandle } from "../bus/message-bus.js";
import { agentTopic, createMessage, formatIssues, type Message } from "../schemas/message.js";
import { consoleLogger, errorMessage, type Logger } from "../events/console.js";

export type AgentState = "initialized" | "running" | "stopped";

export type LocalTaskStatus = "pending" | "running" | "completed" | "failed";

/** Task an agent tracks for itself, independent of the distributor's table. */
export interface LocalTask {
  taskId: string;
  taskType: string;
  data: unknown;
  status: LocalTaskStatus;
  createdAt: string;
  updatedAt: string;
  result?: unknown;
  error?: string;
}

/** Outcome of routing one message through the handler table. */
export type HandleOutcome =
  | { handled: true }
  | { handled: false; reason: "no_handler" | "invalid_content"; issues?: string[] };

/** A handler bound to one message type, with its content already typed. */
export interface MessageHandler {
  readonly messageType: string;
  /** Validate `message.content` and, when it matches, run the handler. */
  invoke(message: Message): HandleOutcome | Promise<HandleOutcome>;
}

/**
 * Bind a handler to a message type. Content failing `schema` is reported as
 * `invalid_content` and never reaches `handle`.
 */
export function defineHandler<T>(
  messageType: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  handle: (content: T, message: Message) => void | Promise<void>,
): MessageHandler {
  return {
    messageType,
    invoke(message) {
      const parsed = schema.safeParse(message.content);
      if (!parsed.success) {
        return { handled: false, reason: "invalid_content", issues: formatIssues(parsed.error) };
      }
      const pending = handle(parsed.data, message);
      if (pending instanceof Promise) {
        return pending.then((): HandleOutcome => ({ handled: true }));
      }
      return { handled: true };
    },
  };
}

/** What an agent listens to and how it reacts. */
export interface AgentCapabilities {
  /** Topics in addition to the conventional `agent.<type>` topic. */
  topics?: string[];
  handlers?: MessageHandler[];
}

export interface AgentOptions {
  bus: MessageBus;
  type: string;
  id?: string;
  capabilities?: AgentCapabilities;
  logger?: Logger;
}

export class Agent {
  readonly id: string;
  readonly type: string;
  private readonly bus: MessageBus;
  private readonly logger: Logger;
  private readonly topics: string[];
  private readonly handlers = new Map<string, MessageHandler>();
  private readonly subscriptions: SubscriptionHandle[] = [];
  private readonly localTasks = new Map<string, LocalTask>();
  private readonly detached = new Set<Promise<void>>();
  private currentState: AgentState = "initialized";

  constructor(opts: AgentOptions) {
    this.bus = opts.bus;
    this.type = opts.type;
    this.id = opts.id ?? `${opts.type}-${randomUUID().slice(0, 8)}`;
    this.logger = opts.logger ?? consoleLogger;

    const extra = opts.capabilities?.topics ?? [];
    this.topics = [...new Set([agentTopic(this.type), ...extra])];

    for (const handler of opts.capabilities?.handlers ?? []) {
      if (this.handlers.has(handler.messageType)) {
        throw new Error(`Agent ${this.id}: duplicate handler for message type "${handler.messageType}"`);
      }
      this.handlers.set(handler.messageType, handler);
    }
  }

  get state(): AgentState {
    return this.currentState;
  }

  /** Subscribe to every capability topic. No-op while running. */
  start(): void {
    if (this.currentState === "running") return;
    for (const topic of this.topics) {
      this.subscriptions.push(
        this.bus.subscribe(topic, async (message) => {
          await this.handleMessage(message);
        }),
      );
    }
    this.currentState = "running";
  }

  /** Drop all subscriptions. Safe before `start()`. */
  stop(): void {
    if (this.currentState !== "running") return;
    for (const handle of this.subscriptions.splice(0)) {
      this.bus.unsubscribe(handle.topic, handle);
    }
    this.currentState = "stopped";
  }

  listensOn(): readonly string[] {
    return this.topics;
  }

  subscriptionCount(): number {
    return this.subscriptions.length;
  }

  /** Publish on the conventional topic of `recipientType`. */
  sendMessage<T>(recipientType: string, messageType: string, content: T): Message<T> {
    return this.publishTo(agentTopic(recipientType), messageType, content);
  }

  /** Publish on an explicit topic, stamped with this agent's identity. */
  publishTo<T>(topic: string, messageType: string, content: T): Message<T> {
    const message = createMessage(this.id, this.type, messageType, content);
    this.bus.publish(topic, message);
    return message;
  }

  /**
   * Route a message to the handler for its type. Unknown types and content
   * that fails the handler's schema are logged and dropped.
   */
  async handleMessage(message: Message): Promise<HandleOutcome> {
    const handler = this.handlers.get(message.messageType);
    if (!handler) {
      this.logger.warn(`Agent ${this.id} has no handler for message type "${message.messageType}"`, {
        senderId: message.senderId,
      });
      return { handled: false, reason: "no_handler" };
    }

    const outcome = await handler.invoke(message);
    if (!outcome.handled) {
      this.logger.warn(`Agent ${this.id} dropped malformed "${message.messageType}" message`, {
        senderId: message.senderId,
        issues: outcome.issues ?? [],
      });
    }
    return outcome;
  }

  /**
   * Run `work` outside the bus dispatch so delivery to other subscribers
   * carries on while it is pending. Failures are logged.
   */
  runDetached(label: string, work: () => Promise<void>): void {
    const job: Promise<void> = (async () => {
      await work();
    })()
      .catch((err: unknown) => {
        this.logger.error(`Agent ${this.id} background job failed`, { label, error: errorMessage(err) });
      })
      .finally(() => {
        this.detached.delete(job);
      });
    this.detached.add(job);
  }

  /** Number of detached jobs still pending. */
  pendingJobs(): number {
    return this.detached.size;
  }

  /** Resolves once every detached job, including ones started meanwhile, has settled. */
  async whenSettled(): Promise<void> {
    while (this.detached.size > 0) {
      await Promise.all([...this.detached]);
    }
  }

  createTask(taskType: string, data: unknown, taskId: string = randomUUID()): LocalTask {
    if (this.localTasks.has(taskId)) {
      throw new Error(`Agent ${this.id}: local task ${taskId} already exists`);
    }
    const now = new Date().toISOString();
    const task: LocalTask = { taskId, taskType, data, status: "pending", createdAt: now, updatedAt: now };
    this.localTasks.set(taskId, task);
    return task;
  }

  /** Returns false when the task is unknown. */
  updateTaskStatus(taskId: string, status: LocalTaskStatus, details: { result?: unknown; error?: string } = {}): boolean {
    const task = this.localTasks.get(taskId);
    if (!task) return false;
    task.status = status;
    task.updatedAt = new Date().toISOString();
    if ("result" in details) task.result = details.result;
    if (details.error !== undefined) task.error = details.error;
    return true;
  }

  getTask(taskId: string): LocalTask | undefined {
    return this.localTasks.get(taskId);
  }

  listTasks(status?: LocalTaskStatus): LocalTask[] {
    const all = [...this.localTasks.values()];
    return status ? all.filter((t) => t.status === status) : all;
  }

  /** Count local tasks per status. */
  taskCounts(): Record<LocalTaskStatus, number> {
    const counts: Record<LocalTaskStatus, number> = { pending: 0, running: 0, completed: 0, failed: 0 };
    for (const task of this.localTasks.values()) counts[task.status]++;
    return counts;
  }
}
