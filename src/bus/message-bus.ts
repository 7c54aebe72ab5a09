/**
 * Message bus — in-process publish/subscribe broker.
 *
 * - `publish` appends to one unbounded FIFO and returns immediately.
 * - A single dispatch loop drains the FIFO, so delivery order is global
 *   publish order (and therefore per-topic order).
 * - Every live subscriber of a topic is invoked in subscription order; a
 *   returned promise is awaited before the next subscriber runs.
 * - A subscriber that throws or rejects is logged and skipped; delivery to the
 *   remaining subscribers and the loop itself carry on.
 * - Delivery is at-most-once: no acknowledgement, no retry.
 */

import type { Message } from "../schemas/message.js";
import type { BusConfig } from "../schemas/config.js";
import type { EventLogger } from "../events/logger.js";
import { consoleLogger, errorMessage, type Logger } from "../events/console.js";
import { WakeSignal, settleWithin } from "./wake-signal.js";

export type MessageCallback = (message: Message) => void | Promise<void>;

/** Opaque handle returned by `subscribe`. */
export interface SubscriptionHandle {
  readonly topic: string;
  readonly id: number;
}

interface Subscriber {
  readonly id: number;
  readonly callback: MessageCallback;
  /** Tombstone flag; cleared by `unsubscribe`. */
  active: boolean;
}

interface QueuedMessage {
  topic: string;
  message: Message;
}

export interface MessageBusOptions extends Partial<BusConfig> {
  logger?: Logger;
  events?: EventLogger;
}

export interface MessageBusStats {
  running: boolean;
  loopAlive: boolean;
  queued: number;
  published: number;
  delivered: number;
  callbackFailures: number;
  topics: number;
  subscribers: number;
}

export class MessageBus {
  private readonly idleWaitMs: number;
  private readonly drainTimeoutMs: number;
  private readonly logger: Logger;
  private readonly events?: EventLogger;

  private readonly topics = new Map<string, Subscriber[]>();
  private readonly queue: QueuedMessage[] = [];
  private readonly wake = new WakeSignal();
  private idleWaiters: Array<() => void> = [];

  private nextSubscriberId = 1;
  private running = false;
  private dispatching = false;
  private loop?: Promise<void>;
  private loopAlive = false;
  private generation = 0;

  private published = 0;
  private delivered = 0;
  private callbackFailures = 0;

  /** Error that terminated the dispatch loop, if any. */
  lastError?: Error;

  constructor(opts: MessageBusOptions = {}) {
    this.idleWaitMs = opts.idleWaitMs ?? 1_000;
    this.drainTimeoutMs = opts.drainTimeoutMs ?? 5_000;
    this.logger = opts.logger ?? consoleLogger;
    this.events = opts.events;
  }

  /**
   * Launch the dispatch loop. No-op while already running. A loop left
   * inside a callback by a timed-out `stop()` is resumed rather than joined
   * by a second one.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    if (this.loopAlive && !this.lastError) return;
    this.lastError = undefined;
    this.loopAlive = true;
    this.loop = this.runLoop(++this.generation);
  }

  /**
   * Signal the loop to exit once the queue is drained and wait up to
   * `drainTimeoutMs` for it. Returns whether the loop finished in time.
   */
  async stop(): Promise<boolean> {
    if (!this.running) return true;
    this.running = false;
    this.wake.notify();
    const loop = this.loop;
    if (!loop) return true;
    const drained = await settleWithin(loop, this.drainTimeoutMs);
    if (!drained) {
      this.logger.warn("Message bus did not drain before timeout", {
        queued: this.queue.length,
        drainTimeoutMs: this.drainTimeoutMs,
      });
    }
    return drained;
  }

  subscribe(topic: string, callback: MessageCallback): SubscriptionHandle {
    const subscriber: Subscriber = { id: this.nextSubscriberId++, callback, active: true };
    const list = this.topics.get(topic);
    if (list) list.push(subscriber);
    else this.topics.set(topic, [subscriber]);
    return { topic, id: subscriber.id };
  }

  /**
   * Mark a subscription inert. The entry stays in the topic's list until the
   * dispatch loop prunes it between messages, so an in-flight dispatch over
   * the list is never disturbed. Returns false for an unknown handle.
   */
  unsubscribe(topic: string, handle: SubscriptionHandle): boolean {
    if (handle.topic !== topic) return false;
    const subscriber = this.topics.get(topic)?.find((s) => s.id === handle.id);
    if (!subscriber || !subscriber.active) return false;
    subscriber.active = false;
    if (!this.dispatching) this.prune(topic);
    return true;
  }

  publish(topic: string, message: Message): void {
    this.queue.push({ topic, message: Object.isFrozen(message) ? message : Object.freeze({ ...message }) });
    this.published++;
    this.wake.notify();
  }

  /** Resolves once the queue is empty and no message is being dispatched. */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  /** False once the loop has exited, whether by `stop()` or by dying. */
  isLoopAlive(): boolean {
    return this.loopAlive;
  }

  subscriberCount(topic: string): number {
    return this.topics.get(topic)?.filter((s) => s.active).length ?? 0;
  }

  getStats(): MessageBusStats {
    let subscribers = 0;
    for (const list of this.topics.values()) {
      subscribers += list.filter((s) => s.active).length;
    }
    return {
      running: this.running,
      loopAlive: this.loopAlive,
      queued: this.queue.length,
      published: this.published,
      delivered: this.delivered,
      callbackFailures: this.callbackFailures,
      topics: this.topics.size,
      subscribers,
    };
  }

  private async runLoop(generation: number): Promise<void> {
    try {
      while ((this.running || this.queue.length > 0) && generation === this.generation) {
        const next = this.queue.shift();
        if (!next) {
          this.resolveIdle();
          await this.wake.wait(this.idleWaitMs);
          continue;
        }
        await this.dispatch(next.topic, next.message);
        this.prune(next.topic);
        if (this.queue.length === 0) this.resolveIdle();
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error("Message bus dispatch loop died", { error: error.message });
      if (generation === this.generation) {
        this.lastError = error;
        this.running = false;
      }
      await this.emit("bus.loop_died", { error: error.message });
    } finally {
      if (generation === this.generation) {
        this.loopAlive = false;
        this.dispatching = false;
        this.resolveIdle();
      }
    }
  }

  private async dispatch(topic: string, message: Message): Promise<void> {
    const list = this.topics.get(topic);
    if (!list) return;

    this.dispatching = true;
    try {
      // Subscribers added during this dispatch start with the next message.
      const count = list.length;
      for (let i = 0; i < count; i++) {
        const subscriber = list[i];
        if (!subscriber || !subscriber.active) continue;
        try {
          await subscriber.callback(message);
          this.delivered++;
        } catch (err) {
          this.callbackFailures++;
          this.logger.error("Subscriber callback failed", {
            topic,
            messageType: message.messageType,
            senderId: message.senderId,
            error: errorMessage(err),
          });
          await this.emit("bus.callback_failed", {
            topic,
            messageType: message.messageType,
            error: errorMessage(err),
          });
        }
      }
    } finally {
      this.dispatching = false;
    }
  }

  private prune(topic: string): void {
    const list = this.topics.get(topic);
    if (!list || list.every((s) => s.active)) return;
    const live = list.filter((s) => s.active);
    if (live.length === 0) this.topics.delete(topic);
    else this.topics.set(topic, live);
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && !this.dispatching;
  }

  private resolveIdle(): void {
    if (!this.isIdle() && this.loopAlive) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private async emit(type: "bus.callback_failed" | "bus.loop_died", payload: Record<string, unknown>): Promise<void> {
    if (!this.events) return;
    try {
      await this.events.log(type, "bus", { payload });
    } catch (err) {
      // Event log failures must not stop delivery
      this.logger.warn("Failed to write bus event", { type, error: errorMessage(err) });
    }
  }
}
