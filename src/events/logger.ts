/**
 * Event logger — append-only JSONL lifecycle log, one file per UTC day.
 *
 * Events land in `<eventsDir>/<yyyy-mm-dd>.jsonl`. Writes are serialized so
 * lines never interleave and `eventId` order matches file order.
 */

import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { BaseEvent, EventType } from "../schemas/event.js";

export type EventCallback = (event: BaseEvent) => void;

export interface EventLoggerOptions {
  /** Invoked synchronously for every event, before it is written. */
  onEvent?: EventCallback;
  /** Skip the file write; events only reach `onEvent`. */
  memoryOnly?: boolean;
}

export interface LogOptions {
  taskId?: string;
  payload?: Record<string, unknown>;
}

export class EventLogger {
  private readonly eventsDir: string;
  private readonly onEvent?: EventCallback;
  private readonly memoryOnly: boolean;
  private nextEventId = 0;
  private dirReady?: Promise<void>;
  private writeChain: Promise<void> = Promise.resolve();
  /** Epoch ms of the most recent event, 0 before the first. */
  lastEventAt = 0;

  constructor(eventsDir: string, opts: EventLoggerOptions = {}) {
    this.eventsDir = eventsDir;
    this.onEvent = opts.onEvent;
    this.memoryOnly = opts.memoryOnly ?? false;
  }

  async log(type: EventType, actor: string, opts: LogOptions = {}): Promise<BaseEvent> {
    const now = new Date();
    const event: BaseEvent = {
      eventId: this.nextEventId++,
      type,
      timestamp: now.toISOString(),
      actor,
      ...(opts.taskId !== undefined ? { taskId: opts.taskId } : {}),
      payload: opts.payload ?? {},
    };
    this.lastEventAt = now.getTime();
    this.onEvent?.(event);

    if (this.memoryOnly) return event;

    const write = this.writeChain.then(() => this.append(event));
    // Keep the chain alive after a failed write; the caller still sees the error.
    this.writeChain = write.catch(() => undefined);
    await write;
    return event;
  }

  async logTask(
    type: Extract<EventType, `task.${string}` | `subtask.${string}`>,
    taskId: string,
    payload: Record<string, unknown> = {},
  ): Promise<BaseEvent> {
    return this.log(type, "distributor", { taskId, payload });
  }

  async logSystem(type: Extract<EventType, `system.${string}`>, payload: Record<string, unknown> = {}): Promise<BaseEvent> {
    return this.log(type, "system", { payload });
  }

  private async append(event: BaseEvent): Promise<void> {
    this.dirReady ??= mkdir(this.eventsDir, { recursive: true }).then(() => undefined);
    await this.dirReady;
    const file = join(this.eventsDir, `${event.timestamp.slice(0, 10)}.jsonl`);
    await appendFile(file, `${JSON.stringify(event)}\n`, "utf-8");
  }
}
