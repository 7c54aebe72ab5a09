import { z } from "zod";

export const EventType = z.enum([
  // Task lifecycle
  "task.submitted",
  "task.requeued",
  "task.distributed",
  "task.completed",
  "task.failed",
  "task.expired",
  "subtask.result",
  "subtask.rejected",

  // Bus
  "bus.callback_failed",
  "bus.loop_died",

  // Callbacks
  "callback.failed",

  // System
  "system.startup",
  "system.shutdown",
  "system.crash_recovery",
]);
export type EventType = z.infer<typeof EventType>;

export const BaseEvent = z.object({
  /** Monotonic within one logger instance. */
  eventId: z.number().int().nonnegative(),
  type: EventType,
  timestamp: z.string().datetime(),
  /** Component or agent that caused the event. */
  actor: z.string(),
  taskId: z.string().optional(),
  payload: z.record(z.string(), z.unknown()).default({}),
});
export type BaseEvent = z.infer<typeof BaseEvent>;
