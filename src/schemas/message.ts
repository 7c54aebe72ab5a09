/**
 * Message envelope and the content schemas of the known message types.
 *
 * The bus itself carries any content; agents and the distributor validate the
 * content of the message types they understand before acting on it.
 */

import { z } from "zod";

/** Envelope published on the bus. Frozen once published. */
export interface Message<TContent = unknown> {
  readonly senderId: string;
  readonly senderType: string;
  /** ISO-8601 timestamp stamped by the sender. */
  readonly timestamp: string;
  readonly messageType: string;
  readonly content: TContent;
}

/** Known message types exchanged between the distributor and device agents. */
export const MessageType = z.enum(["execute_task", "subtask_result", "status_request", "status_report"]);
export type MessageType = z.infer<typeof MessageType>;

/** Distributor → device: run one shard or replica of a task. */
export const ExecuteTaskContent = z.object({
  subtaskId: z.string().min(1),
  taskId: z.string().min(1),
  taskType: z.string().min(1),
  data: z.unknown(),
  /** Topic the device publishes its `subtask_result` on. */
  replyTo: z.string().min(1),
});
export type ExecuteTaskContent = z.infer<typeof ExecuteTaskContent>;

/** Terminal statuses a device may report for a subtask. */
export const SubtaskOutcomeStatus = z.enum(["completed", "failed"]);
export type SubtaskOutcomeStatus = z.infer<typeof SubtaskOutcomeStatus>;

/** Device → distributor: terminal outcome of one subtask. */
export const SubtaskResultContent = z.object({
  subtaskId: z.string().min(1),
  taskId: z.string().min(1),
  status: SubtaskOutcomeStatus,
  result: z.unknown().optional(),
  error: z.string().optional(),
  /** Wall time the device spent on the subtask, when it reports one. */
  computationTimeMs: z.number().nonnegative().optional(),
});
export type SubtaskResultContent = z.infer<typeof SubtaskResultContent>;

/** Any agent → agent: ask for a status report. */
export const StatusRequestContent = z.object({
  requestId: z.string().min(1),
});
export type StatusRequestContent = z.infer<typeof StatusRequestContent>;

/** Reply to a status request. */
export const StatusReportContent = z.object({
  requestId: z.string().min(1),
  agentId: z.string(),
  state: z.enum(["initialized", "running", "stopped"]),
  tasks: z.record(z.string(), z.number().int().nonnegative()),
});
export type StatusReportContent = z.infer<typeof StatusReportContent>;

/** Topic an agent type listens on by convention. */
export function agentTopic(agentType: string): string {
  return `agent.${agentType}`;
}

/** Inbox topic of a single device. */
export function deviceTopic(deviceId: string): string {
  return `device.${deviceId}`;
}

/** Build a frozen envelope. */
export function createMessage<TContent>(
  senderId: string,
  senderType: string,
  messageType: string,
  content: TContent,
  now: Date = new Date(),
): Message<TContent> {
  return Object.freeze({
    senderId,
    senderType,
    timestamp: now.toISOString(),
    messageType,
    content,
  });
}

/** Flatten zod issues into `path: message` strings for logs. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`);
}
