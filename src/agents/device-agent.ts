/**
 * Device agent — the worker side of task distribution.
 *
 * Listens on `device.<deviceId>`, runs each `execute_task` job through an
 * injected executor and reports a `subtask_result` on the job's `replyTo`
 * topic. Jobs run outside the bus dispatch, so a slow or hung executor holds
 * up only its own subtask. An executor that throws produces a `failed`
 * result; it never escapes into the bus.
 */

import { Agent, defineHandler } from "./agent.js";
import type { MessageBus } from "../bus/message-bus.js";
import {
  ExecuteTaskContent,
  StatusRequestContent,
  deviceTopic,
  type StatusReportContent,
  type SubtaskResultContent,
} from "../schemas/message.js";
import { errorMessage, type Logger } from "../events/console.js";

export const DEVICE_AGENT_TYPE = "device";

export type TaskExecutor = (job: ExecuteTaskContent) => unknown | Promise<unknown>;

export interface DeviceAgentOptions {
  bus: MessageBus;
  deviceId: string;
  executor: TaskExecutor;
  logger?: Logger;
  /** Clock for computation time; injectable for tests. */
  now?: () => number;
}

export function createDeviceAgent(opts: DeviceAgentOptions): Agent {
  const now = opts.now ?? Date.now;
  let agent: Agent;

  const run = async (job: ExecuteTaskContent): Promise<void> => {
    const startedAt = now();
    let reply: SubtaskResultContent;
    try {
      const result = await opts.executor(job);
      reply = {
        subtaskId: job.subtaskId,
        taskId: job.taskId,
        status: "completed",
        result,
        computationTimeMs: Math.max(0, now() - startedAt),
      };
      agent.updateTaskStatus(job.subtaskId, "completed", { result });
    } catch (err) {
      const error = errorMessage(err);
      reply = {
        subtaskId: job.subtaskId,
        taskId: job.taskId,
        status: "failed",
        error,
        computationTimeMs: Math.max(0, now() - startedAt),
      };
      agent.updateTaskStatus(job.subtaskId, "failed", { error });
    }
    agent.publishTo(job.replyTo, "subtask_result", reply);
  };

  // Jobs run detached: the handler returns as soon as the job is accepted.
  const execute = defineHandler("execute_task", ExecuteTaskContent, (job) => {
    if (!agent.getTask(job.subtaskId)) agent.createTask(job.taskType, job.data, job.subtaskId);
    agent.updateTaskStatus(job.subtaskId, "running");
    agent.runDetached(job.subtaskId, () => run(job));
  });

  const status = defineHandler("status_request", StatusRequestContent, (request, message) => {
    const report: StatusReportContent = {
      requestId: request.requestId,
      agentId: agent.id,
      state: agent.state,
      tasks: agent.taskCounts(),
    };
    agent.sendMessage(message.senderType, "status_report", report);
  });

  agent = new Agent({
    bus: opts.bus,
    type: DEVICE_AGENT_TYPE,
    id: opts.deviceId,
    capabilities: { topics: [deviceTopic(opts.deviceId)], handlers: [execute, status] },
    logger: opts.logger,
  });
  return agent;
}
