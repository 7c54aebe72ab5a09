import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createDeviceAgent, DEVICE_AGENT_TYPE } from "../device-agent.js";
import { Agent } from "../agent.js";
import { MessageBus } from "../../bus/message-bus.js";
import { silentLogger } from "../../events/console.js";
import { createMessage, type ExecuteTaskContent, type Message } from "../../schemas/message.js";

function job(overrides: Partial<ExecuteTaskContent> = {}): ExecuteTaskContent {
  return {
    subtaskId: "task-1:0",
    taskId: "task-1",
    taskType: "double",
    data: [1, 2, 3],
    replyTo: "agent.distributor",
    ...overrides,
  };
}

describe("createDeviceAgent", () => {
  let bus: MessageBus;
  let replies: Message[];

  beforeEach(() => {
    bus = new MessageBus({ idleWaitMs: 20, logger: silentLogger });
    replies = [];
    bus.subscribe("agent.distributor", (m) => {
      replies.push(m);
    });
    bus.start();
  });

  afterEach(async () => {
    await bus.stop();
  });

  function startDevice(executor: (j: ExecuteTaskContent) => unknown, deviceId = "laptop-1"): Agent {
    const agent = createDeviceAgent({ bus, deviceId, executor, logger: silentLogger, now: () => 1_000 });
    agent.start();
    return agent;
  }

  /** Wait for the job messages, the detached executions and their replies. */
  async function settle(...agents: Agent[]): Promise<void> {
    await bus.whenIdle();
    for (const agent of agents) await agent.whenSettled();
    await bus.whenIdle();
  }

  it("listens on its device topic", () => {
    const agent = startDevice(() => null);
    expect(agent.id).toBe("laptop-1");
    expect(agent.type).toBe(DEVICE_AGENT_TYPE);
    expect(agent.listensOn()).toEqual(["agent.device", "device.laptop-1"]);
  });

  it("runs the executor and reports a completed result", async () => {
    const agent = startDevice((j) => (Array.isArray(j.data) ? j.data.map((n) => Number(n) * 2) : []));

    bus.publish("device.laptop-1", createMessage("dist-1", "distributor", "execute_task", job()));
    await settle(agent);

    expect(replies).toHaveLength(1);
    expect(replies[0]?.messageType).toBe("subtask_result");
    expect(replies[0]?.senderId).toBe("laptop-1");
    expect(replies[0]?.senderType).toBe("device");
    expect(replies[0]?.content).toEqual({
      subtaskId: "task-1:0",
      taskId: "task-1",
      status: "completed",
      result: [2, 4, 6],
      computationTimeMs: 0,
    });
    expect(agent.getTask("task-1:0")?.status).toBe("completed");
  });

  it("reports a failed result when the executor throws", async () => {
    const agent = startDevice(() => {
      throw new Error("bad input");
    });

    bus.publish("device.laptop-1", createMessage("dist-1", "distributor", "execute_task", job()));
    await settle(agent);

    expect(replies.map((r) => r.content)).toEqual([
      { subtaskId: "task-1:0", taskId: "task-1", status: "failed", error: "bad input", computationTimeMs: 0 },
    ]);
    expect(agent.getTask("task-1:0")).toMatchObject({ status: "failed", error: "bad input" });
  });

  it("replies on the topic named by the job", async () => {
    const custom: Message[] = [];
    bus.subscribe("results.custom", (m) => {
      custom.push(m);
    });
    const agent = startDevice(async () => "ok");

    bus.publish("device.laptop-1", createMessage("dist-1", "distributor", "execute_task", job({ replyTo: "results.custom" })));
    await settle(agent);

    expect(replies).toHaveLength(0);
    expect(custom.map((m) => m.content)).toEqual([
      { subtaskId: "task-1:0", taskId: "task-1", status: "completed", result: "ok", computationTimeMs: 0 },
    ]);
  });

  it("answers a redelivered job again", async () => {
    const agent = startDevice(() => 1);
    const message = createMessage("dist-1", "distributor", "execute_task", job());
    bus.publish("device.laptop-1", message);
    bus.publish("device.laptop-1", message);
    await settle(agent);

    expect(replies).toHaveLength(2);
  });

  it("drops execute_task messages without a reply topic", async () => {
    const agent = startDevice(() => 1);
    const outcome = await agent.handleMessage(
      createMessage("dist-1", "distributor", "execute_task", { subtaskId: "t:0", taskId: "t", taskType: "x", data: 1 }),
    );

    expect(outcome).toMatchObject({ handled: false, reason: "invalid_content" });
    await bus.whenIdle();
    expect(replies).toHaveLength(0);
  });

  it("returns to the bus before the executor finishes", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const agent = startDevice(async () => {
      await gate;
      return "done";
    });

    bus.publish("device.laptop-1", createMessage("dist-1", "distributor", "execute_task", job()));
    await bus.whenIdle();
    expect(agent.getTask("task-1:0")?.status).toBe("running");
    expect(agent.pendingJobs()).toBe(1);
    expect(replies).toHaveLength(0);

    release();
    await settle(agent);
    expect(agent.pendingJobs()).toBe(0);
    expect(replies.map((r) => r.content)).toEqual([
      { subtaskId: "task-1:0", taskId: "task-1", status: "completed", result: "done", computationTimeMs: 0 },
    ]);
  });

  it("keeps other devices working while one executor hangs", async () => {
    startDevice(() => new Promise<never>(() => {}), "stuck-1");
    const healthy = startDevice(() => "ok", "desktop-1");

    bus.publish("device.stuck-1", createMessage("dist-1", "distributor", "execute_task", job({ subtaskId: "a:0", taskId: "a" })));
    bus.publish("device.desktop-1", createMessage("dist-1", "distributor", "execute_task", job({ subtaskId: "b:0", taskId: "b" })));
    await settle(healthy);

    expect(replies.map((r) => r.content)).toEqual([
      { subtaskId: "b:0", taskId: "b", status: "completed", result: "ok", computationTimeMs: 0 },
    ]);
    expect(bus.getStats().queued).toBe(0);
  });

  it("answers status requests on the requester's type topic", async () => {
    const reports: Message[] = [];
    bus.subscribe("agent.monitor", (m) => {
      reports.push(m);
    });
    startDevice(() => 1);

    bus.publish("device.laptop-1", createMessage("monitor-1", "monitor", "status_request", { requestId: "req-1" }));
    await bus.whenIdle();

    expect(reports).toHaveLength(1);
    expect(reports[0]?.messageType).toBe("status_report");
    expect(reports[0]?.content).toEqual({
      requestId: "req-1",
      agentId: "laptop-1",
      state: "running",
      tasks: { pending: 0, running: 0, completed: 0, failed: 0 },
    });
  });
});
