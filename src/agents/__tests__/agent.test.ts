import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { z } from "zod";
import { Agent, defineHandler } from "../agent.js";
import { MessageBus } from "../../bus/message-bus.js";
import { silentLogger, type Logger } from "../../events/console.js";
import { createMessage } from "../../schemas/message.js";

function mockLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("Agent", () => {
  let bus: MessageBus;

  beforeEach(() => {
    bus = new MessageBus({ idleWaitMs: 20, logger: silentLogger });
    bus.start();
  });

  afterEach(async () => {
    await bus.stop();
  });

  describe("identity and topics", () => {
    it("listens on its type topic plus capability topics, without duplicates", () => {
      const agent = new Agent({
        bus,
        type: "weather",
        id: "weather-1",
        capabilities: { topics: ["weather.alerts", "agent.weather"] },
      });
      expect(agent.id).toBe("weather-1");
      expect(agent.listensOn()).toEqual(["agent.weather", "weather.alerts"]);
    });

    it("generates an id from its type", () => {
      const agent = new Agent({ bus, type: "weather" });
      expect(agent.id).toMatch(/^weather-[0-9a-f]{8}$/);
    });

    it("rejects two handlers for one message type", () => {
      const noop = () => {};
      expect(
        () =>
          new Agent({
            bus,
            type: "weather",
            id: "w1",
            capabilities: {
              handlers: [defineHandler("ping", z.unknown(), noop), defineHandler("ping", z.unknown(), noop)],
            },
          }),
      ).toThrow('Agent w1: duplicate handler for message type "ping"');
    });
  });

  describe("lifecycle", () => {
    it("subscribes on start and unsubscribes on stop", () => {
      const agent = new Agent({ bus, type: "weather", capabilities: { topics: ["weather.alerts"] } });
      expect(agent.state).toBe("initialized");

      agent.start();
      agent.start();
      expect(agent.state).toBe("running");
      expect(agent.subscriptionCount()).toBe(2);
      expect(bus.subscriberCount("agent.weather")).toBe(1);
      expect(bus.subscriberCount("weather.alerts")).toBe(1);

      agent.stop();
      expect(agent.state).toBe("stopped");
      expect(agent.subscriptionCount()).toBe(0);
      expect(bus.subscriberCount("agent.weather")).toBe(0);
    });

    it("ignores stop before start", () => {
      const agent = new Agent({ bus, type: "weather" });
      agent.stop();
      expect(agent.state).toBe("initialized");
    });

    it("can be restarted after stop", () => {
      const agent = new Agent({ bus, type: "weather" });
      agent.start();
      agent.stop();
      agent.start();
      expect(agent.state).toBe("running");
      expect(bus.subscriberCount("agent.weather")).toBe(1);
    });
  });

  describe("message handling", () => {
    const Reading = z.object({ celsius: z.number() });

    it("runs the handler with validated content", async () => {
      const seen: number[] = [];
      const agent = new Agent({
        bus,
        type: "weather",
        capabilities: { handlers: [defineHandler("reading", Reading, (c) => { seen.push(c.celsius); })] },
      });

      const outcome = await agent.handleMessage(createMessage("s1", "sensor", "reading", { celsius: 21.5 }));
      expect(outcome).toEqual({ handled: true });
      expect(seen).toEqual([21.5]);
    });

    it("awaits async handlers", async () => {
      const seen: string[] = [];
      const agent = new Agent({
        bus,
        type: "weather",
        capabilities: {
          handlers: [
            defineHandler("reading", Reading, async () => {
              await new Promise((resolve) => setTimeout(resolve, 5));
              seen.push("done");
            }),
          ],
        },
      });

      await agent.handleMessage(createMessage("s1", "sensor", "reading", { celsius: 1 }));
      expect(seen).toEqual(["done"]);
    });

    it("drops unknown message types with a warning", async () => {
      const logger = mockLogger();
      const agent = new Agent({ bus, type: "weather", id: "w1", logger });

      const outcome = await agent.handleMessage(createMessage("s1", "sensor", "mystery", {}));
      expect(outcome).toEqual({ handled: false, reason: "no_handler" });
      expect(logger.warn).toHaveBeenCalledWith('Agent w1 has no handler for message type "mystery"', { senderId: "s1" });
    });

    it("drops content that fails the handler schema", async () => {
      const logger = mockLogger();
      const handle = vi.fn();
      const agent = new Agent({
        bus,
        type: "weather",
        id: "w1",
        logger,
        capabilities: { handlers: [defineHandler("reading", Reading, handle)] },
      });

      const outcome = await agent.handleMessage(createMessage("s1", "sensor", "reading", { celsius: "warm" }));
      expect(outcome).toEqual({
        handled: false,
        reason: "invalid_content",
        issues: ["celsius: Expected number, received string"],
      });
      expect(handle).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it("exchanges messages over the bus by agent type", async () => {
      const received: Array<{ senderId: string; senderType: string; celsius: number }> = [];
      const receiver = new Agent({
        bus,
        type: "weather",
        capabilities: {
          handlers: [
            defineHandler("reading", Reading, (c, m) => {
              received.push({ senderId: m.senderId, senderType: m.senderType, celsius: c.celsius });
            }),
          ],
        },
      });
      const sender = new Agent({ bus, type: "sensor", id: "sensor-7" });
      receiver.start();
      sender.start();

      const sent = sender.sendMessage("weather", "reading", { celsius: 4 });
      await bus.whenIdle();

      expect(sent.senderId).toBe("sensor-7");
      expect(Object.isFrozen(sent)).toBe(true);
      expect(received).toEqual([{ senderId: "sensor-7", senderType: "sensor", celsius: 4 }]);
    });

    it("stops receiving after stop", async () => {
      const handle = vi.fn();
      const agent = new Agent({ bus, type: "weather", capabilities: { handlers: [defineHandler("reading", Reading, handle)] } });
      agent.start();
      agent.stop();

      bus.publish("agent.weather", createMessage("s1", "sensor", "reading", { celsius: 1 }));
      await bus.whenIdle();
      expect(handle).not.toHaveBeenCalled();
    });
  });

  describe("local tasks", () => {
    it("creates, updates and lists tasks", () => {
      const agent = new Agent({ bus, type: "worker" });
      const task = agent.createTask("resize", { width: 10 }, "job-1");
      expect(task).toMatchObject({ taskId: "job-1", taskType: "resize", status: "pending" });

      agent.createTask("resize", { width: 20 }, "job-2");
      expect(agent.updateTaskStatus("job-1", "completed", { result: { ok: true } })).toBe(true);
      expect(agent.updateTaskStatus("job-2", "failed", { error: "too wide" })).toBe(true);

      expect(agent.getTask("job-1")?.result).toEqual({ ok: true });
      expect(agent.getTask("job-2")?.error).toBe("too wide");
      expect(agent.listTasks("completed").map((t) => t.taskId)).toEqual(["job-1"]);
      expect(agent.listTasks()).toHaveLength(2);
      expect(agent.taskCounts()).toEqual({ pending: 0, running: 0, completed: 1, failed: 1 });
    });

    it("rejects duplicate task ids and unknown updates", () => {
      const agent = new Agent({ bus, type: "worker", id: "worker-1" });
      agent.createTask("resize", {}, "job-1");
      expect(() => agent.createTask("resize", {}, "job-1")).toThrow("Agent worker-1: local task job-1 already exists");
      expect(agent.updateTaskStatus("missing", "running")).toBe(false);
    });

    it("assigns a uuid when no id is given", () => {
      const agent = new Agent({ bus, type: "worker" });
      const task = agent.createTask("resize", {});
      expect(task.taskId).toMatch(/^[0-9a-f-]{36}$/);
    });
  });
});
