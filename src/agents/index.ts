export { Agent, defineHandler } from "./agent.js";
export type {
  AgentCapabilities,
  AgentOptions,
  AgentState,
  HandleOutcome,
  LocalTask,
  LocalTaskStatus,
  MessageHandler,
} from "./agent.js";
export { createDeviceAgent, DEVICE_AGENT_TYPE } from "./device-agent.js";
export type { DeviceAgentOptions, TaskExecutor } from "./device-agent.js";
