export { InMemoryDeviceRegistry } from "./registry.js";
export type {
  DeviceId,
  DeviceRegistry,
  DeviceSnapshot,
  DeviceStats,
  InMemoryDeviceRegistryOptions,
  SubtaskOutcomeReport,
  SystemStats,
} from "./registry.js";
