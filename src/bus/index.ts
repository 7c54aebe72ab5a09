export { MessageBus } from "./message-bus.js";
export type { MessageBusOptions, MessageBusStats, MessageCallback, SubscriptionHandle } from "./message-bus.js";
export { WakeSignal, settleWithin } from "./wake-signal.js";
