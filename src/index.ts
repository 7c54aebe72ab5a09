/**
 * Agent mesh: a topic-based message bus for cooperating agents and a task
 * distributor that splits work across heterogeneous devices.
 */

export * from './schemas/index.js';
export * from './bus/index.js';
export * from './agents/index.js';
export * from './devices/index.js';
export * from './dispatch/index.js';
export * from './events/index.js';
export * from './service/index.js';
export * from './config/index.js';
export * from './daemon/daemon.js';
export { getHealthStatus, getLivenessStatus } from './daemon/health.js';
export type { HealthStatus, DaemonStatusContext } from './daemon/health.js';
