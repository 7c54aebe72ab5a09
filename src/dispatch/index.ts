export { TaskDistributor, DISTRIBUTOR_AGENT_TYPE } from "./task-distributor.js";
export type {
  DistributionAction,
  DistributionOutcome,
  DistributorStats,
  SubmitTaskInput,
  SubtaskResultOutcome,
  TaskDistributorOptions,
} from "./task-distributor.js";
export { AggregationRegistry, defaultAggregator, consensus, pluralityVote, mean } from "./aggregation.js";
export type { Aggregator } from "./aggregation.js";
export { partitionPayload, chunkSizes } from "./partition.js";
export type { SubtaskPlan } from "./partition.js";
export { PriorityQueue } from "./priority-queue.js";
export { InMemoryTaskLockManager } from "./task-lock.js";
export type { TaskLockManager } from "./task-lock.js";
