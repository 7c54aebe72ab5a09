/**
 * Task partitioning.
 *
 * Array payloads are split into contiguous chunks whose sizes differ by at
 * most one (work-splitting). Any other payload is copied whole to every
 * device (redundancy), so the replicas can be aggregated by consensus.
 */

import type { PartitionMode } from "../schemas/task.js";

export interface SubtaskPlan {
  index: number;
  deviceId: string;
  mode: PartitionMode;
  data: unknown;
}

/**
 * Chunk sizes for `length` items over `parts` parts: the first
 * `length % parts` chunks take one extra item.
 */
export function chunkSizes(length: number, parts: number): number[] {
  if (parts <= 0) return [];
  const base = Math.floor(length / parts);
  const extra = length % parts;
  return Array.from({ length: parts }, (_, i) => base + (i < extra ? 1 : 0));
}

/**
 * Plan one subtask per device. Duplicate device IDs are ignored.
 *
 * When an array has fewer items than there are devices only
 * `max(1, length)` devices are used, so no device receives an empty chunk
 * (an empty array still yields one subtask).
 */
export function partitionPayload(data: unknown, deviceIds: readonly string[]): SubtaskPlan[] {
  const devices = [...new Set(deviceIds)];
  if (devices.length === 0) return [];

  if (Array.isArray(data)) {
    const used = devices.slice(0, Math.max(1, Math.min(devices.length, data.length)));
    const sizes = chunkSizes(data.length, used.length);
    const plans: SubtaskPlan[] = [];
    let offset = 0;
    used.forEach((deviceId, index) => {
      const size = sizes[index] ?? 0;
      plans.push({ index, deviceId, mode: "split", data: data.slice(offset, offset + size) });
      offset += size;
    });
    return plans;
  }

  return devices.map((deviceId, index) => ({
    index,
    deviceId,
    mode: "replica",
    data: structuredClone(data),
  }));
}
