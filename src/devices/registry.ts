/**
 * Device registry — contract consumed by the distributor, and an in-memory
 * reference implementation.
 *
 * The distributor only needs `findAvailableDevices`; everything else on the
 * in-memory registry is device bookkeeping for embedders and the CLI.
 */

import {
  DeviceProfile,
  RegistryConfig,
  type DeviceProfileInput,
} from "../schemas/config.js";
import type { DeviceType, ResourceRequirements } from "../schemas/task.js";
import type { SubtaskOutcomeStatus } from "../schemas/message.js";
import { formatIssues } from "../schemas/message.js";

export type DeviceId = string;

/** Reported to the registry once per terminal subtask. */
export interface SubtaskOutcomeReport {
  deviceId: DeviceId;
  taskId: string;
  subtaskId: string;
  status: SubtaskOutcomeStatus;
  computationTimeMs?: number;
}

export interface DeviceRegistry {
  /**
   * Devices able to take a task with these requirements, best first.
   * Returns an empty list when nothing matches; never throws for "no match".
   */
  findAvailableDevices(required: ResourceRequirements, priority: number): DeviceId[] | Promise<DeviceId[]>;
  /** Optional bookkeeping hook; the distributor calls it for every terminal subtask. */
  recordSubtaskOutcome?(report: SubtaskOutcomeReport): void;
}

export interface DeviceSnapshot {
  profile: DeviceProfile;
  available: boolean;
  /** Epoch ms. */
  registeredAt: number;
  lastSeenAt: number;
  tasksCompleted: number;
  tasksFailed: number;
  computationTimeMs: number;
  /** Rolling score; starts at the profile's score. */
  performanceScore: number;
}

export interface DeviceStats {
  deviceCount: number;
  totalComputationTimeMs: number;
  totalTasksCompleted: number;
  totalTasksFailed: number;
  averagePerformance: number;
  contributionLevel: number;
}

export interface SystemStats extends DeviceStats {
  activeDevices: number;
  deviceDistribution: Partial<Record<DeviceType, number>>;
}

/** Contribution weight per device class. */
const CONTRIBUTION_BASE: Record<DeviceType, number> = {
  server: 10,
  desktop: 5,
  laptop: 3,
  tablet: 1,
  mobile: 0.5,
};

/** Weight of a new sample in the rolling performance score. */
const SCORE_SAMPLE_WEIGHT = 0.3;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export interface InMemoryDeviceRegistryOptions extends Partial<RegistryConfig> {
  now?: () => number;
}

export class InMemoryDeviceRegistry implements DeviceRegistry {
  private readonly config: RegistryConfig;
  private readonly now: () => number;
  private readonly devices = new Map<DeviceId, DeviceSnapshot>();

  constructor(opts: InMemoryDeviceRegistryOptions = {}) {
    const { now, ...config } = opts;
    this.config = RegistryConfig.parse(config);
    this.now = now ?? Date.now;
  }

  /**
   * Register a device, or refresh the profile of a known one (stats are kept).
   * Throws on an invalid profile.
   */
  register(input: DeviceProfileInput): DeviceSnapshot {
    const parsed = DeviceProfile.safeParse(input);
    if (!parsed.success) {
      throw new Error(`Invalid device profile: ${formatIssues(parsed.error).join("; ")}`);
    }
    const profile = parsed.data;
    const now = this.now();
    const existing = this.devices.get(profile.id);
    const snapshot: DeviceSnapshot = existing
      ? { ...existing, profile, available: true, lastSeenAt: now }
      : {
          profile,
          available: true,
          registeredAt: now,
          lastSeenAt: now,
          tasksCompleted: 0,
          tasksFailed: 0,
          computationTimeMs: 0,
          performanceScore: profile.performanceScore,
        };
    this.devices.set(profile.id, snapshot);
    return { ...snapshot };
  }

  unregister(deviceId: DeviceId): boolean {
    return this.devices.delete(deviceId);
  }

  /** Record a liveness signal. Returns false for an unknown device. */
  heartbeat(deviceId: DeviceId): boolean {
    const device = this.devices.get(deviceId);
    if (!device) return false;
    device.lastSeenAt = this.now();
    return true;
  }

  setAvailability(deviceId: DeviceId, available: boolean): boolean {
    const device = this.devices.get(deviceId);
    if (!device) return false;
    device.available = available;
    return true;
  }

  /** Blend a new score sample into the rolling performance score (30% new). */
  updatePerformanceScore(deviceId: DeviceId, score: number): boolean {
    const device = this.devices.get(deviceId);
    if (!device) return false;
    const clamped = Math.min(100, Math.max(0, score));
    device.performanceScore = device.performanceScore === 0
      ? clamped
      : SCORE_SAMPLE_WEIGHT * clamped + (1 - SCORE_SAMPLE_WEIGHT) * device.performanceScore;
    return true;
  }

  get(deviceId: DeviceId): DeviceSnapshot | undefined {
    const device = this.devices.get(deviceId);
    return device ? { ...device } : undefined;
  }

  list(): DeviceSnapshot[] {
    return [...this.devices.values()].map((d) => ({ ...d }));
  }

  /**
   * Filter on availability, heartbeat freshness and resources, then order by
   * speed. Devices at or above `reservedPerformanceScore` only serve tasks with
   * priority ≤ `reservedMaxPriority`; those urgent tasks take the fastest
   * devices first, everything else takes the slowest first.
   */
  findAvailableDevices(required: ResourceRequirements, priority: number): DeviceId[] {
    const urgent = priority <= this.config.reservedMaxPriority;
    const candidates = [...this.devices.values()].filter((device) => {
      if (!this.isLive(device)) return false;
      if (!urgent && device.performanceScore >= this.config.reservedPerformanceScore) return false;
      return this.satisfies(device.profile, required);
    });

    candidates.sort((a, b) => {
      const diff = urgent ? b.performanceScore - a.performanceScore : a.performanceScore - b.performanceScore;
      return diff !== 0 ? diff : a.registeredAt - b.registeredAt;
    });

    const limit = required.maxDevices ?? this.config.maxDevicesPerTask;
    return candidates.slice(0, limit).map((d) => d.profile.id);
  }

  recordSubtaskOutcome(report: SubtaskOutcomeReport): void {
    const device = this.devices.get(report.deviceId);
    if (!device) return;
    if (report.status === "completed") device.tasksCompleted++;
    else device.tasksFailed++;
    device.computationTimeMs += report.computationTimeMs ?? 0;
    device.lastSeenAt = this.now();
  }

  /** Aggregate stats over the given devices (all devices by default). */
  getDeviceStats(deviceIds?: DeviceId[]): DeviceStats {
    const devices = deviceIds
      ? deviceIds.flatMap((id) => {
          const d = this.devices.get(id);
          return d ? [d] : [];
        })
      : [...this.devices.values()];

    if (devices.length === 0) {
      return {
        deviceCount: 0,
        totalComputationTimeMs: 0,
        totalTasksCompleted: 0,
        totalTasksFailed: 0,
        averagePerformance: 0,
        contributionLevel: 0,
      };
    }

    let computation = 0;
    let completed = 0;
    let failed = 0;
    let score = 0;
    let contribution = 0;
    for (const d of devices) {
      computation += d.computationTimeMs;
      completed += d.tasksCompleted;
      failed += d.tasksFailed;
      score += d.performanceScore;
      contribution += CONTRIBUTION_BASE[d.profile.type] * (d.performanceScore / 100);
    }

    return {
      deviceCount: devices.length,
      totalComputationTimeMs: computation,
      totalTasksCompleted: completed,
      totalTasksFailed: failed,
      averagePerformance: round2(score / devices.length),
      contributionLevel: round2(contribution),
    };
  }

  getSystemStats(): SystemStats {
    const distribution: Partial<Record<DeviceType, number>> = {};
    let active = 0;
    for (const d of this.devices.values()) {
      distribution[d.profile.type] = (distribution[d.profile.type] ?? 0) + 1;
      if (this.isLive(d)) active++;
    }
    return { ...this.getDeviceStats(), activeDevices: active, deviceDistribution: distribution };
  }

  private isLive(device: DeviceSnapshot): boolean {
    return device.available && this.now() - device.lastSeenAt <= this.config.heartbeatTtlMs;
  }

  private satisfies(profile: DeviceProfile, required: ResourceRequirements): boolean {
    if (required.deviceTypes.length > 0 && !required.deviceTypes.includes(profile.type)) return false;
    if (!required.capabilities.every((c) => profile.capabilities.includes(c))) return false;
    if (required.minCpuCores !== undefined && profile.cpuCores < required.minCpuCores) return false;
    if (required.minMemoryMb !== undefined && profile.memoryMb < required.minMemoryMb) return false;
    if (required.gpu === true && !profile.gpu) return false;
    return true;
  }
}
