/**
 * Result aggregation for finished tasks.
 *
 * Default policy, chosen by the shape of the successful results:
 * - all arrays  → concatenated in subtask order (work-splitting)
 * - all objects → per key: arithmetic mean when every value present for the
 *   key is a number, otherwise plurality vote with ties going to the value
 *   seen first (redundancy/consensus)
 * - anything else → the raw list of results
 *
 * Task types can register their own aggregator, which replaces the default.
 */

export type Aggregator = (results: unknown[], taskType: string) => unknown;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Structural equality for vote counting (JSON-shaped values). */
function voteKey(value: unknown): string {
  return typeof value === "string" ? `s:${value}` : `j:${JSON.stringify(value) ?? "undefined"}`;
}

export function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Most frequent value; ties go to the value seen first. */
export function pluralityVote<T>(values: T[]): T | undefined {
  const counts = new Map<string, { value: T; count: number; first: number }>();
  values.forEach((value, i) => {
    const key = voteKey(value);
    const entry = counts.get(key);
    if (entry) entry.count++;
    else counts.set(key, { value, count: 1, first: i });
  });

  let best: { value: T; count: number; first: number } | undefined;
  for (const entry of counts.values()) {
    if (!best || entry.count > best.count || (entry.count === best.count && entry.first < best.first)) {
      best = entry;
    }
  }
  return best?.value;
}

/** Per-key consensus over mapping-shaped results. */
export function consensus(results: Array<Record<string, unknown>>): Record<string, unknown> {
  const keys: string[] = [];
  const seen = new Set<string>();
  for (const result of results) {
    for (const key of Object.keys(result)) {
      if (!seen.has(key)) {
        seen.add(key);
        keys.push(key);
      }
    }
  }

  const merged: Record<string, unknown> = {};
  for (const key of keys) {
    const present = results.filter((r) => Object.prototype.hasOwnProperty.call(r, key)).map((r) => r[key]);
    const numbers = present.filter((v): v is number => typeof v === "number" && Number.isFinite(v));
    // defineProperty so a "__proto__" key stays an own key
    Object.defineProperty(merged, key, {
      value: numbers.length === present.length ? mean(numbers) : pluralityVote(present),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return merged;
}

export const defaultAggregator: Aggregator = (results) => {
  if (results.length > 0 && results.every((r) => Array.isArray(r))) {
    return results.flatMap((r) => (Array.isArray(r) ? r : []));
  }
  if (results.length > 0 && results.every(isPlainObject)) {
    return consensus(results.filter(isPlainObject));
  }
  return [...results];
};

/** Aggregators by task type, falling back to `defaultAggregator`. */
export class AggregationRegistry {
  private readonly byType = new Map<string, Aggregator>();

  register(taskType: string, aggregator: Aggregator): this {
    this.byType.set(taskType, aggregator);
    return this;
  }

  has(taskType: string): boolean {
    return this.byType.has(taskType);
  }

  aggregate(taskType: string, results: unknown[]): unknown {
    const aggregator = this.byType.get(taskType) ?? defaultAggregator;
    return aggregator(results, taskType);
  }
}
