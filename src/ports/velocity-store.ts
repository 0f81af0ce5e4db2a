/**
 * Windowed counters for risk velocity rules. Implementations must make each
 * call a single atomic read-modify-write.
 */
export interface VelocityStorePort {
  /** Adds one to the counter and returns the new value. */
  increment(key: string, ttlMs: number): Promise<number>;
  /** Adds `member` to the set and returns the set's cardinality. */
  addDistinct(key: string, member: string, ttlMs: number): Promise<number>;
}
