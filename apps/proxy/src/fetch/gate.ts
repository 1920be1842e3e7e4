import pLimit, { type LimitFunction } from "p-limit";

/**
 * One-slot limiter per key. Calls for the same key run one at a time;
 * calls for different keys never wait on each other. Limiters are created
 * on first use and live for the process lifetime.
 */
export class KeyedGate {
  private readonly gates = new Map<string, LimitFunction>();

  private gate(key: string): LimitFunction {
    let limit = this.gates.get(key);
    if (!limit) {
      limit = pLimit(1);
      this.gates.set(key, limit);
    }
    return limit;
  }

  /** Number of calls for `key` running or waiting for the slot. */
  load(key: string): number {
    const limit = this.gates.get(key);
    return limit ? limit.activeCount + limit.pendingCount : 0;
  }

  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.gate(key)(fn);
  }
}
