/**
 * Per-symbol alert cooldown, keyed by UNIX seconds.
 */

export class CooldownTracker {
  private lastAlert: Map<string, number> = new Map();

  constructor(private readonly windowSeconds: number) {}

  get window(): number {
    return this.windowSeconds;
  }

  /**
   * True while `symbol` alerted less than one window before `nowSec`.
   * A symbol that never alerted is never skipped.
   */
  shouldSkip(symbol: string, nowSec: number): boolean {
    const last = this.lastAlert.get(symbol);
    return last !== undefined && nowSec - last < this.windowSeconds;
  }

  record(symbol: string, nowSec: number): void {
    this.lastAlert.set(symbol, nowSec);
  }

  /** Symbols still cooling down at `nowSec` */
  recentCount(nowSec: number): number {
    let count = 0;
    for (const symbol of this.lastAlert.keys()) {
      if (this.shouldSkip(symbol, nowSec)) {
        count++;
      }
    }
    return count;
  }

  get size(): number {
    return this.lastAlert.size;
  }
}
