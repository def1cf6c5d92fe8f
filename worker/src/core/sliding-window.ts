export type WindowName = 'hour' | 'day';

export type WindowSpec = {
  name: WindowName;
  lengthMs: number;
  ceiling: number;
};

export type RateDecision = { allowed: true } | { allowed: false; retryAfterMs: number; window: WindowName };

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

/**
 * Rolling-window consumption log. A unit consumed at `t` counts against a window
 * of length `L` while `t > now - L`, so budget frees continuously rather than
 * at bucket boundaries.
 */
export class SlidingWindowLog {
  private stamps: number[] = [];

  constructor(private readonly windows: readonly WindowSpec[]) {}

  tryConsume(nowMs: number, cost: number): RateDecision {
    this.prune(nowMs);

    let denied: { retryAfterMs: number; window: WindowName } | null = null;
    for (const spec of this.windows) {
      const retryAfterMs = this.retryAfter(spec, nowMs, cost);
      if (retryAfterMs > 0 && (!denied || retryAfterMs > denied.retryAfterMs)) {
        denied = { retryAfterMs, window: spec.name };
      }
    }

    if (denied) {
      return { allowed: false, ...denied };
    }

    for (let i = 0; i < cost; i++) {
      this.stamps.push(nowMs);
    }
    return { allowed: true };
  }

  private retryAfter(spec: WindowSpec, nowMs: number, cost: number): number {
    if (cost > spec.ceiling) {
      return spec.lengthMs;
    }

    const active = this.inWindow(spec, nowMs);
    const excess = active.length + cost - spec.ceiling;
    if (excess <= 0) {
      return 0;
    }

    return active[excess - 1] + spec.lengthMs - nowMs;
  }

  private inWindow(spec: WindowSpec, nowMs: number): number[] {
    const floor = nowMs - spec.lengthMs;
    return this.stamps.filter((ts) => ts > floor);
  }

  private prune(nowMs: number): void {
    const longest = Math.max(0, ...this.windows.map((spec) => spec.lengthMs));
    const floor = nowMs - longest;
    if (this.stamps.length > 0 && this.stamps[0] <= floor) {
      this.stamps = this.stamps.filter((ts) => ts > floor);
    }
  }
}
