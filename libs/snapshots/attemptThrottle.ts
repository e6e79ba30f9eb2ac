/**
 * Attempt Throttle
 *
 * Keeps attempt launches at least `minIntervalMs` apart, even under a
 * continuous change stream or a failing provider. Zero disables it.
 *
 * The delay never exceeds the interval itself, so a wall clock stepped
 * backwards cannot hold a launch back for longer than one interval.
 */

export const DEFAULT_MIN_ATTEMPT_INTERVAL_MS = 1_000;

export class AttemptThrottle {
    private lastStartMs: number | null = null;

    constructor(private readonly minIntervalMs: number = DEFAULT_MIN_ATTEMPT_INTERVAL_MS) {
        if (!Number.isFinite(minIntervalMs) || minIntervalMs < 0) {
            throw new Error(`Minimum attempt interval must be >= 0 ms, got ${minIntervalMs}`);
        }
    }

    /**
     * Milliseconds to wait before an attempt may launch at `now`.
     */
    public delayBeforeStart(now: Date): number {
        if (this.lastStartMs === null) return 0;
        return Math.min(this.minIntervalMs, Math.max(0, this.lastStartMs + this.minIntervalMs - now.getTime()));
    }

    public recordStart(at: Date): void {
        this.lastStartMs = at.getTime();
    }

    public get intervalMs(): number {
        return this.minIntervalMs;
    }
}
