/**
 * Deadline Controller
 *
 * Bounds the duration of the single in-flight attempt. The armed timer is
 * tagged with the attempt's identity: disarming with any other identity is
 * a no-op, and a timer only fires for the identity it was armed with.
 */

import type { TimerHandle, Timers } from './capabilities.js';
import { isSameAttempt, type SnapshotIdentity } from './snapshotIdentity.js';

export const DEFAULT_ATTEMPT_DEADLINE_MS = 10_000;

interface ArmedDeadline {
    readonly identity: SnapshotIdentity;
    readonly handle: TimerHandle;
}

export class DeadlineController {
    private armed: ArmedDeadline | null = null;

    constructor(
        private readonly timers: Timers,
        private readonly deadlineMs: number = DEFAULT_ATTEMPT_DEADLINE_MS
    ) {
        if (!Number.isFinite(deadlineMs) || deadlineMs <= 0) {
            throw new Error(`Attempt deadline must be a positive number of milliseconds, got ${deadlineMs}`);
        }
    }

    /**
     * Arm the deadline for `identity`, replacing any previous one.
     */
    public arm(identity: SnapshotIdentity, onExpire: (identity: SnapshotIdentity) => void): void {
        this.disarmAll();

        const handle = this.timers.setTimer(this.deadlineMs, () => {
            if (!this.armed || !isSameAttempt(this.armed.identity, identity)) return;
            this.armed = null;
            onExpire(identity);
        });
        this.armed = { identity, handle };
    }

    /**
     * @returns true if a deadline for `identity` was armed and is now cleared
     */
    public disarm(identity: SnapshotIdentity): boolean {
        if (!this.armed || !isSameAttempt(this.armed.identity, identity)) {
            return false;
        }
        this.armed.handle.cancel();
        this.armed = null;
        return true;
    }

    public disarmAll(): void {
        if (this.armed) {
            this.armed.handle.cancel();
            this.armed = null;
        }
    }

    public armedFor(): SnapshotIdentity | null {
        return this.armed?.identity ?? null;
    }

    public get durationMs(): number {
        return this.deadlineMs;
    }
}
