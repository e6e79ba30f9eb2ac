/**
 * Capabilities consumed by the change coordinator.
 *
 * The coordinator treats all of these as opaque services: it reads time,
 * schedules timers and asks for snapshots, nothing else.
 */

import type { SnapshotIdentity } from './snapshotIdentity.js';

export interface Clock {
    now(): Date;
}

export interface TimerHandle {
    cancel(): void;
}

export interface Timers {
    setTimer(delayMs: number, callback: () => void): TimerHandle;
}

/**
 * Provider outcome. A rejected promise is treated the same as
 * `{ success: false }`.
 */
export type SnapshotResult =
    | { readonly success: true }
    | {
        readonly success: false;
        readonly errorCode?: string;
        readonly errorMessage?: string;
    };

export interface SnapshotProvider {
    /** Resolves at most once per call. */
    create(identity: SnapshotIdentity): Promise<SnapshotResult>;
    /** Best-effort cancellation of a running `create`. */
    cancel?(identity: SnapshotIdentity): void;
}
