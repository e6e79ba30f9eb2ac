/**
 * Snapshot Identity
 *
 * Names exactly one snapshot attempt. Built once, when the attempt is
 * launched, from the clock reading at that moment and the coordinator's
 * node identity. Never reused across attempts.
 *
 * Millisecond timestamps alone can collide when two attempts start within
 * the same clock tick, so every identity also carries the coordinator's
 * monotonically increasing attempt sequence.
 */

import { InvalidSnapshotIdentityError } from '../errors/snapshotErrors.js';

export interface SnapshotIdentity {
    /** Instant the attempt was launched (rendered as ISO-8601 UTC) */
    readonly createdAt: Date;
    /** Stable identifier of the node producing the snapshot */
    readonly node: string;
    /** Attempt sequence within the producing coordinator (1, 2, 3...) */
    readonly sequence: number;
}

export function createSnapshotIdentity(createdAt: Date, node: string, sequence: number): SnapshotIdentity {
    if (Number.isNaN(createdAt.getTime())) {
        throw new InvalidSnapshotIdentityError('createdAt', 'timestamp is not a valid date');
    }
    if (node.trim() === '') {
        throw new InvalidSnapshotIdentityError('node', 'node identity must not be empty');
    }
    if (!Number.isSafeInteger(sequence) || sequence < 1) {
        throw new InvalidSnapshotIdentityError('sequence', `expected a positive integer, got ${sequence}`);
    }

    const createdAtMs = createdAt.getTime();
    return Object.freeze({
        // Each read gets its own Date; the instant itself cannot be changed.
        get createdAt(): Date {
            return new Date(createdAtMs);
        },
        node,
        sequence
    });
}

/**
 * Storage-facing name, e.g. `2024-05-01T10:00:00.000Z_node1_3`.
 */
export function snapshotName(identity: SnapshotIdentity): string {
    return `${identity.createdAt.toISOString()}_${identity.node}_${identity.sequence}`;
}

export function isSameAttempt(a: SnapshotIdentity, b: SnapshotIdentity): boolean {
    return a.sequence === b.sequence
        && a.node === b.node
        && a.createdAt.getTime() === b.createdAt.getTime();
}
