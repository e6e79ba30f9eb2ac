/**
 * Canonical errors for the snapshot agent, with machine-readable codes.
 *
 * Attempt failures and timeouts never surface as errors: the coordinator
 * absorbs them as FAILED inputs. Only construction and configuration
 * problems are thrown.
 */

export type SnapshotErrorCode =
    | 'INVALID_SNAPSHOT_IDENTITY'
    | 'INVALID_CONFIGURATION';

export interface ConfigIssue {
    readonly path: string;
    readonly message: string;
}

export class InvalidSnapshotIdentityError extends Error {
    readonly code: SnapshotErrorCode = 'INVALID_SNAPSHOT_IDENTITY';

    constructor(public readonly field: 'createdAt' | 'node' | 'sequence', message: string) {
        super(`Invalid snapshot identity (${field}): ${message}`);
        this.name = 'InvalidSnapshotIdentityError';
        Object.setPrototypeOf(this, InvalidSnapshotIdentityError.prototype);
    }
}

export class SnapshotConfigError extends Error {
    readonly code: SnapshotErrorCode = 'INVALID_CONFIGURATION';

    constructor(
        public readonly context: string,
        public readonly issues: readonly ConfigIssue[]
    ) {
        super(`Configuration violation in ${context}: ${JSON.stringify(issues)}`);
        this.name = 'SnapshotConfigError';
        Object.setPrototypeOf(this, SnapshotConfigError.prototype);
    }
}

/**
 * Extracts a loggable message from any thrown value.
 */
export function describeError(err: unknown): string {
    if (err instanceof Error) {
        return err.message;
    }
    if (typeof err === 'string') {
        return err;
    }
    if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
        return err.message;
    }
    return String(err);
}
