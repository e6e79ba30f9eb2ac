/**
 * Command Snapshot Provider
 *
 * Creates a snapshot by running an external command, e.g.
 *   ["zfs", "snapshot", "tank/data@{name}"]
 *
 * Placeholders substituted in every argument:
 *   {name}      snapshotName(identity)
 *   {node}      identity.node
 *   {timestamp} identity.createdAt as ISO-8601
 *   {sequence}  identity.sequence
 *
 * cancel() aborts the matching run; the aborted run resolves with
 * errorCode CANCELLED.
 */

import { execFile } from 'node:child_process';
import { getComponentLogger } from '../logging/logger.js';
import { describeError } from '../errors/snapshotErrors.js';
import type { SnapshotProvider, SnapshotResult } from '../snapshots/capabilities.js';
import { snapshotName, type SnapshotIdentity } from '../snapshots/snapshotIdentity.js';

const logger = getComponentLogger('CommandSnapshotProvider');

export type CommandRunner = (
    file: string,
    args: readonly string[],
    options: { readonly signal: AbortSignal }
) => Promise<void>;

export const execFileRunner: CommandRunner = (file, args, { signal }) =>
    new Promise((resolve, reject) => {
        execFile(file, [...args], { signal }, error => {
            if (error) {
                reject(error);
                return;
            }
            resolve();
        });
    });

export function renderCommand(template: readonly string[], identity: SnapshotIdentity): string[] {
    const values: Record<string, string> = {
        name: snapshotName(identity),
        node: identity.node,
        timestamp: identity.createdAt.toISOString(),
        sequence: String(identity.sequence)
    };
    return template.map(arg => arg.replace(/\{(name|node|timestamp|sequence)\}/g, (match, key: string) => values[key] ?? match));
}

export class CommandSnapshotProvider implements SnapshotProvider {
    private readonly inFlight = new Map<string, AbortController>();

    constructor(
        private readonly command: readonly string[],
        private readonly run: CommandRunner = execFileRunner
    ) {
        if (command.length === 0) {
            throw new Error('Snapshot command must name an executable');
        }
    }

    public async create(identity: SnapshotIdentity): Promise<SnapshotResult> {
        const name = snapshotName(identity);
        const [file, ...args] = renderCommand(this.command, identity);
        if (file === undefined) {
            return { success: false, errorCode: 'COMMAND_FAILED', errorMessage: 'Snapshot command is empty' };
        }

        const controller = new AbortController();
        this.inFlight.set(name, controller);

        try {
            await this.run(file, args, { signal: controller.signal });
            logger.debug({ snapshot: name, file }, 'Snapshot command completed');
            return { success: true };
        } catch (error: unknown) {
            const errorCode = controller.signal.aborted ? 'CANCELLED' : 'COMMAND_FAILED';
            const errorMessage = describeError(error);
            logger.warn({ snapshot: name, file, errorCode, error: errorMessage }, 'Snapshot command failed');
            return { success: false, errorCode, errorMessage };
        } finally {
            this.inFlight.delete(name);
        }
    }

    public cancel(identity: SnapshotIdentity): void {
        const name = snapshotName(identity);
        const controller = this.inFlight.get(name);
        if (!controller) return;

        logger.info({ snapshot: name }, 'Cancelling snapshot command');
        controller.abort();
    }

    /** Number of commands currently running (for monitoring). */
    public get runningCount(): number {
        return this.inFlight.size;
    }
}
