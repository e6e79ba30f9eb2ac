import { z } from 'zod';
import { DEFAULT_ATTEMPT_DEADLINE_MS } from '../snapshots/deadlineController.js';
import { DEFAULT_MIN_ATTEMPT_INTERVAL_MS } from '../snapshots/attemptThrottle.js';

/**
 * Central schema definitions for agent configuration.
 */

// --- Coordinator ---

/** Blank env values count as unset. */
const blankAsUnset = (value: unknown): unknown =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

export const CoordinatorConfigSchema = z.object({
    nodeIdentity: z.string().trim().min(1).max(128),
    attemptDeadlineMs: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(DEFAULT_ATTEMPT_DEADLINE_MS)),
    minAttemptIntervalMs: z.preprocess(blankAsUnset, z.coerce.number().int().nonnegative().default(DEFAULT_MIN_ATTEMPT_INTERVAL_MS)),
});

// --- Snapshot command ---

/**
 * argv template as a JSON array, e.g. ["zfs","snapshot","tank/data@{name}"]
 */
export const CommandTemplateSchema = z.string().min(1)
    .transform((raw, ctx) => {
        try {
            const parsed: unknown = JSON.parse(raw);
            return parsed;
        } catch {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be a JSON array of strings' });
            return z.NEVER;
        }
    })
    .pipe(z.array(z.string().min(1)).min(1));

// --- Agent environment ---

export const AgentEnvSchema = z.object({
    SNAPSHOT_NODE_IDENTITY: CoordinatorConfigSchema.shape.nodeIdentity,
    SNAPSHOT_ATTEMPT_DEADLINE_MS: CoordinatorConfigSchema.shape.attemptDeadlineMs,
    SNAPSHOT_MIN_ATTEMPT_INTERVAL_MS: CoordinatorConfigSchema.shape.minAttemptIntervalMs,
    SNAPSHOT_WATCH_PATH: z.string().trim().min(1),
    SNAPSHOT_COMMAND: CommandTemplateSchema,
    SNAPSHOT_WATCH_IGNORED: z.string().optional()
        .transform(raw => (raw ?? '').split(',').map(pattern => pattern.trim()).filter(pattern => pattern !== '')),
}).transform(env => ({
    coordinator: {
        nodeIdentity: env.SNAPSHOT_NODE_IDENTITY,
        attemptDeadlineMs: env.SNAPSHOT_ATTEMPT_DEADLINE_MS,
        minAttemptIntervalMs: env.SNAPSHOT_MIN_ATTEMPT_INTERVAL_MS,
    },
    watchPath: env.SNAPSHOT_WATCH_PATH,
    watchIgnored: env.SNAPSHOT_WATCH_IGNORED,
    snapshotCommand: env.SNAPSHOT_COMMAND,
}));

export type AgentConfig = z.infer<typeof AgentEnvSchema>;
