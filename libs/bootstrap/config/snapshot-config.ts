import type { EnvRecord, GuardRule } from '../config-guard.js';

function numeric(env: EnvRecord, name: string): number | null {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return null;
    const value = Number(raw);
    return Number.isFinite(value) ? value : null;
}

/**
 * Snapshot agent configuration guards.
 * Presence and cross-field rules; shapes are checked by AgentEnvSchema.
 */
export const SNAPSHOT_AGENT_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'SNAPSHOT_NODE_IDENTITY' },
    { type: 'required', name: 'SNAPSHOT_WATCH_PATH' },
    { type: 'required', name: 'SNAPSHOT_COMMAND' },

    {
        type: 'forbidIf',
        name: 'SNAPSHOT_WATCH_PATH',
        when: env => env.SNAPSHOT_WATCH_PATH?.trim() === '/',
        message: 'Watching the filesystem root is not supported',
    },

    {
        type: 'assert',
        check: env => {
            const deadline = numeric(env, 'SNAPSHOT_ATTEMPT_DEADLINE_MS');
            const interval = numeric(env, 'SNAPSHOT_MIN_ATTEMPT_INTERVAL_MS');
            return deadline === null || interval === null || deadline > interval;
        },
        message: 'SNAPSHOT_ATTEMPT_DEADLINE_MS must exceed SNAPSHOT_MIN_ATTEMPT_INTERVAL_MS',
    }
];
