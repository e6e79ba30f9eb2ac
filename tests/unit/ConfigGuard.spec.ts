/**
 * Unit Tests: Config Guard
 *
 * @see libs/bootstrap/config-guard.ts
 * @see libs/bootstrap/config/snapshot-config.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ConfigGuard, type GuardRule } from '../../libs/bootstrap/config-guard.js';
import { SNAPSHOT_AGENT_CONFIG_GUARDS } from '../../libs/bootstrap/config/snapshot-config.js';

const validEnv = {
    SNAPSHOT_NODE_IDENTITY: 'node1',
    SNAPSHOT_WATCH_PATH: '/srv/data',
    SNAPSHOT_COMMAND: '["zfs","snapshot","tank/data@{name}"]'
};

describe('ConfigGuard', () => {
    describe('collectViolations()', () => {
        it('should pass a complete environment', () => {
            assert.deepStrictEqual(ConfigGuard.collectViolations(SNAPSHOT_AGENT_CONFIG_GUARDS, validEnv), []);
        });

        it('should report every missing required variable', () => {
            assert.deepStrictEqual(ConfigGuard.collectViolations(SNAPSHOT_AGENT_CONFIG_GUARDS, {}), [
                'FATAL CONFIG: Required env var SNAPSHOT_NODE_IDENTITY is missing',
                'FATAL CONFIG: Required env var SNAPSHOT_WATCH_PATH is missing',
                'FATAL CONFIG: Required env var SNAPSHOT_COMMAND is missing'
            ]);
        });

        it('should treat a blank value as missing', () => {
            const violations = ConfigGuard.collectViolations(SNAPSHOT_AGENT_CONFIG_GUARDS, {
                ...validEnv,
                SNAPSHOT_NODE_IDENTITY: '   '
            });

            assert.deepStrictEqual(violations, ['FATAL CONFIG: Required env var SNAPSHOT_NODE_IDENTITY is missing']);
        });

        it('should refuse to watch the filesystem root', () => {
            const violations = ConfigGuard.collectViolations(SNAPSHOT_AGENT_CONFIG_GUARDS, {
                ...validEnv,
                SNAPSHOT_WATCH_PATH: ' / '
            });

            assert.deepStrictEqual(violations, [
                'FATAL CONFIG: Watching the filesystem root is not supported (Rule: SNAPSHOT_WATCH_PATH)'
            ]);
        });

        it('should require the deadline to exceed the throttle interval', () => {
            const violations = ConfigGuard.collectViolations(SNAPSHOT_AGENT_CONFIG_GUARDS, {
                ...validEnv,
                SNAPSHOT_ATTEMPT_DEADLINE_MS: '500',
                SNAPSHOT_MIN_ATTEMPT_INTERVAL_MS: '1000'
            });

            assert.deepStrictEqual(violations, [
                'FATAL CONFIG: SNAPSHOT_ATTEMPT_DEADLINE_MS must exceed SNAPSHOT_MIN_ATTEMPT_INTERVAL_MS'
            ]);
        });

        it('should leave non-numeric timings to schema validation', () => {
            const violations = ConfigGuard.collectViolations(SNAPSHOT_AGENT_CONFIG_GUARDS, {
                ...validEnv,
                SNAPSHOT_ATTEMPT_DEADLINE_MS: 'soon',
                SNAPSHOT_MIN_ATTEMPT_INTERVAL_MS: '1000'
            });

            assert.deepStrictEqual(violations, []);
        });

        it('should report a rule whose check throws', () => {
            const rules: GuardRule[] = [{
                type: 'assert',
                check: () => {
                    throw new Error('lookup failed');
                },
                message: 'unreachable'
            }];

            assert.deepStrictEqual(ConfigGuard.collectViolations(rules, {}), ['Check failed for rule: lookup failed']);
        });
    });

    describe('enforce()', () => {
        it('should return normally when no rule is violated', () => {
            assert.doesNotThrow(() => ConfigGuard.enforce(SNAPSHOT_AGENT_CONFIG_GUARDS, validEnv));
        });
    });
});
