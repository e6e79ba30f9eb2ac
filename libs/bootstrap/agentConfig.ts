import { validate } from '../validation/validate.js';
import { AgentEnvSchema, type AgentConfig } from '../validation/schema.js';
import type { EnvRecord } from './config-guard.js';

/**
 * Parses the SNAPSHOT_* environment into a typed agent configuration.
 *
 * @throws SnapshotConfigError when any variable is missing or malformed
 */
export function loadAgentConfig(env: EnvRecord = process.env): AgentConfig {
    return validate(AgentEnvSchema, env, 'snapshot-agent:env');
}
