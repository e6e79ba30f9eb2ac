import { logger } from "../logging/logger.js";
import { ConfigGuard, type EnvRecord } from "./config-guard.js";
import { SNAPSHOT_AGENT_CONFIG_GUARDS } from "./config/snapshot-config.js";
import { loadAgentConfig } from "./agentConfig.js";
import type { AgentConfig } from "../validation/schema.js";

export function bootstrap(serviceName: string, env: EnvRecord = process.env): AgentConfig {
    logger.info({ serviceName }, "Bootstrapping service");

    ConfigGuard.enforce(SNAPSHOT_AGENT_CONFIG_GUARDS, env);
    const config = loadAgentConfig(env);

    logger.info({
        serviceName,
        node: config.coordinator.nodeIdentity,
        watchPath: config.watchPath
    }, "Startup checks passed");

    return config;
}
