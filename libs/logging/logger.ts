import { pino, type Logger } from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "snapshot-agent"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger bound to a component of the agent.
 */
export function getComponentLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ component, ...bindings });
}
