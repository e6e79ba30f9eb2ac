import { logger } from '../logging/logger.js';

export type EnvRecord = Readonly<Record<string, string | undefined>>;

export type GuardRule =
    | { type: 'required'; name: string }
    | { type: 'forbidIf'; name: string; when: (env: EnvRecord) => boolean; message: string }
    | { type: 'assert'; check: (env: EnvRecord) => boolean; message: string };

/**
 * Fail-closed configuration guard.
 * Missing values and unsafe combinations stop the process at startup.
 */
export class ConfigGuard {
    static collectViolations(rules: readonly GuardRule[], env: EnvRecord = process.env): string[] {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message}`);
                        }
                        break;
                    }
                }
            } catch (err: unknown) {
                errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        return errors;
    }

    static enforce(rules: readonly GuardRule[], env: EnvRecord = process.env): void {
        const errors = ConfigGuard.collectViolations(rules, env);

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: "Check SNAPSHOT_* environment variables."
            }, "Configuration Guard Violation");

            process.exit(1);
        }

        logger.info("Configuration guard passed.");
    }
}
