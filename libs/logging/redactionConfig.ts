/**
 * Centralized Redaction Configuration
 * Keys that must never reach the logs. Snapshot commands and their
 * environment may carry storage credentials.
 */
export const REDACT_KEYS = [
    // Credentials (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'password', '*.password',
    'secret', '*.secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Command environment
    'env', '*.env'
];

export const REDACT_CENSOR = '[REDACTED]';
