import dotenv from 'dotenv';

dotenv.config();

/**
 * Process-level settings read from the environment (or a local .env file).
 * Correction runs themselves are configured by the ini file passed on the
 * command line; this only covers logging.
 */
export interface Config {
    logLevel: string;   // Level used when --verbose is not given
    logDir: string;     // Directory for rotated log files ('' = console only)
}

function getEnvVarOptional(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
}

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

export const config: Config = {
    logLevel: getEnvVarOptional('BMORPH_LOG_LEVEL', 'warn'),
    logDir: getEnvVarOptional('BMORPH_LOG_DIR', ''),
};
