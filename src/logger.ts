import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { config, isLogLevel } from './config.js';

export type Logger = winston.Logger;

export interface LoggerOptions {
    verbose?: boolean;   // --verbose: log every file read, write and skip
    logDir?: string;     // Overrides BMORPH_LOG_DIR
    silent?: boolean;    // Drop everything (used by tests)
}

// --verbose wins; otherwise BMORPH_LOG_LEVEL, falling back to 'warn'
function getLogLevel(verbose: boolean): string {
    if (verbose) return 'debug';
    return isLogLevel(config.logLevel) ? config.logLevel : 'warn';
}

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(({ level, message, timestamp, ...metadata }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
});

/**
 * Build the run logger. There is no process-wide logger: the CLI creates one
 * and hands it to the batch runner, which threads it through every selection.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    const level = getLogLevel(options.verbose ?? false);
    const logDir = options.logDir ?? config.logDir;

    const consoleTransport = new winston.transports.Console({
        format: combine(
            colorize(),
            timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            logFormat
        ),
    });

    // File rotation: 10MB per file, keep 5 files max
    const fileTransports = logDir
        ? [
            new DailyRotateFile({
                filename: path.join(logDir, 'bmorph-%DATE%.log'),
                datePattern: 'YYYY-MM-DD',
                zippedArchive: true,
                maxSize: '10m',
                maxFiles: '5',
                level,
            }),
            // Separate error log
            new DailyRotateFile({
                filename: path.join(logDir, 'bmorph-error-%DATE%.log'),
                datePattern: 'YYYY-MM-DD',
                zippedArchive: true,
                maxSize: '10m',
                maxFiles: '5',
                level: 'error',
            }),
        ]
        : [];

    return winston.createLogger({
        level,
        silent: options.silent ?? false,
        format: combine(
            timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            logFormat
        ),
        transports: [consoleTransport, ...fileTransports],
    });
}
