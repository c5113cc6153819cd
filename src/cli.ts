/**
 * Command-line handling for streamflow-bmorph.
 *
 * Usage:
 *   streamflow-bmorph --config <file> [--verbose]
 *   streamflow-bmorph --version
 */

import { runBatch } from './batch/runner.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { Logger, createLogger } from './logger.js';
import { loadSettings } from './settings/settings.js';
import { VERSION } from './version.js';

export const USAGE = 'Usage: streamflow-bmorph --config <file> [--verbose] [--version]';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliArgs {
    configPath?: string;
    verbose: boolean;
    version: boolean;
    help: boolean;
    errors: string[];
}

export function parseArgs(argv: string[]): CliArgs {
    const args: CliArgs = { verbose: false, version: false, help: false, errors: [] };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        // --config=<file> form
        const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
        const flag = eq >= 0 ? arg.slice(0, eq) : arg;
        const inlineValue = eq >= 0 ? arg.slice(eq + 1) : undefined;

        switch (flag) {
            case '-c':
            case '--config': {
                const value = inlineValue ?? argv[i + 1];
                if (inlineValue === undefined) i++;
                if (!value || value.startsWith('-')) {
                    args.errors.push(`${flag} requires a file path`);
                } else {
                    args.configPath = value;
                }
                break;
            }
            case '-v':
            case '--verbose':
                args.verbose = true;
                break;
            case '-V':
            case '--version':
                args.version = true;
                break;
            case '-h':
            case '--help':
                args.help = true;
                break;
            default:
                args.errors.push(`Unknown argument: ${arg}`);
                break;
        }
    }

    return args;
}

export interface CliIo {
    stdout: (line: string) => void;
    stderr: (line: string) => void;
    createLogger: (verbose: boolean) => Logger;
}

const defaultIo: CliIo = {
    stdout: line => process.stdout.write(`${line}\n`),
    stderr: line => process.stderr.write(`${line}\n`),
    createLogger: verbose => createLogger({ verbose }),
};

/**
 * Run the tool and return the process exit code.
 */
export function runCli(argv: string[], io: CliIo = defaultIo): number {
    const args = parseArgs(argv);

    if (args.version) {
        io.stdout(`streamflow-bmorph ${VERSION}`);
        return EXIT_OK;
    }
    if (args.help) {
        io.stdout(USAGE);
        return EXIT_OK;
    }
    if (args.errors.length > 0 || !args.configPath) {
        for (const error of args.errors) io.stderr(error);
        if (!args.configPath && args.errors.length === 0) io.stderr('--config is required');
        io.stderr(USAGE);
        return EXIT_USAGE;
    }

    const logger = io.createLogger(args.verbose);
    try {
        const settings = loadSettings(args.configPath);
        const summary = runBatch(settings, { logger });
        io.stdout(`${summary.written} written, ${summary.skipped} skipped, ${summary.total} total`);
        return EXIT_OK;
    } catch (error) {
        if (error instanceof ConfigurationError) {
            logger.error(error.message, { issues: error.issues });
        } else {
            logger.error('Fatal error', {
                error: errorMessage(error),
                stack: error instanceof Error ? error.stack : undefined,
            });
        }
        return EXIT_FAILURE;
    }
}

export interface ProcessHandlers {
    unhandledRejection: (reason: unknown) => void;
    uncaughtException: (error: Error) => void;
}

/**
 * Last-resort handlers for the entry point: log through winston, then exit 1.
 */
export function processHandlers(logger: Logger, exit: (code: number) => void): ProcessHandlers {
    return {
        unhandledRejection: reason => {
            logger.error('Unhandled promise rejection', {
                reason: errorMessage(reason),
                stack: reason instanceof Error ? reason.stack : undefined,
            });
            exit(EXIT_FAILURE);
        },
        uncaughtException: error => {
            logger.error('Uncaught exception', { error: error.message, stack: error.stack });
            exit(EXIT_FAILURE);
        },
    };
}
