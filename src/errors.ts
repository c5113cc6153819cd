/**
 * Error types surfaced by a correction run.
 *
 * Only a missing raw input is recovered locally (as a skipped selection);
 * every error below propagates to the entry point and stops the batch.
 */

export type BmorphErrorCode = 'CONFIG_INVALID' | 'SERIES_FORMAT' | 'KERNEL_FAILURE';

export class BmorphError extends Error {
    readonly code: BmorphErrorCode;

    constructor(code: BmorphErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Raised before any processing when the configuration file cannot be
 * turned into valid Settings. Carries every issue found, not just the first.
 */
export class ConfigurationError extends BmorphError {
    readonly issues: string[];

    constructor(issues: string[], source?: string) {
        const where = source ? ` in ${source}` : '';
        super('CONFIG_INVALID', `Invalid configuration${where}:\n  - ${issues.join('\n  - ')}`);
        this.issues = issues;
    }
}

/**
 * A series file that exists but cannot be parsed into a strictly
 * increasing time series.
 */
export class SeriesFormatError extends BmorphError {
    readonly filePath: string | undefined;
    readonly line: number | undefined;

    constructor(message: string, filePath?: string, line?: number) {
        const location = filePath ? ` (${filePath}${line !== undefined ? `:${line}` : ''})` : '';
        super('SERIES_FORMAT', `${message}${location}`);
        this.filePath = filePath;
        this.line = line;
    }
}

export class KernelError extends BmorphError {
    constructor(message: string) {
        super('KERNEL_FAILURE', message);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
