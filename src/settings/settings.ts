/**
 * Run Settings
 *
 * The ini file is validated once, up front, against a zod schema and turned
 * into an immutable Settings record. Every problem is collected into one
 * ConfigurationError so a bad file fails before any selection is processed.
 *
 *   [siteinfo]
 *   site = site_a, site_b
 *   hydro_model = vic
 *   parameter_set = default
 *   scenario = rcp45, rcp85
 *   downscaling = bcsd
 *   gcm = ccsm4, miroc5
 *
 *   [bmorph]
 *   training_window = 1951-01-01, 2005-12-31
 *   bmorph_window = 1951-01-01, 2099-12-31
 *   reference_window = 1951-01-01, 2005-12-31
 *   n_smooth_short = 61
 *   n_smooth_long = 365
 *   cdf_half_period = 15
 *
 *   [io]
 *   raw_template = raw/{site}/{hydro_model}_{parameter_set}_{scenario}_{downscaling}_{gcm}.csv
 *   reference_template = reference/{site}.csv
 *   output_template = corrected/{site}/{hydro_model}_{parameter_set}_{scenario}_{downscaling}_{gcm}.csv
 *   output_float_format = .3f
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { SiteDims } from '../grid/site-grid.js';
import { unknownPlaceholders } from '../grid/path-templates.js';
import { compileNumberFormat } from '../output/printf-format.js';
import { TimeWindow, makeWindow, parseTimestamp } from '../series/time-window.js';
import { IniDocument, readIniFile, splitList } from './ini-parser.js';

export interface BmorphSettings {
    readonly trainingWindow: TimeWindow;
    readonly correctionWindow: TimeWindow;
    readonly referenceWindow: TimeWindow;
    readonly nSmoothShort: number;
    readonly nSmoothLong: number;
    readonly cdfHalfPeriod: number;     // Years either side of the target year
}

export interface IoSettings {
    readonly rawTemplate: string;       // Absolute, resolved against the config file
    readonly referenceTemplate: string;
    readonly outputTemplate: string;
    readonly floatFormat: string;       // Full printf format, e.g. "%.3f"
}

export interface Settings {
    readonly configPath: string;        // Absolute path of the ini file
    readonly siteDims: SiteDims;
    readonly bmorph: BmorphSettings;
    readonly io: IoSettings;
}

const REQUIRED = { required_error: 'is required' };

const listField = z
    .string(REQUIRED)
    .transform(splitList)
    .pipe(z.array(z.string()).min(1, 'must list at least one value'));

const windowField = z.string(REQUIRED).transform((value, ctx): TimeWindow => {
    const items = splitList(value);
    if (items.length !== 2) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: items.length < 2
                ? `must be a list of two dates "start, stop", got "${value}"`
                : `must contain exactly two dates, got ${items.length}`,
        });
        return z.NEVER;
    }

    const start = parseTimestamp(items[0]);
    const stop = parseTimestamp(items[1]);
    if (!start || !stop) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `unparseable date in "${value}"`,
        });
        return z.NEVER;
    }
    if (start.toMillis() >= stop.toMillis()) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `start ${items[0]} must be earlier than stop ${items[1]}`,
        });
        return z.NEVER;
    }
    return makeWindow(start, stop);
});

function integerField(min: number, message: string) {
    return z
        .string(REQUIRED)
        .trim()
        .regex(/^[+-]?\d+$/, 'must be an integer')
        .transform(Number)
        .pipe(z.number().int().min(min, message));
}

const templateField = z
    .string(REQUIRED)
    .min(1, 'must not be empty')
    .superRefine((value, ctx) => {
        const unknown = unknownPlaceholders(value);
        if (unknown.length > 0) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `unknown placeholder(s) ${unknown.map(u => `{${u}}`).join(', ')}`,
            });
        }
    });

const floatFormatField = z
    .string()
    .default('.3f')
    .transform(value => (value.startsWith('%') ? value : `%${value}`))
    .superRefine((value, ctx) => {
        try {
            compileNumberFormat(value);
        } catch (error) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: error instanceof Error ? error.message : String(error),
            });
        }
    });

const SECTION = { required_error: 'section is missing' };

export const settingsSchema = z.object({
    siteinfo: z.object({
        site: listField,
        hydro_model: listField,
        parameter_set: listField,
        scenario: listField,
        downscaling: listField,
        gcm: listField,
    }, SECTION),
    bmorph: z.object({
        training_window: windowField,
        bmorph_window: windowField,
        reference_window: windowField,
        n_smooth_short: integerField(1, 'must be a positive integer'),
        n_smooth_long: integerField(1, 'must be a positive integer'),
        cdf_half_period: integerField(0, 'must be zero or more'),
    }, SECTION),
    io: z.object({
        raw_template: templateField,
        reference_template: templateField,
        output_template: templateField,
        output_float_format: floatFormatField,
    }, SECTION),
});

/**
 * Validate a parsed ini document. `configPath` is recorded for provenance.
 */
export function parseSettings(document: IniDocument, configPath: string): Settings {
    const result = settingsSchema.safeParse(document);
    if (!result.success) {
        const issues = result.error.issues.map(issue =>
            `${issue.path.join('.') || '(root)'}: ${issue.message}`
        );
        throw new ConfigurationError(issues, configPath);
    }

    const { siteinfo, bmorph, io } = result.data;
    // Relative templates are taken from the configuration file's directory
    const baseDir = path.dirname(configPath);
    // Windows are already frozen; DateTime instances themselves are left alone
    return Object.freeze({
        configPath,
        siteDims: Object.freeze({
            site: Object.freeze(siteinfo.site),
            hydroModel: Object.freeze(siteinfo.hydro_model),
            parameterSet: Object.freeze(siteinfo.parameter_set),
            scenario: Object.freeze(siteinfo.scenario),
            downscaling: Object.freeze(siteinfo.downscaling),
            gcm: Object.freeze(siteinfo.gcm),
        }),
        bmorph: Object.freeze({
            trainingWindow: bmorph.training_window,
            correctionWindow: bmorph.bmorph_window,
            referenceWindow: bmorph.reference_window,
            nSmoothShort: bmorph.n_smooth_short,
            nSmoothLong: bmorph.n_smooth_long,
            cdfHalfPeriod: bmorph.cdf_half_period,
        }),
        io: Object.freeze({
            rawTemplate: path.resolve(baseDir, io.raw_template),
            referenceTemplate: path.resolve(baseDir, io.reference_template),
            outputTemplate: path.resolve(baseDir, io.output_template),
            floatFormat: io.output_float_format,
        }),
    });
}

export function loadSettings(configFile: string): Settings {
    const configPath = path.resolve(configFile);
    if (!fs.existsSync(configPath)) {
        throw new ConfigurationError([`file not found: ${configPath}`]);
    }
    return parseSettings(readIniFile(configPath), configPath);
}
