/**
 * Shared fixtures for filesystem-backed tests: temporary workspaces,
 * generated daily series and a recording stand-in for the kernel.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { DateTime } from 'luxon';
import { CorrectionKernel, RescaleRequest, SegmentRequest } from '../correction/kernel.js';
import { createLogger } from '../logger.js';
import { parseIni } from '../settings/ini-parser.js';
import { Settings, parseSettings } from '../settings/settings.js';

export const silentLogger = createLogger({ silent: true });

export function makeWorkspace(prefix: string): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeWorkspace(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a daily series from start to stop inclusive.
 */
export function writeDailySeries(
    filePath: string,
    start: string,
    stop: string,
    value: (time: DateTime, index: number) => number,
    metadata: string[] = []
): void {
    const rows: string[] = [];
    const last = DateTime.fromISO(stop, { zone: 'utc' });
    let time = DateTime.fromISO(start, { zone: 'utc' });
    let index = 0;
    while (time.toMillis() <= last.toMillis()) {
        rows.push(`${time.toISODate() ?? ''},${value(time, index)}`);
        time = time.plus({ days: 1 });
        index++;
    }
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, [...metadata, 'date,streamflow', ...rows, ''].join('\n'));
}

export interface IniOptions {
    sites?: string;
    gcms?: string;
    trainingWindow?: string;
    correctionWindow?: string;
    referenceWindow?: string;
    nSmoothShort?: number;
    nSmoothLong?: number;
    cdfHalfPeriod?: number;
    floatFormat?: string;
}

export function iniText(options: IniOptions = {}): string {
    return [
        '[siteinfo]',
        `site = ${options.sites ?? 's1'}`,
        'hydro_model = vic',
        'parameter_set = p1',
        'scenario = hist',
        'downscaling = bcsd',
        `gcm = ${options.gcms ?? 'g1'}`,
        '',
        '[bmorph]',
        `training_window = ${options.trainingWindow ?? '1998-01-01, 2002-12-31'}`,
        `bmorph_window = ${options.correctionWindow ?? '2000-01-01, 2000-12-31'}`,
        `reference_window = ${options.referenceWindow ?? '1998-01-01, 2002-12-31'}`,
        `n_smooth_short = ${options.nSmoothShort ?? 3}`,
        `n_smooth_long = ${options.nSmoothLong ?? 31}`,
        `cdf_half_period = ${options.cdfHalfPeriod ?? 2}`,
        '',
        '[io]',
        'raw_template = raw/{site}/{hydro_model}_{gcm}.csv',
        'reference_template = reference/{site}.csv',
        'output_template = out/{site}/{hydro_model}_{gcm}.csv',
        `output_float_format = ${options.floatFormat ?? '.3f'}`,
        '',
    ].join('\n');
}

export function writeConfig(dir: string, options: IniOptions = {}): string {
    const file = path.join(dir, 'run.ini');
    fs.writeFileSync(file, iniText(options));
    return file;
}

export function settingsFor(dir: string, options: IniOptions = {}): Settings {
    return parseSettings(parseIni(iniText(options)), path.join(dir, 'run.ini'));
}

export interface RecordingKernel {
    kernel: CorrectionKernel;
    segmentCalls: SegmentRequest[];
    rescaleCalls: RescaleRequest[];
}

/**
 * Returns each target year's raw values unchanged and records every call.
 */
export function recordingKernel(): RecordingKernel {
    const segmentCalls: SegmentRequest[] = [];
    const rescaleCalls: RescaleRequest[] = [];
    return {
        segmentCalls,
        rescaleCalls,
        kernel: {
            correctSegment(request) {
                segmentCalls.push(request);
                return request.raw.slice(request.targetWindow);
            },
            meanRescale(request) {
                rescaleCalls.push(request);
                return request.corrected;
            },
        },
    };
}
