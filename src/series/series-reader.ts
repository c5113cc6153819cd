/**
 * Series File Reader
 *
 * Raw model output and reference records share one layout:
 *
 *   # free-form metadata lines
 *   # ...
 *   date,streamflow
 *   1998-01-01,12.5
 *   1998-01-02,13.1
 *
 * The header names are not checked; the first column is the timestamp and
 * the second the value.
 */

import fs from 'fs';
import Papa from 'papaparse';
import { SeriesFormatError } from '../errors.js';
import { TimeSeries } from './time-series.js';
import { parseTimestamp } from './time-window.js';

export interface SeriesFile {
    series: TimeSeries;
    metadata: string[];   // Leading '#' lines, verbatim
}

export function parseSeriesText(text: string, source?: string): SeriesFile {
    const lines = text.split(/\r?\n/);

    let cursor = 0;
    const metadata: string[] = [];
    while (cursor < lines.length && lines[cursor].trimStart().startsWith('#')) {
        metadata.push(lines[cursor]);
        cursor++;
    }

    // Skip blank lines between metadata and the header
    while (cursor < lines.length && lines[cursor].trim() === '') {
        cursor++;
    }
    if (cursor >= lines.length) {
        throw new SeriesFormatError('Missing header row', source);
    }

    const headerLine = cursor + 1;
    const body = lines.slice(cursor + 1).join('\n');
    const parsed = Papa.parse<string[]>(body, {
        delimiter: ',',
        skipEmptyLines: 'greedy',
    });

    if (parsed.errors.length > 0) {
        const first = parsed.errors[0];
        const line = first.row !== undefined ? headerLine + first.row + 1 : undefined;
        throw new SeriesFormatError(`CSV parse error: ${first.message}`, source, line);
    }

    const times: number[] = [];
    const values: number[] = [];

    parsed.data.forEach((row, index) => {
        const line = headerLine + index + 1;
        if (row.length < 2) {
            throw new SeriesFormatError(`Expected 2 columns, found ${row.length}`, source, line);
        }

        const time = parseTimestamp(row[0]);
        if (!time) {
            throw new SeriesFormatError(`Unparseable timestamp "${row[0]}"`, source, line);
        }

        const raw = row[1].trim();
        const value = raw === '' ? Number.NaN : Number(raw);
        if (!Number.isFinite(value)) {
            throw new SeriesFormatError(`Invalid value "${row[1]}"`, source, line);
        }

        times.push(time.toMillis());
        values.push(value);
    });

    try {
        return { series: TimeSeries.fromArrays(times, values), metadata };
    } catch (error) {
        if (error instanceof SeriesFormatError) {
            throw new SeriesFormatError(error.message, source);
        }
        throw error;
    }
}

/**
 * Read a raw model output file: series plus its metadata block.
 */
export function readRawSeries(filePath: string): SeriesFile {
    return parseSeriesText(fs.readFileSync(filePath, 'utf-8'), filePath);
}

/**
 * Read a reference ("true") record. Its metadata is not carried forward.
 */
export function readReferenceSeries(filePath: string): TimeSeries {
    return parseSeriesText(fs.readFileSync(filePath, 'utf-8'), filePath).series;
}
