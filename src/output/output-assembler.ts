/**
 * Output Assembler
 *
 * Writes a corrected series as:
 *
 *   <metadata carried from the raw input>
 *   # Bias corrected with streamflow-bmorph v0.1.0
 *   # Bias correction configuration: /abs/path/to/config.ini
 *   date,streamflow
 *   2000-01-01,12.345
 *
 * The artifact holds nothing run-specific, so rerunning the same
 * configuration reproduces it byte for byte.
 */

import fs from 'fs';
import path from 'path';
import { Logger } from '../logger.js';
import { TimeSeries } from '../series/time-series.js';
import { formatTimestamp, isMidnight } from '../series/time-window.js';
import { compileNumberFormat } from './printf-format.js';

export const OUTPUT_HEADER = 'date,streamflow';

export interface Provenance {
    version: string;
    configPath: string;
}

export function provenanceLines(provenance: Provenance): string[] {
    return [
        `# Bias corrected with streamflow-bmorph v${provenance.version}`,
        `# Bias correction configuration: ${provenance.configPath}`,
    ];
}

export function renderSeriesRows(series: TimeSeries, floatFormat: string): string[] {
    const format = compileNumberFormat(floatFormat);
    const points = series.points();
    // One timestamp layout for the whole file: dates only if every point is at midnight
    const withTime = points.some(p => !isMidnight(p.time));
    return points.map(p => `${formatTimestamp(p.time, withTime)},${format(p.value)}`);
}

export function assembleOutput(
    metadata: readonly string[],
    series: TimeSeries,
    provenance: Provenance,
    floatFormat: string
): string {
    const lines = [
        ...metadata,
        ...provenanceLines(provenance),
        OUTPUT_HEADER,
        ...renderSeriesRows(series, floatFormat),
    ];
    return `${lines.join('\n')}\n`;
}

/**
 * Create the destination directory if needed and overwrite the file.
 */
export function writeOutput(outputPath: string, content: string, logger: Logger): void {
    const directory = path.dirname(outputPath);
    if (!fs.existsSync(directory)) {
        fs.mkdirSync(directory, { recursive: true });
        logger.debug(`[OutputAssembler] Created directory ${directory}`);
    }
    fs.writeFileSync(outputPath, content, 'utf-8');
    logger.info(`[OutputAssembler] Wrote ${outputPath}`);
}
