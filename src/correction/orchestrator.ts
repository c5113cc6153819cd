/**
 * Correction Orchestrator
 * Runs one site selection from raw input to written output.
 *
 * 1. Resolve the raw input path; a missing file skips the selection.
 * 2. Read the raw series (with metadata) and the site's reference series.
 * 3. Plan one CDF window per correction year against the raw series bounds.
 * 4. Correct each year and join the yearly segments in ascending order.
 * 5. Rescale the joined series to the reference/training mean ratio over
 *    the whole raw span.
 * 6. Assemble and write the output artifact.
 *
 * Anything other than a missing raw file propagates and stops the batch.
 */

import fs from 'fs';
import { SeriesFormatError } from '../errors.js';
import { SiteSelection, describeSelection } from '../grid/site-grid.js';
import { resolveTemplate } from '../grid/path-templates.js';
import { Logger } from '../logger.js';
import { Provenance, assembleOutput, writeOutput } from '../output/output-assembler.js';
import { readRawSeries, readReferenceSeries } from '../series/series-reader.js';
import { TimeSeries } from '../series/time-series.js';
import { formatWindow } from '../series/time-window.js';
import { BmorphSettings, IoSettings } from '../settings/settings.js';
import { CorrectionKernel } from './kernel.js';
import { YearPlan, planCorrectionYears } from './window-planner.js';

export interface CorrectionContext {
    logger: Logger;
    kernel: CorrectionKernel;
    provenance: Provenance;
}

export type ProcessOutcome =
    | {
        status: 'written';
        selection: SiteSelection;
        outputPath: string;
        years: YearPlan[];
    }
    | {
        status: 'skipped';
        selection: SiteSelection;
        reason: 'missing-input';
        inputPath: string;
    };

export interface CorrectionResult {
    corrected: TimeSeries;
    years: YearPlan[];
    referenceMean: number;
    trainingMean: number;
}

/**
 * Steps 3-5 on already loaded series.
 */
export function correctSeries(
    raw: TimeSeries,
    reference: TimeSeries,
    bmorph: BmorphSettings,
    kernel: CorrectionKernel,
    logger: Logger
): CorrectionResult {
    const rawWindow = raw.bounds();
    if (!rawWindow) {
        throw new SeriesFormatError('Raw series is empty');
    }

    const training = raw.copy();
    const years = planCorrectionYears(bmorph.correctionWindow, bmorph.cdfHalfPeriod, rawWindow);

    const segments = years.map(plan => {
        logger.debug(
            `[Orchestrator] ${plan.year}: target ${formatWindow(plan.targetWindow)}, ` +
            `CDF ${formatWindow(plan.cdfWindow)} (clamp: ${plan.clamp})`
        );
        return kernel.correctSegment({
            raw,
            cdfWindow: plan.cdfWindow,
            targetWindow: plan.targetWindow,
            reference,
            training,
            trainingWindow: bmorph.trainingWindow,
            nSmooth: bmorph.nSmoothShort,
        });
    });
    const joined = TimeSeries.concat(segments);

    const referenceMean = reference.mean(bmorph.referenceWindow);
    const trainingMean = training.mean(bmorph.referenceWindow);
    logger.debug(
        `[Orchestrator] Reference mean ${referenceMean}, training mean ${trainingMean} ` +
        `over ${formatWindow(bmorph.referenceWindow)}`
    );

    const corrected = kernel.meanRescale({
        raw,
        corrected: joined,
        window: rawWindow,
        referenceMean,
        trainingMean,
        nSmooth: bmorph.nSmoothLong,
    });

    return { corrected, years, referenceMean, trainingMean };
}

export function processSelection(
    selection: SiteSelection,
    io: IoSettings,
    bmorph: BmorphSettings,
    context: CorrectionContext
): ProcessOutcome {
    const { logger } = context;
    const label = describeSelection(selection);

    const rawPath = resolveTemplate(io.rawTemplate, selection);
    if (!fs.existsSync(rawPath)) {
        logger.info(`[Orchestrator] Skipping ${label}: no raw input at ${rawPath}`);
        return { status: 'skipped', selection, reason: 'missing-input', inputPath: rawPath };
    }

    logger.info(`[Orchestrator] Reading raw series ${rawPath}`);
    const { series: raw, metadata } = readRawSeries(rawPath);
    if (raw.isEmpty) {
        throw new SeriesFormatError('Raw series is empty', rawPath);
    }

    const referencePath = resolveTemplate(io.referenceTemplate, selection);
    logger.info(`[Orchestrator] Reading reference series ${referencePath}`);
    const reference = readReferenceSeries(referencePath);

    const { corrected, years } = correctSeries(raw, reference, bmorph, context.kernel, logger);

    const outputPath = resolveTemplate(io.outputTemplate, selection);
    const content = assembleOutput(metadata, corrected, context.provenance, io.floatFormat);
    writeOutput(outputPath, content, logger);

    return { status: 'written', selection, outputPath, years };
}
