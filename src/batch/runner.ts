/**
 * Batch Runner
 * Walks the site grid one selection at a time and collects the outcomes.
 *
 * Selections share nothing but the read-only Settings, so the loop is a
 * plain sequential pass; the first failure ends the batch.
 */

import { CorrectionKernel, quantileMappingKernel } from '../correction/kernel.js';
import { CorrectionContext, ProcessOutcome, processSelection } from '../correction/orchestrator.js';
import { countSiteGrid, describeSelection, enumerateSiteGrid } from '../grid/site-grid.js';
import { Logger } from '../logger.js';
import { Settings } from '../settings/settings.js';
import { VERSION } from '../version.js';

export interface BatchOptions {
    logger: Logger;
    kernel?: CorrectionKernel;    // Defaults to the quantile-mapping kernel
    version?: string;             // Defaults to the package version
}

export interface BatchSummary {
    total: number;
    written: number;
    skipped: number;
    outcomes: ProcessOutcome[];
}

export function runBatch(settings: Settings, options: BatchOptions): BatchSummary {
    const { logger } = options;
    const context: CorrectionContext = {
        logger,
        kernel: options.kernel ?? quantileMappingKernel,
        provenance: {
            version: options.version ?? VERSION,
            configPath: settings.configPath,
        },
    };

    const total = countSiteGrid(settings.siteDims);
    logger.info(`[BatchRunner] ${total} selection(s) from ${settings.configPath}`);

    const outcomes: ProcessOutcome[] = [];
    let index = 0;
    for (const selection of enumerateSiteGrid(settings.siteDims)) {
        index++;
        logger.debug(`[BatchRunner] (${index}/${total}) ${describeSelection(selection)}`);
        outcomes.push(processSelection(selection, settings.io, settings.bmorph, context));
    }

    const written = outcomes.filter(o => o.status === 'written').length;
    const skipped = outcomes.length - written;
    logger.info(`[BatchRunner] Done: ${written} written, ${skipped} skipped, ${outcomes.length} total`);

    return { total, written, skipped, outcomes };
}
