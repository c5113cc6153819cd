/**
 * Site Grid Enumerator
 *
 * Lazily yields every combination of the six grid dimensions. Nesting
 * follows the declared dimension order: site is the outermost loop and gcm
 * the innermost. Duplicate values are kept, so duplicated configuration
 * entries produce duplicated runs.
 */

export const SITE_DIMENSIONS = [
    'site',
    'hydroModel',
    'parameterSet',
    'scenario',
    'downscaling',
    'gcm',
] as const;

export type SiteDimension = typeof SITE_DIMENSIONS[number];

/**
 * One run of the batch: a single value for each dimension.
 */
export type SiteSelection = Readonly<Record<SiteDimension, string>>;

export type SiteDims = Readonly<Record<SiteDimension, readonly string[]>>;

function* generate(dims: SiteDims): Generator<SiteSelection> {
    // Odometer over the six dimensions; the last index turns fastest
    const lengths = SITE_DIMENSIONS.map(d => dims[d].length);
    if (lengths.some(n => n === 0)) return;

    const indices = new Array<number>(SITE_DIMENSIONS.length).fill(0);
    while (true) {
        yield Object.freeze({
            site: dims.site[indices[0]],
            hydroModel: dims.hydroModel[indices[1]],
            parameterSet: dims.parameterSet[indices[2]],
            scenario: dims.scenario[indices[3]],
            downscaling: dims.downscaling[indices[4]],
            gcm: dims.gcm[indices[5]],
        });

        let position = indices.length - 1;
        while (position >= 0) {
            indices[position]++;
            if (indices[position] < lengths[position]) break;
            indices[position] = 0;
            position--;
        }
        if (position < 0) return;
    }
}

/**
 * Re-iterable view of the grid: each `for...of` starts from the first
 * combination again.
 */
export function enumerateSiteGrid(dims: SiteDims): Iterable<SiteSelection> {
    return {
        [Symbol.iterator]: () => generate(dims),
    };
}

export function countSiteGrid(dims: SiteDims): number {
    return SITE_DIMENSIONS.reduce((total, d) => total * dims[d].length, 1);
}

export function describeSelection(selection: SiteSelection): string {
    return SITE_DIMENSIONS.map(d => selection[d]).join('/');
}
