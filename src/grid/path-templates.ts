/**
 * Path templates for raw input, reference input and output files.
 *
 *   raw_template = /data/raw/{site}/{hydro_model}_{parameter_set}_{scenario}_{downscaling}_{gcm}.csv
 *
 * Placeholder names match the keys of the [siteinfo] section.
 */

import { SiteDimension, SiteSelection } from './site-grid.js';

export const TEMPLATE_FIELDS: Readonly<Record<string, SiteDimension>> = {
    site: 'site',
    hydro_model: 'hydroModel',
    parameter_set: 'parameterSet',
    scenario: 'scenario',
    downscaling: 'downscaling',
    gcm: 'gcm',
};

const PLACEHOLDER = /\{([^{}]*)\}/g;

function lookupField(name: string): SiteDimension | undefined {
    return Object.prototype.hasOwnProperty.call(TEMPLATE_FIELDS, name)
        ? TEMPLATE_FIELDS[name]
        : undefined;
}

/**
 * Placeholder names in the template that do not name a grid dimension.
 */
export function unknownPlaceholders(template: string): string[] {
    const unknown: string[] = [];
    for (const match of template.matchAll(PLACEHOLDER)) {
        const name = match[1].trim();
        if (!lookupField(name) && !unknown.includes(name)) {
            unknown.push(name);
        }
    }
    return unknown;
}

export function resolveTemplate(template: string, selection: SiteSelection): string {
    return template.replace(PLACEHOLDER, (whole: string, rawName: string) => {
        const field = lookupField(rawName.trim());
        if (!field) {
            throw new Error(`Unknown placeholder ${whole} in path template "${template}"`);
        }
        return selection[field];
    });
}
