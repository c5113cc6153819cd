import fs from 'fs';
import { ConfigurationError } from '../errors.js';

/**
 * section -> key -> raw string value. Keys are case-sensitive.
 */
export type IniDocument = Record<string, Record<string, string>>;

const SECTION = /^\[([^\]]+)\]$/;
const ENTRY = /^([^=:]+?)\s*[=:]\s*(.*)$/;

export function parseIni(text: string, source?: string): IniDocument {
    const sections = new Map<string, Map<string, string>>();
    const issues: string[] = [];
    let current: Map<string, string> | undefined;

    const lines = text.split(/\r?\n/);
    lines.forEach((line, index) => {
        const trimmed = line.trim();
        if (!trimmed || trimmed.startsWith('#') || trimmed.startsWith(';')) {
            return;
        }

        const section = SECTION.exec(trimmed);
        if (section) {
            const name = section[1].trim();
            current = sections.get(name) ?? new Map<string, string>();
            sections.set(name, current);
            return;
        }

        const entry = ENTRY.exec(trimmed);
        if (!entry) {
            issues.push(`line ${index + 1}: expected "key = value", got "${trimmed}"`);
            return;
        }
        if (!current) {
            issues.push(`line ${index + 1}: "${entry[1]}" appears before any [section]`);
            return;
        }

        const value = entry[2].trim().replace(/^"(.*)"$/, '$1');
        current.set(entry[1].trim(), value);
    });

    if (issues.length > 0) {
        throw new ConfigurationError(issues, source);
    }

    return Object.fromEntries(
        [...sections].map(([name, entries]): [string, Record<string, string>] => [name, Object.fromEntries(entries)])
    );
}

export function readIniFile(filePath: string): IniDocument {
    return parseIni(fs.readFileSync(filePath, 'utf-8'), filePath);
}

/**
 * "a, b ,c" -> ["a", "b", "c"]; empty items are dropped.
 */
export function splitList(value: string): string[] {
    return value
        .split(',')
        .map(item => item.trim())
        .filter(item => item.length > 0);
}
