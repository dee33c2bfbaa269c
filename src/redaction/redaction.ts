import { readTableFile } from '../storage/table-file.js';
import type { EntityTable } from '../table/entity-table.js';
import { ok, type Result, type PipelineFailure } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Escape regex metacharacters so an entity text matches literally.
 */
export function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Entity text → bracketed role tag. When two rows share the same text the
 * later row wins.
 */
export function buildReplacementMap(table: EntityTable): Map<string, string> {
    const replacements = new Map<string, string>();
    for (const row of table) {
        if (!row.text.trim()) continue;
        replacements.set(row.text, `[${row.role}]`);
    }
    return replacements;
}

/**
 * Replace every case-insensitive, literal occurrence of each entity text
 * with its `[role]` tag.
 *
 * Longer texts are substituted first so "Lee Harvey" is consumed before
 * "Lee" can match inside it. Matching is not word-boundary aware.
 */
export function redactNarrative(narrative: string, table: EntityTable): string {
    const replacements = buildReplacementMap(table);
    // Array.prototype.sort is stable, so equal-length texts keep table order
    const names = [...replacements.keys()].sort((a, b) => b.length - a.length);

    let redacted = narrative;
    let substitutions = 0;

    for (const name of names) {
        const tag = replacements.get(name) ?? '';
        const pattern = new RegExp(escapeRegExp(name), 'gi');
        redacted = redacted.replace(pattern, () => {
            substitutions++;
            return tag;
        });
    }

    getLogger().info({ entities: names.length, substitutions }, 'Narrative redacted');
    return redacted;
}

/**
 * Load the entity table from disk and redact with it. Redaction does not
 * run when the table cannot be read.
 */
export function redactWithTableFile(narrative: string, tablePath: string): Result<string, PipelineFailure> {
    const table = readTableFile(tablePath);
    if (!table.ok) return table;
    return ok(redactNarrative(narrative, table.value));
}
