import { UNKNOWN_ROLE, type EntityRow } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const SURROUNDING_QUOTES = /^["']+|["']+$/g;

/**
 * Trim, unquote and drop empty fields.
 */
function cleanParts(parts: string[]): string[] {
    return parts
        .map((part) => part.trim().replace(SURROUNDING_QUOTES, '').trim())
        .filter((part) => part.length > 0);
}

/**
 * Parse one line of oracle output into a row, or null when the line does
 * not resolve to one or two fields.
 *
 * The comma split always runs first; the mixed `;`/`,` split is only a
 * fallback for lines the comma split could not resolve.
 */
export function parseEntityLine(line: string, defaultRole: string | null): EntityRow | null {
    const parts = cleanParts(line.split(','));

    if (parts.length === 2) {
        return { text: parts[0] ?? '', role: parts[1] ?? '' };
    }
    if (parts.length === 1) {
        return { text: parts[0] ?? '', role: defaultRole ?? UNKNOWN_ROLE };
    }

    const fallback = cleanParts(line.split(/[;,]/));
    if (fallback.length === 2) {
        return { text: fallback[0] ?? '', role: fallback[1] ?? '' };
    }

    return null;
}

/**
 * Turn a free-text oracle response (one entity per line) into rows.
 * Malformed lines are logged and skipped.
 */
export function parseEntityResponse(response: string, defaultRole: string | null): EntityRow[] {
    const rows: EntityRow[] = [];

    for (const line of response.split(/\r?\n/)) {
        if (!line.trim()) continue;

        const row = parseEntityLine(line, defaultRole);
        if (row) {
            rows.push(row);
        } else {
            getLogger().warn({ line }, 'Skipping malformed entity line');
        }
    }

    return rows;
}
