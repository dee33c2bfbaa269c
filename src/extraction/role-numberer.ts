import type { EntityRow } from '../types/index.js';

/**
 * Suffix each role with a 1-based ordinal that counts occurrences of that
 * role in table order: [X, X, Y] becomes [X 1, X 2, Y 1].
 */
export function assignOrdinals(rows: readonly EntityRow[]): EntityRow[] {
    const counters = new Map<string, number>();

    return rows.map((row) => {
        const count = (counters.get(row.role) ?? 0) + 1;
        counters.set(row.role, count);
        return { text: row.text, role: `${row.role} ${count}` };
    });
}
