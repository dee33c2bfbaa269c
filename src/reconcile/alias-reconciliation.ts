import { PERSON_NAMES_INSTRUCTION, SAME_PERSON_INSTRUCTION, samePersonPrompt } from '../extraction/prompts.js';
import type { Oracle } from '../llm/oracle.js';
import { EntityTable } from '../table/entity-table.js';
import { getLogger } from '../utils/logger.js';

export interface ReconcileProgress {
    completed: number;
    total: number;
}

export interface ReconcileOptions {
    /** Warn before the pairwise loop when it will issue more calls than this */
    warnCallThreshold?: number;
    /** Called after every pairwise oracle call */
    onProgress?: (progress: ReconcileProgress) => void;
}

const pairKey = (text: string, role: string): string => JSON.stringify([text, role]);

/**
 * Split the oracle's name listing into the candidate pool: one name per
 * non-blank line, order and duplicates kept.
 */
export function parseCandidateNames(response: string): string[] {
    return response
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
}

/**
 * Number of pairwise oracle calls a reconciliation run will issue.
 */
export function estimateAliasQueries(table: EntityTable, candidates: readonly string[]): number {
    let total = 0;
    for (const row of table) {
        const self = row.text.toLowerCase();
        total += candidates.filter((candidate) => candidate.toLowerCase() !== self).length;
    }
    return total;
}

/**
 * Whether a yes/no answer confirms an alias. Only the bare word counts.
 */
export function isAffirmative(answer: string): boolean {
    return answer.trim().toLowerCase() === 'yes';
}

/**
 * Find spelling variants of the entities already in the table and append
 * them with the role of the entity they alias.
 *
 * Issues one call for the candidate pool, then one call per
 * (row, candidate) pair, all sequential and uncached. A failed pairwise
 * call counts as "not an alias". Existing rows keep their position; the
 * input table is not modified.
 */
export async function reconcileAliases(
    table: EntityTable,
    narrative: string,
    oracle: Oracle,
    options: ReconcileOptions = {}
): Promise<EntityTable> {
    const logger = getLogger();
    const result = table.clone();
    const present = new Set<string>();
    for (const row of table) {
        present.add(pairKey(row.text, row.role));
    }

    const candidates = parseCandidateNames(await oracle.generate(narrative, PERSON_NAMES_INSTRUCTION));
    const total = estimateAliasQueries(table, candidates);

    if (options.warnCallThreshold !== undefined && total > options.warnCallThreshold) {
        logger.warn(
            { rows: table.size, candidates: candidates.length, calls: total },
            'Alias reconciliation will issue many oracle calls'
        );
    } else {
        logger.info({ rows: table.size, candidates: candidates.length, calls: total }, 'Starting alias reconciliation');
    }

    let completed = 0;
    let added = 0;

    for (const { text: name, role } of table) {
        const self = name.toLowerCase();

        for (const candidate of candidates) {
            if (candidate.toLowerCase() === self) continue;

            const answer = await oracle.generate(samePersonPrompt(name, candidate, narrative), SAME_PERSON_INSTRUCTION);
            completed++;
            options.onProgress?.({ completed, total });

            if (!isAffirmative(answer)) continue;

            const key = pairKey(candidate, role);
            if (present.has(key)) continue;

            result.append({ text: candidate, role });
            present.add(key);
            added++;
            logger.debug({ name, alias: candidate, role }, 'Alias confirmed');
        }
    }

    logger.info({ added, calls: completed }, 'Alias reconciliation complete');
    return result;
}
