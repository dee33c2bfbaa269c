import { extractEntities } from '../extraction/entity-extraction.js';
import type { Oracle } from '../llm/oracle.js';
import { reconcileAliases, type ReconcileOptions } from '../reconcile/alias-reconciliation.js';
import { redactNarrative } from '../redaction/redaction.js';
import type { EntityTable } from '../table/entity-table.js';
import { ok, type Result, type PipelineFailure } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

export interface PipelineOptions extends ReconcileOptions {
    /** Run alias reconciliation between extraction and redaction */
    reconcile?: boolean;
}

export interface PipelineOutput {
    table: EntityTable;
    redacted: string;
}

/**
 * Full pipeline, in order:
 *
 * 1. Extract people and locations into a numbered table
 * 2. Optionally append aliases of the extracted entities
 * 3. Redact the narrative with the resulting table
 */
export async function runPipeline(
    narrative: string,
    oracle: Oracle,
    options: PipelineOptions = {}
): Promise<Result<PipelineOutput, PipelineFailure>> {
    const logger = getLogger();
    const startTime = Date.now();

    const extracted = await extractEntities(narrative, oracle);
    if (!extracted.ok) return extracted;

    const table = options.reconcile
        ? await reconcileAliases(extracted.value, narrative, oracle, options)
        : extracted.value;

    const redacted = redactNarrative(narrative, table);

    logger.info(
        { rows: table.size, reconciled: Boolean(options.reconcile), elapsedMs: Date.now() - startTime },
        'Pipeline complete'
    );
    return ok({ table, redacted });
}
