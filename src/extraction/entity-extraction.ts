import { EntityTable } from '../table/entity-table.js';
import {
    LOCATION_ROLE,
    UNKNOWN_ROLE,
    fail,
    ok,
    type Result,
    type PipelineFailure,
} from '../types/index.js';
import type { Oracle } from '../llm/oracle.js';
import { getLogger } from '../utils/logger.js';
import { LOCATIONS_INSTRUCTION, NAMES_AND_ROLES_INSTRUCTION } from './prompts.js';
import { parseEntityResponse } from './response-parser.js';
import { assignOrdinals } from './role-numberer.js';

/**
 * Cut the narrative after its last period so a trailing sentence fragment
 * is not sent to the oracle. A narrative without any period is kept whole.
 */
export function trimToLastSentence(narrative: string): string {
    const lastPeriod = narrative.lastIndexOf('.');
    return lastPeriod === -1 ? narrative : narrative.slice(0, lastPeriod + 1);
}

/**
 * Build the initial entity table from a narrative:
 *
 * 1. Trim the trailing fragment
 * 2. Ask for `name, role` pairs, then for locations (sequentially)
 * 3. Parse both responses and concatenate people before locations
 * 4. Number the roles
 *
 * Resolves to a `no-data` failure when the oracle yielded no rows, and to
 * `invalid-input` when there is no text to send.
 */
export async function extractEntities(
    narrative: string,
    oracle: Oracle
): Promise<Result<EntityTable, PipelineFailure>> {
    const logger = getLogger();
    const text = trimToLastSentence(narrative).trim();

    if (!text) {
        return fail('invalid-input', 'Narrative is empty; nothing to extract');
    }

    const namesResponse = await oracle.generate(text, NAMES_AND_ROLES_INSTRUCTION);
    const people = parseEntityResponse(namesResponse, UNKNOWN_ROLE);

    const locationsResponse = await oracle.generate(text, LOCATIONS_INSTRUCTION);
    const locations = parseEntityResponse(locationsResponse, LOCATION_ROLE);

    const rows = [...people, ...locations];
    if (rows.length === 0) {
        logger.warn({ narrativeLength: text.length }, 'Oracle returned no entities');
        return fail('no-data', 'No entities could be extracted from the narrative');
    }

    const table = new EntityTable(assignOrdinals(rows));
    logger.info({ people: people.length, locations: locations.length }, 'Entity extraction complete');

    return ok(table);
}
