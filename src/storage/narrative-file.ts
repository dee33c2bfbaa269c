import { readFileSync, writeFileSync } from 'node:fs';
import { fail, ok, type Result, type PipelineFailure } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { describeError } from './table-file.js';

export function readNarrativeFile(path: string): Result<string, PipelineFailure> {
    try {
        return ok(readFileSync(path, 'utf-8'));
    } catch (error) {
        getLogger().error({ error, path }, 'Failed to read narrative');
        return fail('narrative-read', `Could not read narrative at ${path}: ${describeError(error)}`);
    }
}

/**
 * Replace the whole narrative file.
 */
export function writeNarrativeFile(path: string, narrative: string): Result<void, PipelineFailure> {
    try {
        writeFileSync(path, narrative, 'utf-8');
    } catch (error) {
        getLogger().error({ error, path }, 'Failed to write narrative');
        return fail('narrative-write', `Could not write narrative to ${path}: ${describeError(error)}`);
    }

    getLogger().info({ path, length: narrative.length }, 'Narrative saved');
    return ok(undefined);
}
