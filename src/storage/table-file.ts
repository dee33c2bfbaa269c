import { readFileSync, writeFileSync } from 'node:fs';
import { EntityTable } from '../table/entity-table.js';
import { TABLE_HEADER, fail, ok, type Result, type PipelineFailure } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

// ─── Writing ─────────────────────────────────────────────

function quoteField(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Serialize the table as two-column CSV with an `Info,Role` header.
 */
export function serializeTable(table: EntityTable): string {
    let csv = TABLE_HEADER.join(',') + '\n';
    for (const row of table) {
        csv += `${quoteField(row.text)},${quoteField(row.role)}\n`;
    }
    return csv;
}

/**
 * Overwrite the table file. An unwritable path is a `table-write` failure.
 */
export function writeTableFile(path: string, table: EntityTable): Result<void, PipelineFailure> {
    try {
        writeFileSync(path, serializeTable(table), 'utf-8');
    } catch (error) {
        getLogger().error({ error, path }, 'Failed to write entity table');
        return fail('table-write', `Could not write entity table to ${path}: ${describeError(error)}`);
    }

    getLogger().info({ path, rows: table.size }, 'Entity table saved');
    return ok(undefined);
}

// ─── Reading ─────────────────────────────────────────────

/**
 * Split CSV text into records of fields. Quoted fields may contain
 * delimiters, doubled quotes and line breaks. Returns null when a quoted
 * field is never closed.
 */
export function splitCsvRecords(content: string): string[][] | null {
    const records: string[][] = [];
    let record: string[] = [];
    let field = '';
    let inQuotes = false;
    let i = 0;

    const endRecord = () => {
        record.push(field);
        records.push(record);
        record = [];
        field = '';
    };

    while (i < content.length) {
        const ch = content.charAt(i);

        if (inQuotes) {
            if (ch === '"') {
                if (content.charAt(i + 1) === '"') {
                    field += '"';
                    i += 2;
                    continue;
                }
                inQuotes = false;
            } else {
                field += ch;
            }
            i++;
            continue;
        }

        if (ch === '"' && field.trim() === '') {
            field = '';
            inQuotes = true;
        } else if (ch === ',') {
            record.push(field);
            field = '';
        } else if (ch === '\n' || ch === '\r') {
            endRecord();
            if (ch === '\r' && content.charAt(i + 1) === '\n') i++;
        } else {
            field += ch;
        }
        i++;
    }

    if (inQuotes) return null;
    if (field !== '' || record.length > 0) endRecord();

    // Blank lines carry no data
    return records.filter((r) => !(r.length === 1 && r[0]?.trim() === ''));
}

/**
 * Parse a persisted entity table. The first record must be the
 * `Info, Role` header; records with fewer than two fields are skipped with
 * a warning and counted.
 */
export function parseTableCsv(
    content: string
): Result<{ table: EntityTable; skipped: number }, PipelineFailure> {
    const logger = getLogger();
    const records = splitCsvRecords(content.replace(/^\uFEFF/, ''));

    if (!records) {
        return fail('table-read', 'Entity table has an unterminated quoted field');
    }

    const [header, ...body] = records;
    const headerOk =
        header !== undefined &&
        header.length >= 2 &&
        TABLE_HEADER.every((name, i) => header[i]?.trim().toLowerCase() === name.toLowerCase());

    if (!headerOk) {
        return fail('table-read', `Entity table must start with the header "${TABLE_HEADER.join(', ')}"`);
    }

    const table = new EntityTable();
    let skipped = 0;

    body.forEach((record, index) => {
        const [text, role] = record;
        if (text === undefined || role === undefined) {
            skipped++;
            logger.warn({ line: index + 2, record }, 'Skipping entity table row with fewer than two fields');
            return;
        }
        table.append({ text: text.trim(), role: role.trim() });
    });

    return ok({ table, skipped });
}

/**
 * Read and parse an entity table file. A missing or unreadable file is a
 * `table-read` failure.
 */
export function readTableFile(path: string): Result<EntityTable, PipelineFailure> {
    let content: string;
    try {
        content = readFileSync(path, 'utf-8');
    } catch (error) {
        getLogger().error({ error, path }, 'Failed to read entity table');
        return fail('table-read', `Could not read entity table at ${path}: ${describeError(error)}`);
    }

    const parsed = parseTableCsv(content);
    if (!parsed.ok) {
        getLogger().error({ path, reason: parsed.error.message }, 'Malformed entity table');
        return fail('table-read', `${parsed.error.message} (${path})`);
    }

    getLogger().debug({ path, rows: parsed.value.table.size, skipped: parsed.value.skipped }, 'Entity table loaded');
    return ok(parsed.value.table);
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
