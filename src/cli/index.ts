#!/usr/bin/env node
import { Command } from 'commander';
import { z } from 'zod';
import { extractEntities } from '../extraction/entity-extraction.js';
import type { LlmOracle } from '../llm/oracle.js';
import { createOracle, createProvider } from '../llm/provider-factory.js';
import { runPipeline } from '../pipeline/run-pipeline.js';
import { reconcileAliases, type ReconcileProgress } from '../reconcile/alias-reconciliation.js';
import { redactNarrative } from '../redaction/redaction.js';
import { readNarrativeFile, writeNarrativeFile } from '../storage/narrative-file.js';
import { readTableFile, writeTableFile } from '../storage/table-file.js';
import type { LlmConfig, PipelineFailure, RedactorConfig, Result } from '../types/index.js';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { createHttpClient } from '../utils/http-client.js';
import { initLogger, getLogger } from '../utils/logger.js';

const VERSION = '1.0.0';

const CliOptionsSchema = z.object({
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
    jsonLogs: z.boolean().optional(),
    provider: z.enum(['openai', 'ollama']).optional(),
    model: z.string().optional(),
    baseUrl: z.string().optional(),
    chatTemplate: z.boolean().optional(),
    narrative: z.string().optional(),
    table: z.string().optional(),
    out: z.string().optional(),
    reconcile: z.boolean().optional(),
    text: z.string().optional(),
    role: z.string().optional(),
});

type CliOptions = z.infer<typeof CliOptionsSchema>;

function toOverrides(opts: CliOptions): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    const llm: Partial<LlmConfig> = {};

    if (opts.logLevel) overrides.logLevel = opts.logLevel;
    if (opts.jsonLogs) overrides.jsonLogs = true;
    if (opts.narrative) overrides.narrativePath = opts.narrative;
    if (opts.table) overrides.tablePath = opts.table;
    if (opts.provider) llm.provider = opts.provider;
    if (opts.model) llm.model = opts.model;
    if (opts.baseUrl) llm.baseUrl = opts.baseUrl;
    // commander defaults a --no-* flag to true, so only an explicit "off" overrides config
    if (opts.chatTemplate === false) llm.chatTemplate = false;
    if (Object.keys(llm).length > 0) overrides.llm = llm;

    return overrides;
}

/**
 * Parse options, resolve config and initialize logging for one command.
 */
async function setup(command: Command): Promise<{ opts: CliOptions; config: RedactorConfig }> {
    const parsed = CliOptionsSchema.safeParse(command.optsWithGlobals());
    if (!parsed.success) {
        console.error(`Invalid options: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
        process.exit(1);
    }

    const config = await resolveConfig(toOverrides(parsed.data));
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return { opts: parsed.data, config };
}

function oracleFor(config: RedactorConfig): LlmOracle {
    return createOracle(config.llm, createHttpClient({ timeout: config.llm.timeoutMs, version: VERSION }));
}

/**
 * Unwrap a result or report the failure and exit.
 */
function unwrap<T>(result: Result<T, PipelineFailure>): T {
    if (result.ok) return result.value;
    getLogger().error({ kind: result.error.kind }, result.error.message);
    console.error(`Error: ${result.error.message}`);
    process.exit(1);
}

function parseIndex(value: string): number {
    const index = Number(value);
    if (!Number.isInteger(index) || index < 0) {
        console.error(`Invalid row index: ${value}`);
        process.exit(1);
    }
    return index;
}

/**
 * Report how many oracle calls the command made and how many of them failed.
 */
function logOracleStats(oracle: LlmOracle): void {
    const { calls, failures } = oracle.getStats();
    if (failures > 0) {
        getLogger().warn({ calls, failures }, 'Some oracle calls failed and were treated as empty answers');
    } else {
        getLogger().info({ calls }, 'Oracle calls');
    }
}

function logProgress({ completed, total }: ReconcileProgress): void {
    if (completed % 10 === 0 || completed === total) {
        getLogger().info({ completed, total }, 'Alias queries');
    }
}

const program = new Command();

program
    .name('redactor')
    .description('Extract people and places from a narrative with an LLM and redact them with role tags.')
    .version(VERSION)
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .option('--provider <provider>', 'LLM provider: openai | ollama')
    .option('--model <model>', 'LLM model name')
    .option('--base-url <url>', 'LLM endpoint base URL')
    .option('--no-chat-template', 'Send a plain "role: content" prompt instead of chat messages');

// ─── EXTRACT command ──────────────────────────────────────

program
    .command('extract')
    .description('Extract entities from the narrative into the entity table')
    .option('-n, --narrative <path>', 'Narrative text file')
    .option('-t, --table <path>', 'Entity table CSV to write')
    .action(async (_opts: unknown, command: Command) => {
        const { config } = await setup(command);
        const narrative = unwrap(readNarrativeFile(config.narrativePath));
        const oracle = oracleFor(config);
        const extracted = await extractEntities(narrative, oracle);
        logOracleStats(oracle);
        const table = unwrap(extracted);

        unwrap(writeTableFile(config.tablePath, table));
        console.log(`Extracted ${table.size} entities to ${config.tablePath}`);
    });

// ─── RECONCILE command ────────────────────────────────────

program
    .command('reconcile')
    .description('Append aliases of tabled people (one LLM call per row × name pair)')
    .option('-n, --narrative <path>', 'Narrative text file')
    .option('-t, --table <path>', 'Entity table CSV to read')
    .option('-o, --out <path>', 'Where to write the extended table (default: overwrite input)')
    .action(async (_opts: unknown, command: Command) => {
        const { opts, config } = await setup(command);
        const narrative = unwrap(readNarrativeFile(config.narrativePath));
        const table = unwrap(readTableFile(config.tablePath));

        const oracle = oracleFor(config);
        const reconciled = await reconcileAliases(table, narrative, oracle, {
            warnCallThreshold: config.reconcile.warnCallThreshold,
            onProgress: logProgress,
        });
        logOracleStats(oracle);

        const outPath = opts.out ?? config.tablePath;
        unwrap(writeTableFile(outPath, reconciled));
        console.log(`Added ${reconciled.size - table.size} aliases to ${outPath}`);
    });

// ─── REDACT command ───────────────────────────────────────

program
    .command('redact')
    .description('Replace entity mentions in the narrative with [role] tags')
    .option('-n, --narrative <path>', 'Narrative text file')
    .option('-t, --table <path>', 'Entity table CSV to read')
    .option('-o, --out <path>', 'Output file (default: stdout)')
    .action(async (_opts: unknown, command: Command) => {
        const { opts, config } = await setup(command);
        const narrative = unwrap(readNarrativeFile(config.narrativePath));
        const table = unwrap(readTableFile(config.tablePath));
        const redacted = redactNarrative(narrative, table);

        if (opts.out) {
            unwrap(writeNarrativeFile(opts.out, redacted));
        } else {
            process.stdout.write(redacted.endsWith('\n') ? redacted : `${redacted}\n`);
        }
    });

// ─── RUN command ──────────────────────────────────────────

program
    .command('run')
    .description('Extract, optionally reconcile, and redact in one go')
    .option('-n, --narrative <path>', 'Narrative text file')
    .option('-t, --table <path>', 'Entity table CSV to write')
    .option('-o, --out <path>', 'Redacted output file (default: stdout)')
    .option('--reconcile', 'Append aliases before redacting')
    .action(async (_opts: unknown, command: Command) => {
        const { opts, config } = await setup(command);
        const narrative = unwrap(readNarrativeFile(config.narrativePath));
        const oracle = oracleFor(config);
        const result = await runPipeline(narrative, oracle, {
            reconcile: opts.reconcile,
            warnCallThreshold: config.reconcile.warnCallThreshold,
            onProgress: logProgress,
        });
        logOracleStats(oracle);
        const { table, redacted } = unwrap(result);

        unwrap(writeTableFile(config.tablePath, table));
        if (opts.out) {
            unwrap(writeNarrativeFile(opts.out, redacted));
        } else {
            process.stdout.write(redacted.endsWith('\n') ? redacted : `${redacted}\n`);
        }
    });

// ─── TABLE commands ───────────────────────────────────────

const tableCommand = program
    .command('table')
    .description('View and edit the entity table')
    .option('-t, --table <path>', 'Entity table CSV');

tableCommand
    .command('show')
    .description('Print the table with row indices')
    .action(async (_opts: unknown, command: Command) => {
        const { config } = await setup(command);
        const { header, rows } = unwrap(readTableFile(config.tablePath)).toTabular();

        console.log(`#\t${header.join('\t')}`);
        rows.forEach((row, index) => console.log(`${index}\t${row.join('\t')}`));
    });

tableCommand
    .command('add')
    .description('Append a row')
    .argument('<text>', 'Entity text as it appears in the narrative')
    .argument('<role>', 'Role label')
    .action(async (text: string, role: string, _opts: unknown, command: Command) => {
        const { config } = await setup(command);
        const table = unwrap(readTableFile(config.tablePath));
        const index = table.append({ text, role });

        unwrap(writeTableFile(config.tablePath, table));
        console.log(`Added row ${index}`);
    });

tableCommand
    .command('set')
    .description('Change the text and/or role of a row')
    .argument('<index>', 'Row index (see `table show`)')
    .option('--text <text>', 'New entity text')
    .option('--role <role>', 'New role label')
    .action(async (indexArg: string, _opts: unknown, command: Command) => {
        const { opts, config } = await setup(command);
        const table = unwrap(readTableFile(config.tablePath));
        const index = parseIndex(indexArg);

        if (index >= table.size) {
            console.error(`Row ${index} does not exist (table has ${table.size} rows)`);
            process.exit(1);
        }

        const current = table.get(index);
        table.set(index, { text: opts.text ?? current.text, role: opts.role ?? current.role });
        unwrap(writeTableFile(config.tablePath, table));
        console.log(`Updated row ${index}`);
    });

tableCommand
    .command('delete')
    .description('Remove a row')
    .argument('<index>', 'Row index (see `table show`)')
    .action(async (indexArg: string, _opts: unknown, command: Command) => {
        const { config } = await setup(command);
        const table = unwrap(readTableFile(config.tablePath));
        const index = parseIndex(indexArg);

        if (index >= table.size) {
            console.error(`Row ${index} does not exist (table has ${table.size} rows)`);
            process.exit(1);
        }

        const removed = table.delete(index);
        unwrap(writeTableFile(config.tablePath, table));
        console.log(`Deleted row ${index}: ${removed.text} → ${removed.role}`);
    });

// ─── NARRATIVE commands ───────────────────────────────────

const narrativeCommand = program
    .command('narrative')
    .description('Manage the default narrative file')
    .option('-n, --narrative <path>', 'Narrative text file');

narrativeCommand
    .command('save')
    .description('Overwrite the default narrative with the contents of a file')
    .argument('<file>', 'Source text file')
    .action(async (file: string, _opts: unknown, command: Command) => {
        const { config } = await setup(command);
        const text = unwrap(readNarrativeFile(file));

        unwrap(writeNarrativeFile(config.narrativePath, text));
        console.log(`Saved narrative to ${config.narrativePath}`);
    });

narrativeCommand
    .command('show')
    .description('Print the default narrative')
    .action(async (_opts: unknown, command: Command) => {
        const { config } = await setup(command);
        process.stdout.write(unwrap(readNarrativeFile(config.narrativePath)));
    });

// ─── CHECK command ────────────────────────────────────────

program
    .command('check')
    .description('Check that the configured LLM provider is reachable')
    .action(async (_opts: unknown, command: Command) => {
        const { config } = await setup(command);
        const provider = createProvider(config.llm, createHttpClient({ timeout: 5000, version: VERSION }));
        const available = await provider.isAvailable();

        console.log(`${provider.name} (${config.llm.model}): ${available ? 'available' : 'unavailable'}`);
        if (!available) process.exit(1);
    });

await program.parseAsync();
