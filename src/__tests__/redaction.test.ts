import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { buildReplacementMap, escapeRegExp, redactNarrative, redactWithTableFile } from '../redaction/redaction.js';
import { runPipeline } from '../pipeline/run-pipeline.js';
import { EntityTable } from '../table/entity-table.js';
import { ScriptedOracle } from './helpers/scripted-oracle.js';

describe('Redaction Engine', () => {
    it('should return the narrative unchanged when nothing matches', () => {
        const narrative = 'Nobody was there.';
        const table = new EntityTable([{ text: 'John Smith', role: 'Witness 1' }]);
        expect(redactNarrative(narrative, table)).toBe(narrative);
    });

    it('should substitute longer entities before their substrings', () => {
        const table = new EntityTable([
            { text: 'Lee', role: 'Witness 1' },
            { text: 'Lee Harvey', role: 'Suspect 1' },
        ]);
        expect(redactNarrative('Lee Harvey was seen.', table)).toBe('[Suspect 1] was seen.');
    });

    it('should still redact the shorter entity where it stands alone', () => {
        const table = new EntityTable([
            { text: 'Lee', role: 'Witness 1' },
            { text: 'Lee Harvey', role: 'Suspect 1' },
        ]);
        expect(redactNarrative('Lee Harvey met Lee.', table)).toBe('[Suspect 1] met [Witness 1].');
    });

    it('should match case-insensitively', () => {
        const table = new EntityTable([{ text: 'john', role: 'Witness 1' }]);
        expect(redactNarrative('John and JOHN left.', table)).toBe('[Witness 1] and [Witness 1] left.');
    });

    it('should treat regex metacharacters literally', () => {
        const table = new EntityTable([{ text: 'J. Doe', role: 'Officer 1' }]);
        expect(redactNarrative('JX Doe met J. Doe.', table)).toBe('JX Doe met [Officer 1].');
    });

    it('should not respect word boundaries', () => {
        const table = new EntityTable([{ text: 'Al', role: 'Witness 1' }]);
        expect(redactNarrative('Alice met Al.', table)).toBe('[Witness 1]ice met [Witness 1].');
    });

    it('should insert role tags literally', () => {
        const table = new EntityTable([{ text: 'Jane', role: '$& 1' }]);
        expect(redactNarrative('Jane left.', table)).toBe('[$& 1] left.');
    });

    it('should let a later row with the same text win', () => {
        const table = new EntityTable([
            { text: 'Lee', role: 'Witness 1' },
            { text: 'Lee', role: 'Suspect 1' },
        ]);
        expect(buildReplacementMap(table)).toEqual(new Map([['Lee', '[Suspect 1]']]));
        expect(redactNarrative('Lee left.', table)).toBe('[Suspect 1] left.');
    });

    it('should skip blank entity texts', () => {
        const table = new EntityTable([
            { text: '', role: 'Witness 1' },
            { text: '  ', role: 'Witness 2' },
        ]);
        expect(redactNarrative('Jane left.', table)).toBe('Jane left.');
    });

    it('should escape every regex metacharacter', () => {
        expect(escapeRegExp('a.b*c+d?(e)[f]{g}|h^i$j\\k')).toBe('a\\.b\\*c\\+d\\?\\(e\\)\\[f\\]\\{g\\}\\|h\\^i\\$j\\\\k');
    });

    describe('redactWithTableFile', () => {
        let tmpDir: string;

        beforeEach(() => {
            tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'redactor-redaction-'));
        });

        afterEach(() => {
            fs.rmSync(tmpDir, { recursive: true, force: true });
        });

        it('should redact with a table read from disk', () => {
            const tablePath = path.join(tmpDir, 'entities.csv');
            fs.writeFileSync(tablePath, 'Info,Role\nJane Doe,Officer 1\n', 'utf-8');

            expect(redactWithTableFile('Jane Doe left.', tablePath)).toEqual({ ok: true, value: '[Officer 1] left.' });
        });

        it('should fail without redacting when the table is missing', () => {
            const result = redactWithTableFile('Jane Doe left.', path.join(tmpDir, 'missing.csv'));

            expect(result.ok).toBe(false);
            if (result.ok) return;
            expect(result.error.kind).toBe('table-read');
        });

        it('should fail when the table has no header', () => {
            const tablePath = path.join(tmpDir, 'entities.csv');
            fs.writeFileSync(tablePath, 'Jane Doe,Officer 1\n', 'utf-8');

            const result = redactWithTableFile('Jane Doe left.', tablePath);
            expect(result.ok).toBe(false);
        });
    });
});

describe('Pipeline', () => {
    const narrative = 'John Smith, a witness, was seen near Main Street. He spoke with Officer Jane Doe.';

    it('should extract and redact end to end', async () => {
        const oracle = new ScriptedOracle(['John Smith, Witness\nJane Doe, Officer', 'Main Street']);

        const result = await runPipeline(narrative, oracle);

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.table.toTabular()).toEqual({
            header: ['Info', 'Role'],
            rows: [
                ['John Smith', 'Witness 1'],
                ['Jane Doe', 'Officer 1'],
                ['Main Street', 'Location 1'],
            ],
        });
        expect(result.value.redacted).toBe(
            '[Witness 1], a witness, was seen near [Location 1]. He spoke with Officer [Officer 1].'
        );
    });

    it('should redact appended aliases when reconciliation is enabled', async () => {
        const oracle = new ScriptedOracle([
            'Jane Doe, Officer',
            '',
            'Jane Doe\nOfficer Doe',
            'yes',
        ]);

        const result = await runPipeline('Jane Doe arrived. Officer Doe left.', oracle, { reconcile: true });

        expect(result.ok && result.value.redacted).toBe('[Officer 1] arrived. [Officer 1] left.');
    });

    it('should stop at extraction failures', async () => {
        const oracle = new ScriptedOracle(['', '']);

        const result = await runPipeline(narrative, oracle, { reconcile: true });

        expect(result.ok).toBe(false);
        expect(oracle.calls).toHaveLength(2);
    });
});
