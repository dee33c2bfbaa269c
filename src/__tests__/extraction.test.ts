import { describe, it, expect } from 'vitest';
import { parseEntityLine, parseEntityResponse } from '../extraction/response-parser.js';
import { assignOrdinals } from '../extraction/role-numberer.js';
import { extractEntities, trimToLastSentence } from '../extraction/entity-extraction.js';
import { LOCATIONS_INSTRUCTION, NAMES_AND_ROLES_INSTRUCTION } from '../extraction/prompts.js';
import { ScriptedOracle } from './helpers/scripted-oracle.js';

const NARRATIVE = 'John Smith, a witness, was seen near Main Street. He spoke with Officer Jane Doe.';

describe('Response Parser', () => {
    it('should return one row per well-formed "name, role" line', () => {
        const rows = parseEntityResponse('John Smith, Witness\nJane Doe, Officer\nLee Harvey, Suspect', 'Unknown');
        expect(rows).toEqual([
            { text: 'John Smith', role: 'Witness' },
            { text: 'Jane Doe', role: 'Officer' },
            { text: 'Lee Harvey', role: 'Suspect' },
        ]);
    });

    it('should strip quotes and surrounding whitespace', () => {
        expect(parseEntityLine('  "John Smith" ,  \'Witness\'  ', null)).toEqual({ text: 'John Smith', role: 'Witness' });
    });

    it('should use the default role for single-field lines', () => {
        expect(parseEntityResponse('Main Street\nCity Hall', 'Location')).toEqual([
            { text: 'Main Street', role: 'Location' },
            { text: 'City Hall', role: 'Location' },
        ]);
    });

    it('should fall back to Unknown when no default role is given', () => {
        expect(parseEntityLine('Jane Doe', null)).toEqual({ text: 'Jane Doe', role: 'Unknown' });
    });

    it('should drop empty fields before counting', () => {
        expect(parseEntityLine('Main Street,', 'Location')).toEqual({ text: 'Main Street', role: 'Location' });
        expect(parseEntityLine('Jane Doe, "", Officer', null)).toEqual({ text: 'Jane Doe', role: 'Officer' });
    });

    it('should try the comma split before the semicolon fallback', () => {
        // A lone semicolon-delimited pair resolves as a single comma field
        expect(parseEntityLine('Jane Doe; Officer', 'Unknown')).toEqual({ text: 'Jane Doe; Officer', role: 'Unknown' });
    });

    it('should discard lines with more than two fields', () => {
        expect(parseEntityLine('Smith, John, Witness', 'Unknown')).toBeNull();
        expect(parseEntityLine('Smith; John, Witness, Extra', 'Unknown')).toBeNull();
    });

    it('should skip blank and malformed lines without failing the batch', () => {
        const rows = parseEntityResponse('\nJohn Smith, Witness\n   \na, b, c\r\nJane Doe, Officer\n', 'Unknown');
        expect(rows).toEqual([
            { text: 'John Smith', role: 'Witness' },
            { text: 'Jane Doe', role: 'Officer' },
        ]);
    });

    it('should return nothing for an empty response', () => {
        expect(parseEntityResponse('', 'Unknown')).toEqual([]);
    });
});

describe('Role Numberer', () => {
    it('should number each role independently in table order', () => {
        const rows = assignOrdinals([
            { text: 'A', role: 'X' },
            { text: 'B', role: 'X' },
            { text: 'C', role: 'Y' },
        ]);
        expect(rows.map((r) => r.role)).toEqual(['X 1', 'X 2', 'Y 1']);
        expect(rows.map((r) => r.text)).toEqual(['A', 'B', 'C']);
    });

    it('should change ordinals when the input order changes', () => {
        const rows = assignOrdinals([
            { text: 'B', role: 'X' },
            { text: 'A', role: 'X' },
        ]);
        expect(rows).toEqual([
            { text: 'B', role: 'X 1' },
            { text: 'A', role: 'X 2' },
        ]);
    });

    it('should not modify the input rows', () => {
        const input = [{ text: 'A', role: 'Witness' }];
        assignOrdinals(input);
        expect(input).toEqual([{ text: 'A', role: 'Witness' }]);
    });

    it('should not introduce commas into roles', () => {
        const rows = assignOrdinals([
            { text: 'A', role: 'Witness' },
            { text: 'B', role: 'Location' },
        ]);
        expect(rows.every((r) => !r.role.includes(','))).toBe(true);
    });
});

describe('Entity Extraction Pipeline', () => {
    describe('trimToLastSentence', () => {
        it('should drop a trailing fragment', () => {
            expect(trimToLastSentence('Jane left. Then John')).toBe('Jane left.');
        });

        it('should keep text that already ends with a period', () => {
            expect(trimToLastSentence(NARRATIVE)).toBe(NARRATIVE);
        });

        it('should keep a narrative without any period', () => {
            expect(trimToLastSentence('Jane left')).toBe('Jane left');
        });
    });

    it('should build a numbered table from names then locations', async () => {
        const oracle = new ScriptedOracle(['John Smith, Witness\nJane Doe, Officer', 'Main Street']);

        const result = await extractEntities(NARRATIVE, oracle);

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.rows()).toEqual([
            { text: 'John Smith', role: 'Witness 1' },
            { text: 'Jane Doe', role: 'Officer 1' },
            { text: 'Main Street', role: 'Location 1' },
        ]);
    });

    it('should send the names request before the locations request', async () => {
        const oracle = new ScriptedOracle(['John Smith, Witness', 'Main Street']);

        await extractEntities(`${NARRATIVE} And then`, oracle);

        expect(oracle.calls).toEqual([
            { prompt: NARRATIVE, systemInstruction: NAMES_AND_ROLES_INSTRUCTION },
            { prompt: NARRATIVE, systemInstruction: LOCATIONS_INSTRUCTION },
        ]);
    });

    it('should default people without a role to Unknown', async () => {
        const oracle = new ScriptedOracle(['John Smith\nJane Doe', '']);

        const result = await extractEntities(NARRATIVE, oracle);

        expect(result.ok && result.value.rows()).toEqual([
            { text: 'John Smith', role: 'Unknown 1' },
            { text: 'Jane Doe', role: 'Unknown 2' },
        ]);
    });

    it('should report no-data when the oracle returns nothing', async () => {
        const oracle = new ScriptedOracle(['', '']);

        const result = await extractEntities(NARRATIVE, oracle);

        expect(result).toEqual({
            ok: false,
            error: { kind: 'no-data', message: 'No entities could be extracted from the narrative' },
        });
        expect(oracle.calls).toHaveLength(2);
    });

    it('should report invalid-input without calling the oracle for a blank narrative', async () => {
        const oracle = new ScriptedOracle(['John Smith, Witness', 'Main Street']);

        const result = await extractEntities('   \n', oracle);

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe('invalid-input');
        expect(oracle.calls).toHaveLength(0);
    });
});
