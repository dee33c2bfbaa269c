import { TABLE_HEADER, type EntityRow, type TabularData } from '../types/index.js';

/**
 * Ordered, editable mapping from entity text to role label.
 *
 * Pipeline stages append rows and never reorder them; the presentation
 * layer edits through `set`, `append` and `delete` instead of reaching
 * into the storage.
 */
export class EntityTable {
    private readonly entries: EntityRow[];

    constructor(rows: Iterable<EntityRow> = []) {
        this.entries = [];
        for (const row of rows) {
            this.entries.push({ text: row.text, role: row.role });
        }
    }

    get size(): number {
        return this.entries.length;
    }

    get(index: number): EntityRow {
        const row = this.entries[this.checkIndex(index)];
        if (!row) throw new RangeError(`Row index ${index} out of range`);
        return { ...row };
    }

    set(index: number, row: EntityRow): void {
        this.entries[this.checkIndex(index)] = { text: row.text, role: row.role };
    }

    append(row: EntityRow): number {
        this.entries.push({ text: row.text, role: row.role });
        return this.entries.length - 1;
    }

    delete(index: number): EntityRow {
        const [removed] = this.entries.splice(this.checkIndex(index), 1);
        if (!removed) throw new RangeError(`Row index ${index} out of range`);
        return removed;
    }

    /**
     * Whether a row with exactly this text and role exists.
     */
    has(text: string, role: string): boolean {
        return this.entries.some((row) => row.text === text && row.role === role);
    }

    /**
     * Copy of the rows in table order.
     */
    rows(): EntityRow[] {
        return this.entries.map((row) => ({ ...row }));
    }

    /**
     * Independent copy of this table.
     */
    clone(): EntityTable {
        return new EntityTable(this.entries);
    }

    toTabular(): TabularData {
        return {
            header: [...TABLE_HEADER],
            rows: this.entries.map((row) => [row.text, row.role]),
        };
    }

    [Symbol.iterator](): Iterator<EntityRow> {
        return this.rows()[Symbol.iterator]();
    }

    private checkIndex(index: number): number {
        if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
            throw new RangeError(`Row index ${index} out of range (table has ${this.entries.length} rows)`);
        }
        return index;
    }
}
