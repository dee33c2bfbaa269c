/**
 * A single row of the entity table: the literal text to match in the
 * narrative and the role label it is redacted to.
 */
export interface EntityRow {
    /** Literal substring as it appears in the narrative (trimmed, unquoted) */
    text: string;

    /** Role label, e.g. "Witness" before numbering and "Witness 1" after */
    role: string;
}

/**
 * Column headers of the persisted and presented entity table.
 */
export const TABLE_HEADER = ['Info', 'Role'] as const;

/**
 * Header + rows shape handed to the presentation layer.
 */
export interface TabularData {
    header: readonly string[];
    rows: string[][];
}

/** Role assigned when the oracle names a person without a role. */
export const UNKNOWN_ROLE = 'Unknown';

/** Role assigned to every extracted location. */
export const LOCATION_ROLE = 'Location';
