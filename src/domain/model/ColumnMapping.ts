import type { Header, Row } from './Header.js';

/**
 * Lookup from canonical column position to the matching column index in one file's header.
 * `null` marks a canonical column the file does not have.
 */
export type ColumnMapping = readonly (number | null)[];

/**
 * Build the mapping for one file. Names are compared with strict equality: no case folding,
 * no trimming. When a file repeats a name, the first occurrence wins.
 */
export function buildColumnMapping(canonical: Header, fileHeader: Header): ColumnMapping {
  return canonical.map((name) => {
    const index = fileHeader.indexOf(name);
    return index >= 0 ? index : null;
  });
}

/**
 * Project a row onto the canonical column order.
 *
 * The result always has `mapping.length` cells. Absent columns and cells past the end of a
 * ragged row become `''`; columns the mapping does not reference are dropped.
 */
export function mapRow(row: Row, mapping: ColumnMapping): string[] {
  return mapping.map((sourceIndex) => (sourceIndex === null ? '' : (row[sourceIndex] ?? '')));
}
