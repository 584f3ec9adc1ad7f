/** Ordered column names of a CSV file, as read from its first row. */
export type Header = readonly string[];

/** A single CSV record. May be ragged (shorter than its file's header). */
export type Row = readonly string[];

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Remove a UTF-8 byte-order-mark from the first cell of a header.
 *
 * Only the first cell is examined; a BOM anywhere else is kept as part of the column name.
 */
export function stripBom(header: Header): Header {
  const first = header[0];
  if (first === undefined || !first.startsWith(BYTE_ORDER_MARK)) {
    return header;
  }
  return [first.slice(BYTE_ORDER_MARK.length), ...header.slice(1)];
}

export function isEmptyHeader(header: Header): boolean {
  return header.length === 0;
}

export function headersEqual(a: Header, b: Header): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}
