import { RowKind, type Row } from './types';

// Column positions (0-based) in the ERP export
export const COL = {
  KIND: 0,
  ERP_LINE: 1,
  REFERENCE: 2,
  LOCATION_CODE: 4,
  LABEL: 5,
  CARTON_QUANTITY: 6,
  CARTON_PRICE: 7,
  PACKAGING_COUNT: 12,
  UNIT: 13,
  UNIT_QUANTITY: 14,
  UNIT_PRICE: 15,
} as const;

// Header rows are exported 33 wide; line items are extended to match
export const TARGET_WIDTH = 33;

const HEADER_TAG = 'HH';
const LINE_TAG = 'LL';

export function normalizeRow(row: readonly string[]): Row {
  const out = row.slice(0, TARGET_WIDTH);
  while (out.length < TARGET_WIDTH) out.push('');
  return out;
}

function padRow(row: readonly string[]): Row {
  const out = row.slice();
  while (out.length < TARGET_WIDTH) out.push('');
  return out;
}

export function normalizeRows(rows: readonly (readonly string[])[]): Row[] {
  return rows.map(normalizeRow);
}

export function rowKind(row: readonly string[]): RowKind {
  const tag = (row[COL.KIND] ?? '').trim().toUpperCase();
  if (tag === HEADER_TAG) return RowKind.HEADER;
  if (tag === LINE_TAG) return RowKind.LINE;
  return RowKind.OTHER;
}

export function isLineRow(row: readonly string[]): boolean {
  return rowKind(row) === RowKind.LINE;
}

export function readCell(row: readonly string[], col: number): string {
  return row[col] ?? '';
}

export function labelExcerpt(row: readonly string[], max: number): string {
  return readCell(row, COL.LABEL).slice(0, max);
}

/**
 * Copies the collection for a stage. Rows the stage may write to are padded
 * up to TARGET_WIDTH (never truncated); every other row is copied as is.
 */
export function copyForStage(rows: readonly (readonly string[])[], writable: (row: readonly string[]) => boolean): Row[] {
  return rows.map((row) => (writable(row) ? padRow(row) : row.slice()));
}
