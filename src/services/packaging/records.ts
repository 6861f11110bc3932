import { COL, copyForStage, isLineRow, readCell } from './normalize';
import type { EditableLineFields, LineRecord, Row } from './types';

export function toRecords(rows: readonly (readonly string[])[]): LineRecord[] {
  const records: LineRecord[] = [];
  rows.forEach((row, rowIndex) => {
    if (!isLineRow(row)) return;
    records.push({
      rowIndex,
      kind: readCell(row, COL.KIND),
      erpLine: readCell(row, COL.ERP_LINE),
      reference: readCell(row, COL.REFERENCE),
      locationCode: readCell(row, COL.LOCATION_CODE),
      label: readCell(row, COL.LABEL),
      cartonQuantity: readCell(row, COL.CARTON_QUANTITY),
      cartonPrice: readCell(row, COL.CARTON_PRICE),
      packagingCount: readCell(row, COL.PACKAGING_COUNT),
      unit: readCell(row, COL.UNIT),
      unitQuantity: readCell(row, COL.UNIT_QUANTITY),
      unitPrice: readCell(row, COL.UNIT_PRICE),
    });
  });
  return records;
}

/**
 * Writes the four editable fields of each record back to its row. Records pointing
 * outside the collection, or at a row that is no longer a line item, are ignored.
 */
export function applyRecords(
  rows: readonly (readonly string[])[],
  records: readonly EditableLineFields[]
): Row[] {
  const byIndex = new Map<number, EditableLineFields>();
  for (const record of records) {
    if (!Number.isInteger(record.rowIndex)) continue;
    byIndex.set(record.rowIndex, record);
  }

  const out = copyForStage(rows, (row) => isLineRow(row));
  out.forEach((row, rowIndex) => {
    const record = byIndex.get(rowIndex);
    if (!record || !isLineRow(row)) return;
    row[COL.PACKAGING_COUNT] = record.packagingCount;
    row[COL.UNIT] = record.unit;
    row[COL.UNIT_QUANTITY] = record.unitQuantity;
    row[COL.UNIT_PRICE] = record.unitPrice;
  });
  return out;
}
