import { parseDecimalLike } from '../../utils/numberParsing';
import { COL, labelExcerpt, readCell, rowKind } from './normalize';
import { RowKind, type ValidationIssue } from './types';

const LABEL_EXCERPT = 40;

// A per-unit price this large almost always comes from a near-zero packaging count
export const SUSPECT_UNIT_PRICE = 1e12;

/**
 * Read-only completeness scan of line items before export. Checks are independent,
 * so one row can report several issues.
 */
export function validateRows(rows: readonly (readonly string[])[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  rows.forEach((row, rowIndex) => {
    if (rowKind(row) !== RowKind.LINE) return;
    const label = labelExcerpt(row, LABEL_EXCERPT);

    const packagingCount = readCell(row, COL.PACKAGING_COUNT);
    if (!packagingCount.trim()) {
      issues.push({ kind: 'PACKAGING_COUNT_EMPTY', rowIndex, label });
    } else if (parseDecimalLike(packagingCount) === null) {
      issues.push({ kind: 'PACKAGING_COUNT_NOT_NUMERIC', rowIndex, label, value: packagingCount });
    }

    if (!readCell(row, COL.UNIT).trim()) {
      issues.push({ kind: 'UNIT_EMPTY', rowIndex, label });
    }

    if (!readCell(row, COL.UNIT_QUANTITY).trim()) {
      issues.push({ kind: 'UNIT_QUANTITY_EMPTY', rowIndex, label });
    }

    const unitPrice = readCell(row, COL.UNIT_PRICE);
    if (!unitPrice.trim()) {
      issues.push({ kind: 'UNIT_PRICE_EMPTY', rowIndex, label });
      return;
    }
    const price = parseDecimalLike(unitPrice);
    if (price === null) {
      issues.push({ kind: 'UNIT_PRICE_NOT_NUMERIC', rowIndex, label, value: unitPrice });
    } else if (Math.abs(price) > SUSPECT_UNIT_PRICE) {
      issues.push({ kind: 'UNIT_PRICE_SUSPECT', rowIndex, label, value: unitPrice });
    }
  });

  return issues;
}
