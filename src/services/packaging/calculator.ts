import { clampDecimals, DEFAULT_DECIMALS, formatUnitQuantity, parseDecimalLike, toFixedText } from '../../utils/numberParsing';
import { COL, copyForStage, labelExcerpt, readCell, rowKind } from './normalize';
import { RowKind, type CalculationDiagnostic, type RecalculateOptions, type Row, type StageResult } from './types';

const LABEL_EXCERPT = 40;

// Beyond this a per-unit price is treated as a degenerate division
const MAX_UNIT_PRICE_MAGNITUDE = 1e15;

/**
 * Per-unit quantity (col 14) = carton quantity × packaging count.
 * Per-unit price (col 15)    = carton price ÷ packaging count.
 *
 * Missing operands leave the target cell empty and produce a diagnostic; no row
 * defect stops the pass.
 */
export function recalculateUnitFields(
  rows: readonly (readonly string[])[],
  opts: RecalculateOptions = {}
): StageResult<CalculationDiagnostic> {
  const protectHeaders = opts.protectHeaders ?? true;
  const decimals = clampDecimals(opts.decimals ?? DEFAULT_DECIMALS);
  const out: Row[] = copyForStage(rows, (row) => rowKind(row) === RowKind.LINE);
  const diagnostics: CalculationDiagnostic[] = [];

  out.forEach((row, rowIndex) => {
    const kind = rowKind(row);
    if (kind === RowKind.HEADER && protectHeaders) return;
    if (kind !== RowKind.LINE) return;

    const label = labelExcerpt(row, LABEL_EXCERPT);
    const rawPackagingCount = readCell(row, COL.PACKAGING_COUNT);
    const packagingCount = parseDecimalLike(rawPackagingCount);

    if (packagingCount === null || packagingCount === 0) {
      row[COL.UNIT_QUANTITY] = '';
      row[COL.UNIT_PRICE] = '';
      diagnostics.push({ kind: 'PACKAGING_COUNT_MISSING_OR_ZERO', rowIndex, label, rawPackagingCount });
      return;
    }

    const cartonQuantity = parseDecimalLike(readCell(row, COL.CARTON_QUANTITY));
    if (cartonQuantity !== null) {
      row[COL.UNIT_QUANTITY] = formatUnitQuantity(cartonQuantity * packagingCount, decimals);
    } else {
      row[COL.UNIT_QUANTITY] = '';
      diagnostics.push({ kind: 'CARTON_QUANTITY_MISSING', rowIndex, label });
    }

    const cartonPrice = parseDecimalLike(readCell(row, COL.CARTON_PRICE));
    if (cartonPrice === null) {
      row[COL.UNIT_PRICE] = '';
      diagnostics.push({ kind: 'CARTON_PRICE_MISSING', rowIndex, label });
      return;
    }

    const unitPrice = cartonPrice / packagingCount;
    if (Number.isFinite(unitPrice) && Math.abs(unitPrice) < MAX_UNIT_PRICE_MAGNITUDE) {
      row[COL.UNIT_PRICE] = toFixedText(unitPrice, decimals);
    } else {
      row[COL.UNIT_PRICE] = '';
      diagnostics.push({ kind: 'DIVISION_NON_FINITE', rowIndex, label, cartonPrice, packagingCount });
    }
  });

  return { rows: out, diagnostics };
}
