import { autofillPackaging } from './autofill';
import { recalculateUnitFields } from './calculator';
import { RowKind, type AutofillDiagnostic, type CalculationDiagnostic, type RecalculateOptions, type Row } from './types';
import { rowKind } from './normalize';

export * from './types';
export { COL, TARGET_WIDTH, normalizeRow, normalizeRows, rowKind, isLineRow } from './normalize';
export { inferPackaging, NO_MATCH_RULE } from './labelInference';
export { autofillPackaging } from './autofill';
export { recalculateUnitFields } from './calculator';
export { validateRows, SUSPECT_UNIT_PRICE } from './validator';
export { toRecords, applyRecords } from './records';

export type ProcessResult = {
  rows: Row[];
  warnings: AutofillDiagnostic[];
  errors: CalculationDiagnostic[];
};

// Autofill then recalculate, in one pass over the caller's rows
export function processAll(rows: readonly (readonly string[])[], opts: RecalculateOptions = {}): ProcessResult {
  const filled = autofillPackaging(rows, { protectHeaders: opts.protectHeaders });
  const computed = recalculateUnitFields(filled.rows, opts);
  return { rows: computed.rows, warnings: filled.diagnostics, errors: computed.diagnostics };
}

export function summarizeRows(rows: readonly (readonly string[])[]): { headerRowCount: number; lineRowCount: number } {
  let headerRowCount = 0;
  let lineRowCount = 0;
  for (const row of rows) {
    const kind = rowKind(row);
    if (kind === RowKind.HEADER) headerRowCount++;
    else if (kind === RowKind.LINE) lineRowCount++;
  }
  return { headerRowCount, lineRowCount };
}
