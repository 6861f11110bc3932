import { formatPackagingCount } from '../../utils/numberParsing';
import { inferPackaging } from './labelInference';
import { COL, copyForStage, labelExcerpt, readCell, rowKind } from './normalize';
import { RowKind, type AutofillDiagnostic, type Row, type StageOptions, type StageResult } from './types';

const LABEL_EXCERPT = 50;

/**
 * Fills packaging count (col 12) and unit (col 13) of every line item from its label.
 *
 * Header rows are never written: with `protectHeaders` they are skipped outright, and
 * without it they still carry no label semantics, so no rule applies to them.
 */
export function autofillPackaging(
  rows: readonly (readonly string[])[],
  opts: StageOptions = {}
): StageResult<AutofillDiagnostic> {
  const protectHeaders = opts.protectHeaders ?? true;
  const out: Row[] = copyForStage(rows, (row) => rowKind(row) === RowKind.LINE);
  const diagnostics: AutofillDiagnostic[] = [];

  out.forEach((row, rowIndex) => {
    const kind = rowKind(row);
    if (kind === RowKind.HEADER && protectHeaders) return;
    if (kind !== RowKind.LINE) return;

    const result = inferPackaging(readCell(row, COL.LABEL));
    const label = labelExcerpt(row, LABEL_EXCERPT);

    if (result.packagingCount === null) {
      row[COL.PACKAGING_COUNT] = '';
      row[COL.UNIT] = '';
      diagnostics.push({ kind: 'NOT_FOUND', rowIndex, label, suggestedPackagingCount: null, rule: result.rule });
      return;
    }

    row[COL.PACKAGING_COUNT] = formatPackagingCount(result.packagingCount);
    row[COL.UNIT] = result.unit;
    if (!result.isCertain) {
      diagnostics.push({
        kind: 'UNCERTAIN',
        rowIndex,
        label,
        suggestedPackagingCount: result.packagingCount,
        rule: result.rule,
      });
    }
  });

  return { rows: out, diagnostics };
}
