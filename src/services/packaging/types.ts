export type Row = string[];

export const RowKind = {
  HEADER: 'HEADER',
  LINE: 'LINE',
  OTHER: 'OTHER',
} as const;
export type RowKind = (typeof RowKind)[keyof typeof RowKind];

export const UnitCode = {
  WEIGHT: 'KGM',
  COUNT: 'PCE',
} as const;
export type UnitCode = (typeof UnitCode)[keyof typeof UnitCode];

export type InferenceResult = {
  packagingCount: number | null;
  unit: UnitCode | '';
  rule: string;
  isCertain: boolean;
};

export type StageOptions = {
  protectHeaders?: boolean;
};

export type RecalculateOptions = StageOptions & {
  decimals?: number;
};

type RowRef = {
  rowIndex: number;
  label: string;
};

// Autofill
export type UncertainDiagnostic = RowRef & {
  kind: 'UNCERTAIN';
  suggestedPackagingCount: number;
  rule: string;
};

export type NotFoundDiagnostic = RowRef & {
  kind: 'NOT_FOUND';
  suggestedPackagingCount: null;
  rule: string;
};

export type AutofillDiagnostic = UncertainDiagnostic | NotFoundDiagnostic;

// Recalculate
export type CalculationDiagnostic =
  | (RowRef & { kind: 'PACKAGING_COUNT_MISSING_OR_ZERO'; rawPackagingCount: string })
  | (RowRef & { kind: 'CARTON_QUANTITY_MISSING' })
  | (RowRef & { kind: 'CARTON_PRICE_MISSING' })
  | (RowRef & { kind: 'DIVISION_NON_FINITE'; cartonPrice: number; packagingCount: number });

// Validate
export type ValidationIssue =
  | (RowRef & { kind: 'PACKAGING_COUNT_EMPTY' })
  | (RowRef & { kind: 'PACKAGING_COUNT_NOT_NUMERIC'; value: string })
  | (RowRef & { kind: 'UNIT_EMPTY' })
  | (RowRef & { kind: 'UNIT_QUANTITY_EMPTY' })
  | (RowRef & { kind: 'UNIT_PRICE_EMPTY' })
  | (RowRef & { kind: 'UNIT_PRICE_NOT_NUMERIC'; value: string })
  | (RowRef & { kind: 'UNIT_PRICE_SUSPECT'; value: string });

export type Diagnostic = AutofillDiagnostic | CalculationDiagnostic | ValidationIssue;
export type DiagnosticKind = Diagnostic['kind'];

export type StageResult<D> = {
  rows: Row[];
  diagnostics: D[];
};

export type LineRecord = {
  rowIndex: number;
  kind: string;
  erpLine: string;
  reference: string;
  locationCode: string;
  label: string;
  cartonQuantity: string;
  cartonPrice: string;
  packagingCount: string;
  unit: string;
  unitQuantity: string;
  unitPrice: string;
};

export type EditableLineFields = Pick<LineRecord, 'rowIndex' | 'packagingCount' | 'unit' | 'unitQuantity' | 'unitPrice'>;
