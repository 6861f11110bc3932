import z from 'zod';
import { MAX_DECIMALS, MIN_DECIMALS } from '../utils/numberParsing';

export const RowsSchema = z.array(z.array(z.string()));

// Grid editors may send numbers or nulls for edited cells
const EditableCell = z
  .union([z.string(), z.number(), z.null()])
  .transform((v) => (v === null ? '' : String(v)));

export const RowsRequest = z.object({
  rows: RowsSchema,
});
export type RowsRequestType = z.infer<typeof RowsRequest>;

export const AutofillRequest = z.object({
  rows: RowsSchema,
  protectHeaders: z.boolean().optional(),
});
export type AutofillRequestType = z.infer<typeof AutofillRequest>;

export const RecalculateRequest = AutofillRequest.extend({
  decimals: z.number().int().min(MIN_DECIMALS).max(MAX_DECIMALS).optional(),
});
export type RecalculateRequestType = z.infer<typeof RecalculateRequest>;

export const EditableRecord = z.object({
  rowIndex: z.number().int(),
  packagingCount: EditableCell,
  unit: EditableCell,
  unitQuantity: EditableCell,
  unitPrice: EditableCell,
});

export const ApplyRecordsRequest = z.object({
  rows: RowsSchema,
  records: z.array(EditableRecord),
});
export type ApplyRecordsRequestType = z.infer<typeof ApplyRecordsRequest>;

export const ExportRequest = z.object({
  rows: RowsSchema,
  fileName: z.string().min(1).optional(),
});
export type ExportRequestType = z.infer<typeof ExportRequest>;

export const UploadQuery = z.object({
  separator: z.enum(['auto', ';', ',', 'tab']).optional().default('auto'),
});
export type UploadQueryType = z.infer<typeof UploadQuery>;

export const InferLabelRequest = z.object({
  label: z.string(),
});
export type InferLabelRequestType = z.infer<typeof InferLabelRequest>;

export const InferLabelResponse = z.object({
  packagingCount: z.number().nullable(),
  unit: z.enum(['KGM', 'PCE', '']),
  rule: z.string(),
  isCertain: z.boolean(),
});
