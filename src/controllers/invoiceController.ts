import { FastifyRequest, FastifyReply } from 'fastify';
import { config } from '../config/env';
import { csvService, type Separator } from '../services/CsvService';
import {
  applyRecords,
  autofillPackaging,
  normalizeRows,
  processAll,
  recalculateUnitFields,
  summarizeRows,
  toRecords,
  validateRows,
} from '../services/packaging';
import type {
  ApplyRecordsRequestType,
  AutofillRequestType,
  ExportRequestType,
  RecalculateRequestType,
  RowsRequestType,
  UploadQueryType,
} from '../dtos/invoiceDtos';

export const REJECTION_WARNING =
  'The file can still be exported, but the EDI consumer may reject it until these issues are fixed.';

const DEFAULT_EXPORT_NAME = 'export_final.csv';

const SEPARATOR_OPTIONS: Record<UploadQueryType['separator'], Separator | undefined> = {
  auto: undefined,
  ';': ';',
  ',': ',',
  tab: '\t',
};

function stageDefaults(body: { protectHeaders?: boolean; decimals?: number }) {
  return {
    protectHeaders: body.protectHeaders ?? config.PROTECT_HEADERS === 'true',
    decimals: body.decimals ?? config.DEFAULT_DECIMALS,
  };
}

function sendCsv(reply: FastifyReply, fileName: string, payload: Buffer) {
  const safeName = fileName.replace(/["\\\r\n]/g, '_');
  return reply
    .header('content-type', 'text/csv; charset=utf-8')
    .header('content-disposition', `attachment; filename="${safeName}"`)
    .send(payload);
}

export const invoiceController = {
  async upload(req: FastifyRequest<{ Querystring: UploadQueryType }>, reply: FastifyReply) {
    const data = await req.file();
    if (!data) {
      return reply.status(400).send({ error: { code: 'NO_FILE', message: 'No file uploaded' } });
    }

    const buffer = await data.toBuffer();
    const read = csvService.read(buffer, SEPARATOR_OPTIONS[req.query.separator]);
    const rows = normalizeRows(read.rows);
    const summary = summarizeRows(rows);

    req.log.info({
      msg: 'Invoice CSV loaded',
      fileName: data.filename,
      encoding: read.encoding,
      separator: read.separator,
      ...summary,
    });
    if (read.parseErrors.length > 0) {
      req.log.warn({ msg: 'CSV parser reported problems', fileName: data.filename, parseErrors: read.parseErrors });
    }

    return reply.send({
      fileName: data.filename,
      exportFileName: csvService.exportFileName(data.filename),
      encoding: read.encoding,
      separator: read.separator,
      ...summary,
      rows,
    });
  },

  async normalize(req: FastifyRequest<{ Body: RowsRequestType }>) {
    return { rows: normalizeRows(req.body.rows) };
  },

  async autofill(req: FastifyRequest<{ Body: AutofillRequestType }>) {
    const { protectHeaders } = stageDefaults(req.body);
    const result = autofillPackaging(req.body.rows, { protectHeaders });
    req.log.info({ msg: 'Packaging autofill', rows: result.rows.length, diagnostics: result.diagnostics.length });
    return result;
  },

  async recalculate(req: FastifyRequest<{ Body: RecalculateRequestType }>) {
    const result = recalculateUnitFields(req.body.rows, stageDefaults(req.body));
    req.log.info({ msg: 'Unit fields recalculated', rows: result.rows.length, diagnostics: result.diagnostics.length });
    return result;
  },

  async process(req: FastifyRequest<{ Body: RecalculateRequestType }>) {
    const result = processAll(req.body.rows, stageDefaults(req.body));
    req.log.info({
      msg: 'Autofill + recalculation',
      rows: result.rows.length,
      warnings: result.warnings.length,
      errors: result.errors.length,
    });
    return result;
  },

  async validate(req: FastifyRequest<{ Body: RowsRequestType }>) {
    const issues = validateRows(req.body.rows);
    return {
      issues,
      exportable: true,
      rejectionWarning: issues.length > 0 ? REJECTION_WARNING : null,
    };
  },

  async records(req: FastifyRequest<{ Body: RowsRequestType }>) {
    return { records: toRecords(req.body.rows) };
  },

  async applyRecords(req: FastifyRequest<{ Body: ApplyRecordsRequestType }>) {
    return { rows: applyRecords(req.body.rows, req.body.records) };
  },

  async preview(req: FastifyRequest<{ Body: RowsRequestType }>) {
    return { lines: csvService.previewLines(req.body.rows) };
  },

  async exportCsv(req: FastifyRequest<{ Body: ExportRequestType }>, reply: FastifyReply) {
    const { rows, fileName = DEFAULT_EXPORT_NAME } = req.body;
    const issues = validateRows(rows);
    if (issues.length > 0) {
      req.log.warn({ msg: 'Exporting with outstanding issues', fileName, issues: issues.length });
    }
    return sendCsv(reply, fileName, csvService.export(rows));
  },

  async exportReport(req: FastifyRequest<{ Body: ExportRequestType }>, reply: FastifyReply) {
    const { rows, fileName = DEFAULT_EXPORT_NAME } = req.body;
    const issues = validateRows(rows);
    return sendCsv(reply, csvService.reportFileName(fileName), csvService.exportIssueReport(issues));
  },
};
