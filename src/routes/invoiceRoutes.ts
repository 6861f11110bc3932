import { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import { invoiceController } from '../controllers/invoiceController';
import {
  ApplyRecordsRequest,
  AutofillRequest,
  ExportRequest,
  RecalculateRequest,
  RowsRequest,
  UploadQuery,
} from '../dtos/invoiceDtos';

export default async function invoiceRoutes(fastify: FastifyInstance) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  // POST /invoices/upload (multipart, field "file")
  app.post('/upload', { schema: { querystring: UploadQuery } }, invoiceController.upload);

  app.post('/normalize', { schema: { body: RowsRequest } }, invoiceController.normalize);

  app.post('/autofill', { schema: { body: AutofillRequest } }, invoiceController.autofill);

  app.post('/recalculate', { schema: { body: RecalculateRequest } }, invoiceController.recalculate);

  // Autofill then recalculate in one call
  app.post('/process', { schema: { body: RecalculateRequest } }, invoiceController.process);

  app.post('/validate', { schema: { body: RowsRequest } }, invoiceController.validate);

  app.post('/records', { schema: { body: RowsRequest } }, invoiceController.records);

  app.post('/records/apply', { schema: { body: ApplyRecordsRequest } }, invoiceController.applyRecords);

  // First lines of the export exactly as they will be written
  app.post('/preview', { schema: { body: RowsRequest } }, invoiceController.preview);

  app.post('/export', { schema: { body: ExportRequest } }, invoiceController.exportCsv);

  app.post('/report', { schema: { body: ExportRequest } }, invoiceController.exportReport);
}
