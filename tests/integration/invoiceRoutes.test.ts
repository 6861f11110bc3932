import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { FastifyInstance } from 'fastify';
import { buildTestApp, multipartCsv } from './testApp';
import { headerRow, lineRow } from '../helpers/rows';
import { REJECTION_WARNING } from '../../src/controllers/invoiceController';

describe('Invoice Routes Integration', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET /health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('uploads an ERP export and returns normalized rows', async () => {
    const csv = 'HH;FAC1;20240105\r\nLL;1;REF;;3012345678901;12 SACHETS FRUITS SECS;4;30\r\n';
    const res = await app.inject({ method: 'POST', url: '/invoices/upload', ...multipartCsv('invoice.csv', csv) });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.fileName).toBe('invoice.csv');
    expect(body.exportFileName).toBe('invoice_EDI.csv');
    expect(body.separator).toBe(';');
    expect(body.headerRowCount).toBe(1);
    expect(body.lineRowCount).toBe(1);
    expect(body.rows).toHaveLength(2);
    expect(body.rows[1]).toHaveLength(33);
    expect(body.rows[1][4]).toBe('3012345678901');
  });

  it('rejects an empty upload with a 400', async () => {
    const res = await app.inject({ method: 'POST', url: '/invoices/upload', ...multipartCsv('empty.csv', '') });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('CSV_READ_ERROR');
  });

  it('POST /invoices/autofill reports uncertain counts by row', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/invoices/autofill',
      payload: { rows: [headerRow(), lineRow({ label: '12 SACHETS FRUITS SECS' })] },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.rows[1][12]).toBe('12');
    expect(body.rows[1][13]).toBe('PCE');
    expect(body.diagnostics).toEqual([
      {
        kind: 'UNCERTAIN',
        rowIndex: 1,
        label: '12 SACHETS FRUITS SECS',
        suggestedPackagingCount: 12,
        rule: '12 SACHETS → PCE (verify)',
      },
    ]);
  });

  it('POST /invoices/process fills and computes in one call', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/invoices/process',
      payload: {
        rows: [headerRow(), lineRow({ label: 'BANANE 18,5KG CARTON', cartonQuantity: '10', cartonPrice: '37' })],
        decimals: 2,
      },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.rows[0]).toEqual(headerRow());
    expect(body.rows[1].slice(12, 16)).toEqual(['18.5', 'KGM', '185', '2.00']);
    expect(body.warnings).toEqual([]);
    expect(body.errors).toEqual([]);
  });

  it('POST /invoices/recalculate uses the configured precision by default', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/invoices/recalculate',
      payload: { rows: [lineRow({ cartonQuantity: '10', cartonPrice: '37', packagingCount: '18.5' })] },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().rows[0][15]).toBe('2.000000');
  });

  it('POST /invoices/recalculate rejects precision outside 2..8', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/invoices/recalculate',
      payload: { rows: [], decimals: 9 },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
  });

  it('POST /invoices/validate still allows export but warns', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/invoices/validate',
      payload: {
        rows: [lineRow({ label: 'BANANE', unit: 'KGM', unitQuantity: '185', unitPrice: '2.00' })],
      },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      issues: [{ kind: 'PACKAGING_COUNT_EMPTY', rowIndex: 0, label: 'BANANE' }],
      exportable: true,
      rejectionWarning: REJECTION_WARNING,
    });
  });

  it('round-trips grid edits through records', async () => {
    const rows = [headerRow(), lineRow({ label: '4 MAINS', packagingCount: '4', unit: 'PCE' })];

    const recordsRes = await app.inject({ method: 'POST', url: '/invoices/records', payload: { rows } });
    const { records } = recordsRes.json();
    expect(records).toHaveLength(1);
    expect(records[0].rowIndex).toBe(1);

    const applyRes = await app.inject({
      method: 'POST',
      url: '/invoices/records/apply',
      payload: { rows, records: [{ ...records[0], packagingCount: 20, unitQuantity: null }] },
    });

    expect(applyRes.statusCode).toBe(200);
    const out = applyRes.json().rows;
    expect(out[1][12]).toBe('20');
    expect(out[1][13]).toBe('PCE');
    expect(out[1][14]).toBe('');
    expect(out[0]).toEqual(headerRow());
  });

  it('POST /invoices/export returns the EDI file bytes', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/invoices/export',
      payload: { rows: [['HH', 'FAC1', '', ''], ['LL', '1', 'x']], fileName: 'facture_EDI.csv' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(res.headers['content-disposition']).toBe('attachment; filename="facture_EDI.csv"');
    expect(res.rawPayload.equals(Buffer.from('\ufeffHH;FAC1\r\nLL;1;x\r\n', 'utf8'))).toBe(true);
  });

  it('POST /invoices/report lists validation issues', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/invoices/report',
      payload: { rows: [headerRow(), lineRow({ label: 'POMME' })] },
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-disposition']).toBe('attachment; filename="export_final_report.csv"');
    expect(res.rawPayload.toString('utf8')).toBe(
      '\ufeffline;label;issue;value\r\n' +
        '2;POMME;PACKAGING_COUNT_EMPTY;\r\n' +
        '2;POMME;UNIT_EMPTY;\r\n' +
        '2;POMME;UNIT_QUANTITY_EMPTY;\r\n' +
        '2;POMME;UNIT_PRICE_EMPTY;\r\n'
    );
  });

  it('POST /invoices/preview returns the first export lines', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/invoices/preview',
      payload: { rows: [['HH', 'FAC1', '', ''], ['LL', '1', '"BIO" POMME', '']] },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ lines: ['HH;FAC1', 'LL;1;"BIO" POMME'] });
  });
});
