import { detect } from 'chardet';
import * as iconv from 'iconv-lite';
import { parse, unparse } from 'papaparse';
import type { Row, ValidationIssue } from './packaging';

export type Separator = ';' | ',' | '\t';

export interface CsvReadResult {
  rows: Row[];
  separator: Separator;
  encoding: string;
  parseErrors: string[];
}

export class CsvReadError extends Error {
  statusCode = 400;
  code = 'CSV_READ_ERROR';
  constructor(message: string) {
    super(message);
    this.name = 'CsvReadError';
  }
}

const BOM = '\ufeff';
const EXPORT_EOL = '\r\n';
const DETECTION_SAMPLE_BYTES = 50_000;
const SEPARATORS: readonly Separator[] = [';', ',', '\t'];
const DEFAULT_SEPARATOR: Separator = ';';
export const PREVIEW_LINES = 10;

const countOf = (text: string, needle: string) => text.split(needle).length - 1;

function stripTrailingEmpty(row: readonly string[]): string[] {
  let end = row.length;
  while (end > 0 && row[end - 1] === '') end--;
  return row.slice(0, end);
}

function exportLine(row: readonly string[], separator: Separator): string {
  return stripTrailingEmpty(row).join(separator);
}

function withBom(text: string): Buffer {
  return Buffer.from(BOM + text, 'utf8');
}

/**
 * CSV I/O for ERP exports and EDI files.
 *
 * Everything is kept as text on the way in (GLN location codes are 13 digits and
 * must survive untouched). ERP exports never quote fields, so `"` is an ordinary
 * character: labels such as `"BIO" POMME` or `TUYAU 3/4"` stay in their cell and
 * each physical line is one row. The export framing is fixed by the EDI consumer:
 * `;`-separated, trailing empty cells dropped, CRLF line ends, UTF-8 with BOM.
 */
export const csvService = {
  detectEncoding(buffer: Buffer): string {
    return detect(buffer.subarray(0, DETECTION_SAMPLE_BYTES)) ?? 'utf-8';
  },

  decode(buffer: Buffer, encoding: string): string {
    const text = iconv.encodingExists(encoding) ? iconv.decode(buffer, encoding) : buffer.toString('utf8');
    return text.startsWith(BOM) ? text.slice(1) : text;
  },

  // Highest count on the first line wins; ties go to the earlier separator
  detectSeparator(text: string): Separator {
    const firstLine = text.includes('\n') ? text.split('\n')[0] : text.slice(0, 500);
    let best: Separator = DEFAULT_SEPARATOR;
    let bestCount = 0;
    for (const sep of SEPARATORS) {
      const n = countOf(firstLine, sep);
      if (n > bestCount) {
        best = sep;
        bestCount = n;
      }
    }
    return best;
  },

  read(buffer: Buffer, forcedSeparator?: Separator): CsvReadResult {
    if (buffer.length === 0) {
      throw new CsvReadError('Uploaded file is empty');
    }

    const encoding = csvService.detectEncoding(buffer);
    const text = csvService.decode(buffer, encoding);
    const separator = forcedSeparator ?? csvService.detectSeparator(text);

    // fastMode splits on the delimiter without any quote handling
    const result = parse<string[]>(text.replace(/\r\n?/g, '\n'), {
      delimiter: separator,
      newline: '\n',
      fastMode: true,
      skipEmptyLines: true,
    });
    const rows = result.data.filter((cells) => cells.join(separator).trim() !== '');
    if (rows.length === 0) {
      throw new CsvReadError('No data rows found in uploaded file');
    }

    const parseErrors = result.errors.map((e) => (e.row === undefined ? e.message : `row ${e.row + 1}: ${e.message}`));
    return { rows, separator, encoding, parseErrors };
  },

  export(rows: readonly (readonly string[])[], separator: Separator = DEFAULT_SEPARATOR): Buffer {
    const body = rows.map((row) => exportLine(row, separator) + EXPORT_EOL).join('');
    return withBom(body);
  },

  previewLines(rows: readonly (readonly string[])[], limit = PREVIEW_LINES, separator: Separator = DEFAULT_SEPARATOR): string[] {
    return rows.slice(0, limit).map((row) => exportLine(row, separator));
  },

  exportIssueReport(issues: readonly ValidationIssue[]): Buffer {
    const data = issues.map((issue) => [
      String(issue.rowIndex + 1),
      issue.label,
      issue.kind,
      'value' in issue ? issue.value : '',
    ]);
    const body = unparse(
      { fields: ['line', 'label', 'issue', 'value'], data },
      { delimiter: DEFAULT_SEPARATOR, newline: EXPORT_EOL }
    );
    return withBom(body + EXPORT_EOL);
  },

  exportFileName(uploadName: string | null | undefined): string {
    const name = (uploadName ?? '').trim();
    const dot = name.lastIndexOf('.');
    const base = dot > 0 ? name.slice(0, dot) : name;
    return `${base || 'export'}_EDI.csv`;
  },

  reportFileName(exportName: string): string {
    return exportName.replace(/\.csv$/i, '') + '_report.csv';
  },
};
