/**
 * Result table codec
 *
 * UTF-8 with a byte order mark so spreadsheet tools pick the right encoding,
 * CRLF line endings and RFC 4180 quoting.
 */

import { Layout, ResultRow } from '../models/job.model';

export const CSV_COLUMNS = [
  'image_file',
  'page_no',
  'line_no',
  'layout',
  'left',
  'top',
  'width',
  'height',
  'confidence',
  'text',
] as const;

export const BOM = '\uFEFF';

const EOL = '\r\n';

function csvValue(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

function rowValues(row: ResultRow): Array<string | number> {
  return [
    row.imageFile,
    row.pageNo,
    row.lineNo,
    row.layout,
    row.left,
    row.top,
    row.width,
    row.height,
    row.confidence,
    row.text,
  ];
}

export function formatCsv(rows: readonly ResultRow[]): string {
  const lines = [CSV_COLUMNS.join(','), ...rows.map((row) => rowValues(row).map(csvValue).join(','))];
  return BOM + lines.join(EOL) + EOL;
}

/**
 * Splits CSV text into records of raw fields
 */
export function parseCsvRecords(content: string): string[][] {
  const text = content.startsWith(BOM) ? content.slice(BOM.length) : content;
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;
  let i = 0;

  const endField = (): void => {
    record.push(field);
    field = '';
  };
  const endRecord = (): void => {
    endField();
    records.push(record);
    record = [];
  };

  while (i < text.length) {
    const ch = text[i];

    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += ch;
      }
      i += 1;
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      endField();
    } else if (ch === '\r' && text[i + 1] === '\n') {
      endRecord();
      i += 1;
    } else if (ch === '\n') {
      endRecord();
    } else {
      field += ch;
    }
    i += 1;
  }

  if (quoted) {
    throw new Error('Unterminated quoted field in result table');
  }

  // trailing record without a final newline
  if (field !== '' || record.length > 0) {
    endRecord();
  }

  return records;
}

function toInt(value: string, column: string, line: number): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new Error(`Invalid ${column} "${value}" on line ${line} of result table`);
  }
  return parsed;
}

function toLayout(value: string, line: number): Layout {
  if (value !== 'horizontal' && value !== 'vertical-rtl') {
    throw new Error(`Invalid layout "${value}" on line ${line} of result table`);
  }
  return value;
}

export function parseCsv(content: string): ResultRow[] {
  const [header, ...records] = parseCsvRecords(content);
  if (!header) {
    return [];
  }

  if (header.join(',') !== CSV_COLUMNS.join(',')) {
    throw new Error(`Unexpected result table header: ${header.join(',')}`);
  }

  return records.map((fields, index) => {
    const line = index + 2;
    if (fields.length !== CSV_COLUMNS.length) {
      throw new Error(`Expected ${CSV_COLUMNS.length} fields on line ${line}, got ${fields.length}`);
    }
    const [imageFile, pageNo, lineNo, layout, left, top, width, height, confidence, text] = fields;
    return {
      imageFile,
      pageNo: toInt(pageNo, 'page_no', line),
      lineNo: toInt(lineNo, 'line_no', line),
      layout: toLayout(layout, line),
      left: toInt(left, 'left', line),
      top: toInt(top, 'top', line),
      width: toInt(width, 'width', line),
      height: toInt(height, 'height', line),
      confidence,
      text,
    };
  });
}
