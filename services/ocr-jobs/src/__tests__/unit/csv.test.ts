import { BOM, CSV_COLUMNS, formatCsv, parseCsv, parseCsvRecords } from '../../storage/csv';
import { ResultRow } from '../../models/job.model';

function row(overrides: Partial<ResultRow> = {}): ResultRow {
  return {
    imageFile: 'doc_page_0001.png',
    pageNo: 1,
    lineNo: 1,
    layout: 'horizontal',
    left: 10,
    top: 20,
    width: 300,
    height: 24,
    confidence: '0.9500',
    text: 'hello',
    ...overrides,
  };
}

describe('formatCsv', () => {
  it('should write a BOM, the header and CRLF-terminated rows', () => {
    expect(formatCsv([row()])).toBe(
      `${BOM}image_file,page_no,line_no,layout,left,top,width,height,confidence,text\r\n` +
        'doc_page_0001.png,1,1,horizontal,10,20,300,24,0.9500,hello\r\n'
    );
  });

  it('should write only the header for an empty table', () => {
    expect(formatCsv([])).toBe(`${BOM}${CSV_COLUMNS.join(',')}\r\n`);
  });

  it('should quote commas, quotes and line breaks', () => {
    const content = formatCsv([row({ text: 'say "hi", then\nleave' })]);

    expect(content.split('\r\n')[1]).toBe('doc_page_0001.png,1,1,horizontal,10,20,300,24,0.9500,"say ""hi"", then\nleave"');
  });
});

describe('parseCsvRecords', () => {
  it('should split quoted and bare fields', () => {
    expect(parseCsvRecords('a,"b,c",""\r\n"x""y",z,\n')).toEqual([
      ['a', 'b,c', ''],
      ['x"y', 'z', ''],
    ]);
  });

  it('should accept a last record without a newline', () => {
    expect(parseCsvRecords('a,b\r\nc,d')).toEqual([
      ['a', 'b'],
      ['c', 'd'],
    ]);
  });

  it('should reject an unterminated quote', () => {
    expect(() => parseCsvRecords('a,"b\r\n')).toThrow('Unterminated quoted field in result table');
  });
});

describe('parseCsv', () => {
  it('should read back what formatCsv wrote', () => {
    const rows = [
      row(),
      row({ lineNo: 2, text: 'a, "quoted"\r\nline', confidence: '' }),
      row({ pageNo: 2, layout: 'vertical-rtl', imageFile: 'doc_page_0002.png' }),
    ];

    expect(parseCsv(formatCsv(rows))).toEqual(rows);
  });

  it('should read an empty file as no rows', () => {
    expect(parseCsv('')).toEqual([]);
  });

  it('should reject an unknown header', () => {
    expect(() => parseCsv('page,text\r\n')).toThrow('Unexpected result table header: page,text');
  });

  it('should name the line of a malformed row', () => {
    const content = `${CSV_COLUMNS.join(',')}\r\na.png,one,1,horizontal,0,0,1,1,,x\r\n`;

    expect(() => parseCsv(content)).toThrow('Invalid page_no "one" on line 2 of result table');
  });

  it('should reject rows with missing fields', () => {
    const content = `${CSV_COLUMNS.join(',')}\r\na.png,1,1\r\n`;

    expect(() => parseCsv(content)).toThrow('Expected 10 fields on line 2, got 3');
  });

  it('should reject an unknown layout', () => {
    const content = `${CSV_COLUMNS.join(',')}\r\na.png,1,1,diagonal,0,0,1,1,,x\r\n`;

    expect(() => parseCsv(content)).toThrow('Invalid layout "diagonal" on line 2 of result table');
  });
});
