import { UnparseableReferenceFileError } from '../utils/errors';

export type ReferenceEncoding = 'utf-16' | 'utf-8' | 'latin1' | 'windows-1252';

export const REFERENCE_ENCODINGS: ReferenceEncoding[] = ['utf-16', 'utf-8', 'latin1', 'windows-1252'];
export const REFERENCE_DELIMITERS = ['\t', ',', ';'];

export const EMPLOYER_COLUMNS = [
  'EmployerName',
  'Employer',
  'Employer_Name',
  'CompanyName',
  'Employer (Petitioner) Name',
];

export interface ReferenceTable {
  encoding: ReferenceEncoding;
  delimiter: string;
  header: string[];
  rows: string[][];
  /** Rows with more fields than the header */
  skippedRows: number;
}

/**
 * Decodes the buffer with one encoding; null when the bytes are not valid for it
 */
export function decodeAs(buffer: Buffer, encoding: ReferenceEncoding): string | null {
  switch (encoding) {
    case 'utf-16': {
      // Byte order must be declared by a BOM
      if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) {
        return buffer.subarray(2).toString('utf16le');
      }
      if (buffer.length >= 2 && buffer[0] === 0xfe && buffer[1] === 0xff) {
        const body = Buffer.from(buffer.subarray(2, 2 + ((buffer.length - 2) & ~1)));
        return body.swap16().toString('utf16le');
      }
      return null;
    }
    case 'utf-8':
      try {
        return new TextDecoder('utf-8', { fatal: true, ignoreBOM: false }).decode(buffer);
      } catch {
        return null;
      }
    case 'latin1':
      return buffer.toString('latin1');
    case 'windows-1252':
      return new TextDecoder('windows-1252').decode(buffer);
  }
}

/**
 * Splits delimited text into records, honoring double-quoted fields
 * Blank lines are dropped
 */
export function parseDelimited(text: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;

  const endRecord = (): void => {
    record.push(field);
    if (record.length > 1 || record[0].trim() !== '') {
      records.push(record);
    }
    record = [];
    field = '';
    fieldStarted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"' && !fieldStarted) {
      inQuotes = true;
      fieldStarted = true;
    } else if (char === delimiter) {
      record.push(field);
      field = '';
      fieldStarted = false;
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      endRecord();
    } else {
      field += char;
      fieldStarted = true;
    }
  }

  if (field !== '' || record.length > 0) {
    endRecord();
  }

  return records;
}

function toTable(
  text: string,
  encoding: ReferenceEncoding,
  delimiter: string
): ReferenceTable | null {
  const [headerRecord, ...body] = parseDelimited(text, delimiter);
  if (!headerRecord) return null;

  const header = headerRecord.map(name => name.trim());
  if (header.length <= 1) return null;

  const rows: string[][] = [];
  let skippedRows = 0;
  for (const record of body) {
    if (record.length > header.length) {
      skippedRows++;
      continue;
    }
    while (record.length < header.length) record.push('');
    rows.push(record);
  }

  return { encoding, delimiter, header, rows, skippedRows };
}

/**
 * Tries every encoding and delimiter combination in order
 * The first parse whose header has more than one column wins
 */
export function parseReferenceFile(buffer: Buffer, filePath: string): ReferenceTable {
  for (const encoding of REFERENCE_ENCODINGS) {
    const text = decodeAs(buffer, encoding);
    if (text === null) continue;
    const content = text.startsWith('\ufeff') ? text.slice(1) : text;

    for (const delimiter of REFERENCE_DELIMITERS) {
      const table = toTable(content, encoding, delimiter);
      if (table) return table;
    }
  }

  throw new UnparseableReferenceFileError(filePath, 'no encoding and delimiter produced more than one column');
}

function columnIndex(table: ReferenceTable, name: string): number {
  return table.header.indexOf(name);
}

/**
 * Keeps approved H-1B rows; files without the status columns are not filtered
 */
export function filterSponsorshipRows(table: ReferenceTable): string[][] {
  const visaIdx = columnIndex(table, 'VisaClass');
  const statusIdx = columnIndex(table, 'CaseStatus');

  return table.rows.filter(row => {
    if (visaIdx >= 0 && !/h-1b/i.test(row[visaIdx])) return false;
    if (statusIdx >= 0 && !/approved|certified/i.test(row[statusIdx])) return false;
    return true;
  });
}

/**
 * First employer column present in the header, or null
 */
export function findEmployerColumn(table: ReferenceTable): string | null {
  return EMPLOYER_COLUMNS.find(column => table.header.includes(column)) ?? null;
}

/**
 * Employer names of the kept rows, in file order
 * Null when the file has no employer column
 */
export function extractEmployerNames(table: ReferenceTable): string[] | null {
  const column = findEmployerColumn(table);
  if (!column) return null;
  const idx = columnIndex(table, column);
  return filterSponsorshipRows(table)
    .map(row => row[idx])
    .filter(name => name.trim().length > 0);
}
