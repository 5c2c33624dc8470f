export type CsvValue = string | number | undefined;

const NEEDS_QUOTING = /[",\r\n]/;

export const toCsvField = (value: CsvValue): string => {
  if (value === undefined) {
    return '';
  }
  const text = String(value);
  if (!NEEDS_QUOTING.test(text)) {
    return text;
  }
  return `"${text.replace(/"/g, '""')}"`;
};

export const toCsvLine = (values: CsvValue[]): string => `${values.map(toCsvField).join(',')}\n`;

/**
 * Splits CSV text into rows of fields. Quoted fields may hold commas,
 * doubled quotes and line breaks; LF and CRLF both end a row.
 */
export const parseCsv = (text: string): string[][] => {
  const source = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < source.length; i += 1) {
    const char = source[i];
    if (inQuotes) {
      if (char !== '"') {
        field += char;
      } else if (source[i + 1] === '"') {
        field += '"';
        i += 1;
      } else {
        inQuotes = false;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && source[i + 1] === '\n') {
        i += 1;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
};
