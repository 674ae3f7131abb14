export type CsvRecord = {
  /** 1-based line in the source text where the record starts. */
  line: number;
  cells: string[];
};

/**
 * Splits CSV text into records of raw cell values. Quoted cells may hold
 * separators, doubled quotes and line breaks. Blank records are dropped but
 * line numbers still count them.
 */
export function parseCsvRecords(text: string): CsvRecord[] {
  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const records: CsvRecord[] = [];
  let record: string[] = [];
  let current = '';
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;

  const endRecord = () => {
    record.push(current);
    records.push({ line: recordLine, cells: record });
    record = [];
    current = '';
  };

  for (let i = 0; i < source.length; i++) {
    const char = source[i];
    if (inQuotes) {
      if (char === '"') {
        if (source[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') line++;
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      record.push(current);
      current = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && source[i + 1] === '\n') i++;
      endRecord();
      line++;
      recordLine = line;
    } else {
      current += char;
    }
  }

  if (current.length || record.length) {
    endRecord();
  }

  return records.filter((entry) => entry.cells.some((cell) => cell.trim().length > 0));
}

export function escapeCsvCell(value: unknown): string {
  if (value == null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsvLine(values: readonly unknown[]): string {
  return values.map(escapeCsvCell).join(',');
}
