/**
 * Minimal RFC 4180 CSV reading and writing.
 *
 * Fields containing a comma, quote, CR or LF are quoted; quotes inside
 * quoted fields are doubled. Quoted fields may span lines.
 */

const NEEDS_QUOTING = /[",\r\n]/;

export function formatCsvField(value: string): string {
  if (NEEDS_QUOTING.test(value) || value !== value.trim()) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serialize rows, header first. Lines end with \n, including the last one.
 */
export function stringifyCsv(header: readonly string[], rows: ReadonlyArray<readonly string[]>): string {
  const lines = [header, ...rows].map((row) => row.map(formatCsvField).join(','));
  return lines.join('\n') + '\n';
}

/**
 * Parse CSV text into rows of raw field values.
 * Blank lines are skipped; a leading UTF-8 BOM is ignored.
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;

  const endRow = () => {
    row.push(field);
    const blank = row.length === 1 && row[0] === '' && !fieldStarted;
    if (!blank) rows.push(row);
    row = [];
    field = '';
    fieldStarted = false;
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      fieldStarted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
      fieldStarted = true;
    } else if (ch === '\n') {
      endRow();
    } else if (ch !== '\r') {
      field += ch;
      fieldStarted = true;
    }
  }

  if (field !== '' || row.length > 0 || fieldStarted) {
    endRow();
  }

  return rows;
}
