export interface CsvTable {
  headers: string[];
  rows: Record<string, string>[];
}

export interface TableCheck {
  /** Column rows are keyed by. */
  keyColumn: string | null;
  rowCount: number;
  duplicateKeys: string[];
  warnings: string[];
}

export function parseCsv(content: string, delimiter = ','): CsvTable {
  const lines = content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((l) => l.trim().length > 0);
  const [headerLine, ...dataLines] = lines;
  if (headerLine === undefined) return { headers: [], rows: [] };

  const headers = splitCsvLine(headerLine, delimiter);
  const rows = dataLines.map((line) => {
    const values = splitCsvLine(line, delimiter);
    const row: Record<string, string> = {};
    headers.forEach((h, i) => {
      row[h] = values[i] ?? '';
    });
    return row;
  });
  return { headers, rows };
}

/** `Name` (any case) when present, else the first column. */
export function keyColumnOf(headers: readonly string[]): string | null {
  return headers.find((h) => h.toLowerCase() === 'name') ?? headers[0] ?? null;
}

export function checkTable(table: CsvTable): TableCheck {
  const keyColumn = keyColumnOf(table.headers);
  const warnings: string[] = [];
  if (!keyColumn) {
    return { keyColumn: null, rowCount: 0, duplicateKeys: [], warnings: ['table has no header row'] };
  }
  if (!table.rows.length) warnings.push('table has a header but no rows');
  if (table.headers.length < 2) warnings.push(`table has no payload column besides ${keyColumn}`);

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const row of table.rows) {
    const key = row[keyColumn] ?? '';
    if (seen.has(key)) duplicates.add(key);
    seen.add(key);
  }
  const duplicateKeys = [...duplicates].sort();
  if (duplicateKeys.length) warnings.push(`duplicate ${keyColumn} keys: ${duplicateKeys.join(', ')}`);

  return { keyColumn, rowCount: table.rows.length, duplicateKeys, warnings };
}

function splitCsvLine(line: string, delimiter: string): string[] {
  const out: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);
    if (ch === '"') {
      if (inQuotes && line.charAt(i + 1) === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (ch === delimiter && !inQuotes) {
      out.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  out.push(current.trim());
  return out;
}
