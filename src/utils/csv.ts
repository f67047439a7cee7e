/**
 * Minimal quote-aware CSV reader. Handles `""` escapes and commas inside
 * quoted cells; does not support newlines inside quoted cells.
 */

export function parseCSV(content: string): string[][] {
  const lines = content.split(/\r?\n/);
  const rows: string[][] = [];

  for (const line of lines) {
    if (line.trim() === '') continue;

    const row: string[] = [];
    let current = '';
    let inQuotes = false;

    for (let i = 0; i < line.length; i++) {
      const char = line[i];

      if (char === '"') {
        if (inQuotes && line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = !inQuotes;
        }
      } else if (char === ',' && !inQuotes) {
        row.push(current.trim());
        current = '';
      } else {
        current += char;
      }
    }

    row.push(current.trim());
    rows.push(row);
  }

  return rows;
}

export interface CsvTable {
  headers: string[];
  rows: Array<Record<string, string>>;
}

/** First row is the header; header names are lowercased. */
export function parseCsvTable(content: string): CsvTable {
  const [headerRow, ...dataRows] = parseCSV(content);
  if (!headerRow) return { headers: [], rows: [] };

  const headers = headerRow.map((h) => h.toLowerCase().trim());
  const rows = dataRows.map((row) => {
    const record: Record<string, string> = {};
    headers.forEach((header, i) => {
      record[header] = row[i] ?? '';
    });
    return record;
  });
  return { headers, rows };
}
