/**
 * CSV reading and writing for the table files.
 *
 * Handles quoted fields, commas and newlines within quotes, doubled quotes,
 * CRLF line endings and a leading byte-order mark (spreadsheet exports).
 */

/** Split CSV text into records of raw field values. Blank lines are skipped. */
export function parseCSVRecords(text: string): string[][] {
  const body = text.startsWith("\uFEFF") ? text.slice(1) : text;
  return splitCSVLines(body)
    .filter((line) => line.trim() !== "")
    .map(parseCSVRow);
}

/**
 * Parse CSV text into objects keyed by the (trimmed) header row.
 * Short rows leave their trailing keys out; extra cells are dropped.
 */
export function parseCSV(text: string): Record<string, string>[] {
  const [header, ...records] = parseCSVRecords(text);
  if (!header) return [];

  const headers = header.map((h) => h.trim());
  return records.map((values) => {
    const row: Record<string, string> = {};
    headers.forEach((h, j) => {
      if (j < values.length) row[h] = values[j];
    });
    return row;
  });
}

/** Serialize a header row plus data rows; every row emits every column. */
export function formatCSV(
  headers: readonly string[],
  rows: readonly Record<string, string | undefined>[],
): string {
  const lines = [headers.map(escapeCSVField).join(",")];
  for (const row of rows) {
    lines.push(headers.map((h) => escapeCSVField(row[h] ?? "")).join(","));
  }
  return lines.join("\n") + "\n";
}

export function escapeCSVField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function splitCSVLines(text: string): string[] {
  const lines: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"') {
      inQuotes = !inQuotes;
      current += ch;
    } else if ((ch === "\n" || ch === "\r") && !inQuotes) {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      lines.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  if (current) lines.push(current);
  return lines;
}

function parseCSVRow(line: string): string[] {
  const values: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (ch === "," && !inQuotes) {
      values.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  values.push(current);
  return values;
}
