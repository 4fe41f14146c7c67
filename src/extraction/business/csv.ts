/**
 * Minimal RFC 4180 CSV codec for report payloads.
 * Values stay strings; only the header row is ever rewritten.
 */

export interface CsvTable {
  headers: string[];
  rows: string[][];
}

const BOM = "\uFEFF";
const NEEDS_QUOTING = /[",\r\n]/;

export function parseCsv(text: string): CsvTable {
  const input = text.startsWith(BOM) ? text.slice(BOM.length) : text;
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let inQuotes = false;
  let i = 0;

  while (i < input.length) {
    const ch = input[i];
    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i += 1;
        continue;
      }
      field += ch;
      i += 1;
      continue;
    }

    if (ch === '"' && field === "") {
      // Quotes only open a field; elsewhere they are literal (5'10")
      inQuotes = true;
      i += 1;
    } else if (ch === ",") {
      record.push(field);
      field = "";
      i += 1;
    } else if (ch === "\r" || ch === "\n") {
      record.push(field);
      records.push(record);
      record = [];
      field = "";
      i += ch === "\r" && input[i + 1] === "\n" ? 2 : 1;
    } else {
      field += ch;
      i += 1;
    }
  }

  if (inQuotes) {
    throw new Error("Malformed CSV: unterminated quoted field");
  }
  if (field !== "" || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  // Blank lines carry no data
  const nonBlank = records.filter(r => !(r.length === 1 && r[0] === ""));
  const [headers = [], ...rows] = nonBlank;
  return { headers: mangleDuplicateHeaders(headers), rows };
}

/**
 * Repeated header names get a numeric suffix: Name, Name.1, Name.2.
 * A suffixed name that collides with an existing one is bumped again.
 */
export function mangleDuplicateHeaders(headers: readonly string[]): string[] {
  const counts = new Map<string, number>();
  return headers.map(header => {
    let name = header;
    let count = counts.get(name) ?? 0;
    while (count > 0) {
      counts.set(name, count + 1);
      name = `${name}.${count}`;
      count = counts.get(name) ?? 0;
    }
    counts.set(name, count + 1);
    return name;
  });
}

function formatField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsv(table: CsvTable): string {
  const lines = [table.headers, ...table.rows].map(r =>
    r.map(formatField).join(",")
  );
  return `${lines.join("\n")}\n`;
}

export function renameColumns(
  table: CsvTable,
  rename: (header: string) => string
): CsvTable {
  return { headers: table.headers.map(rename), rows: table.rows };
}
