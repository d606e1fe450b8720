// Minimal CSV reading and rendering for the frame, gesture and summary logs.
// Fields may be quoted with `"`; a doubled `""` inside quotes is a literal quote.

export interface CsvTable {
  header: string[];
  rows: string[][];
}

/**
 * Parse CSV text. The first non-blank line is the header.
 * Blank lines are skipped; a UTF-8 BOM is ignored; CRLF and LF both end a record.
 * Returns null when there is no header line at all.
 */
export function parseCsv(text: string): CsvTable | null {
  const records = splitRecords(text.replace(/^\uFEFF/, ""));
  const nonBlank = records.filter((fields) => !(fields.length === 1 && fields[0].trim() === ""));
  if (nonBlank.length === 0) return null;
  const [header, ...rows] = nonBlank;
  return { header: header.map((h) => h.trim()), rows };
}

function splitRecords(text: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
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
    } else if (ch === ",") {
      fields.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      fields.push(field);
      records.push(fields);
      fields = [];
      field = "";
    } else {
      field += ch;
    }
  }

  if (field !== "" || fields.length > 0) {
    fields.push(field);
    records.push(fields);
  }
  return records;
}

/** Normalise a header cell: trimmed, lower-cased, spaces to underscores. */
export function normalizeHeader(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, "_");
}

/**
 * Index of the first header column matching any alias (compared normalised),
 * or -1.
 */
export function findColumn(header: readonly string[], aliases: readonly string[]): number {
  const normalized = header.map(normalizeHeader);
  for (const alias of aliases) {
    const idx = normalized.indexOf(normalizeHeader(alias));
    if (idx >= 0) return idx;
  }
  return -1;
}

function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsvRow(values: readonly (string | number | boolean)[]): string {
  return values.map((v) => escapeField(String(v))).join(",");
}

/** Render a full table; always ends with a newline. */
export function formatCsv(
  header: readonly string[],
  rows: readonly (readonly (string | number | boolean)[])[],
): string {
  return [formatCsvRow(header), ...rows.map(formatCsvRow)].join("\n") + "\n";
}
