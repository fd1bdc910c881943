/**
 * Minimal RFC 4180 reader: quoted fields, doubled quotes, embedded newlines,
 * CRLF line endings and a leading BOM.
 */
export function parseCsv(text: string): string[][] {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < input.length; i += 1) {
    const ch = input[i];
    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i += 1;
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
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && input[i + 1] === "\n") i += 1;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += ch;
    }
  }

  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

export type CsvRecords = {
  columns: string[];
  records: Array<Record<string, string>>;
};

/**
 * Header row becomes the keys. Blank lines are dropped; short rows get ""
 * for the missing columns.
 */
export function parseCsvRecords(text: string): CsvRecords {
  const rows = parseCsv(text).filter(
    (r) => !(r.length === 1 && r[0] === "")
  );
  const [header, ...body] = rows;
  if (!header) return { columns: [], records: [] };
  const records = body.map((cells) => {
    const record: Record<string, string> = {};
    header.forEach((column, idx) => {
      record[column] = cells[idx] ?? "";
    });
    return record;
  });
  return { columns: header, records };
}
