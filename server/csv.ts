/** Minimal RFC 4180 codec for the habits file. */

export function csvEscape(v: string) {
  if (v.includes('"') || v.includes(",") || v.includes("\n") || v.includes("\r")) {
    return '"' + v.replace(/"/g, '""') + '"';
  }
  return v;
}

export function formatCsv(records: string[][]) {
  return records.map((r) => r.map(csvEscape).join(",")).join("\n") + "\n";
}

/**
 * Splits CSV text into records. Quoted fields may hold commas, quotes ("") and
 * line breaks. Blank lines are skipped. Throws on an unterminated quote.
 */
export function parseCsv(text: string): string[][] {
  const src = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let inQuotes = false;
  let quoteStart = 0;

  const endRecord = () => {
    record.push(field);
    if (!(record.length === 1 && record[0] === "")) records.push(record);
    record = [];
    field = "";
  };

  let i = 0;
  while (i < src.length) {
    const ch = src[i];

    if (inQuotes) {
      if (ch === '"') {
        if (src[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      quoteStart = i;
      i++;
    } else if (ch === ",") {
      record.push(field);
      field = "";
      i++;
    } else if (ch === "\r" || ch === "\n") {
      endRecord();
      i += ch === "\r" && src[i + 1] === "\n" ? 2 : 1;
    } else {
      field += ch;
      i++;
    }
  }

  if (inQuotes) {
    throw new Error(`Unterminated quoted field starting at offset ${quoteStart}`);
  }
  if (field !== "" || record.length > 0) endRecord();

  return records;
}
