/**
 * Minimal RFC 4180 reader for comma-separated prediction and goldstandard files.
 * Quoted fields may contain commas, doubled quotes and line breaks; a quote
 * anywhere but the start of a field is literal text.
 */

export interface CsvTable {
  header: string[];
  /** Data rows with the 1-based file line each row starts on. */
  rows: { line: number; values: string[] }[];
}

export class CsvParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CsvParseError";
  }
}

function splitRecords(text: string): { line: number; values: string[] }[] {
  const records: { line: number; values: string[] }[] = [];
  let values: string[] = [];
  let field = "";
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;
  // A record made of a single empty unquoted field is a blank line.
  let sawQuote = false;

  const endRecord = () => {
    values.push(field);
    if (!(values.length === 1 && values[0] === "" && !sawQuote)) {
      records.push({ line: recordLine, values });
    }
    values = [];
    field = "";
    sawQuote = false;
  };

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
        if (ch === "\n") line++;
        field += ch;
      }
      continue;
    }
    if (ch === '"' && field === "") {
      inQuotes = true;
      sawQuote = true;
    } else if (ch === ",") {
      values.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      endRecord();
      line++;
      recordLine = line;
    } else {
      field += ch;
    }
  }
  if (inQuotes) {
    throw new CsvParseError(`Unterminated quoted field starting in line ${recordLine}`);
  }
  if (field !== "" || values.length > 0 || sawQuote) endRecord();
  return records;
}

export function parseCsv(text: string): CsvTable {
  const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const records = splitRecords(body);
  if (records.length === 0) {
    throw new CsvParseError("No columns to parse from file");
  }
  const [first, ...rest] = records;
  const header = first.values.map((h) => h.trim());
  for (const r of rest) {
    if (r.values.length > header.length) {
      throw new CsvParseError(
        `Expected ${header.length} fields in line ${r.line}, saw ${r.values.length}`
      );
    }
    // Short rows read as trailing empty (missing) values.
    while (r.values.length < header.length) r.values.push("");
  }
  return { header, rows: rest };
}
