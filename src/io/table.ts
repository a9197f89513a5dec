/**
 * Reads a CSV file into typed columns. Only the requested columns are kept;
 * anything else in the file is ignored.
 */

import fs from "node:fs";
import type { ColumnSpec, ColumnType } from "../config/challenge";
import { CsvParseError, parseCsv, type CsvTable } from "./csv";

/** Text treated as a missing value in float columns. */
const MISSING_VALUE_MARKERS = new Set([
  "",
  "#N/A",
  "#N/A N/A",
  "#NA",
  "-1.#IND",
  "-1.#QNAN",
  "-NaN",
  "-nan",
  "1.#IND",
  "1.#QNAN",
  "<NA>",
  "N/A",
  "NA",
  "NULL",
  "NaN",
  "None",
  "n/a",
  "nan",
  "null"
]);

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INF_RE = /^([+-]?)inf(inity)?$/i;

export class TableSchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TableSchemaError";
  }
}

export type Column =
  | { type: "string"; values: string[] }
  | { type: "int"; values: number[] }
  | { type: "float"; values: (number | null)[] };

export class Table {
  constructor(
    public readonly rowCount: number,
    private readonly columns: Map<string, Column>
  ) {}

  strings(name: string): string[] {
    const col = this.column(name);
    if (col.type !== "string") throw this.typeMismatch(name, "string", col.type);
    return col.values;
  }

  ints(name: string): number[] {
    const col = this.column(name);
    if (col.type !== "int") throw this.typeMismatch(name, "int", col.type);
    return col.values;
  }

  floats(name: string): (number | null)[] {
    const col = this.column(name);
    if (col.type !== "float") throw this.typeMismatch(name, "float", col.type);
    return col.values;
  }

  private column(name: string): Column {
    const col = this.columns.get(name);
    if (!col) throw new TableSchemaError(`Column '${name}' was not read`);
    return col;
  }

  private typeMismatch(name: string, wanted: ColumnType, actual: ColumnType): TableSchemaError {
    return new TableSchemaError(`Column '${name}' is ${actual}, not ${wanted}`);
  }
}

function parseFailure(raw: string, type: ColumnType, name: string, line: number): TableSchemaError {
  return new TableSchemaError(
    `Unable to parse ${JSON.stringify(raw)} as ${type} in column '${name}' (line ${line})`
  );
}

export function parseFloatCell(raw: string): number | null | undefined {
  const trimmed = raw.trim();
  if (MISSING_VALUE_MARKERS.has(trimmed)) return null;
  const inf = INF_RE.exec(trimmed);
  if (inf) return inf[1] === "-" ? -Infinity : Infinity;
  if (!FLOAT_RE.test(trimmed)) return undefined;
  return Number(trimmed);
}

export function parseIntCell(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (!INT_RE.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : undefined;
}

function convertColumn(
  name: string,
  type: ColumnType,
  cells: { line: number; raw: string }[]
): Column {
  switch (type) {
    case "string":
      return { type, values: cells.map((c) => c.raw) };
    case "int":
      return {
        type,
        values: cells.map((c) => {
          const v = parseIntCell(c.raw);
          if (v === undefined) throw parseFailure(c.raw, type, name, c.line);
          return v;
        })
      };
    case "float":
      return {
        type,
        values: cells.map((c) => {
          const v = parseFloatCell(c.raw);
          if (v === undefined) throw parseFailure(c.raw, type, name, c.line);
          return v;
        })
      };
  }
}

function parseCsvText(text: string): CsvTable {
  try {
    return parseCsv(text);
  } catch (error) {
    if (error instanceof CsvParseError) throw new TableSchemaError(error.message);
    throw error;
  }
}

export function parseTable(text: string, columns: ColumnSpec): Table {
  const csv = parseCsvText(text);
  const wanted = Object.keys(columns);
  const notFound = wanted.filter((name) => !csv.header.includes(name));
  if (notFound.length > 0) {
    throw new TableSchemaError(
      `Usecols do not match columns, columns expected but not found: [${notFound.map((n) => `'${n}'`).join(", ")}]`
    );
  }
  const out = new Map<string, Column>();
  for (const [name, type] of Object.entries(columns)) {
    const idx = csv.header.indexOf(name);
    const cells = csv.rows.map((r) => ({ line: r.line, raw: r.values[idx] }));
    out.set(name, convertColumn(name, type, cells));
  }
  return new Table(csv.rows.length, out);
}

export function readTable(filePath: string, columns: ColumnSpec): Table {
  return parseTable(fs.readFileSync(filePath, "utf8"), columns);
}
