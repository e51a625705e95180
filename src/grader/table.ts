export type Scalar =
  | { kind: "null" }
  | { kind: "integer"; value: number }
  | { kind: "real"; value: number }
  | { kind: "text"; value: string };

/** Tabular output of one statement. Row order carries no meaning for grading. */
export interface ResultTable {
  columns: string[];
  rows: Scalar[][];
}

export type DisplayValue = string | number | null;

export const NULL_SCALAR: Scalar = { kind: "null" };

/**
 * Maps a value read from better-sqlite3 in safe-integer mode onto the tagged variant.
 * In that mode INTEGER arrives as bigint and REAL as number.
 */
export function toScalar(value: unknown): Scalar {
  if (value === null || value === undefined) return NULL_SCALAR;
  if (typeof value === "bigint") {
    if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
      return { kind: "integer", value: Number(value) };
    }
    // Outside the double-safe range the exact digits survive only as text.
    return { kind: "text", value: value.toString() };
  }
  if (typeof value === "number") return { kind: "real", value };
  if (typeof value === "string") return { kind: "text", value };
  if (value instanceof Uint8Array) {
    return { kind: "text", value: `x'${Buffer.from(value).toString("hex")}'` };
  }
  return { kind: "text", value: String(value) };
}

export function displayValue(scalar: Scalar): DisplayValue {
  return scalar.kind === "null" ? null : scalar.value;
}

/** Plain JSON-friendly rows for clients. */
export function toDisplayRows(table: ResultTable): DisplayValue[][] {
  return table.rows.map((row) => row.map(displayValue));
}

/**
 * Keeps only the named columns, in the order given. Names are matched after trimming;
 * when a name occurs twice the first occurrence wins.
 */
export function projectTable(table: ResultTable, columns: string[]): ResultTable {
  const trimmed = table.columns.map((c) => c.trim());
  const indexes = columns.map((name) => trimmed.indexOf(name.trim()));
  return {
    columns: indexes.map((idx, i) => (idx === -1 ? columns[i] ?? "" : table.columns[idx] ?? "")),
    rows: table.rows.map((row) => indexes.map((idx) => (idx === -1 ? NULL_SCALAR : row[idx] ?? NULL_SCALAR))),
  };
}
