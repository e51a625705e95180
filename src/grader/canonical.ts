import type { ResultTable, Scalar } from "./table";
import { NULL_SCALAR } from "./table";

// bigint only for integers outside the double-safe range, which keep their exact digits.
export type CanonicalValue = null | number | bigint | string;

/** Comparison-only form of a ResultTable; never shown to players. */
export interface CanonicalTable {
  columns: string[];
  rows: CanonicalValue[][];
}

export const FLOAT_DECIMALS = 6;

// Spellings different engines and formatters use for "no value".
const NULL_SPELLINGS = new Set(["", "none", "null", "nan"]);
const NUMERIC_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_TEXT = /^[+-]?\d+$/;

export function roundReal(value: number): number {
  if (!Number.isFinite(value)) return value;
  const rounded = Number.parseFloat(value.toFixed(FLOAT_DECIMALS));
  return Object.is(rounded, -0) ? 0 : rounded;
}

/**
 * Integers and reals share one numeric domain, so 12, 12.0 and "12" compare equal.
 * Text that is not a pure number stays text (trimmed); there is no partial parse.
 * Integer text beyond the double-safe range becomes a bigint so distinct values stay distinct.
 */
export function canonicalValue(scalar: Scalar): CanonicalValue {
  switch (scalar.kind) {
    case "null":
      return null;
    case "integer":
      return scalar.value;
    case "real":
      return roundReal(scalar.value);
    case "text": {
      const text = scalar.value.trim();
      if (NULL_SPELLINGS.has(text.toLowerCase())) return null;
      if (NUMERIC_TEXT.test(text)) return numericText(text);
      return text;
    }
  }
}

function numericText(text: string): number | bigint {
  const value = Number(text);
  if (INTEGER_TEXT.test(text) && !Number.isSafeInteger(value)) {
    return BigInt(text.startsWith("+") ? text.slice(1) : text);
  }
  return roundReal(value);
}

/** Injective string key for a row; used for multiset counting and the fallback sort. */
export function rowKey(row: CanonicalValue[]): string {
  return JSON.stringify(
    row.map((v) => (typeof v === "number" || typeof v === "bigint" ? { n: v.toString() } : v))
  );
}

function compareValues(a: CanonicalValue, b: CanonicalValue): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  if (typeof a === "bigint" && typeof b === "bigint") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a !== "string" && typeof b !== "string") {
    const x = Number(a);
    const y = Number(b);
    return x < y ? -1 : x > y ? 1 : 0;
  }
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function compareTuples(a: CanonicalValue[], b: CanonicalValue[]): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const cmp = compareValues(a[i] ?? null, b[i] ?? null);
    if (cmp !== 0) return cmp;
  }
  return a.length - b.length;
}

function hasMixedColumn(rows: CanonicalValue[][], width: number): boolean {
  for (let col = 0; col < width; col++) {
    let seen: "number" | "string" | null = null;
    for (const row of rows) {
      const value = row[col] ?? null;
      if (value === null) continue;
      const type = typeof value === "string" ? "string" : "number";
      if (seen && seen !== type) return true;
      seen = type;
    }
  }
  return false;
}

/**
 * Orders rows only so that comparison is order-independent. A column mixing numbers and
 * text has no natural order, so the whole table then falls back to ordering by row key.
 * Array.prototype.sort is stable, so ties keep their original order.
 */
export function sortRows(rows: CanonicalValue[][], width: number): CanonicalValue[][] {
  const copy = rows.slice();
  if (hasMixedColumn(copy, width)) {
    const keyed = copy.map((row) => ({ row, key: rowKey(row) }));
    keyed.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    return keyed.map((k) => k.row);
  }
  return copy.sort(compareTuples);
}

export function canonicalizeTable(table: ResultTable): CanonicalTable {
  const order = table.columns
    .map((name, index) => ({ name: name.trim(), index }))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const rows = table.rows.map((row) => order.map(({ index }) => canonicalValue(row[index] ?? NULL_SCALAR)));

  return {
    columns: order.map((c) => c.name),
    rows: sortRows(rows, order.length),
  };
}

export function canonicalTablesEqual(a: CanonicalTable, b: CanonicalTable): boolean {
  if (a.columns.length !== b.columns.length || a.rows.length !== b.rows.length) return false;
  if (a.columns.some((name, i) => name !== b.columns[i])) return false;
  return a.rows.every((row, i) => {
    const other = b.rows[i];
    return other !== undefined && rowKey(row) === rowKey(other);
  });
}
