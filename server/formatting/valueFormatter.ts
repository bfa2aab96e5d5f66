/**
 * Cell formatting shared by the plain-text and Block Kit renderers.
 */

import type { ScalarValue, TabularAnswer } from "@shared/schema";
import { COLUMN_TYPES } from "../config/constants";

const DECIMAL_TYPES: ReadonlySet<string> = new Set(COLUMN_TYPES.DECIMAL_TYPES);
const INTEGER_TYPES: ReadonlySet<string> = new Set(COLUMN_TYPES.INTEGER_TYPES);
const INTEGER_PATTERN = /^[+-]?\d+$/;

// Exact ties round to even.
// roundingMode is missing from the ES2022 lib typings.
const decimalOptions: Intl.NumberFormatOptions & { roundingMode: "halfEven" } = {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
  roundingMode: "halfEven",
};
const decimalFormat = new Intl.NumberFormat("en-US", decimalOptions);

const integerFormat = new Intl.NumberFormat("en-US", {
  maximumFractionDigits: 0,
});

function toFiniteNumber(value: string | number): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (trimmed === "") return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function formatInteger(value: string | number): string {
  // BIGINT values arrive as strings and can exceed 2^53
  if (typeof value === "string" && INTEGER_PATTERN.test(value.trim())) {
    return integerFormat.format(BigInt(value.trim()));
  }
  const parsed = toFiniteNumber(value);
  return parsed === null ? String(value) : integerFormat.format(Math.trunc(parsed));
}

/**
 * Format one cell for display according to its column type tag.
 * Never throws: a value that does not parse as its declared type is shown as-is.
 */
export function formatCell(value: ScalarValue, typeName: string): string {
  if (value === null) {
    return "NULL";
  }

  const type = typeName.toUpperCase();
  if (DECIMAL_TYPES.has(type)) {
    const parsed = toFiniteNumber(value);
    return parsed === null ? String(value) : decimalFormat.format(parsed);
  }
  if (INTEGER_TYPES.has(type)) {
    return formatInteger(value);
  }
  return String(value);
}

/**
 * Formatted cells for every row, or null when a row's length does not match
 * the column schema.
 */
export function formatTableRows(table: TabularAnswer): string[][] | null {
  const columnCount = table.columns.length;
  if (table.rows.some(row => row.length !== columnCount)) {
    return null;
  }
  return table.rows.map(row => row.map((value, i) => formatCell(value, table.columns[i].typeName)));
}

/** Length in code points, so padding and truncation never split a character. */
export function displayLength(text: string): number {
  return Array.from(text).length;
}
