/**
 * Reusable validation checks. Each returns "" when the check passes, or a
 * single human-readable message.
 */

const MAX_LISTED_IDS = 10;

function formatIds(ids: string[]): string {
  const shown = ids.slice(0, MAX_LISTED_IDS).map((id) => `'${id}'`);
  const more = ids.length > MAX_LISTED_IDS ? ", ..." : "";
  return `[${shown.join(", ")}${more}]`;
}

/** Counts every repeat after the first occurrence; lists each duplicated ID once. */
export function checkDuplicateKeys(ids: string[]): string {
  const seen = new Set<string>();
  const duplicated = new Set<string>();
  let count = 0;
  for (const id of ids) {
    if (seen.has(id)) {
      count++;
      duplicated.add(id);
    } else {
      seen.add(id);
    }
  }
  if (count === 0) return "";
  return `Found ${count} duplicate ID(s): ${formatIds([...duplicated])}`;
}

/** Goldstandard IDs without a prediction. */
export function checkMissingKeys(goldIds: string[], predIds: string[]): string {
  const predicted = new Set(predIds);
  const missing = goldIds.filter((id) => !predicted.has(id));
  if (missing.length === 0) return "";
  return `Found ${missing.length} missing ID(s): ${formatIds(missing)}`;
}

/** Predicted IDs that are not in the goldstandard. */
export function checkUnknownKeys(goldIds: string[], predIds: string[]): string {
  const known = new Set(goldIds);
  const unknown = predIds.filter((id) => !known.has(id));
  if (unknown.length === 0) return "";
  return `Found ${unknown.length} unknown ID(s): ${formatIds(unknown)}`;
}

export function checkNullValues(values: (number | null)[], column: string): string {
  const nullCount = values.filter((v) => v === null || Number.isNaN(v)).length;
  if (nullCount === 0) return "";
  return `'${column}' column contains ${nullCount} NaN value(s).`;
}

export function checkValuesRange(
  values: (number | null)[],
  column: string,
  min: number,
  max: number
): string {
  const outOfRange = values.some((v) => v !== null && (v < min || v > max));
  if (!outOfRange) return "";
  return `'${column}' column should be between [${min}, ${max}] inclusive.`;
}
