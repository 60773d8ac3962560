/**
 * Locale-formatted numbers from the accounting statements
 * "." is the thousands separator and "," the decimal separator: "1.234,56"
 */

const PLAIN_DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/

/**
 * Parse a locale-formatted value
 * @returns The number, or null when the value is not numeric
 */
export function tryParseLocaleNumber(raw: string | null | undefined): number | null {
  if (raw === null || raw === undefined) return null

  const normalized = raw.trim().replace(/\./g, '').replace(/,/g, '.')
  if (!PLAIN_DECIMAL.test(normalized)) return null

  const value = Number(normalized)
  return Number.isFinite(value) ? value : null
}

/**
 * Parse a locale-formatted value, treating anything unparseable as 0
 */
export function parseLocaleNumber(raw: string | null | undefined): number {
  return tryParseLocaleNumber(raw) ?? 0
}
