const FIRST_NUMBER_PATTERN = /[-+]?(?:\d+(?:\.\d*)?|\.\d+)/;

/**
 * Pull the first decimal number out of a string ("133mm" -> 133,
 * "Flow: -2.50 L/s" -> -2.5). Returns null for no match or a non-finite result.
 */
export const parseFirstNumber = (text: string): number | null => {
  const match = FIRST_NUMBER_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const value = Number.parseFloat(match[0]);
  return Number.isFinite(value) ? value : null;
};

/**
 * Accepts numbers and numeric strings found in structured payloads.
 */
export const coerceNumeric = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    return parseFirstNumber(value);
  }
  return null;
};

export const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
