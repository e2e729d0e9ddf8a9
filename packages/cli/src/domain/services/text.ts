export const ELLIPSIS = "...";

export function containsIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export function equalsIgnoreCase(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Returns `value` unchanged when it fits in `maxLength` characters, otherwise
 * keeps the first `maxLength - 3` characters and appends {@link ELLIPSIS}.
 */
export function truncateWithEllipsis(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value;
  }

  if (maxLength <= ELLIPSIS.length) {
    return value.slice(0, maxLength);
  }

  return value.slice(0, maxLength - ELLIPSIS.length) + ELLIPSIS;
}

export function isDecimalDigits(value: string): boolean {
  return /^[0-9]+$/.test(value);
}

export function splitWords(value: string): string[] {
  return value.split(" ").filter((word) => word.length > 0);
}
