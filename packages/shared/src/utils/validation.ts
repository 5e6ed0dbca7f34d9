export function truncateString(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Replaces every code point outside printable ASCII (tab, CR and LF kept)
 * with `?`. Used when a sink rejects the original text.
 */
export function toLossyAscii(text: string): string {
  return text.replace(/[^\t\n\r\x20-\x7E]/gu, '?');
}
