/**
 * Shared formatting utilities
 */

/**
 * Format a count with its noun: "1 function", "3 functions".
 */
export function formatCount(count: number, singular: string, plural: string = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

/**
 * Format a bare hex address for display: "61E7A0" -> "0x61E7A0".
 * Empty or missing addresses display as "?".
 */
export function formatAddress(address: string | null): string {
  return address ? `0x${address}` : "?";
}
