/**
 * Call-site matching for registration routines.
 */

import { CALL_PREFIX, isHexAddress } from "../constants.js";

export interface CallSite {
  /** The full registration statement, including the character after `;` */
  statement: string;
  start: number;
  end: number;
}

/**
 * Build the boundary pattern for one category: a call to any of the given
 * routines, everything up to the first semicolon that is not inside a
 * block, and a following character that does not open a literal.
 *
 * This detects call boundaries only; it assumes literal semicolons have
 * been masked.
 */
export function buildCallPattern(addresses: readonly string[]): RegExp {
  if (addresses.length === 0) {
    throw new Error("At least one registration address is required");
  }
  for (const address of addresses) {
    if (!isHexAddress(address)) {
      throw new Error(`Not a hexadecimal address: ${address}`);
    }
  }
  const alternatives = [...new Set(addresses)].join("|");
  return new RegExp(`${CALL_PREFIX}(?:${alternatives})(?![0-9A-F])[^;{}]+;[^"]`, "gi");
}

/**
 * Locate every registration statement, in text order.
 */
export function findCallSites(text: string, pattern: RegExp): CallSite[] {
  const sites: CallSite[] = [];
  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    sites.push({ statement: match[0], start, end: start + match[0].length });
  }
  return sites;
}
