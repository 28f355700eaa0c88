/**
 * Quote-safe preprocessing of the decompiled source.
 *
 * Descriptions routinely contain semicolons, and the call-site matcher ends a
 * statement at the first semicolon it sees. Semicolons inside literals are
 * swapped for a sentinel before matching and restored in extracted fields.
 */

import { DEFAULT_SENTINEL } from "../constants.js";

/** A `"`, escaped or plain characters up to the end of the line, a `"` */
const LITERAL_PATTERN = /"(?:[^"\\\n]|\\.)*"/g;

const SEMICOLON = 0x3b;

/**
 * Normalize line endings and drop the leading declaration block.
 */
export function prepareSource(raw: string, skipLines: number): string {
  const lines = raw.split(/\r?\n/);
  return lines.slice(skipLines).join("\n");
}

/**
 * Replace every semicolon inside a quoted literal with the sentinel.
 *
 * The text is copied once into a UTF-16 buffer and patched in place, so the
 * cost does not grow with the number of replacements. Offsets and every
 * character outside literals are unchanged.
 */
export function maskLiteralDelimiters(text: string, sentinel: string = DEFAULT_SENTINEL): string {
  if (sentinel.length !== 1) {
    throw new Error(`Sentinel must be a single character, got ${JSON.stringify(sentinel)}`);
  }
  const sentinelCode = sentinel.charCodeAt(0);
  const buffer = Buffer.from(text, "utf16le");
  let replaced = 0;

  for (const literal of text.matchAll(LITERAL_PATTERN)) {
    const start = literal.index ?? 0;
    const end = start + literal[0].length;
    for (let i = start; i < end; i++) {
      if (text.charCodeAt(i) === SEMICOLON) {
        buffer.writeUInt16LE(sentinelCode, i * 2);
        replaced++;
      }
    }
  }

  return replaced === 0 ? text : buffer.toString("utf16le");
}

/**
 * Turn sentinels back into semicolons.
 */
export function restoreDelimiters(text: string, sentinel: string = DEFAULT_SENTINEL): string {
  return text.split(sentinel).join(";");
}
