/**
 * Converters from raw argument fields to clean values.
 */

/**
 * A field that is missing or does not hold the expected value. The scraper
 * discards the match that produced it and moves on.
 */
export class MalformedFieldError extends Error {
  constructor(
    message: string,
    readonly index: number
  ) {
    super(message);
    this.name = "MalformedFieldError";
  }
}

const DECIMAL_LITERAL = /^\d+$/;

function fieldAt(fields: readonly string[], index: number): string {
  const field = fields[index];
  if (field === undefined) {
    throw new MalformedFieldError(`Missing field ${index} (have ${fields.length})`, index);
  }
  return field;
}

function trimEnd(value: string, characters: string): string {
  let end = value.length;
  while (end > 0 && characters.includes(value[end - 1])) {
    end--;
  }
  return value.slice(0, end);
}

/**
 * Name between the quotes, with known decompiler artifacts replaced.
 */
export function extractName(
  fields: readonly string[],
  index: number,
  aliases: Readonly<Record<string, string>> = {}
): string {
  const field = fieldAt(fields, index).trimStart();
  let name = trimEnd(field.slice(field.indexOf('"') + 1), '" ');

  for (const [artifact, replacement] of Object.entries(aliases)) {
    name = name.split(artifact).join(replacement);
  }
  return name;
}

/**
 * Address as bare uppercase hex. Symbols carry it after their `_` separator
 * (`sub_4A10F0` → `4A10F0`); plain offsets are `0x` literals or decimal
 * numerals (`0x24` and `36` both → `24`).
 */
export function extractAddress(fields: readonly string[], index: number): string {
  const field = fieldAt(fields, index);
  const separator = field.indexOf("_");
  const address = trimEnd(field.slice(separator + 1), '" ').trimStart();
  if (separator === -1 && DECIMAL_LITERAL.test(address)) {
    return BigInt(address).toString(16).toUpperCase();
  }
  return address.replace(/^0x/i, "").toUpperCase();
}

/**
 * Base-10 integer field.
 */
export function extractInt(fields: readonly string[], index: number): number {
  const field = fieldAt(fields, index).trim();
  if (!/^[+-]?\d+$/.test(field)) {
    throw new MalformedFieldError(`Field ${index} is not an integer: ${field}`, index);
  }
  return Number.parseInt(field, 10);
}
