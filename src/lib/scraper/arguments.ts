/**
 * Argument decomposition for matched registration statements.
 */

import { DEFAULT_SENTINEL } from "../constants.js";
import { restoreDelimiters } from "./preprocessor.js";

export interface DecomposedArguments {
  /** Comma-separated fields; the description slot holds a `"` placeholder */
  fields: string[];
  description: string;
  /** Offset where the description field starts, or -1 when none was found */
  boundary: number;
}

/** C cast the decompiler puts in front of string arguments, e.g. `(int)` */
const LEADING_CAST = /^\([^()"]*\)\s*/;

/**
 * Text between the first `(` and the last `)` of a statement.
 */
export function argumentList(statement: string): string {
  const opening = statement.indexOf("(");
  const closing = statement.lastIndexOf(")");
  if (opening === -1 || closing <= opening) {
    return statement.slice(opening + 1);
  }
  return statement.slice(opening + 1, closing);
}

/**
 * Plain comma split, for calls that carry no description.
 */
export function splitArguments(args: string): string[] {
  return args.split(",");
}

/**
 * Separate the trailing quoted description from the other fields.
 *
 * Scans back from the last quote, flipping an in-quote flag on every `"`,
 * until it reaches a comma outside any quotation. Commas inside the
 * description are skipped that way.
 */
export function decomposeArguments(
  args: string,
  sentinel: string = DEFAULT_SENTINEL
): DecomposedArguments {
  const descriptionEnd = args.lastIndexOf('"');
  if (descriptionEnd === -1) {
    return { fields: splitArguments(args), description: "", boundary: -1 };
  }

  let boundary = -1;
  let inQuotation = true;
  for (let index = descriptionEnd - 1; index >= 0; index--) {
    const character = args[index];
    if (character === "," && !inQuotation) {
      boundary = index + 1;
      break;
    }
    if (character === '"') {
      inQuotation = !inQuotation;
    }
  }

  if (boundary === -1) {
    return { fields: splitArguments(args), description: "", boundary };
  }

  let description = args.slice(boundary, descriptionEnd).trimStart().replace(LEADING_CAST, "");
  if (description.startsWith('"')) {
    description = description.slice(1);
  }

  const remainder = args.slice(0, boundary) + args.slice(descriptionEnd);
  return {
    fields: splitArguments(remainder),
    description: restoreDelimiters(description, sentinel),
    boundary,
  };
}
