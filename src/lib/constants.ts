/**
 * Registration categories, scanned in this order.
 */
export const Category = {
  GlobalFunction: "globalFunction",
  TypeMethod: "typeMethod",
  GlobalValue: "globalValue",
  DatablockProperty: "datablockProperty",
} as const;

export type CategoryType = (typeof Category)[keyof typeof Category];

export const CATEGORY_ORDER: readonly CategoryType[] = [
  Category.GlobalFunction,
  Category.TypeMethod,
  Category.GlobalValue,
  Category.DatablockProperty,
];

/**
 * Human-readable category labels for CLI output.
 */
export const CategoryLabel: Record<CategoryType, string> = {
  globalFunction: "Global functions",
  typeMethod: "Type methods",
  globalValue: "Global values",
  datablockProperty: "Datablock properties",
};

/**
 * Argument positions inside each registration call, counted after the
 * description has been cut out (its slot keeps a placeholder).
 */
export const FieldLayout = {
  globalFunction: { name: 0, address: 1, minArgs: 3, maxArgs: 4 },
  typeMethod: { typeName: 1, name: 2, address: 3, minArgs: 5, maxArgs: 6 },
  globalValue: { name: 0, typeCode: 1, address: 2 },
  datablockProperty: { name: 0, address: 2 },
} as const;

/** Prefix the decompiler puts in front of every subroutine address */
export const CALL_PREFIX = "sub_";

/** Start of the comment line the decompiler emits above each subroutine */
export const HEADER_MARKER = "//----- ";
export const HEADER_SEPARATOR = "-";

/**
 * Stands in for semicolons inside literals. ASCII unit separator: never
 * present in decompiler output, unlike "~".
 */
export const DEFAULT_SENTINEL = "\u001f";

/** Lines of forward declarations at the top of the corpus */
export const DEFAULT_SKIP_LINES = 33350;

/** Property types are not inferred from the registration call. */
export const UNRESOLVED_PROPERTY_TYPE = "<unresolved>";

/** Owner of a property whose enclosing subroutine header cannot be found */
export const UNLOCATED_OWNER = "<unlocated>";

/** Label for a primitive type code outside the configured table */
export const UNKNOWN_PRIMITIVE = "Unknown";

/**
 * Checks if a string is a bare hexadecimal address.
 */
export function isHexAddress(value: string): boolean {
  return /^[0-9A-Fa-f]+$/.test(value);
}

/**
 * Canonical form of a hex address: uppercase, no leading zeros.
 * `0061e7a0` -> `61E7A0`.
 */
export function normalizeAddress(hex: string): string {
  return BigInt(`0x${hex}`).toString(16).toUpperCase();
}
