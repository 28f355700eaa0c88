import { parse } from "yaml";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import {
  DEFAULT_SENTINEL,
  DEFAULT_SKIP_LINES,
  isHexAddress,
  normalizeAddress,
  type CategoryType,
} from "./constants.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Bundled tables for the corpus the tool was built for */
export const DEFAULT_CONFIG_PATH = join(__dirname, "../../config/engine.yaml");

/**
 * Static tables the scraper and renderer run on. Owned by the caller and
 * never mutated by the scraper.
 */
export interface EngineConfig {
  /** Leading lines of the corpus to ignore */
  skipLines: number;
  /** Single character standing in for semicolons inside literals */
  sentinel: string;
  /** Registration routine addresses per category */
  registries: Record<CategoryType, string[]>;
  /** Registering subroutine address → datablock type name */
  datablockTypes: Record<string, string>;
  /** Decompiler symbol artifacts → the names they stand for */
  symbolAliases: Record<string, string>;
  /** Primitive type code → label, indexed by code */
  primitiveTypes: string[];
  /** Type name → ordered chain from the type itself up to the root */
  inheritance: Record<string, string[]>;
}

type YamlObject = Record<string, unknown>;

function isObject(value: unknown): value is YamlObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readStringList(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) {
    throw new Error(`${field} must be a list`);
  }
  return value.map((entry, index) => {
    if (typeof entry !== "string" && typeof entry !== "number") {
      throw new Error(`${field}[${index}] must be a string`);
    }
    return String(entry);
  });
}

function readStringMap(value: unknown, field: string): Record<string, string> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isObject(value)) {
    throw new Error(`${field} must be a mapping`);
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new Error(`${field}.${key} must be a string`);
    }
    result[key] = entry;
  }
  return result;
}

function readAddress(value: string, field: string): string {
  const address = value.trim();
  if (!isHexAddress(address)) {
    throw new Error(`${field}: not a hexadecimal address: ${value}`);
  }
  return normalizeAddress(address);
}

/**
 * Parse and validate engine configuration YAML.
 * Missing scalars fall back to the defaults; registries are required.
 */
export function parseEngineConfig(content: string): EngineConfig {
  const doc: unknown = parse(content);
  if (!isObject(doc)) {
    throw new Error("Engine configuration must be a YAML mapping");
  }

  const skipLines = doc.skipLines ?? DEFAULT_SKIP_LINES;
  if (typeof skipLines !== "number" || !Number.isInteger(skipLines) || skipLines < 0) {
    throw new Error("skipLines must be a non-negative integer");
  }

  const sentinel = doc.sentinel ?? DEFAULT_SENTINEL;
  if (typeof sentinel !== "string" || sentinel.length !== 1 || sentinel === ";" || sentinel === '"') {
    throw new Error("sentinel must be a single character other than ';' and '\"'");
  }

  const rawRegistries = doc.registries;
  if (!isObject(rawRegistries)) {
    throw new Error("registries must be a mapping of category to address list");
  }
  const readRegistry = (category: CategoryType): string[] => {
    const field = `registries.${category}`;
    const addresses = readStringList(rawRegistries[category], field).map((address) =>
      readAddress(address, field)
    );
    if (addresses.length === 0) {
      throw new Error(`${field} must list at least one address`);
    }
    return addresses;
  };
  const registries: Record<CategoryType, string[]> = {
    globalFunction: readRegistry("globalFunction"),
    typeMethod: readRegistry("typeMethod"),
    globalValue: readRegistry("globalValue"),
    datablockProperty: readRegistry("datablockProperty"),
  };

  const datablockTypes: Record<string, string> = {};
  for (const [address, type] of Object.entries(readStringMap(doc.datablockTypes, "datablockTypes"))) {
    datablockTypes[readAddress(address, "datablockTypes")] = type;
  }

  const primitiveTypes = doc.primitiveTypes === undefined
    ? []
    : readStringList(doc.primitiveTypes, "primitiveTypes");

  const rawInheritance = doc.inheritance ?? {};
  if (!isObject(rawInheritance)) {
    throw new Error("inheritance must be a mapping");
  }
  const inheritance: Record<string, string[]> = {};
  for (const [type, chain] of Object.entries(rawInheritance)) {
    inheritance[type] = readStringList(chain, `inheritance.${type}`);
  }

  return {
    skipLines,
    sentinel,
    registries,
    datablockTypes,
    symbolAliases: readStringMap(doc.symbolAliases, "symbolAliases"),
    primitiveTypes,
    inheritance,
  };
}

/**
 * Load engine configuration from disk.
 */
export async function loadEngineConfig(path: string = DEFAULT_CONFIG_PATH): Promise<EngineConfig> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read engine configuration ${path}: ${reason}`);
  }
  try {
    return parseEngineConfig(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid engine configuration ${path}: ${reason}`);
  }
}
