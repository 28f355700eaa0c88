/**
 * DokuWiki reference page for a scraped catalog.
 *
 * Reads the finished catalog only; all text interpretation happened in the
 * scraper.
 */

import { UNKNOWN_PRIMITIVE } from "../constants.js";
import type { EngineConfig } from "../engine-config.js";
import type { Catalog, EngineFunction } from "../scraper/types.js";
import { render } from "../templates.js";

export interface FunctionEntry {
  name: string;
  address: string;
  description: string;
  minArgs: number;
  maxArgs: number;
}

export interface TypeSection {
  name: string;
  count: number;
  inheritance: string;
  methods: FunctionEntry[];
}

export interface GlobalValueEntry {
  name: string;
  type: string;
  address: string;
}

export interface DatablockSection {
  name: string;
  count: number;
  inheritance: string;
  properties: Array<{ name: string; offset: string; type: string }>;
}

export interface ReferenceView {
  title: string;
  functionCount: number;
  globalFunctions: FunctionEntry[];
  arithmeticFunctions: FunctionEntry[];
  audioFunctions: FunctionEntry[];
  typeMethodTotal: number;
  types: TypeSection[];
  globalValues: GlobalValueEntry[];
  datablocks: DatablockSection[];
}

export interface FunctionGroups {
  general: EngineFunction[];
  arithmetic: EngineFunction[];
  audio: EngineFunction[];
}

export const UNKNOWN_INHERITANCE = "<Unknown>";

/**
 * Split global functions into the page's three listings.
 */
export function partitionGlobalFunctions(functions: readonly EngineFunction[]): FunctionGroups {
  const groups: FunctionGroups = { general: [], arithmetic: [], audio: [] };
  for (const fn of functions) {
    const { name } = fn;
    if (name.startsWith("m") || name.includes("Vector") || name.includes("Matrix")) {
      groups.arithmetic.push(fn);
    } else if (name.includes("alx") || name.includes("audio") || name.includes("getAudio")) {
      groups.audio.push(fn);
    } else {
      groups.general.push(fn);
    }
  }
  return groups;
}

/**
 * Render an ancestry chain as "A -> [[#B]] -> C", linking the names that
 * have their own section on the page.
 */
export function formatInheritance(chain: readonly string[] | undefined, linked: ReadonlySet<string>): string {
  if (!chain || chain.length === 0) {
    return UNKNOWN_INHERITANCE;
  }
  return chain.map((type) => (linked.has(type) ? `[[#${type}]]` : type)).join(" -> ");
}

/**
 * Script-visible name of a global value; the engine exposes them with `$`.
 */
export function globalValueName(name: string): string {
  return name.startsWith("$") ? name : `$${name}`;
}

export function primitiveTypeLabel(code: number, labels: readonly string[]): string {
  return labels[code] ?? UNKNOWN_PRIMITIVE;
}

// The engine counts the function name itself as the first argument
function toEntry(fn: EngineFunction): FunctionEntry {
  return {
    name: fn.name,
    address: fn.address ?? "",
    description: fn.description,
    minArgs: fn.minArgs - 1,
    maxArgs: fn.maxArgs - 1,
  };
}

export function buildReferenceView(
  catalog: Catalog,
  config: Pick<EngineConfig, "inheritance" | "primitiveTypes">,
  title: string
): ReferenceView {
  const groups = partitionGlobalFunctions(catalog.functions);
  const linked = new Set([...catalog.typeMethods.keys(), ...catalog.datablocks.keys()]);

  const types: TypeSection[] = [];
  for (const [name, methods] of catalog.typeMethods) {
    types.push({
      name,
      count: catalog.typeMethodCounts.get(name) ?? methods.length,
      inheritance: formatInheritance(config.inheritance[name], linked),
      methods: methods.map(toEntry),
    });
  }

  const datablocks: DatablockSection[] = [];
  for (const [name, datablock] of catalog.datablocks) {
    datablocks.push({
      name,
      count: datablock.properties.size,
      inheritance: formatInheritance(config.inheritance[name], linked),
      properties: [...datablock.properties.values()].map((property) => ({
        name: property.name,
        offset: property.address ?? "",
        type: property.typeName,
      })),
    });
  }

  return {
    title,
    functionCount: catalog.functionCount,
    globalFunctions: groups.general.map(toEntry),
    arithmeticFunctions: groups.arithmetic.map(toEntry),
    audioFunctions: groups.audio.map(toEntry),
    typeMethodTotal: catalog.typeMethodTotal,
    types,
    globalValues: catalog.globalVariables.map((variable) => ({
      name: globalValueName(variable.name),
      type: primitiveTypeLabel(variable.typeName, config.primitiveTypes),
      address: variable.address ?? "",
    })),
    datablocks,
  };
}

/**
 * Render the full reference page.
 */
export function renderReference(
  catalog: Catalog,
  config: Pick<EngineConfig, "inheritance" | "primitiveTypes">,
  title: string = "Engine Reference"
): string {
  return render("reference", buildReferenceView(catalog, config, title));
}
