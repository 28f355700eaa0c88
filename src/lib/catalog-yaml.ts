import { stringify } from "yaml";
import type { Catalog, EngineFunction } from "./scraper/types.js";

// Types
export interface FunctionRecord {
  name: string;
  address: string | null;
  description: string;
  minArgs: number;
  maxArgs: number;
}

export interface CatalogDocument {
  functions: FunctionRecord[];
  typeMethods: Record<string, FunctionRecord[]>;
  typeMethodTotal: number;
  globalValues: Array<{ name: string; address: string | null; typeCode: number }>;
  datablocks: Record<string, Record<string, { address: string | null; type: string }>>;
}

function toRecord(fn: EngineFunction): FunctionRecord {
  return {
    name: fn.name,
    address: fn.address,
    description: fn.description,
    minArgs: fn.minArgs,
    maxArgs: fn.maxArgs,
  };
}

/**
 * Plain-object form of a catalog, keyed the way the catalog groups it.
 */
export function catalogToDocument(catalog: Catalog): CatalogDocument {
  const typeMethods: Record<string, FunctionRecord[]> = {};
  for (const [type, methods] of catalog.typeMethods) {
    typeMethods[type] = methods.map(toRecord);
  }

  const datablocks: CatalogDocument["datablocks"] = {};
  for (const [type, datablock] of catalog.datablocks) {
    const properties: Record<string, { address: string | null; type: string }> = {};
    for (const [name, property] of datablock.properties) {
      properties[name] = { address: property.address, type: property.typeName };
    }
    datablocks[type] = properties;
  }

  return {
    functions: catalog.functions.map(toRecord),
    typeMethods,
    typeMethodTotal: catalog.typeMethodTotal,
    globalValues: catalog.globalVariables.map((variable) => ({
      name: variable.name,
      address: variable.address,
      typeCode: variable.typeName,
    })),
    datablocks,
  };
}

/**
 * Serialize a catalog as YAML.
 */
export function stringifyCatalog(catalog: Catalog): string {
  return stringify(catalogToDocument(catalog), { lineWidth: 0 });
}

/**
 * YAML fragment of unresolved owner addresses, ready to paste into the
 * `datablockTypes` table once each type is identified.
 */
export function stringifyUnresolvedOwners(addresses: readonly string[]): string {
  const datablockTypes: Record<string, string> = {};
  for (const address of addresses) {
    datablockTypes[address] = address;
  }
  return stringify({ datablockTypes }, { lineWidth: 0 });
}
