/**
 * Extraction pipeline: masked text → call sites → fields → catalog.
 */

import { readFile } from "node:fs/promises";
import {
  Category,
  CATEGORY_ORDER,
  FieldLayout,
  UNRESOLVED_PROPERTY_TYPE,
  type CategoryType,
} from "../constants.js";
import type { EngineConfig } from "../engine-config.js";
import type { Output } from "../output.js";
import { argumentList, decomposeArguments, splitArguments } from "./arguments.js";
import { CatalogBuilder } from "./catalog.js";
import { MalformedFieldError, extractAddress, extractInt, extractName } from "./fields.js";
import { buildCallPattern, findCallSites, type CallSite } from "./matcher.js";
import { OwnerResolver } from "./owner-resolver.js";
import { maskLiteralDelimiters, prepareSource } from "./preprocessor.js";
import type { Catalog } from "./types.js";

export interface ScraperOptions {
  config: EngineConfig;
  /** Receives skipped matches and unresolved owners */
  out?: Output;
}

export interface ScrapeResult {
  catalog: Catalog;
  /** Owner addresses missing from the datablock type table */
  unresolvedOwners: readonly string[];
  /** Matches skipped for malformed fields, per category */
  discarded: Record<CategoryType, number>;
  /** Datablock type table after synthetic entries were added */
  datablockTypes: Record<string, string>;
}

/**
 * Read the decompiled source and drop its leading declaration lines.
 */
export async function readSource(path: string, skipLines: number): Promise<string> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read decompiled source ${path}: ${reason}`);
  }
  return prepareSource(raw, skipLines);
}

export class Scraper {
  private readonly config: EngineConfig;
  private readonly out?: Output;
  private readonly patterns: Record<CategoryType, RegExp>;

  constructor(options: ScraperOptions) {
    this.config = options.config;
    this.out = options.out;
    const { registries } = options.config;
    this.patterns = {
      globalFunction: buildCallPattern(registries.globalFunction),
      typeMethod: buildCallPattern(registries.typeMethod),
      globalValue: buildCallPattern(registries.globalValue),
      datablockProperty: buildCallPattern(registries.datablockProperty),
    };
  }

  /**
   * Build a catalog from prepared source text.
   * Each call starts from the configured tables, so repeated runs agree.
   */
  scrape(source: string): ScrapeResult {
    const text = maskLiteralDelimiters(source, this.config.sentinel);
    const builder = new CatalogBuilder();
    const resolver = new OwnerResolver(this.config.datablockTypes, this.out);
    const discarded: Record<CategoryType, number> = {
      globalFunction: 0,
      typeMethod: 0,
      globalValue: 0,
      datablockProperty: 0,
    };

    for (const category of CATEGORY_ORDER) {
      for (const site of findCallSites(text, this.patterns[category])) {
        try {
          this.collect(category, site, text, builder, resolver);
        } catch (error) {
          if (!(error instanceof MalformedFieldError)) {
            throw error;
          }
          discarded[category]++;
          this.out?.discarded(category, site.statement, error.message);
        }
      }
    }

    return {
      catalog: builder.build(),
      unresolvedOwners: [...resolver.unresolvedAddresses],
      discarded,
      datablockTypes: resolver.table(),
    };
  }

  private collect(
    category: CategoryType,
    site: CallSite,
    text: string,
    builder: CatalogBuilder,
    resolver: OwnerResolver
  ): void {
    const aliases = this.config.symbolAliases;
    const args = argumentList(site.statement);

    switch (category) {
      case Category.GlobalFunction: {
        const layout = FieldLayout.globalFunction;
        const { fields, description } = decomposeArguments(args, this.config.sentinel);
        const name = extractName(fields, layout.name, aliases);
        const address = extractAddress(fields, layout.address);
        const [minArgs, maxArgs] = argumentCounts(fields, layout.minArgs, layout.maxArgs);
        builder.addFunction({ name, address, typeName: null, description, minArgs, maxArgs });
        return;
      }
      case Category.TypeMethod: {
        const layout = FieldLayout.typeMethod;
        const { fields, description } = decomposeArguments(args, this.config.sentinel);
        const typeName = extractName(fields, layout.typeName, aliases);
        const name = extractName(fields, layout.name, aliases);
        const address = extractAddress(fields, layout.address);
        const [minArgs, maxArgs] = argumentCounts(fields, layout.minArgs, layout.maxArgs);
        builder.addTypeMethod({ name, address, typeName, description, minArgs, maxArgs });
        return;
      }
      case Category.GlobalValue: {
        const layout = FieldLayout.globalValue;
        const fields = splitArguments(args);
        const name = extractName(fields, layout.name, aliases);
        const typeName = extractInt(fields, layout.typeCode);
        const address = extractAddress(fields, layout.address);
        builder.addGlobalVariable({ name, address, typeName, description: null });
        return;
      }
      case Category.DatablockProperty: {
        const layout = FieldLayout.datablockProperty;
        const fields = splitArguments(args);
        const name = extractName(fields, layout.name, aliases);
        const address = extractAddress(fields, layout.address);
        const owner = resolver.resolveAt(text, site.start);
        builder.addProperty(owner, {
          name,
          address,
          typeName: UNRESOLVED_PROPERTY_TYPE,
          description: null,
        });
        return;
      }
    }
  }
}

/**
 * Minimum and maximum argument counts; a reversed pair is malformed.
 */
function argumentCounts(fields: readonly string[], minIndex: number, maxIndex: number): [number, number] {
  const minArgs = extractInt(fields, minIndex);
  const maxArgs = extractInt(fields, maxIndex);
  if (minArgs > maxArgs) {
    throw new MalformedFieldError(`Minimum arguments ${minArgs} exceed maximum ${maxArgs}`, maxIndex);
  }
  return [minArgs, maxArgs];
}

/**
 * Read a decompiled source file and scrape it.
 */
export async function scrapeFile(path: string, options: ScraperOptions): Promise<ScrapeResult> {
  const source = await readSource(path, options.config.skipLines);
  return new Scraper(options).scrape(source);
}
