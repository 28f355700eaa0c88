/**
 * Engine catalog extraction.
 */

export * from "./types.js";
export { prepareSource, maskLiteralDelimiters, restoreDelimiters } from "./preprocessor.js";
export { buildCallPattern, findCallSites, type CallSite } from "./matcher.js";
export {
  argumentList,
  decomposeArguments,
  splitArguments,
  type DecomposedArguments,
} from "./arguments.js";
export { MalformedFieldError, extractName, extractAddress, extractInt } from "./fields.js";
export { OwnerResolver } from "./owner-resolver.js";
export { CatalogBuilder } from "./catalog.js";
export {
  Scraper,
  readSource,
  scrapeFile,
  type ScraperOptions,
  type ScrapeResult,
} from "./scraper.js";
