import { Args, Flags } from "@oclif/core";
import { Output } from "./output.js";
import { DEFAULT_CONFIG_PATH, loadEngineConfig, type EngineConfig } from "./engine-config.js";
import { scrapeFile, type ScrapeResult } from "./scraper/index.js";

/**
 * Positional argument shared by all commands.
 */
export const inputArg = {
  input: Args.string({
    description: "Decompiled source file to scrape",
    required: true,
  }),
};

/**
 * Common flags shared by all commands.
 */
export const commonFlags = {
  config: Flags.string({
    char: "c",
    description: "Engine configuration (registries and lookup tables)",
    default: DEFAULT_CONFIG_PATH,
  }),
  "skip-lines": Flags.integer({
    description: "Leading lines of declarations to skip (overrides the configuration)",
    min: 0,
  }),
  verbose: Flags.boolean({
    char: "v",
    description: "Show skipped matches and unresolved owners",
    default: false,
  }),
};

/**
 * Apply command-line overrides to a loaded configuration.
 */
export function applyOverrides(config: EngineConfig, overrides: { skipLines?: number }): EngineConfig {
  if (overrides.skipLines === undefined) {
    return config;
  }
  return { ...config, skipLines: overrides.skipLines };
}

export interface ScrapeRun {
  config: EngineConfig;
  result: ScrapeResult;
}

/**
 * Loads configuration and scrapes the input.
 * Handles error cases by logging and exiting.
 */
export async function runScrape(
  input: string,
  flags: { config: string; "skip-lines"?: number },
  out: Output
): Promise<ScrapeRun> {
  try {
    const config = applyOverrides(await loadEngineConfig(flags.config), {
      skipLines: flags["skip-lines"],
    });
    out.info(`Scraping ${input} (skipping ${config.skipLines} lines)`);
    const result = await scrapeFile(input, { config, out });
    return { config, result };
  } catch (error) {
    out.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

/**
 * Type names ordered by descending count, then name.
 */
export function rankByCount(counts: ReadonlyMap<string, number>): Array<[string, number]> {
  return [...counts].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}
