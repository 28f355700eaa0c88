import { Command, Flags } from "@oclif/core";
import { writeFile } from "node:fs/promises";
import { Output } from "../lib/output.js";
import { commonFlags, inputArg, runScrape } from "../lib/command-utils.js";
import { renderReference } from "../lib/reference/renderer.js";

export default class Scrape extends Command {
  static description =
    "Scrape the decompiled source and write the engine reference page (DokuWiki)";

  static examples = [
    "<%= config.bin %> scrape Tribes2.c",
    "<%= config.bin %> scrape Tribes2.c --output reference.txt",
    "<%= config.bin %> scrape Tribes2.c --skip-lines 0 -v",
  ];

  static args = inputArg;

  static flags = {
    ...commonFlags,
    output: Flags.string({
      char: "o",
      description: "File to write the page to (default: stdout)",
    }),
    title: Flags.string({
      description: "Page title",
      default: "Engine Reference",
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Scrape);
    // Keep stdout clean for the page when no output file is given
    const out = new Output({ verbose: flags.verbose && flags.output !== undefined });

    const { config, result } = await runScrape(args.input, flags, out);
    const page = renderReference(result.catalog, config, flags.title);

    if (!flags.output) {
      process.stdout.write(page);
      return;
    }

    try {
      await writeFile(flags.output, page, "utf-8");
    } catch (error) {
      out.error(`Cannot write ${flags.output}: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }

    const { catalog } = result;
    out.success(`Wrote ${flags.output}`);
    if (result.unresolvedOwners.length > 0) {
      out.warn(
        `${result.unresolvedOwners.length} datablock owner address(es) not in the type table (run 'ecat owners')`
      );
    }
    out.summary({
      functions: catalog.functionCount,
      typeMethods: catalog.typeMethodTotal,
      globals: catalog.globalVariables.length,
      datablocks: catalog.datablocks.size,
    });
  }
}
