import { Command } from "@oclif/core";
import { Output } from "../lib/output.js";
import { commonFlags, inputArg, runScrape } from "../lib/command-utils.js";
import { stringifyCatalog } from "../lib/catalog-yaml.js";

export default class Dump extends Command {
  static description =
    "Dump the scraped catalog to stdout as YAML (deterministic)";

  static examples = [
    "<%= config.bin %> dump Tribes2.c",
    "<%= config.bin %> dump Tribes2.c > catalog.yaml",
  ];

  static args = inputArg;

  static flags = commonFlags;

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Dump);
    // Diagnostics would end up in the YAML
    const out = new Output({ verbose: false });

    const { result } = await runScrape(args.input, flags, out);
    process.stdout.write(stringifyCatalog(result.catalog));
  }
}
