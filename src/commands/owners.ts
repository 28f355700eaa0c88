import { Command } from "@oclif/core";
import { Output } from "../lib/output.js";
import { commonFlags, inputArg, runScrape } from "../lib/command-utils.js";
import { stringifyUnresolvedOwners } from "../lib/catalog-yaml.js";

export default class Owners extends Command {
  static description =
    "List datablock owner addresses missing from the type table, as a YAML fragment to curate";

  static examples = [
    "<%= config.bin %> owners Tribes2.c",
    "<%= config.bin %> owners Tribes2.c >> unresolved.yaml",
  ];

  static args = inputArg;

  static flags = commonFlags;

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Owners);
    const out = new Output({ verbose: false });

    const { result } = await runScrape(args.input, flags, out);

    if (result.unresolvedOwners.length === 0) {
      console.error("All datablock owners resolved.");
      return;
    }
    process.stdout.write(stringifyUnresolvedOwners(result.unresolvedOwners));
  }
}
