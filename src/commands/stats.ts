import { Command, Flags } from "@oclif/core";
import { Output } from "../lib/output.js";
import { commonFlags, inputArg, rankByCount, runScrape } from "../lib/command-utils.js";
import { CATEGORY_ORDER, CategoryLabel, UNLOCATED_OWNER } from "../lib/constants.js";
import { formatAddress, formatCount } from "../lib/formatting.js";

export default class Stats extends Command {
  static description =
    "Display statistics about the scraped catalog, skipped matches and unresolved datablock owners (deterministic)";

  static examples = [
    "<%= config.bin %> stats Tribes2.c",
    "<%= config.bin %> stats Tribes2.c --check",
    "<%= config.bin %> stats Tribes2.c -v",
  ];

  static args = inputArg;

  static flags = {
    ...commonFlags,
    top: Flags.integer({
      description: "Number of types to list by method count",
      default: 10,
    }),
    check: Flags.boolean({
      description: "Exit with code 1 if any datablock owner is unresolved (for CI)",
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Stats);
    const out = new Output({ verbose: flags.verbose });

    const { result } = await runScrape(args.input, flags, out);
    const { catalog } = result;

    out.section("Catalog");

    console.log(`Global functions:     ${catalog.functionCount}`);
    console.log(
      `Type methods:         ${catalog.typeMethodTotal} (${formatCount(catalog.typeMethods.size, "type")})`
    );
    console.log(`Global values:        ${catalog.globalVariables.length}`);

    let propertyCount = 0;
    for (const datablock of catalog.datablocks.values()) {
      propertyCount += datablock.properties.size;
    }
    console.log(
      `Datablocks:           ${catalog.datablocks.size} (${formatCount(propertyCount, "property", "properties")})`
    );

    // Skipped matches
    const skipped = CATEGORY_ORDER.filter((category) => result.discarded[category] > 0);
    if (skipped.length === 0) {
      console.log("\n✓ No matches skipped");
    } else {
      console.log("\nSkipped matches:");
      for (const category of skipped) {
        console.log(`  ${CategoryLabel[category]}:`.padEnd(26) + `${result.discarded[category]}`);
      }
    }

    // Largest types
    const ranked = rankByCount(catalog.typeMethodCounts).slice(0, flags.top);
    if (ranked.length > 0) {
      console.log("\nMethods by type:");
      for (const [type, count] of ranked) {
        console.log(`  ${type}`.padEnd(26) + `${count}`);
      }
      if (catalog.typeMethodCounts.size > ranked.length) {
        console.log(`  ... and ${catalog.typeMethodCounts.size - ranked.length} more`);
      }
    }

    // Owner resolution
    const unresolved = result.unresolvedOwners;
    const unlocated = catalog.datablocks.get(UNLOCATED_OWNER)?.properties.size ?? 0;
    console.log();
    if (unresolved.length === 0) {
      console.log("✓ Datablock owners: all resolved");
    } else {
      console.log(`✗ Unresolved datablock owners: ${unresolved.length}`);
      const display = flags.verbose ? unresolved : unresolved.slice(0, 5);
      for (const address of display) {
        const properties = catalog.datablocks.get(address)?.properties.size ?? 0;
        console.log(`  - ${formatAddress(address)} (${formatCount(properties, "property", "properties")})`);
      }
      if (!flags.verbose && unresolved.length > 5) {
        console.log(`  ... and ${unresolved.length - 5} more (use --verbose)`);
      }
    }
    if (unlocated > 0) {
      console.log(`⚠ Properties without an enclosing subroutine header: ${unlocated}`);
    }

    console.log();

    // Exit with error code for CI if --check flag and issues found
    if (flags.check && unresolved.length > 0) {
      process.exit(1);
    }
  }
}
