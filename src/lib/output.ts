import chalk from "chalk";
import { CategoryLabel, type CategoryType } from "./constants.js";
import { formatCount } from "./formatting.js";

export interface OutputOptions {
  verbose: boolean;
}

export class Output {
  private verbose: boolean;
  private startTime: number;
  private discardedCount: number = 0;

  constructor(options: OutputOptions) {
    this.verbose = options.verbose;
    this.startTime = Date.now();
  }

  // Startup messages
  info(msg: string): void {
    if (this.verbose) {
      console.log(chalk.cyan("●") + " " + chalk.cyan(msg));
    }
  }

  success(msg: string): void {
    console.log(chalk.green("✓") + " " + chalk.green(msg));
  }

  warn(msg: string): void {
    console.log(chalk.yellow("⚠") + " " + chalk.yellow(msg));
  }

  error(msg: string): void {
    console.log(chalk.red("✗") + " " + chalk.red(msg));
  }

  // Boxed section title, as in "━━━ Catalog ━━━"
  section(title: string): void {
    console.log();
    console.log(chalk.blue(`━━━ ${title} ━━━`));
    console.log();
  }

  // A registration statement that was skipped
  discarded(category: CategoryType, statement: string, reason: string): void {
    this.discardedCount++;
    if (this.verbose) {
      console.log(
        chalk.yellow("⤷") + " " +
        chalk.yellow(`Skipped match (${CategoryLabel[category]})`) + " " +
        chalk.dim(`${this.truncate(statement, 60)} (${reason})`)
      );
    }
  }

  // Owner address missing from the datablock type table
  unresolvedOwner(address: string): void {
    if (this.verbose) {
      console.log(chalk.magenta("?") + " " + chalk.magenta(`Unresolved datablock owner 0x${address}`));
    }
  }

  // Final summary
  summary(counts: { functions: number; typeMethods: number; globals: number; datablocks: number }): void {
    const elapsed = ((Date.now() - this.startTime) / 1000).toFixed(1);

    console.log();
    if (this.verbose) {
      console.log(chalk.blue("━━━ Summary ━━━"));
      console.log(chalk.white(`Global functions: ${counts.functions}`));
      console.log(chalk.white(`Type methods: ${counts.typeMethods}`));
      console.log(chalk.white(`Global values: ${counts.globals}`));
      console.log(chalk.white(`Datablocks: ${counts.datablocks}`));
      console.log(chalk.white(`Skipped matches: ${this.discardedCount}`));
      console.log(chalk.white(`Time: ${elapsed}s`));
    } else {
      let summary =
        `Done. Scraped ${formatCount(counts.functions, "function")}, ` +
        `${formatCount(counts.typeMethods, "type method")}, ` +
        `${formatCount(counts.globals, "global value")} and ` +
        `${formatCount(counts.datablocks, "datablock")} in ${elapsed}s.`;
      if (this.discardedCount > 0) {
        summary += ` Skipped ${formatCount(this.discardedCount, "match", "matches")}.`;
      }
      console.log(summary);
    }
  }

  // Helper to truncate a string for display
  private truncate(str: string, maxLen: number): string {
    // Replace newlines with spaces for display
    const clean = str.replace(/\s+/g, " ").trim();
    if (clean.length > maxLen) {
      return clean.slice(0, maxLen) + "...";
    }
    return clean;
  }
}
