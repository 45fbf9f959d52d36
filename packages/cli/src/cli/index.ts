import { resolve } from "node:path";
import { Command } from "commander";
import { UnitcovError } from "../errors";
import {
  attributeReport,
  defaultDeps,
  isReportFile,
  type AttributeDeps,
} from "./commands/attribute";

export function createProgram(deps: AttributeDeps = defaultDeps): Command {
  return new Command()
    .name("unitcov")
    .description("Keep only the lcov coverage earned by unit tests")
    .version("0.1.0")
    .argument("[report]", "lcov tracefile to rewrite (e.g. coverage.info)")
    .option("--root <dir>", "source tree root", process.cwd())
    .option("--config <path>", "config file (default: unitcov.yaml in the root, if present)")
    .option("--explain", "print the decision for every function to stderr")
    .option("--json", "Output errors as machine-readable JSON")
    .action(async function (this: Command, report: string | undefined) {
      if (report === undefined || !(await isReportFile(report))) {
        process.stdout.write(`usage: ${this.name()} <coverage_file.info>\n`);
        return;
      }

      const opts = this.opts<{ root: string; config?: string; explain?: boolean }>();
      await attributeReport(
        {
          reportPath: report,
          root: resolve(opts.root),
          configPath: opts.config,
          explain: opts.explain === true,
        },
        deps,
      );
    });
}

export const program = createProgram();

export function formatErrorForOutput(err: unknown, json: boolean): string {
  if (json) {
    const payload =
      err instanceof UnitcovError
        ? err.toJSON()
        : { error: "UnknownError", message: err instanceof Error ? err.message : String(err) };
    return JSON.stringify(payload);
  }
  if (err instanceof UnitcovError && err.sourceFile !== undefined) {
    return `${err.sourceFile}: ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Parse `argv` and run. Returns the process exit status; records written
 * before a failure stay written.
 */
export async function runCli(argv: readonly string[], cli: Command = program): Promise<number> {
  try {
    await cli.parseAsync([...argv]);
    return 0;
  } catch (err) {
    const json = cli.opts().json === true;
    if (json) {
      process.stdout.write(formatErrorForOutput(err, true) + "\n");
    } else {
      console.error(formatErrorForOutput(err, false));
    }
    return 1;
  }
}
