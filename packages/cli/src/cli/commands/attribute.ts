import { readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import type { AttributionConfig } from "@unitcov/sdk";
import { createLog } from "../../debug";
import { UnitcovError } from "../../errors";
import { attributeRecord, type AttributionResult } from "../../attribution/engine";
import { createAttributionContext } from "../../attribution/context";
import { loadCallGraph, type CallGraph } from "../../callgraph/graph";
import { DEFAULT_CONFIG_FILE, loadAttributionConfig } from "../../config/loader";
import {
  discoverCallGraphFiles,
  findCallGraphFile,
  relativeToRoot,
} from "../../discovery/callgraphs";
import { discoverRestrictedFunctions } from "../../discovery/restricted";
import { discoverTestedFunctions } from "../../discovery/tests";
import { sourceFile } from "../../lcov/record";
import { parseReport, renderRecord } from "../../lcov/report";

const debug = createLog("cli");

export class ReportError extends UnitcovError {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message, "ReportError");
    this.name = "ReportError";
  }
}

export type AttributeOptions = {
  reportPath: string;
  /** Source tree root; SF paths and discovered files are relative to it. */
  root: string;
  /** Explicit config file. Without one, `unitcov.yaml` in the root is used if present. */
  configPath?: string;
  explain?: boolean;
};

export type AttributeDeps = {
  readReport: (path: string) => Promise<string>;
  loadConfig: (configPath: string, options: { optional: boolean }) => Promise<AttributionConfig>;
  discoverTested: typeof discoverTestedFunctions;
  discoverRestricted: typeof discoverRestrictedFunctions;
  discoverCallGraphs: (root: string) => Promise<string[]>;
  loadCallGraph: (path: string) => Promise<CallGraph>;
  /** Receives the rewritten report, one record at a time. */
  write: (chunk: string) => void;
  /** Receives one line per decision when `explain` is set. */
  explain: (line: string) => void;
};

export type AttributeSummary = {
  records: number;
  erased: number;
};

export async function isReportFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export async function attributeReport(
  options: AttributeOptions,
  deps: AttributeDeps,
): Promise<AttributeSummary> {
  const config = options.configPath
    ? await deps.loadConfig(options.configPath, { optional: false })
    : await deps.loadConfig(join(options.root, DEFAULT_CONFIG_FILE), { optional: true });

  const tested = await deps.discoverTested(
    options.root,
    config.testSuffix,
    config.testedFunctions,
  );
  const restricted = await deps.discoverRestricted(options.root, config.restrictedScanDirs);
  const callGraphFiles = await deps.discoverCallGraphs(options.root);
  const context = createAttributionContext(config, tested, restricted);
  debug(
    "%d tested, %d restricted, %d call graphs",
    context.tested.size,
    context.restricted.size,
    callGraphFiles.length,
  );

  let content: string;
  try {
    content = await deps.readReport(options.reportPath);
  } catch (err) {
    throw new ReportError(`Could not read coverage report: ${options.reportPath}`, err);
  }

  const summary: AttributeSummary = { records: 0, erased: 0 };

  for (const record of parseReport(content)) {
    const file = relativeToRoot(sourceFile(record), options.root);
    const graphFile = findCallGraphFile(callGraphFiles, file);
    if (!graphFile) debug("no call graph for %s, leaving it untouched", file);

    let result: AttributionResult;
    try {
      const graph = graphFile ? await deps.loadCallGraph(join(options.root, graphFile)) : null;
      result = attributeRecord(record, graph, context);
    } catch (err) {
      throw err instanceof UnitcovError ? err.inRecord(file) : err;
    }

    for (const decision of result.decisions) {
      if (decision.action === "erase") summary.erased++;
      if (options.explain) {
        deps.explain(`${file}: ${decision.action} ${decision.name} (${decision.reason})`);
      }
    }

    deps.write(renderRecord(result.record) + "\n");
    summary.records++;
  }

  debug("rewrote %d records, erased %d functions", summary.records, summary.erased);
  return summary;
}

export const defaultDeps: AttributeDeps = {
  readReport: (path) => readFile(path, "utf-8"),
  loadConfig: loadAttributionConfig,
  discoverTested: discoverTestedFunctions,
  discoverRestricted: discoverRestrictedFunctions,
  discoverCallGraphs: discoverCallGraphFiles,
  loadCallGraph,
  write: (chunk) => {
    process.stdout.write(chunk);
  },
  explain: (line) => {
    console.error(line);
  },
};
