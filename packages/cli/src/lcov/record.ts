import { UnitcovError } from "../errors";

export class RecordError extends UnitcovError<{ line: string }> {
  constructor(message: string, line?: string) {
    super(message, "RecordError", line !== undefined ? { line } : undefined);
    this.name = "RecordError";
  }
}

/** The coverage data for one source file, without its `end_of_record` sentinel. */
export type CoverageRecord = {
  readonly lines: readonly string[];
};

/**
 * A single record line, classified by tag. Tags the engine never rewrites are
 * kept as `other` so they round-trip verbatim.
 */
export type CoverageLine =
  | { tag: "SF"; path: string }
  | { tag: "FN"; start: number; name: string }
  | { tag: "FNDA"; count: number; name: string }
  | { tag: "FNH"; count: number }
  | { tag: "DA"; line: number; count: number; checksum?: string }
  | { tag: "LH"; count: number }
  | { tag: "other"; raw: string };

export const END_OF_RECORD = "end_of_record";

// FN:<start>[,<end>],<name>; newer lcov emits the end line too.
const FN_PATTERN = /^(\d+),(?:\d+,)?([^,]+)$/;
const FNDA_PATTERN = /^(\d+),(.+)$/;
const DA_PATTERN = /^(\d+),(\d+)(?:,(.+))?$/;
const COUNT_PATTERN = /^\d+$/;

function parseCount(value: string, raw: string): number {
  if (!COUNT_PATTERN.test(value)) {
    throw new RecordError(`Expected a non-negative integer in "${raw}"`, raw);
  }
  return Number.parseInt(value, 10);
}

function matchFields(pattern: RegExp, body: string, raw: string): RegExpExecArray {
  const match = pattern.exec(body);
  if (!match) {
    throw new RecordError(`Malformed coverage line "${raw}"`, raw);
  }
  return match;
}

export function parseLine(raw: string): CoverageLine {
  const colon = raw.indexOf(":");
  if (colon === -1) return { tag: "other", raw };

  const tag = raw.slice(0, colon);
  const body = raw.slice(colon + 1);

  switch (tag) {
    case "SF":
      return { tag: "SF", path: body };
    case "FN": {
      const [, start, name] = matchFields(FN_PATTERN, body, raw);
      return { tag: "FN", start: parseCount(start, raw), name };
    }
    case "FNDA": {
      const [, count, name] = matchFields(FNDA_PATTERN, body, raw);
      return { tag: "FNDA", count: parseCount(count, raw), name };
    }
    case "DA": {
      const [, line, count, checksum] = matchFields(DA_PATTERN, body, raw);
      return {
        tag: "DA",
        line: parseCount(line, raw),
        count: parseCount(count, raw),
        ...(checksum !== undefined && { checksum }),
      };
    }
    case "FNH":
      return { tag: "FNH", count: parseCount(body, raw) };
    case "LH":
      return { tag: "LH", count: parseCount(body, raw) };
    default:
      return { tag: "other", raw };
  }
}

export function sourceFile(record: CoverageRecord): string {
  for (const raw of record.lines) {
    const line = parseLine(raw);
    if (line.tag === "SF") return line.path;
  }
  throw new RecordError("Coverage record has no SF line");
}

/** Execution count from the function's first FNDA line, or 0 when it has none. */
export function executionCount(record: CoverageRecord, name: string): number {
  for (const raw of record.lines) {
    const line = parseLine(raw);
    if (line.tag === "FNDA" && line.name === name) return line.count;
  }
  return 0;
}
