import { InvariantError } from "../errors";
import { parseLine, type CoverageRecord } from "./record";
import { spanContains, type FunctionSpan } from "./functions";

function decrement(tag: "FNH" | "LH", count: number, by: number, span: FunctionSpan): number {
  const next = count - by;
  if (next < 0) {
    throw new InvariantError(`${tag} would drop below zero while erasing ${span.name}`, {
      function: span.name,
      counter: tag,
      value: count,
      decrement: by,
    });
  }
  return next;
}

/**
 * Return a copy of `record` in which `span`'s function and every line inside
 * its range report zero executions, with FNH and LH reduced to match.
 * Erasing a function that is already at zero leaves the aggregates alone.
 */
export function eraseFunction(record: CoverageRecord, span: FunctionSpan): CoverageRecord {
  const parsed = record.lines.map(parseLine);

  let functionHit = false;
  let executedLines = 0;
  for (const line of parsed) {
    if (line.tag === "FNDA" && line.name === span.name && line.count !== 0) {
      functionHit = true;
    } else if (line.tag === "DA" && line.count !== 0 && spanContains(span, line.line)) {
      executedLines++;
    }
  }

  const lines = parsed.map((line, i) => {
    switch (line.tag) {
      case "FNDA":
        return line.name === span.name ? `FNDA:0,${span.name}` : record.lines[i];
      case "DA":
        if (!spanContains(span, line.line)) return record.lines[i];
        return line.checksum !== undefined
          ? `DA:${line.line},0,${line.checksum}`
          : `DA:${line.line},0`;
      case "FNH":
        return functionHit ? `FNH:${decrement("FNH", line.count, 1, span)}` : record.lines[i];
      case "LH":
        return executedLines > 0
          ? `LH:${decrement("LH", line.count, executedLines, span)}`
          : record.lines[i];
      default:
        return record.lines[i];
    }
  });

  return { lines };
}
