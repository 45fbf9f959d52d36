import { parseLine, type CoverageRecord } from "./record";

/**
 * A function's line range inside a record. `end` is the line before the next
 * function starts; `null` for the last function means "to end of file".
 */
export type FunctionSpan = {
  name: string;
  start: number;
  end: number | null;
};

export function extractFunctions(record: CoverageRecord): FunctionSpan[] {
  const spans: FunctionSpan[] = [];

  for (const raw of record.lines) {
    const line = parseLine(raw);
    if (line.tag !== "FN") continue;
    spans.push({ name: line.name, start: line.start, end: null });
  }

  // Spans follow declaration order; overlapping declarations are not expected.
  for (let i = 0; i < spans.length - 1; i++) {
    spans[i] = { ...spans[i], end: spans[i + 1].start - 1 };
  }

  return spans;
}

export function spanContains(span: FunctionSpan, lineNo: number): boolean {
  return lineNo >= span.start && (span.end === null || lineNo <= span.end);
}
