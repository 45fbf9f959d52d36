import { END_OF_RECORD, type CoverageRecord } from "./record";

/**
 * Split an lcov report into per-file records. Lines are trimmed; anything
 * after the last `end_of_record` is an unterminated record and is dropped.
 */
export function parseReport(content: string): CoverageRecord[] {
  const records: CoverageRecord[] = [];
  let current: string[] = [];

  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();

    if (line === END_OF_RECORD) {
      records.push({ lines: current });
      current = [];
      continue;
    }

    current.push(line);
  }

  return records;
}

export function renderRecord(record: CoverageRecord): string {
  return [...record.lines, END_OF_RECORD].join("\n");
}
