import type { ReachabilityException } from "@unitcov/sdk";
import { UnitcovError } from "../errors";
import { callees, hasNode, type CallGraph } from "./graph";

export class NodeNotFoundError extends UnitcovError<{ node: string }> {
  constructor(public readonly node: string) {
    super(`Function "${node}" is not in the call graph`, "NodeNotFound", { node });
    this.name = "NodeNotFoundError";
  }
}

export type ReachabilityDetails = {
  anchor: string;
  target: string;
  missing: string;
};

export class ReachabilityError extends UnitcovError<ReachabilityDetails> {
  constructor(anchor: string, target: string, missing: string) {
    super(
      `Cannot decide whether "${anchor}" reaches "${target}": "${missing}" is not in the call graph`,
      "ReachabilityError",
      { anchor, target, missing },
    );
    this.name = "ReachabilityError";
  }
}

/** Anchor → targets whose failed lookups are tolerated. */
export type ExceptionTable = ReadonlyMap<string, ReadonlySet<string>>;

export function buildExceptionTable(entries: ReachabilityException[]): ExceptionTable {
  const table = new Map<string, Set<string>>();
  for (const { anchor, targets } of entries) {
    const existing = table.get(anchor) ?? new Set<string>();
    for (const target of targets) existing.add(target);
    table.set(anchor, existing);
  }
  return table;
}

export function isExempt(table: ExceptionTable, anchor: string, target: string): boolean {
  return table.get(anchor)?.has(target) === true;
}

/**
 * Whether a directed path from `from` to `to` exists. A node always reaches
 * itself; otherwise both endpoints must be in the graph.
 */
export function hasPath(graph: CallGraph, from: string, to: string): boolean {
  if (from === to) return true;
  if (!hasNode(graph, from)) throw new NodeNotFoundError(from);
  if (!hasNode(graph, to)) throw new NodeNotFoundError(to);

  const visited = new Set<string>([from]);
  const queue = [from];

  for (let i = 0; i < queue.length; i++) {
    const current = queue[i];
    for (const next of callees(graph, current)) {
      if (next === to) return true;
      if (!visited.has(next)) {
        visited.add(next);
        queue.push(next);
      }
    }
  }

  return false;
}

export function isReachable(
  graph: CallGraph,
  anchors: Iterable<string>,
  target: string,
  exceptions: ExceptionTable,
): boolean {
  for (const anchor of anchors) {
    try {
      if (hasPath(graph, anchor, target)) return true;
    } catch (err) {
      if (!(err instanceof NodeNotFoundError)) throw err;
      if (isExempt(exceptions, anchor, target)) continue;
      throw new ReachabilityError(anchor, target, err.node);
    }
  }
  return false;
}
