import { readFile } from "node:fs/promises";
import { createLog } from "../debug";
import { UnitcovError } from "../errors";

const debug = createLog("callgraph");

export class CallGraphError extends UnitcovError {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message, "CallGraphError");
    this.name = "CallGraphError";
  }
}

/**
 * Static "caller calls callee" edges within one translation unit. A function
 * is a node only if it appears on at least one edge.
 */
export type CallGraph = {
  edges: Map<string, Set<string>>;
};

export const INDIRECT_CALL = "__indirect_call";

const EDGE_PATTERN = /sourcename: "([^"]+)" targetname: "([^"]+)"/;

export function createCallGraph(): CallGraph {
  return { edges: new Map() };
}

/** Drop a `unit:` qualifier such as `strings.c:ends_with`. */
export function stripUnitQualifier(name: string): string {
  const colon = name.indexOf(":");
  return colon === -1 ? name : name.slice(colon + 1);
}

export function addEdge(graph: CallGraph, source: string, target: string): void {
  let callees = graph.edges.get(source);
  if (!callees) {
    callees = new Set();
    graph.edges.set(source, callees);
  }
  callees.add(target);
  if (!graph.edges.has(target)) graph.edges.set(target, new Set());
}

export function hasNode(graph: CallGraph, name: string): boolean {
  return graph.edges.has(name);
}

export function callees(graph: CallGraph, name: string): ReadonlySet<string> {
  return graph.edges.get(name) ?? new Set();
}

/** Parse the VCG text gcc writes with `-fcallgraph-info`. */
export function parseCallGraph(content: string): CallGraph {
  const graph = createCallGraph();

  for (const line of content.split(/\r?\n/)) {
    if (!line.startsWith("edge:")) continue;

    const match = EDGE_PATTERN.exec(line);
    if (!match) continue;

    const [, source, target] = match;
    if (target === INDIRECT_CALL) continue;

    addEdge(graph, stripUnitQualifier(source), stripUnitQualifier(target));
  }

  return graph;
}

export async function loadCallGraph(path: string): Promise<CallGraph> {
  debug("loading call graph from %s", path);

  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new CallGraphError(`Could not read call graph: ${path}`, err);
  }

  const graph = parseCallGraph(raw);
  debug("loaded %d nodes from %s", graph.edges.size, path);
  return graph;
}
