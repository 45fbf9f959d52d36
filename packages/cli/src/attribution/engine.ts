import { createLog } from "../debug";
import { isReachable } from "../callgraph/reachability";
import type { CallGraph } from "../callgraph/graph";
import { extractFunctions } from "../lcov/functions";
import { executionCount, type CoverageRecord } from "../lcov/record";
import { eraseFunction } from "../lcov/rewrite";
import { isTestedByProxy, type AttributionContext } from "./context";

const debug = createLog("attribution");

export type DecisionReason =
  | "no-call-graph"
  | "not-executed"
  | "tested-by-proxy"
  | "reachable"
  | "unreachable"
  | "tested"
  | "untested";

export type Decision = {
  name: string;
  action: "keep" | "erase";
  reason: DecisionReason;
};

export type AttributionResult = {
  record: CoverageRecord;
  decisions: Decision[];
};

/**
 * Decide, for every function in `record`, whether its coverage was earned by
 * a unit test, and erase the coverage of those that were not.
 *
 * Restricted functions are judged by file-local reachability from the
 * record's anchors: tested public functions plus executed functions tested
 * through their public counterpart.
 */
export function attributeRecord(
  record: CoverageRecord,
  graph: CallGraph | null,
  context: AttributionContext,
): AttributionResult {
  const spans = extractFunctions(record);

  if (!graph) {
    return {
      record,
      decisions: spans.map((span): Decision => ({
        name: span.name,
        action: "keep",
        reason: "no-call-graph",
      })),
    };
  }

  const executed = new Set(
    spans.filter((span) => executionCount(record, span.name) !== 0).map((span) => span.name),
  );

  const anchors = new Set<string>();
  for (const { name } of spans) {
    if (context.tested.has(name) && !context.restricted.has(name)) anchors.add(name);
  }
  for (const name of executed) {
    if (isTestedByProxy(context, name)) anchors.add(name);
  }
  debug("%d functions, %d anchors", spans.length, anchors.size);

  const decisions: Decision[] = [];
  let current = record;

  for (const span of spans) {
    const decision = decide(span.name, executed, anchors, graph, context);
    decisions.push(decision);
    if (decision.action === "erase") {
      debug("erasing %s (%s)", span.name, decision.reason);
      current = eraseFunction(current, span);
    }
  }

  return { record: current, decisions };
}

function decide(
  name: string,
  executed: ReadonlySet<string>,
  anchors: ReadonlySet<string>,
  graph: CallGraph,
  context: AttributionContext,
): Decision {
  if (!executed.has(name)) {
    return { name, action: "keep", reason: "not-executed" };
  }

  if (isTestedByProxy(context, name)) {
    return { name, action: "keep", reason: "tested-by-proxy" };
  }

  if (context.restricted.has(name)) {
    return isReachable(graph, anchors, name, context.exceptions)
      ? { name, action: "keep", reason: "reachable" }
      : { name, action: "erase", reason: "unreachable" };
  }

  return context.tested.has(name)
    ? { name, action: "keep", reason: "tested" }
    : { name, action: "erase", reason: "untested" };
}
