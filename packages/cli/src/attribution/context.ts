import type { AttributionConfig, NamingConvention } from "@unitcov/sdk";
import { buildExceptionTable, type ExceptionTable } from "../callgraph/reachability";

/** Run-wide inputs to attribution, computed once and never mutated. */
export type AttributionContext = {
  /** Functions with a dedicated unit test. */
  tested: ReadonlySet<string>;
  /** Functions with file-local visibility. */
  restricted: ReadonlySet<string>;
  naming: NamingConvention;
  exceptions: ExceptionTable;
};

export function createAttributionContext(
  config: AttributionConfig,
  tested: Iterable<string>,
  restricted: Iterable<string>,
): AttributionContext {
  return {
    tested: new Set(tested),
    restricted: new Set(restricted),
    naming: config.naming,
    exceptions: buildExceptionTable(config.reachabilityExceptions),
  };
}

/**
 * A restricted-prefix name whose public-prefix counterpart has a unit test,
 * e.g. `pcmk__frobnicate` when `pcmk_frobnicate` is tested.
 */
export function isTestedByProxy(context: AttributionContext, name: string): boolean {
  const { restrictedPrefix, publicPrefix } = context.naming;
  if (!name.startsWith(restrictedPrefix)) return false;
  return context.tested.has(publicPrefix + name.slice(restrictedPrefix.length));
}
