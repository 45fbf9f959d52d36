import { z } from "zod";

export const reachabilityExceptionSchema = z.object({
  anchor: z.string().min(1),
  targets: z.array(z.string().min(1)).min(1),
});

export type ReachabilityException = z.infer<typeof reachabilityExceptionSchema>;

/**
 * Anchor/target pairs whose call-graph lookups are known to fail because the
 * graph never records the relationship. Kept verbatim; it is unclear whether
 * these are gaps in the call-graph output or real reachability gaps.
 */
export const DEFAULT_REACHABILITY_EXCEPTIONS: ReachabilityException[] = [
  {
    anchor: "pcmk__starts_with",
    targets: [
      "ends_with",
      "pcmk__str_hash",
      "pcmk__strcase_equal",
      "pcmk__strcase_hash",
      "copy_str_table_entry",
    ],
  },
  {
    anchor: "pe__cmp_rsc_priority",
    targets: ["resource_node_score"],
  },
];
