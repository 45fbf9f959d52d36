import { z } from "zod";
import { namingConventionSchema } from "./naming";
import { DEFAULT_REACHABILITY_EXCEPTIONS, reachabilityExceptionSchema } from "./exceptions";

// Functions whose unit tests live in a file not named after them, typically
// case-sensitive/insensitive variants sharing one test file.
export const DEFAULT_TESTED_FUNCTIONS = [
  "crm_exit_name",
  "crm_exit_str",
  "pcmk__add_separated_word",
  "pcmk__ends_with_ext",
  "pcmk__strcase_any_of",
  "pcmk_rc2exitc",
  "pcmk_rc_name",
  "pcmk_rc_str",
];

export const attributionConfigSchema = z.object({
  version: z.literal("1").default("1"),
  testSuffix: z.string().min(1).default("_test.c"),
  testedFunctions: z.array(z.string().min(1)).default(DEFAULT_TESTED_FUNCTIONS),
  restrictedScanDirs: z.array(z.string().min(1)).default(["lib"]),
  naming: namingConventionSchema.default({}),
  reachabilityExceptions: z
    .array(reachabilityExceptionSchema)
    .default(DEFAULT_REACHABILITY_EXCEPTIONS),
});

export type AttributionConfig = z.infer<typeof attributionConfigSchema>;
