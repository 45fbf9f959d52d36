import { z } from "zod";

/**
 * Naming convention linking a library-internal function to its public
 * counterpart, e.g. `pcmk__frobnicate` → `pcmk_frobnicate`.
 */
export const namingConventionSchema = z.object({
  restrictedPrefix: z.string().min(1).default("pcmk__"),
  publicPrefix: z.string().min(1).default("pcmk_"),
});

export type NamingConvention = z.infer<typeof namingConventionSchema>;
