import { zodToJsonSchema } from "zod-to-json-schema";
import { attributionConfigSchema } from "../config/attribution";

/** Draft-07 JSON schema for `unitcov.yaml`, as zod-to-json-schema emits it. */
export function buildConfigJsonSchema(): Record<string, unknown> {
  const jsonSchema = zodToJsonSchema(attributionConfigSchema, {
    name: "unitcov.v1",
    $refStrategy: "none",
  });

  return {
    ...jsonSchema,
    $id: "unitcov.v1.schema.json",
  };
}
