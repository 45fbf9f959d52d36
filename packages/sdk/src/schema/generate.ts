import { writeFileSync, mkdirSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { buildConfigJsonSchema } from "./json-schema";

const here = dirname(fileURLToPath(import.meta.url));
const outPath = resolve(here, "../../schemas/unitcov.v1.schema.json");
mkdirSync(dirname(outPath), { recursive: true });
writeFileSync(outPath, JSON.stringify(buildConfigJsonSchema(), null, 2) + "\n");

console.log(`Generated ${outPath}`);
