import { readFile } from "node:fs/promises";
import { load as parseYaml } from "js-yaml";
import { attributionConfigSchema, type AttributionConfig } from "@unitcov/sdk";
import { createLog } from "../debug";
import { UnitcovError } from "../errors";

const debug = createLog("config");

export const DEFAULT_CONFIG_FILE = "unitcov.yaml";

export class ConfigError extends UnitcovError {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message, "ConfigError");
    this.name = "ConfigError";
  }
}

function formatZodIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `  - ${path}: ${issue.message}`;
    })
    .join("\n");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Load and validate the attribution config. When `optional` is set a missing
 * file yields the defaults; any other failure is a ConfigError.
 */
export async function loadAttributionConfig(
  configPath = DEFAULT_CONFIG_FILE,
  { optional = false }: { optional?: boolean } = {},
): Promise<AttributionConfig> {
  debug("loading config from %s", configPath);

  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err) {
    if (optional && isMissingFile(err)) {
      debug("no config at %s, using defaults", configPath);
      return attributionConfigSchema.parse({});
    }
    throw new ConfigError(`Could not read config file: ${configPath}`, err);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${configPath}`, err);
  }

  // An empty file parses to undefined; treat it as "all defaults".
  const result = attributionConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    debug("validation failed: %d issues", result.error.issues.length);
    const details = formatZodIssues(result.error.issues);
    throw new ConfigError(`Invalid config in ${configPath}:\n${details}`, result.error);
  }

  debug(
    "loaded config with %d tested names and %d reachability exceptions",
    result.data.testedFunctions.length,
    result.data.reachabilityExceptions.length,
  );
  return result.data;
}
