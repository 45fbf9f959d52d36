import { posix } from "node:path";
import { glob } from "glob";
import { createLog } from "../debug";

const debug = createLog("discovery");

function isWanted(file: string): boolean {
  const name = posix.basename(file);
  // Unit-test drivers have no calls worth following.
  if (name.endsWith("_test.ci")) return false;
  // Test builds of libraries duplicate the regular objects.
  if (name.includes("_test_la-")) return false;
  return !`/${file}`.includes("/.libs/");
}

/** Call-graph files (`*.ci`) under `root`, as root-relative paths. */
export async function discoverCallGraphFiles(root: string): Promise<string[]> {
  const files = await glob("**/*.ci", { cwd: root, nodir: true, posix: true, dot: true });
  const wanted = files.filter(isWanted).sort();
  debug("found %d call graph files (%d skipped)", wanted.length, files.length - wanted.length);
  return wanted;
}

/**
 * Match a source file to its call graph. `lib/common/strings.c` compiles to
 * something like `lib/common/libcrmcommon_la-strings.ci`: same directory,
 * object prefix, then the source's base name.
 */
export function findCallGraphFile(files: readonly string[], sourceFile: string): string | null {
  const sourceDir = posix.dirname(sourceFile);
  const { name: sourceBase } = posix.parse(sourceFile);

  for (const file of files) {
    if (posix.dirname(file) !== sourceDir) continue;
    if (posix.basename(file).endsWith(`-${sourceBase}.ci`)) return file;
  }

  return null;
}

/** Make an absolute `SF` path relative to the source root. */
export function relativeToRoot(path: string, root: string): string {
  const prefix = root.endsWith("/") ? root : `${root}/`;
  return path.startsWith(prefix) ? path.slice(prefix.length) : path;
}
