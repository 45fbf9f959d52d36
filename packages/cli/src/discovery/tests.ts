import { basename } from "node:path";
import { glob } from "glob";
import { createLog } from "../debug";

const debug = createLog("discovery");

/**
 * Unit tests are named after the function they test (`pcmk_foo_test.c` tests
 * `pcmk_foo`); `extra` covers tests that live under another name.
 */
export async function discoverTestedFunctions(
  root: string,
  testSuffix: string,
  extra: readonly string[] = [],
): Promise<Set<string>> {
  const files = await glob(`**/*${testSuffix}`, { cwd: root, nodir: true, posix: true });
  debug("found %d unit test files under %s", files.length, root);

  const tested = new Set<string>(extra);
  for (const file of files) {
    tested.add(basename(file).slice(0, -testSuffix.length));
  }
  return tested;
}
