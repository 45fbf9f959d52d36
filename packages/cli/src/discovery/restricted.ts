import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { glob } from "glob";
import { createLog } from "../debug";

const debug = createLog("discovery");

/**
 * Pull a function name out of a line that may hold a declaration, or return
 * null when the line does not look like one.
 */
export function functionNameFromDeclaration(line: string): string | null {
  const paren = line.indexOf("(");
  if (paren === -1) return null;
  // An initializer means a variable, not a function.
  if (line.includes("=")) return null;

  const beforeParen = line.slice(0, paren);
  const name = beforeParen.slice(beforeParen.lastIndexOf(" ") + 1).replace(/\W/g, "");
  return name || null;
}

/**
 * Approximate the static functions declared in one C source or header. The
 * declaration line itself and the one after it are both considered, since the
 * name often follows a `static int` line.
 */
export function scanStaticDeclarations(content: string): string[] {
  const lines = content.split(/\r?\n/);
  const candidates = new Set<number>();

  lines.forEach((line, i) => {
    if (!line.startsWith("static")) return;
    candidates.add(i);
    if (i + 1 < lines.length) candidates.add(i + 1);
  });

  const names: string[] = [];
  for (const i of [...candidates].sort((a, b) => a - b)) {
    const name = functionNameFromDeclaration(lines[i]);
    if (name) names.push(name);
  }
  return names;
}

export async function discoverRestrictedFunctions(
  root: string,
  scanDirs: readonly string[],
): Promise<Set<string>> {
  const restricted = new Set<string>();

  for (const dir of scanDirs) {
    const files = await glob(`${dir}/**/*.{c,h}`, { cwd: root, nodir: true, posix: true });
    debug("scanning %d files under %s for static functions", files.length, dir);

    for (const file of files.sort()) {
      const content = await readFile(join(root, file), "utf-8");
      for (const name of scanStaticDeclarations(content)) restricted.add(name);
    }
  }

  debug("found %d restricted functions", restricted.size);
  return restricted;
}
