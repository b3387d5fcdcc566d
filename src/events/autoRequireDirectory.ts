import { readdirSync } from "node:fs";
import { extname, join } from "node:path";

const LOADABLE_EXTENSIONS = new Set([".ts", ".js"]);

/** Modules in `directory` that should be loaded: scripts other than index and declaration files. */
export function listLoadableModules(directory: string): string[] {
  return readdirSync(directory, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter(
      (name) =>
        LOADABLE_EXTENSIONS.has(extname(name)) &&
        !name.startsWith("index.") &&
        !name.endsWith(".d.ts"),
    )
    .sort();
}

/**
 * Requires every loadable module in a directory for its side effects
 * (event registration). A module that throws is logged and skipped.
 *
 * @param label Scope used in log lines, e.g. "events" or "listeners".
 * @returns number of modules loaded.
 */
export function autoRequireDirectory(directory: string, label: string): number {
  let loaded = 0;
  for (const fileName of listLoadableModules(directory)) {
    try {
      require(join(directory, fileName));
      loaded += 1;
    } catch (error) {
      console.error(`[${label}] Failed to load ${fileName}:`, error);
    }
  }
  return loaded;
}
