import { pathToFileURL } from "node:url";

/** True when the module at `importMetaUrl` is the process entry point (node or tsx). */
export function isMainModule(
  importMetaUrl: string,
  argv: readonly string[] = process.argv,
): boolean {
  const entry = argv[1];
  if (!entry) return false;
  return importMetaUrl === pathToFileURL(entry).href;
}
