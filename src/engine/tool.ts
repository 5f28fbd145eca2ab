import { delimiter, isAbsolute, join } from "path";
import type { FileSystem } from "#/core";
import { ExternalToolMissingError } from "#/errors";

function isRegularFile(fs: FileSystem, path: string): boolean {
  return fs.exists(path) && fs.stat(path).isFile;
}

/**
 * Resolve the build tool to a file on disk.
 * A name without a directory part is looked up along `searchPath` (a PATH value).
 */
export function locateBuildTool(fs: FileSystem, toolPath: string, searchPath = ""): string {
  if (isAbsolute(toolPath) || toolPath.includes("/")) {
    if (isRegularFile(fs, toolPath)) return toolPath;
    throw new ExternalToolMissingError(toolPath);
  }

  for (const dir of searchPath.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, toolPath);
    if (isRegularFile(fs, candidate)) return candidate;
  }

  throw new ExternalToolMissingError(toolPath);
}
