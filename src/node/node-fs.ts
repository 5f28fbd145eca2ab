import { existsSync, readFileSync, readdirSync, statSync } from "fs";
import type { FileStat, FileSystem } from "#/core";

/**
 * FileSystem backed by Node's synchronous fs calls.
 */
export const nodeFileSystem: FileSystem = {
  readFile(path: string): string {
    return readFileSync(path, "utf-8");
  },

  exists(path: string): boolean {
    return existsSync(path);
  },

  readdir(path: string): string[] {
    return readdirSync(path);
  },

  stat(path: string): FileStat {
    const stats = statSync(path);
    return {
      isDirectory: stats.isDirectory(),
      isFile: stats.isFile(),
      size: stats.size,
      mtimeMs: stats.mtimeMs,
    };
  },
};
