import { readFile } from "node:fs/promises";
import { extname, resolve } from "node:path";

export interface LoadFileResults {
  path: string;
  content: string;
  format: string;
}

/**
 * Loads the file at `path`, or when no path is given, the first of
 * `<defaults.name>.<format>` that exists in the working directory.
 *
 * @returns null when no path was given and none of the defaults exist
 * @throws when an explicit path cannot be read, or a default exists but cannot be read
 */
export async function searchAndLoadFile(
  path: string | null,
  options: {
    defaults: {
      name: string;
      formats: string[];
    };
  },
): Promise<LoadFileResults | null> {
  if (path) {
    const filePath = resolve(path);
    const content = await readFile(filePath, { encoding: "utf-8" });
    return { path: filePath, content, format: extname(filePath).slice(1) };
  }

  const { defaults } = options;
  for (const format of defaults.formats) {
    const filePath = resolve(defaults.name + "." + format);
    try {
      const content = await readFile(filePath, { encoding: "utf-8" });
      return { path: filePath, content, format };
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        continue;
      }
      throw error;
    }
  }
  return null;
}
