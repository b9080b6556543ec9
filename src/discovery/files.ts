import fs from "fs/promises";
import path from "path";
import { glob, hasMagic } from "glob";

export const DEFAULT_EXTENSIONS = [".luau", ".lua"];

async function statOf(file: string) {
  try {
    return await fs.stat(file);
  } catch {
    return undefined;
  }
}

function matches(extensions: string[]) {
  return (file: string) => extensions.some((ext) => file.endsWith(ext));
}

async function expand(pattern: string, extensions: string[]) {
  const accepted = matches(extensions);
  const stat = await statOf(pattern);

  if (stat?.isDirectory()) {
    const found = await glob("**/*", { cwd: pattern, nodir: true, dot: true });
    return found.filter(accepted).map((e) => path.join(pattern, e));
  }
  if (hasMagic(pattern, { magicalBraces: true })) {
    const found = await glob(pattern, { nodir: true });
    return found.filter(accepted);
  }
  if (stat?.isFile() && accepted(pattern)) {
    return [pattern];
  }
  return [];
}

export async function findFiles(
  patterns: string[],
  extensions = DEFAULT_EXTENSIONS,
): Promise<string[]> {
  // keyed by absolute path, so "./t/a.luau" and "t/a.luau" are one file
  const files = new Map<string, string>();
  for (const pattern of patterns) {
    for (const file of await expand(pattern, extensions)) {
      const key = path.resolve(file);
      if (!files.has(key)) {
        files.set(key, path.normalize(file));
      }
    }
  }
  return [...files.values()].sort((x, y) =>
    x === y ? 0 : x < y ? -1 : 1,
  );
}
