import { readFile } from "node:fs/promises";

/**
 * Expands command-line arguments into the list of URLs to process.
 *
 * Arguments ending in `.txt` are read as one URL per line. Trailing slashes are
 * stripped and duplicates (compared case-insensitively) keep their first position.
 */
export async function collectInputUrls(
  args: readonly string[],
  readText: (path: string) => Promise<string> = (path) => readFile(path, "utf-8")
): Promise<string[]> {
  const collected: string[] = [];
  const seen = new Set<string>();

  const add = (raw: string): void => {
    const url = raw.trim().replace(/\/$/, "");
    if (!url) return;
    const key = url.toLowerCase();
    if (seen.has(key)) return;
    seen.add(key);
    collected.push(url);
  };

  for (const arg of args) {
    if (arg.endsWith(".txt")) {
      const content = await readText(arg);
      for (const line of content.split(/\r?\n/)) {
        add(line);
      }
    } else {
      add(arg);
    }
  }

  return collected;
}
