import { promises as fs } from "node:fs";

export type ImageList = {
  locations: string[];
  /** Present when at least one entry carries a title; untitled entries get "". */
  titles?: string[];
};

/**
 * One entry per line: `location` or `location<TAB>title`. Blank lines and
 * lines starting with `#` are skipped.
 */
export function parseImageList(raw: string): ImageList {
  const locations: string[] = [];
  const titles: string[] = [];
  let titled = false;

  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const tab = trimmed.indexOf("\t");
    const location = (tab === -1 ? trimmed : trimmed.slice(0, tab)).trim();
    const title = tab === -1 ? "" : trimmed.slice(tab + 1).trim();
    if (!location) continue;

    locations.push(location);
    titles.push(title);
    if (title) titled = true;
  }

  return titled ? { locations, titles } : { locations };
}

export async function loadImageList(filePath: string): Promise<ImageList> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (err && typeof err === "object" && "code" in err && (err as { code?: unknown }).code === "ENOENT") {
      throw new Error(`Image list not found: ${filePath}`);
    }
    throw err;
  }
  return parseImageList(raw);
}
