import type { Settings } from "../../config/settings.js";
import { loadImageList } from "../../loaders/imageList.js";
import { buildCollection } from "../../pipeline/buildCollection.js";
import { bestMatch } from "../../retrieval/search.js";
import { parseIndexArg } from "../parse.js";
import { formatMatch, writeLine, type CommandDeps } from "./deps.js";

export async function runMatchCommand(
  args: string[],
  settings: Settings,
  deps: CommandDeps = {}
): Promise<void> {
  const [listFile, indexRaw] = args;
  if (!listFile) {
    throw new Error("Usage: lookalike match <listFile> [index]");
  }
  const requested = indexRaw == null ? null : parseIndexArg(indexRaw, "index");

  const list = await loadImageList(listFile);
  const { collection } = await buildCollection({
    list,
    settings,
    extractor: deps.extractor,
    fetch: deps.fetch,
    logger: deps.logger
  });

  const references = requested == null ? Array.from({ length: collection.size }, (_, i) => i) : [requested];
  for (const reference of references) {
    writeLine(deps, formatMatch(reference, bestMatch(collection, reference)));
  }
}
