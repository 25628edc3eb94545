import type { Settings } from "../../config/settings.js";
import { loadImageList } from "../../loaders/imageList.js";
import { buildCollection } from "../../pipeline/buildCollection.js";
import { topMatches } from "../../retrieval/search.js";
import { parseIndexArg } from "../parse.js";
import { formatMatch, writeLine, type CommandDeps } from "./deps.js";

const DEFAULT_LIMIT = 5;

export async function runRankCommand(
  args: string[],
  settings: Settings,
  deps: CommandDeps = {}
): Promise<void> {
  const [listFile, indexRaw, limitRaw] = args;
  if (!listFile || indexRaw == null) {
    throw new Error("Usage: lookalike rank <listFile> <index> [limit]");
  }
  const reference = parseIndexArg(indexRaw, "index");
  const limit = limitRaw == null ? DEFAULT_LIMIT : parseIndexArg(limitRaw, "limit", 1);

  const list = await loadImageList(listFile);
  const { collection } = await buildCollection({
    list,
    settings,
    extractor: deps.extractor,
    fetch: deps.fetch,
    logger: deps.logger
  });

  for (const match of topMatches(collection, reference, limit)) {
    writeLine(deps, formatMatch(reference, match));
  }
}
