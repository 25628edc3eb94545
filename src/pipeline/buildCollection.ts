import type { Settings } from "../config/settings.js";
import { createEmbeddingExtractor, type EmbeddingExtractor } from "../embedding/extractor.js";
import { fetchImage } from "../integrations/http/imageFetcher.js";
import type { ImageList } from "../loaders/imageList.js";
import { logger as defaultLogger, type Logger } from "../logging/logger.js";
import { EmbeddingCollection } from "../retrieval/collection.js";
import type { RebuildResult } from "../retrieval/types.js";

export async function buildCollection(params: {
  list: ImageList;
  settings: Settings;
  extractor?: EmbeddingExtractor;
  fetch?: typeof fetch;
  logger?: Logger;
}): Promise<{ collection: EmbeddingCollection; result: RebuildResult }> {
  const { settings } = params;
  const extractor = params.extractor ?? (await createEmbeddingExtractor({ settings }));

  const collection = new EmbeddingCollection({
    extractor,
    fetchImage: (location) =>
      fetchImage(location, {
        fetch: params.fetch,
        size: settings.imageSize,
        maxBytes: settings.maxImageBytes,
        timeoutMs: settings.fetchTimeoutMs
      }),
    throttleMs: settings.throttleMs,
    logger: params.logger ?? defaultLogger
  });

  const result = await collection.rebuild(params.list.locations, params.list.titles);
  return { collection, result };
}
