export { loadSettings, type Settings } from "./config/settings.js";
export {
  createEmbeddingExtractor,
  type EmbeddingExtractor,
  type EmbeddingExtractorOptions
} from "./embedding/extractor.js";
export { scaleToSignedRange, scaleToUnitRange, subtractImageNetMean } from "./embedding/preprocess.js";
export type { EmbeddingModel, ImageBatch, PixelGrid, Preprocess } from "./embedding/types.js";
export {
  decodeToGrid,
  fetchImage,
  type FetchImageOptions,
  type FetchResult
} from "./integrations/http/imageFetcher.js";
export {
  createGraphEmbeddingModel,
  loadGraphEmbeddingModel,
  type Predictor
} from "./integrations/tfjs/graphModel.js";
export { loadImageList, parseImageList, type ImageList } from "./loaders/imageList.js";
export { createLogger, logger, type Logger } from "./logging/logger.js";
export { buildCollection } from "./pipeline/buildCollection.js";
export { EmbeddingCollection, type EmbeddingCollectionOptions } from "./retrieval/collection.js";
export * from "./retrieval/errors.js";
export { bestMatch, scoreAgainst, topMatches } from "./retrieval/search.js";
export { cosineSimilarity } from "./retrieval/similarity.js";
export type * from "./retrieval/types.js";
