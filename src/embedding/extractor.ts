import { z } from "zod";

import { loadSettings, type Settings } from "../config/settings.js";
import { loadGraphEmbeddingModel } from "../integrations/tfjs/graphModel.js";
import { NumericError } from "../retrieval/errors.js";
import type { EmbeddingVector } from "../retrieval/types.js";
import { scaleToUnitRange } from "./preprocess.js";
import type { EmbeddingModel, PixelGrid, Preprocess } from "./types.js";

function isEmbeddingModel(value: unknown): value is EmbeddingModel {
  if (!value || typeof value !== "object") return false;
  const candidate = value as Partial<EmbeddingModel>;
  return (
    typeof candidate.infer === "function" &&
    typeof candidate.name === "string" &&
    Number.isInteger(candidate.dimension) &&
    (candidate.dimension ?? 0) > 0 &&
    Array.isArray(candidate.inputShape) &&
    candidate.inputShape.length === 3
  );
}

const extractorOptionsSchema = z.object({
  model: z
    .custom<EmbeddingModel>(isEmbeddingModel, {
      message: "model must provide name, inputShape, a positive dimension and infer()"
    })
    .optional(),
  preprocess: z
    .custom<Preprocess>((v) => typeof v === "function", { message: "preprocess must be a function" })
    .optional(),
  settings: z.custom<Settings>((v) => Boolean(v) && typeof v === "object").optional()
});

/**
 * `model` defaults to the TensorFlow.js graph model at `settings.modelUrl`
 * (MobileNet v2 feature vector unless overridden), `preprocess` to
 * {@link scaleToUnitRange}.
 */
export type EmbeddingExtractorOptions = z.input<typeof extractorOptionsSchema>;

export type EmbeddingExtractor = {
  readonly model: EmbeddingModel;
  readonly preprocess: Preprocess;
  /** Returns `null` when there is no image to embed. */
  extract(pixels: PixelGrid | null): Promise<EmbeddingVector | null>;
};

const sharedModels = new Map<string, Promise<EmbeddingModel>>();

function loadSharedModel(settings: Settings): Promise<EmbeddingModel> {
  const key = `${settings.modelUrl}|${settings.imageSize}|${settings.embeddingDimension}`;
  let pending = sharedModels.get(key);
  if (!pending) {
    pending = loadGraphEmbeddingModel(settings).catch((err: unknown) => {
      sharedModels.delete(key);
      throw err;
    });
    sharedModels.set(key, pending);
  }
  return pending;
}

export async function createEmbeddingExtractor(
  options: EmbeddingExtractorOptions = {}
): Promise<EmbeddingExtractor> {
  const parsed = extractorOptionsSchema.parse(options);
  const model = parsed.model ?? (await loadSharedModel(parsed.settings ?? loadSettings()));
  const preprocess = parsed.preprocess ?? scaleToUnitRange;
  const [height, width, channels] = model.inputShape;

  return {
    model,
    preprocess,
    async extract(pixels) {
      if (!pixels) return null;

      if (pixels.height !== height || pixels.width !== width || pixels.channels !== channels) {
        throw new Error(
          `Pixel grid ${pixels.width}x${pixels.height}x${pixels.channels} does not match model input ${width}x${height}x${channels}`
        );
      }

      const data = preprocess(pixels);
      if (data.length !== height * width * channels) {
        throw new Error(
          `Preprocessed input length mismatch: expected=${height * width * channels} actual=${data.length}`
        );
      }

      const rows = await model.infer({ shape: [1, height, width, channels], data });
      const row = rows[0];
      if (rows.length !== 1 || !row) {
        throw new Error(`Model ${model.name} returned ${rows.length} rows for a single image`);
      }
      if (row.length !== model.dimension) {
        throw new Error(
          `Embedding dimension mismatch: expected=${model.dimension} actual=${row.length}`
        );
      }
      if (!row.every(Number.isFinite)) {
        throw new NumericError(`Model ${model.name} returned a non-finite embedding`);
      }
      return [...row];
    }
  };
}
