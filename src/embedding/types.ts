/**
 * Canonical decoded image: row-major, interleaved RGB, one byte per channel.
 * `data.length === width * height * channels`.
 */
export type PixelGrid = {
  width: number;
  height: number;
  channels: 3;
  data: Uint8Array;
};

/** Model input: `shape` is `[batch, height, width, channels]`. */
export type ImageBatch = {
  shape: [number, number, number, number];
  data: Float32Array;
};

/**
 * Inference-only capability the extractor depends on. Implementations are
 * loaded once and shared; `infer` must not mutate model state.
 */
export interface EmbeddingModel {
  readonly name: string;
  /** `[height, width, channels]` the model accepts. */
  readonly inputShape: readonly [number, number, number];
  /** Length of every output row. */
  readonly dimension: number;
  /** Returns one row per batch item, each `dimension` long. */
  infer(batch: ImageBatch): Promise<number[][]>;
}

/** Model-specific normalization from bytes to the floats fed to `infer`. */
export type Preprocess = (pixels: PixelGrid) => Float32Array;
