import { pino } from "pino";
import sharp from "sharp";

import type { EmbeddingModel, ImageBatch, PixelGrid } from "../embedding/types.js";
import type { ImageRecord, ReadableCollection } from "../retrieval/types.js";
import { IndexOutOfRangeError } from "../retrieval/errors.js";

export const silentLogger = pino({ level: "silent" });

/** Embeds an image as its per-channel mean, so colours map to directions. */
export function stubModel(size = 1): EmbeddingModel & { batches: ImageBatch[] } {
  const batches: ImageBatch[] = [];
  return {
    name: "stub-model",
    inputShape: [size, size, 3],
    dimension: 3,
    batches,
    async infer(batch) {
      batches.push(batch);
      const [count, height, width, channels] = batch.shape;
      const perImage = height * width * channels;
      const rows: number[][] = [];
      for (let b = 0; b < count; b += 1) {
        const sums = [0, 0, 0];
        for (let i = 0; i < perImage; i += 1) {
          const c = i % channels;
          sums[c] = (sums[c] ?? 0) + (batch.data[b * perImage + i] ?? 0);
        }
        rows.push(sums.map((s) => s / (height * width)));
      }
      return rows;
    }
  };
}

export function solidGrid(size: number, rgb: [number, number, number]): PixelGrid {
  const data = new Uint8Array(size * size * 3);
  for (let i = 0; i < data.length; i += 3) {
    data[i] = rgb[0];
    data[i + 1] = rgb[1];
    data[i + 2] = rgb[2];
  }
  return { width: size, height: size, channels: 3, data };
}

export async function solidPng(
  rgb: [number, number, number],
  width = 4,
  height = 4
): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: rgb[0], g: rgb[1], b: rgb[2] } }
  })
    .png()
    .toBuffer();
}

export function vectorCollection(vectors: number[][], titles?: string[]): ReadableCollection {
  return {
    size: vectors.length,
    get(index: number): ImageRecord {
      const vector = vectors[index];
      if (!Number.isInteger(index) || vector === undefined) {
        throw new IndexOutOfRangeError(index, vectors.length);
      }
      return { location: `img-${index}`, title: titles?.[index], vector };
    }
  };
}
