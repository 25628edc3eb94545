import type { PixelGrid, Preprocess } from "./types.js";

// ImageNet channel means in BGR order, as used by "caffe"-style networks.
const IMAGENET_MEAN_BGR = [103.939, 116.779, 123.68] as const;

/** Scales every channel to [0, 1]. Default for TF Hub image models. */
export const scaleToUnitRange: Preprocess = (pixels) => {
  const out = new Float32Array(pixels.data.length);
  for (let i = 0; i < pixels.data.length; i += 1) {
    out[i] = (pixels.data[i] ?? 0) / 255;
  }
  return out;
};

/** Scales every channel to [-1, 1]. */
export const scaleToSignedRange: Preprocess = (pixels) => {
  const out = new Float32Array(pixels.data.length);
  for (let i = 0; i < pixels.data.length; i += 1) {
    out[i] = (pixels.data[i] ?? 0) / 127.5 - 1;
  }
  return out;
};

/** Reorders RGB to BGR and subtracts the ImageNet mean, without scaling. */
export const subtractImageNetMean: Preprocess = (pixels: PixelGrid) => {
  const out = new Float32Array(pixels.data.length);
  for (let i = 0; i < pixels.data.length; i += 3) {
    const r = pixels.data[i] ?? 0;
    const g = pixels.data[i + 1] ?? 0;
    const b = pixels.data[i + 2] ?? 0;
    out[i] = b - IMAGENET_MEAN_BGR[0];
    out[i + 1] = g - IMAGENET_MEAN_BGR[1];
    out[i + 2] = r - IMAGENET_MEAN_BGR[2];
  }
  return out;
};
