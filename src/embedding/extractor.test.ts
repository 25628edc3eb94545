import { beforeEach, describe, expect, it, vi } from "vitest";

import { solidGrid, stubModel } from "../__fixtures__/stubs.js";
import type { Settings } from "../config/settings.js";
import { loadGraphEmbeddingModel } from "../integrations/tfjs/graphModel.js";
import { NumericError } from "../retrieval/errors.js";
import { createEmbeddingExtractor } from "./extractor.js";
import { scaleToUnitRange } from "./preprocess.js";

vi.mock("../integrations/tfjs/graphModel.js", () => ({
  loadGraphEmbeddingModel: vi.fn()
}));

const loadModel = vi.mocked(loadGraphEmbeddingModel);

function settingsFor(modelUrl: string, imageSize = 1): Settings {
  return {
    modelUrl,
    modelFromTfHub: false,
    embeddingDimension: 3,
    imageSize,
    throttleMs: 0,
    fetchTimeoutMs: 0,
    maxImageBytes: 1024,
    logLevel: "silent"
  };
}

describe("createEmbeddingExtractor", () => {
  it("uses the injected model with unit-range preprocessing by default", async () => {
    const model = stubModel(1);
    const extractor = await createEmbeddingExtractor({ model });

    expect(extractor.model).toBe(model);
    expect(extractor.preprocess).toBe(scaleToUnitRange);

    const vector = await extractor.extract(solidGrid(1, [255, 0, 51]));
    expect(vector).toHaveLength(3);
    expect(vector?.[0]).toBe(1);
    expect(vector?.[1]).toBe(0);
    expect(vector?.[2]).toBeCloseTo(0.2, 6);
  });

  it("runs the model on a single-item batch", async () => {
    const model = stubModel(2);
    const extractor = await createEmbeddingExtractor({ model });
    await extractor.extract(solidGrid(2, [0, 0, 0]));

    expect(model.batches).toHaveLength(1);
    expect(model.batches[0]?.shape).toEqual([1, 2, 2, 3]);
    expect(model.batches[0]?.data).toHaveLength(12);
  });

  it("applies a custom preprocessing function", async () => {
    const preprocess = vi.fn(() => Float32Array.of(1, 2, 3));
    const extractor = await createEmbeddingExtractor({ model: stubModel(1), preprocess });
    const pixels = solidGrid(1, [9, 9, 9]);

    expect(await extractor.extract(pixels)).toEqual([1, 2, 3]);
    expect(preprocess).toHaveBeenCalledWith(pixels);
  });

  it("returns null without calling the model when there is no image", async () => {
    const model = stubModel(1);
    const infer = vi.spyOn(model, "infer");
    const extractor = await createEmbeddingExtractor({ model });

    expect(await extractor.extract(null)).toBeNull();
    expect(infer).not.toHaveBeenCalled();
  });

  it("rejects a grid that does not fit the model input", async () => {
    const extractor = await createEmbeddingExtractor({ model: stubModel(1) });
    await expect(extractor.extract(solidGrid(2, [0, 0, 0]))).rejects.toThrow(
      "Pixel grid 2x2x3 does not match model input 1x1x3"
    );
  });

  it("rejects preprocessing output of the wrong length", async () => {
    const extractor = await createEmbeddingExtractor({
      model: stubModel(1),
      preprocess: () => new Float32Array(2)
    });
    await expect(extractor.extract(solidGrid(1, [0, 0, 0]))).rejects.toThrow(
      "Preprocessed input length mismatch: expected=3 actual=2"
    );
  });

  it("rejects model output of the wrong dimension", async () => {
    const extractor = await createEmbeddingExtractor({
      model: { ...stubModel(1), infer: async () => [[0.5, 0.5]] }
    });
    await expect(extractor.extract(solidGrid(1, [0, 0, 0]))).rejects.toThrow(
      "Embedding dimension mismatch: expected=3 actual=2"
    );
  });

  it("validates the model at construction", async () => {
    await expect(
      createEmbeddingExtractor({
        model: { name: "broken", inputShape: [1, 1, 3], dimension: 0, infer: async () => [] }
      })
    ).rejects.toThrow("model must provide name, inputShape, a positive dimension and infer()");
  });

  it("rejects a non-finite embedding", async () => {
    const extractor = await createEmbeddingExtractor({
      model: { ...stubModel(1), infer: async () => [[0.5, Number.NaN, 0.5]] }
    });
    const result = extractor.extract(solidGrid(1, [0, 0, 0]));
    await expect(result).rejects.toThrow(NumericError);
    await expect(result).rejects.toThrow("Model stub-model returned a non-finite embedding");
  });
});

describe("createEmbeddingExtractor with the default model", () => {
  beforeEach(() => {
    loadModel.mockReset();
  });

  it("loads the model once and shares it between extractors", async () => {
    const model = stubModel(1);
    loadModel.mockResolvedValue(model);
    const settings = settingsFor("http://models.test/shared");

    const first = await createEmbeddingExtractor({ settings });
    const second = await createEmbeddingExtractor({ settings });

    expect(first.model).toBe(model);
    expect(second.model).toBe(model);
    expect(loadModel).toHaveBeenCalledTimes(1);
    expect(loadModel).toHaveBeenCalledWith(settings);
    expect(first.preprocess).toBe(scaleToUnitRange);
  });

  it("loads a separate model for a different input size", async () => {
    loadModel.mockImplementation(async (settings) => stubModel(settings.imageSize));

    const small = await createEmbeddingExtractor({ settings: settingsFor("http://models.test/sized", 1) });
    const large = await createEmbeddingExtractor({ settings: settingsFor("http://models.test/sized", 2) });

    expect(small.model).not.toBe(large.model);
    expect(large.model.inputShape).toEqual([2, 2, 3]);
    expect(loadModel).toHaveBeenCalledTimes(2);
  });

  it("retries a load that failed", async () => {
    const model = stubModel(1);
    loadModel.mockRejectedValueOnce(new Error("model unavailable")).mockResolvedValueOnce(model);
    const settings = settingsFor("http://models.test/flaky");

    await expect(createEmbeddingExtractor({ settings })).rejects.toThrow("model unavailable");
    const extractor = await createEmbeddingExtractor({ settings });

    expect(extractor.model).toBe(model);
    expect(loadModel).toHaveBeenCalledTimes(2);
  });
});
