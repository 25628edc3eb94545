import * as tf from "@tensorflow/tfjs";

import type { Settings } from "../../config/settings.js";
import type { EmbeddingModel } from "../../embedding/types.js";

/** The part of `tf.GraphModel` inference needs. */
export type Predictor = {
  predict(input: tf.Tensor): tf.Tensor | tf.Tensor[] | tf.NamedTensorMap;
};

export function createGraphEmbeddingModel(params: {
  predictor: Predictor;
  name: string;
  imageSize: number;
  dimension: number;
}): EmbeddingModel {
  const { predictor, imageSize, dimension } = params;

  return {
    name: params.name,
    inputShape: [imageSize, imageSize, 3],
    dimension,
    async infer(batch) {
      await tf.ready();
      const output = tf.tidy(() => {
        const input = tf.tensor4d(batch.data, batch.shape, "float32");
        const result = predictor.predict(input);
        if (!(result instanceof tf.Tensor)) {
          throw new Error(`Model ${params.name} returned multiple outputs; expected a single tensor`);
        }
        return result.as2D(batch.shape[0], -1);
      });
      try {
        return await output.array();
      } finally {
        output.dispose();
      }
    }
  };
}

export async function loadGraphEmbeddingModel(settings: Settings): Promise<EmbeddingModel> {
  await tf.ready();
  const graph = await tf.loadGraphModel(settings.modelUrl, {
    fromTFHub: settings.modelFromTfHub
  });
  return createGraphEmbeddingModel({
    predictor: graph,
    name: settings.modelUrl,
    imageSize: settings.imageSize,
    dimension: settings.embeddingDimension
  });
}
