const DEFAULT_MODEL_URL =
  "https://tfhub.dev/google/tfjs-model/imagenet/mobilenet_v2_100_224/feature_vector/3/default/1";

export type Settings = {
  modelUrl: string;
  modelFromTfHub: boolean;
  embeddingDimension: number;
  imageSize: number;
  throttleMs: number;
  fetchTimeoutMs: number;
  maxImageBytes: number;
  logLevel: string;
};

function readInteger(name: string, fallback: number, min: number): number {
  const raw = process.env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`${name} must be an integer >= ${min}, got: ${raw}`);
  }
  return parsed;
}

function readFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw == null) return fallback;
  return !(raw === "0" || raw.toLowerCase() === "false");
}

export function loadSettings(): Settings {
  return {
    modelUrl: process.env.LOOKALIKE_MODEL_URL ?? DEFAULT_MODEL_URL,
    modelFromTfHub: readFlag("LOOKALIKE_MODEL_FROM_TFHUB", true),
    embeddingDimension: readInteger("LOOKALIKE_EMBEDDING_DIMENSION", 1280, 1),
    imageSize: readInteger("LOOKALIKE_IMAGE_SIZE", 224, 1),
    throttleMs: readInteger("LOOKALIKE_THROTTLE_MS", 100, 0),
    fetchTimeoutMs: readInteger("LOOKALIKE_FETCH_TIMEOUT_MS", 0, 0),
    maxImageBytes: readInteger("LOOKALIKE_MAX_IMAGE_BYTES", 20 * 1024 * 1024, 1),
    logLevel: process.env.LOG_LEVEL ?? "info"
  };
}
