export type EmbeddingVector = number[];

export type ImageRecord = {
  readonly location: string;
  readonly title?: string;
  readonly vector: readonly number[];
};

/** Read side of a collection; the similarity functions never need more. */
export interface ReadableCollection {
  readonly size: number;
  /** Throws `IndexOutOfRangeError` outside `0..size-1`. */
  get(index: number): ImageRecord;
}

export type DroppedImage = {
  /** Position of the input in the submitted batch. */
  position: number;
  location: string;
  reason: string;
};

export type RebuildResult = {
  locations: string[];
  vectors: EmbeddingVector[];
  dropped: DroppedImage[];
};

export type SimilarityMatch = {
  index: number;
  location: string;
  title?: string;
  score: number;
};
