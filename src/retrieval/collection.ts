import { setTimeout as delay } from "node:timers/promises";

import type { EmbeddingExtractor } from "../embedding/extractor.js";
import { fetchImage, type FetchResult } from "../integrations/http/imageFetcher.js";
import { logger as defaultLogger, type Logger } from "../logging/logger.js";
import { IndexOutOfRangeError, RebuildInProgressError } from "./errors.js";
import type {
  DroppedImage,
  EmbeddingVector,
  ImageRecord,
  ReadableCollection,
  RebuildResult
} from "./types.js";

export type EmbeddingCollectionOptions = {
  extractor: EmbeddingExtractor;
  /** Defaults to {@link fetchImage} at the model's input size. */
  fetchImage?: (location: string) => Promise<FetchResult>;
  /** Pause between consecutive fetch attempts. Defaults to 100ms. */
  throttleMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

/**
 * Locations, titles and vectors of the images that made it through the last
 * rebuild, kept in parallel: index `i` is the same image in all three.
 *
 * Rebuilds run strictly one item at a time and are not reentrant; callers
 * sharing an instance must serialize them.
 */
export class EmbeddingCollection implements ReadableCollection {
  private locationList: string[] = [];
  private titleList: string[] | null = null;
  private vectorList: EmbeddingVector[] = [];
  private rebuilding = false;

  private readonly extractor: EmbeddingExtractor;
  private readonly fetcher: (location: string) => Promise<FetchResult>;
  private readonly throttleMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: EmbeddingCollectionOptions) {
    const throttleMs = options.throttleMs ?? 100;
    if (!Number.isFinite(throttleMs) || throttleMs < 0) {
      throw new Error(`throttleMs must be a non-negative number, got: ${throttleMs}`);
    }
    const [size] = options.extractor.model.inputShape;

    this.extractor = options.extractor;
    this.fetcher = options.fetchImage ?? ((location) => fetchImage(location, { size }));
    this.throttleMs = throttleMs;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.logger = options.logger ?? defaultLogger;
  }

  get size(): number {
    return this.vectorList.length;
  }

  /** Vector length shared by every record, or `null` while empty. */
  get dimension(): number | null {
    return this.vectorList[0]?.length ?? null;
  }

  get locations(): string[] {
    return [...this.locationList];
  }

  /** `null` when the last rebuild was given no titles. */
  get titles(): string[] | null {
    return this.titleList ? [...this.titleList] : null;
  }

  get vectors(): EmbeddingVector[] {
    return this.vectorList.map((v) => [...v]);
  }

  get(index: number): ImageRecord {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new IndexOutOfRangeError(index, this.size);
    }
    const location = this.locationList[index];
    const vector = this.vectorList[index];
    if (location === undefined || vector === undefined) {
      throw new IndexOutOfRangeError(index, this.size);
    }
    return { location, title: this.titleList?.[index], vector };
  }

  /** First index holding `location`, or -1. */
  indexOf(location: string): number {
    return this.locationList.indexOf(location);
  }

  records(): ImageRecord[] {
    return this.locationList.map((_, i) => this.get(i));
  }

  private reset(withTitles: boolean): void {
    this.locationList = [];
    this.titleList = withTitles ? [] : null;
    this.vectorList = [];
  }

  /**
   * Replaces the whole collection with the images from `locations` that could
   * be fetched and embedded, in input order. Failed inputs are left out (not
   * kept as holes) and reported in `dropped`.
   */
  async rebuild(locations: readonly string[], titles?: readonly string[]): Promise<RebuildResult> {
    if (this.rebuilding) {
      throw new RebuildInProgressError();
    }
    if (titles && titles.length !== locations.length) {
      throw new Error(`Title count mismatch: locations=${locations.length} titles=${titles.length}`);
    }

    this.rebuilding = true;
    this.reset(titles != null);
    const dropped: DroppedImage[] = [];

    try {
      for (let position = 0; position < locations.length; position += 1) {
        if (position > 0 && this.throttleMs > 0) {
          await this.sleep(this.throttleMs);
        }

        const location = locations[position] ?? "";
        this.logger.debug({ position, location }, "fetching image");

        const fetched = await this.fetcher(location);
        const vector = fetched.ok ? await this.extractor.extract(fetched.pixels) : null;

        if (!vector) {
          const reason = fetched.ok ? "No embedding produced" : fetched.error.message;
          dropped.push({ position, location, reason });
          this.logger.warn({ position, location, reason }, "dropping image");
          continue;
        }

        const dimension = this.dimension;
        if (dimension !== null && vector.length !== dimension) {
          throw new Error(
            `Embedding dimension mismatch at position ${position}: expected=${dimension} actual=${vector.length}`
          );
        }

        this.locationList.push(location);
        this.titleList?.push(titles?.[position] ?? "");
        this.vectorList.push(vector);
      }
    } catch (err: unknown) {
      this.reset(false);
      throw err;
    } finally {
      this.rebuilding = false;
    }

    this.logger.info(
      { requested: locations.length, kept: this.size, dropped: dropped.length },
      "collection rebuilt"
    );
    return { locations: this.locations, vectors: this.vectors, dropped };
  }
}
