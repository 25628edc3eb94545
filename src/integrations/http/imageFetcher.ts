import type { ReadableStream } from "node:stream/web";

import sharp from "sharp";
import { z } from "zod";

import type { PixelGrid } from "../../embedding/types.js";
import { logger } from "../../logging/logger.js";
import { FetchFailureError } from "../../retrieval/errors.js";

const fetchImageOptionsSchema = z.object({
  fetch: z
    .custom<typeof fetch>((v) => typeof v === "function", { message: "fetch must be a function" })
    .optional(),
  size: z.number().int().positive().default(224),
  maxBytes: z.number().int().positive().default(20 * 1024 * 1024),
  /** 0 leaves timing entirely to the transport. */
  timeoutMs: z.number().int().nonnegative().default(0)
});

export type FetchImageOptions = z.input<typeof fetchImageOptionsSchema>;
type ResolvedFetchImageOptions = z.output<typeof fetchImageOptionsSchema>;

export type FetchResult =
  | { ok: true; pixels: PixelGrid }
  | { ok: false; error: FetchFailureError };

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function readBody(
  location: string,
  body: ReadableStream<Uint8Array>,
  maxBytes: number
): Promise<Buffer> {
  const reader = body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  let drained = false;

  try {
    for (;;) {
      const next = await reader.read();
      if (next.done) {
        drained = true;
        break;
      }
      total += next.value.byteLength;
      if (total > maxBytes) {
        throw new FetchFailureError(location, `Image exceeds ${maxBytes} bytes`);
      }
      chunks.push(next.value);
    }
  } finally {
    if (!drained) {
      await reader.cancel().catch((err: unknown) => {
        logger.debug({ location, err: describe(err) }, "stream cancel failed");
      });
    }
    reader.releaseLock();
  }

  return Buffer.concat(chunks, total);
}

async function download(location: string, options: ResolvedFetchImageOptions): Promise<Buffer> {
  const transport = options.fetch ?? fetch;
  const controller = new AbortController();
  const timer =
    options.timeoutMs > 0 ? setTimeout(() => controller.abort(), options.timeoutMs) : undefined;

  try {
    const response = await transport(location, { signal: controller.signal, redirect: "follow" });

    if (!response.ok) {
      await response.body?.cancel();
      throw new FetchFailureError(location, `Unexpected status ${response.status}`, {
        status: response.status
      });
    }
    if (!response.body) {
      throw new FetchFailureError(location, "Response has no body", { status: response.status });
    }

    // A declared length only describes the decoded body when nothing was compressed in transit.
    const encoding = response.headers.get("content-encoding");
    const declaredRaw =
      encoding == null || encoding === "identity" ? response.headers.get("content-length") : null;
    const declared = declaredRaw == null ? null : Number(declaredRaw);

    if (declared != null && (!Number.isInteger(declared) || declared < 0)) {
      await response.body.cancel();
      throw new FetchFailureError(location, `Malformed content-length: ${declaredRaw}`);
    }
    if (declared != null && declared > options.maxBytes) {
      await response.body.cancel();
      throw new FetchFailureError(location, `Image exceeds ${options.maxBytes} bytes`);
    }

    const bytes = await readBody(location, response.body, options.maxBytes);
    if (declared != null && bytes.length !== declared) {
      throw new FetchFailureError(
        location,
        `Body length mismatch: content-length=${declared} received=${bytes.length}`
      );
    }
    return bytes;
  } catch (err: unknown) {
    if (controller.signal.aborted) {
      throw new FetchFailureError(location, `Request timed out after ${options.timeoutMs}ms`, {
        cause: err
      });
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Decodes any format sharp reads into a `size`×`size` sRGB grid, cropping
 * to cover, honouring EXIF orientation and dropping alpha.
 */
export async function decodeToGrid(location: string, bytes: Buffer, size: number): Promise<PixelGrid> {
  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(bytes, { failOn: "error" })
      .rotate()
      .resize(size, size, { fit: "cover", position: "centre" })
      .toColourspace("srgb")
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (err: unknown) {
    throw new FetchFailureError(location, `Could not decode image: ${describe(err)}`, { cause: err });
  }

  const { data, info } = decoded;
  if (info.channels !== 3 || info.width !== size || info.height !== size) {
    throw new FetchFailureError(
      location,
      `Decoded image has shape ${info.width}x${info.height}x${info.channels}, expected ${size}x${size}x3`
    );
  }

  return {
    width: size,
    height: size,
    channels: 3,
    data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength)
  };
}

/**
 * Single attempt. Transport, status and decode failures come back as
 * `{ ok: false }`; only invalid options throw.
 */
export async function fetchImage(location: string, options: FetchImageOptions = {}): Promise<FetchResult> {
  const resolved = fetchImageOptionsSchema.parse(options);

  try {
    const bytes = await download(location, resolved);
    const pixels = await decodeToGrid(location, bytes, resolved.size);
    return { ok: true, pixels };
  } catch (err: unknown) {
    if (err instanceof FetchFailureError) {
      return { ok: false, error: err };
    }
    return {
      ok: false,
      error: new FetchFailureError(location, `Request failed: ${describe(err)}`, { cause: err })
    };
  }
}
