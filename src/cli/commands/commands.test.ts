import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { silentLogger, solidPng, stubModel } from "../../__fixtures__/stubs.js";
import type { Settings } from "../../config/settings.js";
import { createEmbeddingExtractor } from "../../embedding/extractor.js";
import { runMatchCommand } from "./match.js";
import { runRankCommand } from "./rank.js";
import type { CommandDeps } from "./deps.js";

const settings: Settings = {
  modelUrl: "unused",
  modelFromTfHub: false,
  embeddingDimension: 3,
  imageSize: 2,
  throttleMs: 0,
  fetchTimeoutMs: 0,
  maxImageBytes: 1_000_000,
  logLevel: "silent"
};

const LIST = [
  "# thumbnails",
  "http://img.test/red.png\tRed",
  "http://img.test/missing.png\tMissing",
  "http://img.test/blue.png\tBlue",
  "http://img.test/near-red.png\tNear red"
].join("\n");

const COLOURS: Record<string, [number, number, number]> = {
  "http://img.test/red.png": [255, 0, 0],
  "http://img.test/blue.png": [0, 0, 255],
  "http://img.test/near-red.png": [255, 0, 10]
};

const transport: typeof fetch = async (input) => {
  const colour = COLOURS[String(input)];
  if (!colour) return new Response("not found", { status: 404 });
  return new Response(new Uint8Array(await solidPng(colour)), { status: 200 });
};

describe("cli commands", () => {
  let dir: string;
  let listFile: string;
  let lines: string[];
  let deps: CommandDeps;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "lookalike-cli-"));
    listFile = path.join(dir, "images.txt");
    await fs.writeFile(listFile, LIST, "utf-8");
    lines = [];
    deps = {
      extractor: await createEmbeddingExtractor({ model: stubModel(2) }),
      fetch: transport,
      logger: silentLogger,
      write: (line) => lines.push(line)
    };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("match prints the best match of every reachable image", async () => {
    await runMatchCommand([listFile], settings, deps);

    expect(lines).toEqual([
      "0\t2\t0.9992\thttp://img.test/near-red.png\tNear red",
      "1\t2\t0.0392\thttp://img.test/near-red.png\tNear red",
      "2\t0\t0.9992\thttp://img.test/red.png\tRed"
    ]);
  });

  it("match prints a single reference when given an index", async () => {
    await runMatchCommand([listFile, "1"], settings, deps);
    expect(lines).toEqual(["1\t2\t0.0392\thttp://img.test/near-red.png\tNear red"]);
  });

  it("rank prints the top candidates in order", async () => {
    await runRankCommand([listFile, "0", "2"], settings, deps);

    expect(lines).toEqual([
      "0\t2\t0.9992\thttp://img.test/near-red.png\tNear red",
      "0\t1\t0.0000\thttp://img.test/blue.png\tBlue"
    ]);
  });

  it("match surfaces an out-of-range index", async () => {
    await expect(runMatchCommand([listFile, "3"], settings, deps)).rejects.toThrow(
      "Index 3 is out of range for a collection of size 3"
    );
  });

  it("commands explain their usage", async () => {
    await expect(runMatchCommand([], settings, deps)).rejects.toThrow(
      "Usage: lookalike match <listFile> [index]"
    );
    await expect(runRankCommand([listFile], settings, deps)).rejects.toThrow(
      "Usage: lookalike rank <listFile> <index> [limit]"
    );
  });
});
