import type { EmbeddingExtractor } from "../../embedding/extractor.js";
import type { Logger } from "../../logging/logger.js";
import type { SimilarityMatch } from "../../retrieval/types.js";

export type CommandDeps = {
  extractor?: EmbeddingExtractor;
  fetch?: typeof fetch;
  logger?: Logger;
  write?: (line: string) => void;
};

export function writeLine(deps: CommandDeps, line: string): void {
  if (deps.write) {
    deps.write(line);
    return;
  }
  process.stdout.write(`${line}\n`);
}

export function formatMatch(referenceIndex: number, match: SimilarityMatch): string {
  return [referenceIndex, match.index, match.score.toFixed(4), match.location, match.title ?? ""].join("\t");
}
