export type Command = "match" | "rank";

export const USAGE = "Usage: lookalike <match|rank> <listFile> [...]";

export function parseCli(argv: string[]): { command: Command; args: string[] } {
  const [, , command, ...rest] = argv;
  if (command !== "match" && command !== "rank") {
    throw new Error(USAGE);
  }
  return { command, args: rest };
}

export function parseIndexArg(raw: string, name: string, min = 0): number {
  const value = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || !Number.isSafeInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got: ${raw}`);
  }
  return value;
}
