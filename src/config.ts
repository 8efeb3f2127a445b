import type { Viewport } from "./frame.js";

export type CliConfig = {
  file?: string;
  event: string;
  frames: number;
  dt: number;
  viewport: Viewport;
  quiet: boolean;
  help: boolean;
};

/** Bad command line; the CLI prints it and exits with 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const valued = new Set(["--event", "--frames", "--dt", "--width", "--height"]);

export function parseArgs(args: readonly string[]): CliConfig {
  const option = (name: string): string | undefined => {
    const i = args.indexOf(name);
    return i >= 0 ? args[i + 1] : undefined;
  };

  const numeric = (name: string, dflt: number): number => {
    const raw = option(name);
    if (raw === undefined) return dflt;
    const n = Number(raw);
    if (raw.trim() === "" || !Number.isFinite(n)) throw new UsageError(`${name} expects a number, got '${raw}'`);
    return n;
  };

  const frames = numeric("--frames", 1);
  if (!Number.isInteger(frames) || frames < 0)
    throw new UsageError(`--frames expects a non-negative integer, got '${option("--frames") ?? ""}'`);

  return {
    file: args.find((a, i) => !a.startsWith("--") && !valued.has(args[i - 1] ?? "")),
    event: option("--event") ?? "render",
    frames,
    dt: numeric("--dt", 1 / 60),
    viewport: { width: numeric("--width", 800), height: numeric("--height", 600) },
    quiet: args.includes("--quiet"),
    help: args.includes("--help"),
  };
}
