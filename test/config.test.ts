import { describe, it, expect } from "vitest";
import { UsageError, parseArgs } from "../src/config.js";

describe("parseArgs", () => {
  it("falls back to defaults", () => {
    expect(parseArgs([])).toEqual({
      file: undefined,
      event: "render",
      frames: 1,
      dt: 1 / 60,
      viewport: { width: 800, height: 600 },
      quiet: false,
      help: false,
    });
  });

  it("reads the file and valued flags in any order", () => {
    const config = parseArgs(["--frames", "3", "game.cue", "--event", "tick", "--width", "320", "--quiet"]);
    expect(config.file).toBe("game.cue");
    expect(config.frames).toBe(3);
    expect(config.event).toBe("tick");
    expect(config.viewport).toEqual({ width: 320, height: 600 });
    expect(config.quiet).toBe(true);
  });

  it("allows zero frames", () => {
    expect(parseArgs(["--frames", "0"]).frames).toBe(0);
  });

  it.each(["2.5", "-1"])("rejects --frames %s", raw => {
    expect(() => parseArgs(["--frames", raw])).toThrow(UsageError);
    expect(() => parseArgs(["--frames", raw])).toThrow(`--frames expects a non-negative integer, got '${raw}'`);
  });

  it("rejects non-numeric values", () => {
    expect(() => parseArgs(["--dt", "fast"])).toThrow("--dt expects a number, got 'fast'");
    expect(() => parseArgs(["--width"])).not.toThrow();
  });
});
