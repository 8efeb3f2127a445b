import { describe, it, expect, vi, afterEach } from "vitest";
import { compileSource } from "../src/compile.js";
import { Interpreter } from "../src/runtime.js";
import {
  type DrawCommand, type Host,
  colors, consoleHost, expectBool, expectColor, expectFloat, expectInt, expectKey, expectString,
  formatCommand, installHostBindings,
} from "../src/natives.js";
import { bool, float, int, str } from "../src/values.js";

function recordingHost(down: number[] = []) {
  const draws: DrawCommand[] = [];
  const printed: string[] = [];
  const host: Host = {
    draw: cmd => { draws.push(cmd); },
    isKeyDown: key => down.includes(key),
    isKeyPressed: () => false,
    print: line => { printed.push(line); },
  };
  return { host, draws, printed };
}

function script(src: string, down: number[] = []) {
  const rec = recordingHost(down);
  const interp = new Interpreter();
  installHostBindings(interp, rec.host);
  interp.run(compileSource(src));
  return { ...rec, interp };
}

const white = { name: "white", r: 255, g: 255, b: 255, a: 255 };
const black = { name: "black", r: 0, g: 0, b: 0, a: 255 };

afterEach(() => {
  vi.restoreAllMocks();
});

describe("argument helpers", () => {
  it("coerce numbers", () => {
    expect(expectInt([float(3.9)], 0, "f")).toBe(3);
    expect(expectInt([int(-2)], 0, "f")).toBe(-2);
    expect(expectFloat([int(2)], 0, "f")).toBe(2);
  });

  it("accept exact kinds", () => {
    expect(expectString([int(1), str("s")], 1, "f")).toBe("s");
    expect(expectBool([bool(false)], 0, "f")).toBe(false);
  });

  it("name the function, index and kind on mismatch", () => {
    expect(() => expectBool([str("x")], 0, "f")).toThrow("[RUNTIME] f: expected bool at index 0, got Str");
    expect(() => expectInt([str("x")], 0, "g")).toThrow("[RUNTIME] g: expected integer at index 0, got Str");
    expect(() => expectString([], 0, "f")).toThrow("[RUNTIME] f: missing string argument at index 0");
  });

  it("resolve colors case-insensitively", () => {
    expect(expectColor([str("YeLLow")], 0, "f")).toEqual({ name: "yellow", r: 253, g: 249, b: 0, a: 255 });
    expect(() => expectColor([str("mauve")], 0, "f")).toThrow("[RUNTIME] f: unknown color 'mauve'");
    expect(() => expectColor([int(1)], 0, "f")).toThrow("[RUNTIME] f: expected color name at index 0, got Int");
    expect(colors.size).toBe(16);
  });

  it("resolve key names and pass key codes through", () => {
    expect(expectKey([str("Space")], 0, "k")).toBe(32);
    expect(expectKey([str("up")], 0, "k")).toBe(265);
    expect(expectKey([int(81)], 0, "k")).toBe(81);
    expect(() => expectKey([str("f13")], 0, "k")).toThrow("[RUNTIME] k: unknown key name 'f13'");
  });
});

describe("host bindings", () => {
  it("sends drawText to the host with resolved arguments", () => {
    const { draws } = script('drawText("Hi", 10, 20, 24, "yellow")');
    expect(draws).toEqual([
      { op: "text", text: "Hi", x: 10, y: 20, size: 24, color: { name: "yellow", r: 253, g: 249, b: 0, a: 255 } },
    ]);
  });

  it("truncates float coordinates and accepts color globals", () => {
    const { draws } = script('drawRect(10 / 4, 1.9, 3, 4, "RED")\ndrawRectLines(0, 0, 8, 8, WHITE)\nclear(BLACK)');
    expect(draws).toEqual([
      { op: "rect", x: 2, y: 1, w: 3, h: 4, color: { name: "red", r: 230, g: 41, b: 55, a: 255 } },
      { op: "rectLines", x: 0, y: 0, w: 8, h: 8, color: white },
      { op: "clear", color: black },
    ]);
  });

  it("keeps a fractional circle radius", () => {
    const { draws } = script('drawCircle(5, 6, 2.5, "white")');
    expect(draws).toEqual([{ op: "circle", x: 5, y: 6, radius: 2.5, color: white }]);
  });

  it("prints values in display form", () => {
    const { printed } = script('print("score", 7, 3 + 4, true)\nprint()');
    expect(printed).toEqual(["score 7 7.0 true", ""]);
  });

  it("checks arity before argument kinds", () => {
    expect(() => script("drawCircle(1, 2)")).toThrow("[RUNTIME] drawCircle expects 4 arguments: x, y, radius, color");
    expect(() => script('drawText(1, 2, 3, 4, "red")')).toThrow("[RUNTIME] drawText: expected string at index 0, got Int");
  });

  it("queries key state from the host", () => {
    const { interp } = script('var a = isKeyDown("space")\nvar b = isKeyDown(265)\nvar c = isKeyPressed("space")', [32]);
    expect(interp.getGlobal("a")).toEqual(bool(true));
    expect(interp.getGlobal("b")).toEqual(bool(false));
    expect(interp.getGlobal("c")).toEqual(bool(false));
  });

  it("rejects bad key arguments", () => {
    expect(() => script("isKeyDown(true)")).toThrow("[RUNTIME] isKeyDown: expected key name or key code at index 0, got Bool");
    expect(() => script("isKeyDown()")).toThrow("[RUNTIME] isKeyDown: missing key argument at index 0");
  });

  it("seeds color name globals", () => {
    const { interp } = script("var c = YELLOW");
    expect(interp.getGlobal("c")).toEqual(str("yellow"));
  });
});

describe("console host", () => {
  it("formats draw commands as lines", () => {
    expect(formatCommand({ op: "text", text: "Hi", x: 1, y: 2, size: 3, color: white })).toBe('drawText "Hi" 1 2 3 white');
    expect(formatCommand({ op: "circle", x: 1, y: 2, radius: 2.5, color: black })).toBe("drawCircle 1 2 2.5 black");
    expect(formatCommand({ op: "clear", color: black })).toBe("clear black");
  });

  it("logs draws and prints", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const host = consoleHost();
    host.draw({ op: "clear", color: black });
    host.print("hello");
    expect(log.mock.calls).toEqual([["clear black"], ["hello"]]);
    expect(host.isKeyDown(32)).toBe(false);
  });

  it("drops draws when quiet", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const host = consoleHost({ quiet: true });
    host.draw({ op: "clear", color: black });
    host.print("hello");
    expect(log.mock.calls).toEqual([["hello"]]);
  });
});
