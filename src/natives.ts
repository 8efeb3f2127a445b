/* Host bindings: argument helpers for native authors + a reference drawing/input set */

import { RuntimeError } from "./errors.js";
import type { Interpreter } from "./runtime.js";
import { type Value, nil, bool, show } from "./values.js";

/* ---------- Argument helpers ---------- */

function arg(args: Value[], i: number, fn: string, what: string): Value {
  const v = args[i];
  if (v === undefined) throw new RuntimeError(`${fn}: missing ${what} argument at index ${i}`);
  return v;
}

const wrongKind = (fn: string, what: string, i: number, v: Value) =>
  new RuntimeError(`${fn}: expected ${what} at index ${i}, got ${v.k}`);

export function expectInt(args: Value[], i: number, fn: string): number {
  const v = arg(args, i, fn, "integer");
  if (v.k === "Int") return v.v;
  if (v.k === "Float") return Math.trunc(v.v);
  throw wrongKind(fn, "integer", i, v);
}

export function expectFloat(args: Value[], i: number, fn: string): number {
  const v = arg(args, i, fn, "number");
  if (v.k === "Int" || v.k === "Float") return v.v;
  throw wrongKind(fn, "number", i, v);
}

export function expectString(args: Value[], i: number, fn: string): string {
  const v = arg(args, i, fn, "string");
  if (v.k === "Str") return v.v;
  throw wrongKind(fn, "string", i, v);
}

export function expectBool(args: Value[], i: number, fn: string): boolean {
  const v = arg(args, i, fn, "bool");
  if (v.k === "Bool") return v.v;
  throw wrongKind(fn, "bool", i, v);
}

/* ---------- Colours & keys ---------- */

export type Color = { readonly name: string; readonly r: number; readonly g: number; readonly b: number; readonly a: number };

const rgb = (name: string, r: number, g: number, b: number): Color => ({ name, r, g, b, a: 255 });

export const colors: ReadonlyMap<string, Color> = new Map([
  rgb("white", 255, 255, 255),
  rgb("black", 0, 0, 0),
  rgb("red", 230, 41, 55),
  rgb("green", 0, 228, 48),
  rgb("blue", 0, 121, 241),
  rgb("yellow", 253, 249, 0),
  rgb("orange", 255, 161, 0),
  rgb("purple", 200, 122, 255),
  rgb("pink", 255, 109, 194),
  rgb("lightgray", 200, 200, 200),
  rgb("gray", 130, 130, 130),
  rgb("darkgray", 80, 80, 80),
  rgb("raywhite", 245, 245, 245),
  rgb("lightblue", 173, 216, 230),
  rgb("skyblue", 102, 191, 255),
  rgb("lime", 0, 158, 47),
].map((c): [string, Color] => [c.name, c]));

export function expectColor(args: Value[], i: number, fn: string): Color {
  const v = arg(args, i, fn, "color");
  if (v.k !== "Str") throw wrongKind(fn, "color name", i, v);
  const c = colors.get(v.v.toLowerCase());
  if (!c) throw new RuntimeError(`${fn}: unknown color '${v.v}'`);
  return c;
}

export const keyCodes: ReadonlyMap<string, number> = new Map([
  ["space", 32], ["escape", 256], ["enter", 257], ["tab", 258],
  ["right", 262], ["left", 263], ["down", 264], ["up", 265],
]);

/** Key name or raw key code. */
export function expectKey(args: Value[], i: number, fn: string): number {
  const v = arg(args, i, fn, "key");
  if (v.k === "Int") return v.v;
  if (v.k === "Str") {
    const code = keyCodes.get(v.v.toLowerCase());
    if (code === undefined) throw new RuntimeError(`${fn}: unknown key name '${v.v}'`);
    return code;
  }
  throw wrongKind(fn, "key name or key code", i, v);
}

/* ---------- Host ---------- */

export type DrawCommand =
  | { op: "text"; text: string; x: number; y: number; size: number; color: Color }
  | { op: "rect"; x: number; y: number; w: number; h: number; color: Color }
  | { op: "rectLines"; x: number; y: number; w: number; h: number; color: Color }
  | { op: "circle"; x: number; y: number; radius: number; color: Color }
  | { op: "clear"; color: Color };

/** What a frontend supplies so scripts can draw, read input and print. */
export interface Host {
  draw(cmd: DrawCommand): void;
  isKeyDown(key: number): boolean;
  isKeyPressed(key: number): boolean;
  print(line: string): void;
}

export function formatCommand(cmd: DrawCommand): string {
  switch (cmd.op) {
    case "text": return `drawText ${JSON.stringify(cmd.text)} ${cmd.x} ${cmd.y} ${cmd.size} ${cmd.color.name}`;
    case "rect": return `drawRect ${cmd.x} ${cmd.y} ${cmd.w} ${cmd.h} ${cmd.color.name}`;
    case "rectLines": return `drawRectLines ${cmd.x} ${cmd.y} ${cmd.w} ${cmd.h} ${cmd.color.name}`;
    case "circle": return `drawCircle ${cmd.x} ${cmd.y} ${cmd.radius} ${cmd.color.name}`;
    case "clear": return `clear ${cmd.color.name}`;
  }
}

/** Headless host: draw commands become console lines, no key is ever down. */
export function consoleHost(opts: { quiet?: boolean } = {}): Host {
  return {
    draw: cmd => { if (!opts.quiet) console.log(formatCommand(cmd)); },
    isKeyDown: () => false,
    isKeyPressed: () => false,
    print: line => console.log(line),
  };
}

function needs(fn: string, args: Value[], n: number, sig: string) {
  if (args.length < n) throw new RuntimeError(`${fn} expects ${n} arguments: ${sig}`);
}

export function installHostBindings(interp: Interpreter, host: Host): void {
  interp.registerNative("print", (_env, args) => { host.print(args.map(show).join(" ")); return nil(); });

  interp.registerNative("drawText", (_env, args) => {
    needs("drawText", args, 5, "text, x, y, size, color");
    host.draw({
      op: "text",
      text: expectString(args, 0, "drawText"),
      x: expectInt(args, 1, "drawText"),
      y: expectInt(args, 2, "drawText"),
      size: expectInt(args, 3, "drawText"),
      color: expectColor(args, 4, "drawText"),
    });
    return nil();
  });

  for (const op of ["rect", "rectLines"] as const) {
    const fn = op === "rect" ? "drawRect" : "drawRectLines";
    interp.registerNative(fn, (_env, args) => {
      needs(fn, args, 5, "x, y, w, h, color");
      host.draw({
        op,
        x: expectInt(args, 0, fn),
        y: expectInt(args, 1, fn),
        w: expectInt(args, 2, fn),
        h: expectInt(args, 3, fn),
        color: expectColor(args, 4, fn),
      });
      return nil();
    });
  }

  interp.registerNative("drawCircle", (_env, args) => {
    needs("drawCircle", args, 4, "x, y, radius, color");
    host.draw({
      op: "circle",
      x: expectInt(args, 0, "drawCircle"),
      y: expectInt(args, 1, "drawCircle"),
      radius: expectFloat(args, 2, "drawCircle"),
      color: expectColor(args, 3, "drawCircle"),
    });
    return nil();
  });

  interp.registerNative("clear", (_env, args) => {
    needs("clear", args, 1, "color");
    host.draw({ op: "clear", color: expectColor(args, 0, "clear") });
    return nil();
  });

  interp.registerNative("isKeyDown", (_env, args) => bool(host.isKeyDown(expectKey(args, 0, "isKeyDown"))));
  interp.registerNative("isKeyPressed", (_env, args) => bool(host.isKeyPressed(expectKey(args, 0, "isKeyPressed"))));

  for (const name of ["WHITE", "BLACK", "RED", "GREEN", "BLUE", "YELLOW"]) {
    interp.setGlobalString(name, name.toLowerCase());
  }
}
