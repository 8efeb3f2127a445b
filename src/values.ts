import type { Stmt } from "./ast.js";
import type { Env } from "./runtime.js";
import { RuntimeError, type Pos } from "./errors.js";

/** Host callable. Gets the caller's scope and the evaluated arguments. */
export type NativeFn = (env: Env, args: Value[]) => Value;

export type Fun =
  | { readonly native: NativeFn; readonly name: string }
  | { readonly params: readonly string[]; readonly body: readonly Stmt[]; readonly name: string };

export type Value =
  | { readonly k: "Nil" }
  | { readonly k: "Int"; readonly v: number }
  | { readonly k: "Float"; readonly v: number }
  | { readonly k: "Bool"; readonly v: boolean }
  | { readonly k: "Str"; readonly v: string }
  | { readonly k: "Fun"; readonly fn: Fun };

export type ValueKind = Value["k"];

const NIL: Value = { k: "Nil" };
export const nil = (): Value => NIL;
export const int = (v: number): Value => ({ k: "Int", v: Math.trunc(v) });
export const float = (v: number): Value => ({ k: "Float", v });
export const bool = (v: boolean): Value => ({ k: "Bool", v });
export const str = (v: string): Value => ({ k: "Str", v });
export const native = (name: string, fn: NativeFn): Value => ({ k: "Fun", fn: { native: fn, name } });
export const userFun = (name: string, params: readonly string[], body: readonly Stmt[]): Value =>
  ({ k: "Fun", fn: { params, body, name } });

export const isNative = (fn: Fun): fn is Extract<Fun, { native: NativeFn }> => "native" in fn;

export function truthy(v: Value): boolean {
  switch (v.k) {
    case "Nil": return false;
    case "Bool": return v.v;
    case "Int": case "Float": return v.v !== 0;
    case "Str": return v.v.length > 0;
    case "Fun": return true;
  }
}

export function toFloat(v: Value, pos?: Pos): number {
  if (v.k === "Int" || v.k === "Float") return v.v;
  throw new RuntimeError(`Expected numeric value, got ${v.k}`, pos);
}

export function toInt(v: Value, pos?: Pos): number {
  if (v.k === "Int") return v.v;
  if (v.k === "Float") return Math.trunc(v.v);
  throw new RuntimeError(`Expected numeric value, got ${v.k}`, pos);
}

/** Display form used by `print` and the REPL. Floats always keep a fractional part. */
export function show(v: Value): string {
  switch (v.k) {
    case "Nil": return "nil";
    case "Int": return String(v.v);
    case "Float": return Number.isInteger(v.v) ? v.v.toFixed(1) : String(v.v);
    case "Bool": return String(v.v);
    case "Str": return v.v;
    case "Fun": return isNative(v.fn) ? `<native ${v.fn.name}>` : `<proc ${v.fn.name}>`;
  }
}
