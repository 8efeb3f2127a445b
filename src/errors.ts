/* Error taxonomy. Everything the core throws on bad input is a ScriptError. */

export type ErrorKind = "lex" | "parse" | "runtime";

export type Pos = { line: number; col: number };

export abstract class ScriptError extends Error {
  abstract readonly kind: ErrorKind;
  constructor(message: string, readonly reason: string, readonly pos?: Pos) {
    super(message);
    this.name = new.target.name;
  }
  get line() { return this.pos?.line; }
  get col() { return this.pos?.col; }
}

export class LexError extends ScriptError {
  readonly kind = "lex";
  constructor(reason: string, pos: Pos) {
    super(`[LEX] ${reason} at ${pos.line}:${pos.col}`, reason, pos);
  }
}

export class ParseError extends ScriptError {
  readonly kind = "parse";
  constructor(reason: string, near: string, pos: Pos) {
    super(`[PARSE] ${reason} at token ${near} ${pos.line}:${pos.col}`, reason, pos);
  }
}

export class RuntimeError extends ScriptError {
  readonly kind = "runtime";
  constructor(reason: string, pos?: Pos) {
    super(pos ? `[RUNTIME] ${reason} at ${pos.line}:${pos.col}` : `[RUNTIME] ${reason}`, reason, pos);
  }
}

export const isScriptError = (e: unknown): e is ScriptError => e instanceof ScriptError;
