import type { Expr, Program, Stmt } from "./ast.js";
import { RuntimeError, type Pos } from "./errors.js";
import { attempt, type Result } from "./result.js";
import {
  type Fun, type NativeFn, type Value,
  nil, int, float, bool, str, native, userFun, isNative, truthy, toFloat, toInt,
} from "./values.js";

/* Control-flow signal: a `return` travels up as a value, not as an exception. */
type ExecResult = { returned: false } | { returned: true; v: Value };
const NORMAL: ExecResult = { returned: false };

// V8 reports exhausted recursion as a RangeError with this wording.
const isStackOverflow = (e: unknown) => e instanceof RangeError && e.message.includes("call stack");

const at = (node: { line: number; col: number }): Pos => ({ line: node.line, col: node.col });

/* Scope chain */
export class Env {
  private m = new Map<string, Value>();
  constructor(readonly parent?: Env) {}

  /** Binds in this frame only, replacing whatever was here. */
  define(n: string, v: Value): void { this.m.set(n, v); }

  /** Updates the nearest binding; with none anywhere, binds here. */
  set(n: string, v: Value): void {
    for (let e: Env | undefined = this; e; e = e.parent) {
      if (e.m.has(n)) { e.m.set(n, v); return; }
    }
    this.m.set(n, v);
  }

  lookup(n: string): Value | undefined {
    for (let e: Env | undefined = this; e; e = e.parent) {
      const v = e.m.get(n);
      if (v !== undefined) return v;
    }
    return undefined;
  }

  get(n: string, pos?: Pos): Value {
    const v = this.lookup(n);
    if (v === undefined) throw new RuntimeError(`Undefined variable '${n}'`, pos);
    return v;
  }

  has(n: string): boolean { return this.lookup(n) !== undefined; }
}

export type InterpreterOptions = {
  globals?: Record<string, Value>;
  natives?: Record<string, NativeFn>;
};

/* ---------------- Interpreter ---------------- */
export class Interpreter {
  readonly globals = new Env();
  private events = new Map<string, Program>();

  constructor(options: InterpreterOptions = {}) {
    for (const [n, fn] of Object.entries(options.natives ?? {})) this.registerNative(n, fn);
    for (const [n, v] of Object.entries(options.globals ?? {})) this.setGlobal(n, v);
  }

  /* ---------- Host surface ---------- */
  registerNative(name: string, fn: NativeFn): void { this.globals.define(name, native(name, fn)); }

  registerEvent(name: string, program: Program): void { this.events.set(name, program); }
  hasEvent(name: string): boolean { return this.events.has(name); }
  eventNames(): string[] { return [...this.events.keys()]; }

  /** Runs the named event against the globals. Unknown names are a no-op. */
  triggerEvent(name: string): Result<void> {
    const program = this.events.get(name);
    return attempt(() => { if (program) this.run(program); });
  }

  /** Executes a program once against the globals, throwing on the first error. */
  run(program: Program): void { this.block(program.body, this.globals); }

  callFunction(name: string, args: Value[]): Result<Value> {
    return attempt(() => this.invoke(this.callee(name, this.globals), args, this.globals));
  }

  setGlobal(name: string, v: Value): void { this.globals.define(name, v); }
  setGlobalInt(name: string, v: number): void { this.setGlobal(name, int(v)); }
  setGlobalFloat(name: string, v: number): void { this.setGlobal(name, float(v)); }
  setGlobalBool(name: string, v: boolean): void { this.setGlobal(name, bool(v)); }
  setGlobalString(name: string, v: string): void { this.setGlobal(name, str(v)); }
  getGlobal(name: string): Value | undefined { return this.globals.lookup(name); }

  /* ---------- Statements ---------- */
  private block(stmts: readonly Stmt[], env: Env): ExecResult {
    for (const s of stmts) {
      const r = this.exec(s, env);
      if (r.returned) return r;
    }
    return NORMAL;
  }

  private exec(s: Stmt, env: Env): ExecResult {
    switch (s.k) {
      case "ExprS": this.eval(s.e, env); return NORMAL;
      case "Var":
      case "Let": env.define(s.n, this.eval(s.init, env)); return NORMAL;
      case "Assign": env.set(s.n, this.eval(s.v, env)); return NORMAL;
      case "If": {
        if (truthy(this.eval(s.main.c, env))) return this.block(s.main.body, env);
        for (const br of s.elifs) {
          if (truthy(this.eval(br.c, env))) return this.block(br.body, env);
        }
        return s.otherwise ? this.block(s.otherwise, env) : NORMAL;
      }
      case "For": {
        const from = toInt(this.eval(s.from, env), at(s.from));
        const to = toInt(this.eval(s.to, env), at(s.to));
        for (let i = from; i < to; i++) {
          env.set(s.n, int(i));
          const r = this.block(s.body, env);
          if (r.returned) return r;
        }
        return NORMAL;
      }
      case "Proc": env.define(s.n, userFun(s.n, s.params.map(p => p.n), s.body)); return NORMAL;
      case "Return": return { returned: true, v: this.eval(s.v, env) };
      case "Block": return this.block(s.body, env);
    }
  }

  /* ---------- Expressions ---------- */
  eval(e: Expr, env: Env): Value {
    switch (e.k) {
      case "Int": return int(e.v);
      case "Float": return float(e.v);
      case "Str": return str(e.v);
      case "Bool": return bool(e.v);
      case "Ident": return env.get(e.n, at(e));
      case "Unary": {
        const r = this.eval(e.r, env);
        if (e.op === "not") return bool(!truthy(r));
        return float(-toFloat(r, at(e)));
      }
      case "Binary": {
        if (e.op === "and") return bool(truthy(this.eval(e.l, env)) && truthy(this.eval(e.r, env)));
        if (e.op === "or") return bool(truthy(this.eval(e.l, env)) || truthy(this.eval(e.r, env)));
        const l = toFloat(this.eval(e.l, env), at(e.l));
        const r = toFloat(this.eval(e.r, env), at(e.r));
        switch (e.op) {
          case "+": return float(l + r);
          case "-": return float(l - r);
          case "*": return float(l * r);
          case "/": return float(l / r);
          case "%": return float(l % r);
          case "==": return bool(l === r);
          case "!=": return bool(l !== r);
          case "<": return bool(l < r);
          case "<=": return bool(l <= r);
          case ">": return bool(l > r);
          case ">=": return bool(l >= r);
        }
      }
      case "Call": {
        const fn = this.callee(e.n, env, at(e));
        const args: Value[] = [];
        for (const a of e.args) args.push(this.eval(a, env));
        return this.invoke(fn, args, env);
      }
    }
  }

  private callee(name: string, env: Env, pos?: Pos): Fun {
    const v = env.get(name, pos);
    if (v.k !== "Fun") throw new RuntimeError(`'${name}' is not callable`, pos);
    return v.fn;
  }

  /* Call frames chain to the caller's scope, not the declaring one. */
  private invoke(fn: Fun, args: Value[], caller: Env): Value {
    if (isNative(fn)) return fn.native(caller, args);
    const frame = new Env(caller);
    fn.params.forEach((p, idx) => frame.define(p, args[idx] ?? nil()));
    try {
      const r = this.block(fn.body, frame);
      return r.returned ? r.v : nil();
    } catch (e) {
      if (isStackOverflow(e)) throw new RuntimeError(`Stack overflow in '${fn.name}'`);
      throw e;
    }
  }
}
