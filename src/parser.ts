import { T, type Tok, showTok } from "./tokens.js";
import type { BinaryOp, Branch, Expr, Param, Program, Stmt } from "./ast.js";
import { ParseError } from "./errors.js";

const precedence: Record<BinaryOp, number> = {
  "or": 1,
  "and": 2,
  "==": 3, "!=": 3, "<": 3, "<=": 3, ">": 3, ">=": 3,
  "+": 4, "-": 4,
  "*": 5, "/": 5, "%": 5,
};

// Operand of a prefix operator is parsed above every binary level.
const UNARY_PREC = 100;

const isBinaryOp = (s: string): s is BinaryOp => Object.hasOwn(precedence, s);

export class Parser {
  private i = 0;
  constructor(private toks: Tok[]) {}

  parse(): Program {
    const body: Stmt[] = [];
    for (;;) {
      while (this.try(T.Newline));
      if (this.is(T.EOF)) break;
      body.push(this.stmt());
      this.endOfStmt();
    }
    return { body };
  }

  /* -------- Statements -------- */
  private stmt(): Stmt {
    const tok = this.peek();
    if (tok.t === T.Identifier) {
      switch (tok.lex) {
        case "var": return this.varDecl("Var");
        case "let": return this.varDecl("Let");
        case "if": return this.ifStmt();
        case "for": return this.forStmt();
        case "proc": return this.procDecl();
        case "return": return this.returnStmt();
      }
      const next = this.peekN(1);
      if (next.t === T.Op && next.lex === "=") return this.assign();
    }
    const e = this.expr();
    return { k: "ExprS", e, line: tok.line, col: tok.col };
  }

  // After a block the Dedent has already closed the line.
  private endOfStmt() {
    if (this.try(T.Newline)) return;
    if (this.prev().t === T.Dedent || this.is(T.Dedent) || this.is(T.EOF)) return;
    throw this.err("Expected end of line");
  }

  private block(): Stmt[] {
    this.expect(T.Colon, "Expected ':'");
    this.expect(T.Newline, "Expected newline after ':'");
    this.expect(T.Indent, "Expected indented block");
    const body: Stmt[] = [];
    while (!this.is(T.Dedent) && !this.is(T.EOF)) {
      if (this.try(T.Newline)) continue;
      body.push(this.stmt());
      this.endOfStmt();
    }
    this.expect(T.Dedent, "Expected end of block");
    return body;
  }

  private varDecl(k: "Var" | "Let"): Stmt {
    const kw = this.advance();
    const n = this.expect(T.Identifier, "Expected variable name").lex;
    this.expectOp("=");
    const init = this.expr();
    return { k, n, init, line: kw.line, col: kw.col };
  }

  private assign(): Stmt {
    const target = this.advance();
    this.expectOp("=");
    const v = this.expr();
    return { k: "Assign", n: target.lex, v, line: target.line, col: target.col };
  }

  private ifStmt(): Stmt {
    const kw = this.advance();
    const main: Branch = { c: this.expr(), body: this.block() };
    const elifs: Branch[] = [];
    while (this.tryWord("elif")) elifs.push({ c: this.expr(), body: this.block() });
    const otherwise = this.tryWord("else") ? this.block() : undefined;
    return { k: "If", main, elifs, otherwise, line: kw.line, col: kw.col };
  }

  // Only `for NAME in range(a, b):` exists.
  private forStmt(): Stmt {
    const kw = this.advance();
    const n = this.expect(T.Identifier, "Expected loop variable name").lex;
    this.expectWord("in");
    this.expectWord("range");
    this.expect(T.LParen, "Expected '(' after 'range'");
    const from = this.expr();
    this.expect(T.Comma, "Expected ',' in range(start, end)");
    const to = this.expr();
    this.expect(T.RParen, "Expected ')' after range arguments");
    const body = this.block();
    return { k: "For", n, from, to, body, line: kw.line, col: kw.col };
  }

  private procDecl(): Stmt {
    const kw = this.advance();
    const n = this.expect(T.Identifier, "Expected proc name").lex;
    this.expect(T.LParen, "Expected '('");
    const params: Param[] = [];
    if (!this.is(T.RParen)) {
      do {
        const name = this.expect(T.Identifier, "Expected parameter name").lex;
        this.expect(T.Colon, "Expected ':' after parameter name");
        const type = this.expect(T.Identifier, "Expected parameter type").lex;
        params.push({ n: name, type });
      } while (this.try(T.Comma));
    }
    this.expect(T.RParen, "Expected ')'");
    const body = this.block();
    return { k: "Proc", n, params, body, line: kw.line, col: kw.col };
  }

  private returnStmt(): Stmt {
    const kw = this.advance();
    return { k: "Return", v: this.expr(), line: kw.line, col: kw.col };
  }

  /* -------- Expressions (precedence climbing) -------- */
  private expr(min = 0): Expr {
    let left = this.prefix();
    for (;;) {
      const op = this.binaryOp();
      if (!op || precedence[op] <= min) break;
      const tok = this.advance();
      const r = this.expr(precedence[op]);
      left = { k: "Binary", l: left, op, r, line: tok.line, col: tok.col };
    }
    return left;
  }

  private binaryOp(): BinaryOp | undefined {
    const tok = this.peek();
    if (tok.t === T.Op && isBinaryOp(tok.lex)) return tok.lex;
    if (tok.t === T.Identifier && (tok.lex === "and" || tok.lex === "or")) return tok.lex;
    return undefined;
  }

  private prefix(): Expr {
    const tok = this.advance();
    const at = { line: tok.line, col: tok.col };
    switch (tok.t) {
      case T.Int: {
        const v = Number(tok.lex);
        if (!Number.isSafeInteger(v)) throw new ParseError("Integer literal out of range", showTok(tok), at);
        return { k: "Int", v, ...at };
      }
      case T.Float: return { k: "Float", v: Number(tok.lex), ...at };
      case T.String: return { k: "Str", v: tok.lex, ...at };
      case T.LParen: {
        const e = this.expr();
        this.expect(T.RParen, "Expected ')'");
        return e;
      }
      case T.Op:
        if (tok.lex === "-") return { k: "Unary", op: "-", r: this.expr(UNARY_PREC), ...at };
        break;
      case T.Identifier:
        if (tok.lex === "true") return { k: "Bool", v: true, ...at };
        if (tok.lex === "false") return { k: "Bool", v: false, ...at };
        if (tok.lex === "not") return { k: "Unary", op: "not", r: this.expr(UNARY_PREC), ...at };
        if (this.try(T.LParen)) return { k: "Call", n: tok.lex, args: this.args(), ...at };
        return { k: "Ident", n: tok.lex, ...at };
    }
    throw new ParseError("Expected expression", showTok(tok), at);
  }

  private args(): Expr[] {
    const args: Expr[] = [];
    if (!this.is(T.RParen)) {
      do { args.push(this.expr()); } while (this.try(T.Comma));
    }
    this.expect(T.RParen, "Expected ')'");
    return args;
  }

  /* -------- helpers -------- */
  private is(t: T) { return this.peek().t === t; }
  private try(t: T) { if (this.is(t)) { this.i++; return true; } return false; }
  private isWord(w: string) { const p = this.peek(); return p.t === T.Identifier && p.lex === w; }
  private tryWord(w: string) { if (this.isWord(w)) { this.i++; return true; } return false; }
  private expect(t: T, msg: string): Tok { if (this.is(t)) return this.advance(); throw this.err(msg); }
  private expectWord(w: string) { if (!this.tryWord(w)) throw this.err(`Expected '${w}'`); }
  private expectOp(op: string) {
    const p = this.peek();
    if (p.t === T.Op && p.lex === op) { this.i++; return; }
    throw this.err(`Expected '${op}'`);
  }
  private prev() { return this.toks[Math.max(this.i - 1, 0)]; }
  // The stream always ends in EOF; reads past it keep returning EOF.
  private peekN(n: number) { return this.toks[Math.min(this.i + n, this.toks.length - 1)]; }
  private peek() { return this.peekN(0); }
  private advance() { const tok = this.peek(); if (tok.t !== T.EOF) this.i++; return tok; }
  private err(m: string) {
    const p = this.peek();
    return new ParseError(m, showTok(p), { line: p.line, col: p.col });
  }
}
