import { T, type Tok, twoCharOps, oneCharOps, isDigit, isIdStart, isIdPart } from "./tokens.js";
import { LexError } from "./errors.js";

/**
 * Source text → flat token list.
 *
 * Layout is resolved here: each logical line ends in one Newline, a deeper
 * indent opens one Indent, and a shallower one closes one Dedent per level.
 * Blank and comment-only lines produce nothing.
 */
export class Lexer {
  private i = 0; private line = 1; private col = 1;
  private indents = [0];
  constructor(private src: string) {}

  lex(): Tok[] {
    const out: Tok[] = [];
    while (!this.eof()) {
      if (this.col === 1 && !this.layout(out)) continue;
      this.skipWS();
      if (this.eof()) break;
      const line = this.line, col = this.col;
      const c = this.peek();

      if (c === "#") { this.skipComment(); continue; }
      if (c === "\n") { this.advance(); out.push({ t: T.Newline, lex: "\\n", line, col }); continue; }

      switch (c) {
        case "(": this.advance(); out.push({ t: T.LParen, lex: c, line, col }); continue;
        case ")": this.advance(); out.push({ t: T.RParen, lex: c, line, col }); continue;
        case ",": this.advance(); out.push({ t: T.Comma, lex: c, line, col }); continue;
        case ":": this.advance(); out.push({ t: T.Colon, lex: c, line, col }); continue;
        case '"': case "'": out.push(this.string()); continue;
      }

      const two = this.src.slice(this.i, this.i + 2);
      const op2 = twoCharOps.find(o => o === two);
      if (op2) { this.advance(); this.advance(); out.push({ t: T.Op, lex: op2, line, col }); continue; }
      const op1 = oneCharOps.find(o => o === c);
      if (op1) { this.advance(); out.push({ t: T.Op, lex: op1, line, col }); continue; }

      if (isDigit(c)) { out.push(this.number()); continue; }
      if (isIdStart(c)) { out.push(this.identifier()); continue; }
      throw new LexError(`Unexpected character '${c}'`, { line, col });
    }

    const last = out[out.length - 1];
    if (last && last.t !== T.Newline) out.push({ t: T.Newline, lex: "\\n", line: this.line, col: this.col });
    while (this.indents.length > 1) {
      this.indents.pop();
      out.push({ t: T.Dedent, lex: "", line: this.line, col: this.col });
    }
    out.push({ t: T.EOF, lex: "", line: this.line, col: this.col });
    return out;
  }

  /* Measures the indent of the line starting here. Returns false for a line with no code (already consumed). */
  private layout(out: Tok[]): boolean {
    let width = 0;
    while (this.peek() === " " || this.peek() === "\t") { this.advance(); width++; }
    if (this.peek() === "\r") this.advance();
    if (this.eof() || this.peek() === "\n" || this.peek() === "#") {
      this.skipComment();
      if (!this.eof()) this.advance();
      return false;
    }

    const pos = { line: this.line, col: this.col };
    const top = this.indents[this.indents.length - 1];
    if (width > top) {
      this.indents.push(width);
      out.push({ t: T.Indent, lex: "", ...pos });
      return true;
    }
    while (width < this.indents[this.indents.length - 1]) {
      this.indents.pop();
      out.push({ t: T.Dedent, lex: "", ...pos });
    }
    if (width !== this.indents[this.indents.length - 1])
      throw new LexError(`Inconsistent indentation (width ${width} matches no enclosing block)`, pos);
    return true;
  }

  private eof() { return this.i >= this.src.length; }
  private peek() { return this.src[this.i] ?? "\0"; }
  private peekN(n: number) { return this.src[this.i + n] ?? "\0"; }
  private advance() { const ch = this.src[this.i++]; if (ch === "\n") { this.line++; this.col = 1; } else this.col++; return ch; }

  private skipWS() {
    while (this.peek() === " " || this.peek() === "\t" || this.peek() === "\r") this.advance();
  }
  private skipComment() { while (this.peek() !== "\n" && !this.eof()) this.advance(); }

  private string(): Tok {
    const line = this.line, col = this.col;
    const q = this.advance();
    let v = "";
    while (this.peek() !== q) {
      if (this.eof() || this.peek() === "\n") throw new LexError("Unterminated string", { line, col });
      v += this.advance();
    }
    this.advance(); // closing quote
    return { t: T.String, lex: v, line, col };
  }

  private number(): Tok {
    const line = this.line, col = this.col;
    let s = "";
    while (isDigit(this.peek())) s += this.advance();
    if (this.peek() === "." && isDigit(this.peekN(1))) {
      s += this.advance();
      while (isDigit(this.peek())) s += this.advance();
      return { t: T.Float, lex: s, line, col };
    }
    return { t: T.Int, lex: s, line, col };
  }

  private identifier(): Tok {
    const line = this.line, col = this.col;
    let s = "";
    while (isIdPart(this.peek())) s += this.advance();
    return { t: T.Identifier, lex: s, line, col };
  }
}
