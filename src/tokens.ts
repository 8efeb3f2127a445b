/* Tokens + operator table + char helpers */

export enum T {
  // Literals
  Int, Float, String,
  Identifier,

  // Operators (lexeme carries which one)
  Op,

  // Punctuation
  LParen, RParen, Comma, Colon,

  // Layout
  Newline, Indent, Dedent,

  EOF,
}

export type Tok = { readonly t: T; readonly lex: string; readonly line: number; readonly col: number };

/** Two-char operators must be tried before their one-char prefixes. */
export const twoCharOps = ["==", "!=", "<=", ">="] as const;
export const oneCharOps = ["=", "<", ">", "+", "-", "*", "/", "%"] as const;

export const isDigit = (ch: string) => ch >= "0" && ch <= "9";
export const isIdStart = (ch: string) => /[A-Za-z_]/.test(ch);
export const isIdPart = (ch: string) => /[A-Za-z0-9_]/.test(ch);

export function showTok(tok: Tok): string {
  switch (tok.t) {
    case T.Newline: return "newline";
    case T.Indent: return "indent";
    case T.Dedent: return "dedent";
    case T.EOF: return "end of input";
    default: return `'${tok.lex}'`;
  }
}
