import { Lexer } from "./lexer.js";
import { Parser } from "./parser.js";
import type { Program } from "./ast.js";
import { attempt, type Result } from "./result.js";

/**
 * compileSource: text → Program.
 * No optimisation, just lex + parse. Throws LexError / ParseError.
 */
export function compileSource(source: string): Program {
  const toks = new Lexer(source).lex();
  return new Parser(toks).parse();
}

/** Same as compileSource, with the failure returned instead of thrown. */
export function tryCompile(source: string): Result<Program> {
  return attempt(() => compileSource(source));
}
