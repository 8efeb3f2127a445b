// Barrel

export { Lexer } from "./lexer.js";
export { Parser } from "./parser.js";
export { Interpreter, Env } from "./runtime.js";
export type { InterpreterOptions } from "./runtime.js";
export { compileSource, tryCompile } from "./compile.js";
export { FrameContext } from "./frame.js";
export type { Viewport } from "./frame.js";
export * from "./tokens.js";
export type * from "./ast.js";
export * from "./values.js";
export * from "./errors.js";
export * from "./result.js";
export * from "./natives.js";
