export { Tokenizer, Token } from "./tokenizer";
export { TokenType } from "./tokens";
export { Parser } from "./parser";
export { ExprNS, StmtNS } from "./ast-types";
export * from "./errors/errors";
export * from "./vm";
export { parseSource, compileSource, runInContext } from "./runner/runner";
