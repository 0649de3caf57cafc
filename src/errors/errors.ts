import { Token } from "../tokenizer";

/**
 * Position of a character in the source text.
 * `line` is 1-based, `col` and `index` are 0-based.
 */
export interface SourceLocation {
  line: number;
  col: number;
  index: number;
}

/* Searches backwards and forwards till it hits a newline */
export function getFullLine(source: string, current: number): string {
  let back: number = Math.min(current, source.length);
  while (back > 0 && source[back - 1] !== "\n") {
    back--;
  }
  let forward: number = back;
  while (forward < source.length && source[forward] !== "\n") {
    forward++;
  }

  return source.slice(back, forward);
}

export function createErrorIndicator(col: number): string {
  return `${" ".repeat(col)}^ Near here`;
}

/**
 * An error that points at a place in the program text.
 */
export class SourceError extends Error {
  readonly line: number;
  readonly col: number;
  readonly detail: string;

  constructor(source: string, location: SourceLocation, detail: string) {
    const fullLine = getFullLine(source, location.index);
    super(
      `${detail} (line ${location.line}, column ${location.col + 1})\n\n` +
        `${fullLine}\n${createErrorIndicator(location.col)}`
    );
    this.name = new.target.name;
    this.line = location.line;
    this.col = location.col;
    this.detail = detail;
  }
}

export class TokenizerError extends SourceError {}

export class ParserError extends SourceError {
  constructor(source: string, token: Token, expected: string) {
    const found = token.lexeme === "" ? "end of input" : `'${token.lexeme}'`;
    super(source, token, `Expected ${expected} but found ${found}`);
  }
}

export class CompileError extends SourceError {}

export class UnsupportedOperatorError extends CompileError {
  constructor(source: string, operator: Token) {
    super(source, operator, `Unsupported binary operator '${operator.lexeme}'`);
  }
}

export class UndefinedVariableError extends CompileError {
  constructor(source: string, name: Token) {
    super(source, name, `Undefined variable '${name.lexeme}'`);
  }
}

export class UndefinedFunctionError extends CompileError {
  constructor(source: string, name: Token) {
    super(source, name, `Undefined function '${name.lexeme}'`);
  }
}

export class ArityMismatchError extends CompileError {
  constructor(source: string, name: Token, expected: number, got: number) {
    super(
      source,
      name,
      `Function '${name.lexeme}' expects ${expected} argument(s) but got ${got}`
    );
  }
}

export class DuplicateFunctionError extends CompileError {
  constructor(source: string, name: Token) {
    super(source, name, `Function '${name.lexeme}' is already declared`);
  }
}

export class ReservedNameError extends CompileError {
  constructor(source: string, name: Token) {
    super(source, name, `'${name.lexeme}' is a builtin and cannot be declared`);
  }
}

export class IntegerRangeError extends CompileError {
  constructor(source: string, literal: Token) {
    super(source, literal, `Integer literal ${literal.lexeme} does not fit in 32 bits`);
  }
}

/**
 * Raised when the symbol table is sealed with a target that was never placed.
 * This is a compiler bug rather than a problem in the program text.
 */
export class UnresolvedLabelError extends Error {
  constructor(name: string) {
    super(`Label '${name}' was referenced but never placed`);
    this.name = "UnresolvedLabelError";
  }
}
