// Core compiler
export { BytecodeCompiler } from "./compiler";
export { ProgramBuilder } from "./program-builder";

// Interpreter
export {
  BytecodeInterpreter,
  InterpreterOptions,
  InterpreterState,
  DEFAULT_INTERPRETER_OPTIONS,
} from "./interpreter";

// Symbols
export { SymbolTable, ResolvedSymbols } from "./symbol-table";

// Types
export {
  Program,
  Instruction,
  Label,
  SymbolInfo,
  FunctionSymbol,
  LabelSymbol,
} from "./types";

// Opcodes
export { default as OpCodes } from "./opcodes";

// Listings
export { formatInstruction, stringifyProgram } from "./disassembler";

// Primitives
export { PRIMITIVE_FUNCTIONS, executePrimitive, isPrimitive } from "./primitives";

// Errors
export * from "./errors";
