import OpCodes from "./opcodes";
import { ResolvedSymbols } from "./symbol-table";

/**
 * Opaque handle for a compiler-generated jump target.
 * Labels never share a namespace with function names.
 */
export interface Label {
  readonly kind: "label";
  readonly id: number;
  readonly name: string;
}

export type Instruction =
  | { opcode: OpCodes.PUSHC; value: number }
  | { opcode: OpCodes.LDSLOT; slot: number }
  | { opcode: OpCodes.BINDARG; slot: number; callerOffset: number }
  | { opcode: OpCodes.STSLOT; slot: number }
  | { opcode: OpCodes.BRF; target: Label }
  | { opcode: OpCodes.JMP; target: Label }
  | { opcode: OpCodes.CALL; callee: string; numArgs: number }
  | { opcode: OpCodes.RET }
  | { opcode: OpCodes.ADD }
  | { opcode: OpCodes.SUB }
  | { opcode: OpCodes.LT }
  | { opcode: OpCodes.POP };

export type NullaryOpCode =
  | OpCodes.RET
  | OpCodes.ADD
  | OpCodes.SUB
  | OpCodes.LT
  | OpCodes.POP;

export interface FunctionSymbol {
  kind: "function";
  name: string;
  location: number;
  arity: number;
  localCount: number;
}

export interface LabelSymbol {
  kind: "label";
  name: string;
  location: number;
  arity: 0;
  localCount: 0;
}

export type SymbolInfo = FunctionSymbol | LabelSymbol;

/**
 * A compiled program: the flat instruction list plus its sealed symbol table.
 */
export class Program {
  readonly instructions: readonly Instruction[];
  readonly symbols: ResolvedSymbols;

  constructor(instructions: Instruction[], symbols: ResolvedSymbols) {
    this.instructions = Object.freeze(instructions.slice());
    this.symbols = symbols;
    Object.freeze(this);
  }
}
