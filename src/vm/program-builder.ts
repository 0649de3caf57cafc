import OpCodes from "./opcodes";
import { SymbolTable } from "./symbol-table";
import { Instruction, Label, NullaryOpCode, Program } from "./types";

/**
 * Appends instructions to a single flat code list and records the symbols
 * that refer to it. One builder is shared by every compiler instance working
 * on the same program.
 */
export class ProgramBuilder {
  private readonly instructions: Instruction[] = [];
  private readonly symbols = new SymbolTable();

  /** Index the next emitted instruction will get. */
  get size(): number {
    return this.instructions.length;
  }

  emitNullary(opcode: NullaryOpCode): void {
    this.instructions.push({ opcode });
  }

  emitPushConstant(value: number): void {
    this.instructions.push({ opcode: OpCodes.PUSHC, value });
  }

  emitLoadSlot(slot: number): void {
    this.instructions.push({ opcode: OpCodes.LDSLOT, slot });
  }

  emitStoreSlot(slot: number): void {
    this.instructions.push({ opcode: OpCodes.STSLOT, slot });
  }

  emitBindArgument(slot: number, callerOffset: number): void {
    this.instructions.push({ opcode: OpCodes.BINDARG, slot, callerOffset });
  }

  emitCall(callee: string, numArgs: number): void {
    this.instructions.push({ opcode: OpCodes.CALL, callee, numArgs });
  }

  /**
   * Emit a forward jump to a fresh label named `<prefix>_<index of the jump>`.
   * The label must be placed with `markLabel` before `build`.
   */
  emitJump(opcode: OpCodes.BRF | OpCodes.JMP, prefix: string): Label {
    const target = this.symbols.createLabel(prefix, this.size);
    this.instructions.push({ opcode, target });
    return target;
  }

  markLabel(label: Label): void {
    this.symbols.markLabel(label, this.size);
  }

  declareFunction(name: string, arity: number): boolean {
    return this.symbols.declareFunction(name, arity);
  }

  functionArity(name: string): number | undefined {
    return this.symbols.functionArity(name);
  }

  markFunctionEntry(name: string): void {
    this.symbols.markFunctionEntry(name, this.size);
  }

  finalizeFunction(name: string, localCount: number): void {
    this.symbols.finalizeFunction(name, localCount);
  }

  build(): Program {
    return new Program(this.instructions, this.symbols.seal());
  }
}
