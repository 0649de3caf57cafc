import OpCodes from "./opcodes";
import { Instruction, Program, SymbolInfo } from "./types";

/**
 * One-line rendering of an instruction for traces and listings
 */
export function formatInstruction(instr: Instruction): string {
  const name = OpCodes[instr.opcode];
  switch (instr.opcode) {
    case OpCodes.PUSHC:
      return `${name} ${instr.value}`;
    case OpCodes.LDSLOT:
    case OpCodes.STSLOT:
      return `${name} ${instr.slot}`;
    case OpCodes.BINDARG:
      return `${name} ${instr.slot} -${instr.callerOffset}`;
    case OpCodes.BRF:
    case OpCodes.JMP:
      return `${name} ${instr.target.name}`;
    case OpCodes.CALL:
      return `${name} ${instr.callee} ${instr.numArgs}`;
    default:
      return name;
  }
}

function formatSymbol(symbol: SymbolInfo): string {
  if (symbol.kind === "function") {
    return `function ${symbol.name} location=${symbol.location} arity=${symbol.arity} locals=${symbol.localCount}`;
  }
  return `label ${symbol.name} location=${symbol.location}`;
}

/**
 * Human-readable listing of a compiled program. Symbols are shown as
 * `name:` lines in front of the instruction they point at, then listed
 * with their metadata at the end.
 */
export function stringifyProgram(program: Program): string {
  const symbols = program.symbols.entries();
  const lines: string[] = [];

  const emitSymbolsAt = (location: number) => {
    for (const symbol of symbols) {
      if (symbol.location === location) {
        lines.push(`${symbol.name}:`);
      }
    }
  };

  program.instructions.forEach((instr, index) => {
    emitSymbolsAt(index);
    lines.push(`${String(index).padStart(4, "0")}  ${formatInstruction(instr)}`);
  });
  emitSymbolsAt(program.instructions.length);

  lines.push("");
  lines.push("; symbols");
  for (const symbol of symbols) {
    lines.push(formatSymbol(symbol));
  }

  return `${lines.join("\n")}\n`;
}
