import { formatInstruction, stringifyProgram } from "../vm/disassembler";
import OpCodes from "../vm/opcodes";
import { ProgramBuilder } from "../vm/program-builder";
import { compile } from "./utils";

describe('Disassembler', () => {
  test('Instruction operands', () => {
    const builder = new ProgramBuilder();
    builder.emitPushConstant(-7);
    builder.emitBindArgument(1, 2);
    builder.emitStoreSlot(4);
    builder.emitCall("print", 0);
    builder.emitNullary(OpCodes.LT);
    const label = builder.emitJump(OpCodes.BRF, "if_else");
    builder.markLabel(label);

    expect(builder.build().instructions.map(formatInstruction)).toEqual([
      "PUSHC -7",
      "BINDARG 1 -2",
      "STSLOT 4",
      "CALL print 0",
      "LT",
      "BRF if_else_5",
    ]);
  });

  test('Listing marks symbols in front of their instruction', () => {
    const program = compile("function id(x) return x; end print(id(42));");
    expect(stringifyProgram(program)).toBe(
      "0000  JMP function_done_0\n" +
      "id:\n" +
      "0001  BINDARG 0 -1\n" +
      "0002  LDSLOT 0\n" +
      "0003  RET\n" +
      "0004  PUSHC 0\n" +
      "0005  RET\n" +
      "function_done_0:\n" +
      "0006  PUSHC 42\n" +
      "0007  CALL id 1\n" +
      "0008  CALL print 1\n" +
      "0009  POP\n" +
      "\n" +
      "; symbols\n" +
      "function id location=1 arity=1 locals=1\n" +
      "label function_done_0 location=6\n"
    );
  });

  test('Label placed after the last instruction', () => {
    const listing = stringifyProgram(compile("if 1 < 2 then print(1); end"));
    expect(listing.endsWith(
      "0006  POP\n" +
      "if_else_3:\n" +
      "\n" +
      "; symbols\n" +
      "label if_else_3 location=7\n"
    )).toBe(true);
  });

  test('Empty program', () => {
    expect(stringifyProgram(compile(""))).toBe("\n; symbols\n");
  });
});
