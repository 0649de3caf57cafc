import { ExprNS, StmtNS } from "../ast-types";
import {
  ArityMismatchError,
  CompileError,
  DuplicateFunctionError,
  IntegerRangeError,
  ReservedNameError,
  UndefinedFunctionError,
  UndefinedVariableError,
  UnsupportedOperatorError,
} from "../errors/errors";
import { Token } from "../tokenizer";
import { TokenType } from "../tokens";
import { BytecodeCompiler } from "../vm/compiler";
import { formatInstruction } from "../vm/disassembler";
import { compile, listing } from "./utils";

describe('Bytecode Compiler', () => {
  describe('Emission', () => {
    test('Function declaration is guarded and binds its argument', () => {
      expect(listing("function id(x) return x; end id(42);")).toEqual([
        "JMP function_done_0",
        "BINDARG 0 -1",
        "LDSLOT 0",
        "RET",
        "PUSHC 0",
        "RET",
        "PUSHC 42",
        "CALL id 1",
        "POP",
      ]);
    });

    test('Function symbol points inside the body and carries metadata', () => {
      const program = compile("function id(x) return x; end id(42);");
      expect(program.symbols.resolveFunction("id")).toEqual({
        kind: "function",
        name: "id",
        location: 1,
        arity: 1,
        localCount: 1,
      });
      expect(program.symbols.entries().map(s => `${s.name}@${s.location}`))
        .toEqual(["id@1", "function_done_0@6"]);
    });

    test('Parameters bind from the nearest argument outwards', () => {
      expect(listing("function f(a, b) local c = a - b; return c; end")).toEqual([
        "JMP function_done_0",
        "BINDARG 0 -2",
        "BINDARG 1 -1",
        "LDSLOT 0",
        "LDSLOT 1",
        "SUB",
        "STSLOT 2",
        "LDSLOT 2",
        "RET",
        "PUSHC 0",
        "RET",
      ]);
      const program = compile("function f(a, b) local c = a - b; return c; end");
      expect(program.symbols.resolveFunction("f")?.localCount).toBe(3);
    });

    test('Redeclared local initializer reads the earlier binding', () => {
      expect(listing("function f(a) local a = a + 5; return a; end")).toEqual([
        "JMP function_done_0",
        "BINDARG 0 -1",
        "LDSLOT 0",
        "PUSHC 5",
        "ADD",
        "STSLOT 1",
        "LDSLOT 1",
        "RET",
        "PUSHC 0",
        "RET",
      ]);
    });

    test('If statement branches past its body', () => {
      const code = "local a = 1; if a < 2 then print(a); end";
      expect(listing(code)).toEqual([
        "PUSHC 1",
        "STSLOT 0",
        "LDSLOT 0",
        "PUSHC 2",
        "LT",
        "BRF if_else_5",
        "LDSLOT 0",
        "CALL print 1",
        "POP",
      ]);
      const labels = compile(code).symbols.entries();
      expect(labels).toEqual([
        { kind: "label", name: "if_else_5", location: 9, arity: 0, localCount: 0 },
      ]);
    });

    test('Locals declared inside if bodies count towards the frame', () => {
      const program = compile(`
function f(n)
  if n < 1 then
    local zero = 0;
    return zero;
  end
  local one = 1;
  return one;
end`);
      expect(program.symbols.resolveFunction("f")?.localCount).toBe(3);
    });

    test('Call arguments are compiled left to right', () => {
      expect(listing("print(1, 2 + 3);")).toEqual([
        "PUSHC 1",
        "PUSHC 2",
        "PUSHC 3",
        "ADD",
        "CALL print 2",
        "POP",
      ]);
    });

    test('Forward calls resolve', () => {
      expect(listing("return g(); function g() return 5; end")).toEqual([
        "CALL g 0",
        "RET",
        "JMP function_done_2",
        "PUSHC 5",
        "RET",
        "PUSHC 0",
        "RET",
      ]);
    });

    test('Compiles a hand-built tree without source text', () => {
      const tok = (type: TokenType, lexeme: string) => new Token(type, lexeme, 1, 0, 0);
      const one = tok(TokenType.NUMBER, "1");
      const ast = new StmtNS.FileInput(one, one, [
        new StmtNS.Return(one, one, new ExprNS.Binary(one, one,
          new ExprNS.Literal(one, one, 1),
          tok(TokenType.PLUS, "+"),
          new ExprNS.Literal(one, one, 2))),
      ]);
      const program = BytecodeCompiler.fromProgram().compileProgram(ast);
      expect(program.instructions.map(formatInstruction)).toEqual([
        "PUSHC 1",
        "PUSHC 2",
        "ADD",
        "RET",
      ]);
    });

    test('Compiled program is frozen', () => {
      const program = compile("return 1;");
      expect(Object.isFrozen(program)).toBe(true);
      expect(Object.isFrozen(program.instructions)).toBe(true);
    });
  });

  describe('Errors', () => {
    test('Unsupported operator', () => {
      expect(() => compile("1 * 2;")).toThrow(UnsupportedOperatorError);
      expect(() => compile("1 * 2;")).toThrow(
        "Unsupported binary operator '*' (line 1, column 3)\n\n1 * 2;\n  ^ Near here"
      );
    });

    test('Unsupported operator inside a function body', () => {
      expect(() => compile("function f(a) return a > 1; end")).toThrow(UnsupportedOperatorError);
    });

    test('Undefined variable', () => {
      expect(() => compile("return y;")).toThrow(UndefinedVariableError);
    });

    test('Local is not in scope inside its own initializer', () => {
      expect(() => compile("local x = x + 1;")).toThrow(UndefinedVariableError);
      expect(() => compile("local x = x + 1;"))
        .toThrow("Undefined variable 'x' (line 1, column 11)");
      expect(() => compile("function f() local x = x + 1; return x; end"))
        .toThrow(UndefinedVariableError);
    });

    test('Top-level locals are not visible inside functions', () => {
      expect(() => compile("local x = 1; function f() return x; end"))
        .toThrow("Undefined variable 'x' (line 1, column 34)");
    });

    test('Undefined function', () => {
      expect(() => compile("foo(1);")).toThrow(UndefinedFunctionError);
    });

    test('Argument count must match arity', () => {
      expect(() => compile("function f(a) return a; end f(1, 2);")).toThrow(ArityMismatchError);
      expect(() => compile("function f(a) return a; end f(1, 2);"))
        .toThrow("Function 'f' expects 1 argument(s) but got 2");
    });

    test('Duplicate function', () => {
      expect(() => compile("function f() return 1; end function f() return 2; end"))
        .toThrow(DuplicateFunctionError);
    });

    test('Duplicate function nested in an if body', () => {
      expect(() => compile("function f() return 1; end if 1 < 2 then function f() return 2; end end"))
        .toThrow(DuplicateFunctionError);
    });

    test('Builtin names are reserved', () => {
      expect(() => compile("function print(x) return x; end")).toThrow(ReservedNameError);
    });

    test('Integer literal out of range', () => {
      expect(() => compile("return 3000000000;")).toThrow(IntegerRangeError);
    });

    test('Duplicate parameter', () => {
      expect(() => compile("function f(a, a) return a; end")).toThrow(CompileError);
      expect(() => compile("function f(a, a) return a; end")).toThrow("Duplicate parameter 'a'");
    });
  });
});
