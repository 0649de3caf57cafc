import { StmtNS } from "../ast-types";
import { Parser } from "../parser";
import { Tokenizer } from "../tokenizer";
import { BytecodeCompiler } from "../vm/compiler";
import { BytecodeInterpreter, InterpreterOptions } from "../vm/interpreter";
import { Program } from "../vm/types";

export function parseSource(code: string): StmtNS.FileInput {
    const tokenizer = new Tokenizer(code)
    const tokens = tokenizer.scanEverything()
    const parser = new Parser(code, tokens)
    return parser.parse()
}

export function compileSource(code: string): Program {
    const ast = parseSource(code);
    const compiler = BytecodeCompiler.fromProgram(code);
    return compiler.compileProgram(ast);
}

export function runInContext(
    code: string,
    options: Partial<InterpreterOptions> = {}
): { result: number | undefined, stdout: string } {
    const program = compileSource(code);
    const interpreter = new BytecodeInterpreter(program, options);
    const result = interpreter.execute();
    return { result, stdout: interpreter.getStdout() };
}
