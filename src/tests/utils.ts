import { StmtNS } from "../ast-types";
import { compileSource, parseSource, runInContext } from "../runner/runner";
import { formatInstruction } from "../vm/disassembler";
import { BytecodeInterpreter, InterpreterOptions } from "../vm/interpreter";
import { Program } from "../vm/types";

export function parse(code: string): StmtNS.FileInput {
    return parseSource(code);
}

export function compile(code: string): Program {
    return compileSource(code);
}

/** Instructions of a compiled program, one formatted string each. */
export function listing(code: string): string[] {
    return compile(code).instructions.map(formatInstruction);
}

/**
 * Compile and run, keeping `print` output off the console.
 */
export function compileAndRun(
    code: string,
    options: Partial<InterpreterOptions> = {}
): { result: number | undefined, stdout: string } {
    return runInContext(code, { output: () => undefined, ...options });
}

/** Step until the interpreter reaches `pc`, failing if it never does. */
export function runUntil(interpreter: BytecodeInterpreter, pc: number, limit: number = 1000): void {
    for (let i = 0; i < limit; i++) {
        if (interpreter.getState().pc === pc) {
            return;
        }
        if (!interpreter.step()) {
            break;
        }
    }
    throw new Error(`Interpreter never reached pc ${pc}`);
}
