#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import * as fs from "fs";
import * as path from "path";
import { compileSource } from "../runner/runner";
import { stringifyProgram } from "../vm/disassembler";
import { BytecodeInterpreter, InterpreterOptions } from "../vm/interpreter";
import { Program } from "../vm/types";

interface RunOptions {
  debug?: boolean;
  maxCallDepth?: number;
  maxStackSize?: number;
}

interface CompileOptions {
  output?: string;
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function readSource(inputFile: string): string {
  if (!fs.existsSync(inputFile)) {
    console.error(`Error: File '${inputFile}' not found`);
    process.exit(1);
  }
  return fs.readFileSync(inputFile, "utf8");
}

function fail(error: unknown): never {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

function interpretProgram(program: Program, options: RunOptions) {
  const interpreterOptions: Partial<InterpreterOptions> = {
    debug: options.debug ?? false,
  };
  if (options.maxCallDepth !== undefined) {
    interpreterOptions.maxCallDepth = options.maxCallDepth;
  }
  if (options.maxStackSize !== undefined) {
    interpreterOptions.maxStackSize = options.maxStackSize;
  }

  const interpreter = new BytecodeInterpreter(program, interpreterOptions);
  const result = interpreter.execute();
  if (options.debug) {
    const stats = interpreter.getStats();
    console.log(`Execution result: ${result}`);
    console.log(`Instructions executed: ${stats.instructionCount}`);
    console.log(`Deepest call: ${stats.maxCallDepth}`);
  }
}

/**
 * CLI tool for compiling and running Stackling programs
 */
function main() {
  const program = new Command();

  program
    .name("stackling")
    .description("Stackling - compile and run programs on the stack VM")
    .version("0.1.0");

  program
    .command("run")
    .description("Compile and run a program")
    .argument("<input-file>", "Source file to run")
    .option("-d, --debug", "Trace every executed instruction")
    .option("--max-call-depth <n>", "Maximum number of nested calls", parsePositiveInteger)
    .option("--max-stack-size <n>", "Maximum operand stack size per frame", parsePositiveInteger)
    .action((inputFile: string, options: RunOptions) => {
      const code = readSource(inputFile);
      try {
        interpretProgram(compileSource(code), options);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command("compile")
    .description("Compile a program and write its bytecode listing")
    .argument("<input-file>", "Source file to compile")
    .option("-o, --output <file>", "Output file path")
    .action((inputFile: string, options: CompileOptions) => {
      const code = readSource(inputFile);
      const outputFile =
        options.output ?? inputFile.replace(/(\.[^./\\]+)?$/, ".lst");
      try {
        const compiled = compileSource(code);

        const outputDir = path.dirname(outputFile);
        if (outputDir && !fs.existsSync(outputDir)) {
          fs.mkdirSync(outputDir, { recursive: true });
        }
        fs.writeFileSync(outputFile, stringifyProgram(compiled));

        console.log(`Bytecode listing saved to: ${outputFile}`);
        console.log(`\nCompilation Summary:`);
        console.log(`  Total Instructions: ${compiled.instructions.length}`);
        console.log(`  Total Symbols: ${compiled.symbols.entries().length}`);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command("disasm")
    .description("Print the bytecode listing of a program")
    .argument("<input-file>", "Source file to compile")
    .action((inputFile: string) => {
      const code = readSource(inputFile);
      try {
        process.stdout.write(stringifyProgram(compileSource(code)));
      } catch (error) {
        fail(error);
      }
    });

  program.parse(process.argv);
}

// Run the CLI if this file is executed directly
if (require.main === module) {
  main();
}

export { main };
