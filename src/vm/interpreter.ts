import OpCodes from "./opcodes";
import {
  ArgumentCountError,
  SlotOutOfRangeError,
  StackOverflowError,
  StackUnderflowError,
  UnresolvedSymbolError,
} from "./errors";
import { executePrimitive, PRIMITIVE_FUNCTIONS } from "./primitives";
import { formatInstruction } from "./disassembler";
import { Instruction, Label, Program } from "./types";

/**
 * Stack-machine interpreter for compiled programs.
 *
 * Each call gets its own frame record in a call-frame list; operands,
 * slots (parameters and locals) and the incoming arguments of one invocation
 * are kept apart instead of sharing one untyped stack. Top-level code runs in
 * an implicit entry frame whose slots grow on demand.
 */

export interface InterpreterOptions {
  maxStackSize: number; // per-frame operand stack limit
  maxCallDepth: number;
  debug: boolean;
  output: (line: string) => void;
}

export const DEFAULT_INTERPRETER_OPTIONS: InterpreterOptions = {
  maxStackSize: 10000,
  maxCallDepth: 1000,
  debug: false,
  output: (line: string) => console.log(line),
};

/**
 * Call frame for function execution
 */
interface CallFrame {
  name: string;
  returnAddress: number; // Where to resume in the caller
  arguments: number[]; // Values the caller pushed, in source order
  slots: number[];
  stack: number[]; // Each frame has its own operand stack
}

export interface InterpreterState {
  pc: number;
  callDepth: number;
  stackDepth: number; // operand stack of the current frame
  halted: boolean;
}

export const ENTRY_FRAME_NAME = "<main>";

export class BytecodeInterpreter {
  private readonly program: Program;
  private readonly instructions: readonly Instruction[];
  private readonly options: InterpreterOptions;
  private readonly frames: CallFrame[] = [];
  private readonly stdout: string[] = [];
  private pc = 0;
  private halted = false;
  private result: number | undefined = undefined;
  private instructionCount = 0;
  private maxCallDepthReached = 0;

  constructor(program: Program, options: Partial<InterpreterOptions> = {}) {
    this.program = program;
    this.instructions = program.instructions;
    this.options = { ...DEFAULT_INTERPRETER_OPTIONS, ...options };
    this.reset();
  }

  /**
   * Debug logging helper
   */
  private debug(message: string): void {
    if (this.options.debug) {
      console.log(`[DEBUG] ${message}`);
    }
  }

  /**
   * Run from the first instruction until the code runs out or the top level
   * returns. Yields the value of a top-level `return`, if any.
   */
  execute(): number | undefined {
    this.reset();
    let running = true;
    while (running) {
      running = this.step();
    }
    return this.result;
  }

  /**
   * Retire one instruction. Returns false once the program has finished.
   */
  step(): boolean {
    if (this.halted) {
      return false;
    }
    if (this.pc >= this.instructions.length) {
      this.halted = true;
      return false;
    }

    const instr = this.instructions[this.pc];
    this.instructionCount++;
    if (this.options.debug) {
      const stackStr = this.currentFrame().stack.join(", ");
      this.debug(`PC=${this.pc} | ${formatInstruction(instr)} | Stack: [${stackStr}]`);
    }
    this.executeInstruction(instr);
    return !this.halted;
  }

  getState(): InterpreterState {
    return {
      pc: this.pc,
      callDepth: this.frames.length,
      stackDepth: this.frames.length > 0 ? this.currentFrame().stack.length : 0,
      halted: this.halted,
    };
  }

  getStats(): { instructionCount: number; maxCallDepth: number } {
    return {
      instructionCount: this.instructionCount,
      maxCallDepth: this.maxCallDepthReached,
    };
  }

  /** Everything `print` has written, one entry per line. */
  getStdout(): string {
    return this.stdout.map((line) => `${line}\n`).join("");
  }

  private reset(): void {
    this.frames.length = 0;
    this.frames.push({
      name: ENTRY_FRAME_NAME,
      returnAddress: -1,
      arguments: [],
      slots: [],
      stack: [],
    });
    this.stdout.length = 0;
    this.pc = 0;
    this.halted = false;
    this.result = undefined;
    this.instructionCount = 0;
    this.maxCallDepthReached = 1;
  }

  private currentFrame(): CallFrame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      throw new Error("No current frame");
    }
    return frame;
  }

  /**
   * Execute a single instruction
   */
  private executeInstruction(instr: Instruction): void {
    switch (instr.opcode) {
      case OpCodes.PUSHC:
        this.push(instr.value);
        this.pc++;
        break;

      case OpCodes.LDSLOT:
        this.push(this.readSlot(instr.slot));
        this.pc++;
        break;

      case OpCodes.BINDARG:
        this.bindArgument(instr.slot, instr.callerOffset);
        this.pc++;
        break;

      case OpCodes.STSLOT:
        this.writeSlot(instr.slot, this.pop());
        this.pc++;
        break;

      case OpCodes.BRF:
        if (this.pop() === 0) {
          this.pc = this.labelLocation(instr.target);
        } else {
          this.pc++;
        }
        break;

      case OpCodes.JMP:
        this.pc = this.labelLocation(instr.target);
        break;

      case OpCodes.CALL:
        this.call(instr.callee, instr.numArgs);
        break;

      case OpCodes.RET:
        this.return();
        break;

      case OpCodes.ADD:
        this.binaryOp((a, b) => (a + b) | 0);
        this.pc++;
        break;

      case OpCodes.SUB:
        this.binaryOp((a, b) => (a - b) | 0);
        this.pc++;
        break;

      case OpCodes.LT:
        this.binaryOp((a, b) => (a < b ? 1 : 0));
        this.pc++;
        break;

      case OpCodes.POP:
        this.pop();
        this.pc++;
        break;
    }
  }

  // ========================================================================
  // Stack Operations
  // ========================================================================

  private push(value: number): void {
    const stack = this.currentFrame().stack;
    if (stack.length >= this.options.maxStackSize) {
      throw new StackOverflowError(
        `Operand stack overflow (max: ${this.options.maxStackSize})`,
        this.pc
      );
    }
    stack.push(value);
  }

  private pop(): number {
    const value = this.currentFrame().stack.pop();
    if (value === undefined) {
      throw new StackUnderflowError(this.pc);
    }
    return value;
  }

  /** Pops `count` values and returns them bottom-first, i.e. in push order. */
  private popMany(count: number): number[] {
    const values: number[] = new Array(count);
    for (let i = count - 1; i >= 0; i--) {
      values[i] = this.pop();
    }
    return values;
  }

  private binaryOp(op: (left: number, right: number) => number): void {
    const right = this.pop();
    const left = this.pop();
    this.push(op(left, right));
  }

  // ========================================================================
  // Slot Operations
  // ========================================================================

  private readSlot(slot: number): number {
    const slots = this.currentFrame().slots;
    if (slot < 0 || slot >= slots.length) {
      throw new SlotOutOfRangeError(slot, slots.length, this.pc);
    }
    return slots[slot];
  }

  private writeSlot(slot: number, value: number): void {
    const slots = this.currentFrame().slots;
    if (slot < 0) {
      throw new SlotOutOfRangeError(slot, slots.length, this.pc);
    }
    while (slots.length <= slot) {
      slots.push(0);
    }
    slots[slot] = value;
  }

  private bindArgument(slot: number, callerOffset: number): void {
    const args = this.currentFrame().arguments;
    const index = args.length - callerOffset;
    if (callerOffset <= 0 || index < 0) {
      throw new SlotOutOfRangeError(-callerOffset, args.length, this.pc);
    }
    this.writeSlot(slot, args[index]);
  }

  // ========================================================================
  // Control Flow
  // ========================================================================

  private labelLocation(label: Label): number {
    const symbol = this.program.symbols.resolveLabel(label);
    if (!symbol) {
      throw new UnresolvedSymbolError(label.name, this.pc);
    }
    return symbol.location;
  }

  private call(callee: string, numArgs: number): void {
    // Builtins are intercepted before symbol lookup
    const primitiveIndex = PRIMITIVE_FUNCTIONS.get(callee);
    if (primitiveIndex !== undefined) {
      const args = this.popMany(numArgs);
      this.push(
        executePrimitive(primitiveIndex, args, {
          writeLine: (line) => {
            this.stdout.push(line);
            this.options.output(line);
          },
        })
      );
      this.pc++;
      return;
    }

    const symbol = this.program.symbols.resolveFunction(callee);
    if (!symbol) {
      throw new UnresolvedSymbolError(callee, this.pc);
    }
    if (numArgs !== symbol.arity) {
      throw new ArgumentCountError(callee, symbol.arity, numArgs, this.pc);
    }
    if (this.frames.length >= this.options.maxCallDepth) {
      throw new StackOverflowError(
        `Maximum call depth exceeded (${this.options.maxCallDepth})`,
        this.pc
      );
    }

    const args = this.popMany(numArgs);
    this.debug(`[CALL] ${callee}(${args.join(", ")}) -> ${symbol.location}`);

    this.frames.push({
      name: callee,
      returnAddress: this.pc + 1,
      arguments: args,
      slots: new Array<number>(symbol.localCount).fill(0),
      stack: [],
    });
    this.maxCallDepthReached = Math.max(this.maxCallDepthReached, this.frames.length);
    this.pc = symbol.location;
  }

  private return(): void {
    const returnValue = this.pop();
    const frame = this.currentFrame();

    if (this.frames.length === 1) {
      // Returning from the top level ends the program
      this.debug(`[RET] Program result: ${returnValue}`);
      this.result = returnValue;
      this.halted = true;
      return;
    }

    this.frames.pop();
    this.debug(`[RET] ${frame.name} -> ${returnValue}`);
    this.pc = frame.returnAddress;
    this.push(returnValue);
  }
}

