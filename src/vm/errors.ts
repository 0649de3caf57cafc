export class VMRuntimeError extends Error {
  readonly pc: number;

  constructor(message: string, pc: number) {
    super(`${message} (at pc ${pc})`);
    this.name = new.target.name;
    this.pc = pc;
  }
}

export class StackUnderflowError extends VMRuntimeError {
  constructor(pc: number) {
    super("Stack underflow", pc);
  }
}

export class StackOverflowError extends VMRuntimeError {}

export class SlotOutOfRangeError extends VMRuntimeError {
  constructor(slot: number, size: number, pc: number) {
    super(`Slot ${slot} out of range (frame has ${size} slots)`, pc);
  }
}

export class UnresolvedSymbolError extends VMRuntimeError {
  constructor(name: string, pc: number) {
    super(`Unresolved symbol '${name}'`, pc);
  }
}

export class ArgumentCountError extends VMRuntimeError {
  constructor(name: string, expected: number, got: number, pc: number) {
    super(`Function '${name}' expects ${expected} argument(s) but got ${got}`, pc);
  }
}
