import { UnresolvedLabelError } from "../errors/errors";
import { FunctionSymbol, Label, LabelSymbol, SymbolInfo } from "./types";

interface PendingFunction {
  name: string;
  arity: number;
  location: number | null;
  localCount: number | null;
}

interface PendingLabel {
  label: Label;
  location: number | null;
}

/**
 * Compile-time symbol table.
 *
 * Functions are declared up front with their arity (placeholder phase), then
 * given an entry location and a final local count while their bodies are
 * emitted. Labels are created when a forward jump is emitted and placed once
 * the jump target is reached. `seal` checks that every symbol was placed and
 * returns the read-only view the interpreter resolves against.
 */
export class SymbolTable {
  private readonly functions = new Map<string, PendingFunction>();
  private readonly labels: PendingLabel[] = [];

  /**
   * Returns false if a function of that name was already declared.
   */
  declareFunction(name: string, arity: number): boolean {
    if (this.functions.has(name)) {
      return false;
    }
    this.functions.set(name, { name, arity, location: null, localCount: null });
    return true;
  }

  /** Arity of a declared function, or undefined if there is none. */
  functionArity(name: string): number | undefined {
    return this.functions.get(name)?.arity;
  }

  markFunctionEntry(name: string, location: number): void {
    this.getPendingFunction(name).location = location;
  }

  finalizeFunction(name: string, localCount: number): void {
    const pending = this.getPendingFunction(name);
    if (localCount < pending.arity) {
      throw new Error(
        `Function ${name} has ${localCount} slots but takes ${pending.arity} arguments`
      );
    }
    pending.localCount = localCount;
  }

  createLabel(prefix: string, at: number): Label {
    const label: Label = {
      kind: "label",
      id: this.labels.length,
      name: `${prefix}_${at}`,
    };
    this.labels.push({ label, location: null });
    return label;
  }

  markLabel(label: Label, location: number): void {
    const pending = this.labels[label.id];
    if (!pending || pending.label !== label) {
      throw new Error(`Label ${label.name} does not belong to this symbol table`);
    }
    pending.location = location;
  }

  seal(): ResolvedSymbols {
    const functions = new Map<string, FunctionSymbol>();
    for (const pending of this.functions.values()) {
      if (pending.location === null || pending.localCount === null) {
        throw new UnresolvedLabelError(pending.name);
      }
      functions.set(pending.name, {
        kind: "function",
        name: pending.name,
        location: pending.location,
        arity: pending.arity,
        localCount: pending.localCount,
      });
    }

    const labels = new Map<number, LabelSymbol>();
    for (const pending of this.labels) {
      if (pending.location === null) {
        throw new UnresolvedLabelError(pending.label.name);
      }
      labels.set(pending.label.id, {
        kind: "label",
        name: pending.label.name,
        location: pending.location,
        arity: 0,
        localCount: 0,
      });
    }

    return new ResolvedSymbols(functions, labels);
  }

  private getPendingFunction(name: string): PendingFunction {
    const pending = this.functions.get(name);
    if (!pending) {
      throw new Error(`Function ${name} was not declared`);
    }
    return pending;
  }
}

/**
 * Read-only symbol table consumed by the interpreter.
 */
export class ResolvedSymbols {
  constructor(
    private readonly functions: ReadonlyMap<string, FunctionSymbol>,
    private readonly labels: ReadonlyMap<number, LabelSymbol>
  ) {}

  resolveFunction(name: string): FunctionSymbol | undefined {
    return this.functions.get(name);
  }

  resolveLabel(label: Label): LabelSymbol | undefined {
    return this.labels.get(label.id);
  }

  resolve(target: Label | string): SymbolInfo | undefined {
    return typeof target === "string"
      ? this.resolveFunction(target)
      : this.resolveLabel(target);
  }

  /** All symbols ordered by location, functions before labels at the same address. */
  entries(): SymbolInfo[] {
    const all: SymbolInfo[] = [...this.functions.values(), ...this.labels.values()];
    return all.sort(
      (a, b) =>
        a.location - b.location ||
        (a.kind === b.kind ? 0 : a.kind === "function" ? -1 : 1)
    );
  }
}
