// Map builtin function name to its dispatch index
export const PRIMITIVE_FUNCTIONS: ReadonlyMap<string, number> = new Map([
  ["print", 0],
]);

export function isPrimitive(name: string): boolean {
  return PRIMITIVE_FUNCTIONS.has(name);
}

/**
 * Host services a builtin may use.
 */
export interface PrimitiveContext {
  writeLine(line: string): void;
}

/**
 * Execute a builtin. `args` are in source order.
 * Every builtin yields a value so that a call is always one stack push.
 */
export function executePrimitive(
  primitiveIndex: number,
  args: number[],
  context: PrimitiveContext
): number {
  switch (primitiveIndex) {
    case 0: // print
      context.writeLine(args.join(" "));
      return 0;

    default:
      throw new Error(`Unknown primitive function index: ${primitiveIndex}`);
  }
}
