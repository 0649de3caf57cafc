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
import OpCodes from "./opcodes";
import { isPrimitive } from "./primitives";
import { ProgramBuilder } from "./program-builder";
import { NullaryOpCode, Program } from "./types";

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

/**
 * Bytecode compiler implementing the visitor interfaces.
 *
 * One instance compiles one function body (or the top level) and owns that
 * body's local-name table; all instances of a program share one builder, so
 * the emitted code is a single flat instruction list.
 */
export class BytecodeCompiler
  implements StmtNS.Visitor<void>, ExprNS.Visitor<void>
{
  private readonly source: string;
  private readonly builder: ProgramBuilder;
  private readonly locals = new Map<string, number>();
  private nextSlot = 0;

  constructor(source: string, builder: ProgramBuilder, parameters: Token[] = []) {
    this.source = source;
    this.builder = builder;
    for (const param of parameters) {
      if (this.locals.has(param.lexeme)) {
        throw new CompileError(source, param, `Duplicate parameter '${param.lexeme}'`);
      }
      this.declareLocal(param);
    }
  }

  /**
   * Create a compiler for the top level of a program
   */
  static fromProgram(source: string = ""): BytecodeCompiler {
    return new BytecodeCompiler(source, new ProgramBuilder());
  }

  fromFunctionNode(node: StmtNS.FunctionDef): BytecodeCompiler {
    return new BytecodeCompiler(this.source, this.builder, node.parameters);
  }

  /**
   * Compile entire program and return the sealed Program
   */
  compileProgram(program: StmtNS.FileInput): Program {
    this.declareFunctions(program.statements);
    this.compile(program);
    return this.builder.build();
  }

  compile(node: StmtNS.Stmt | ExprNS.Expr): void {
    node.accept(this);
  }

  compileStatements(statements: StmtNS.Stmt[]): void {
    for (const statement of statements) {
      this.compile(statement);
    }
  }

  /** Number of slots this body has assigned so far (parameters included). */
  get slotCount(): number {
    return this.nextSlot;
  }

  /**
   * First phase: every function in the program, at any depth, is declared with
   * its arity before any code is emitted, so calls can be checked regardless
   * of declaration order.
   */
  private declareFunctions(statements: StmtNS.Stmt[]): void {
    for (const stmt of statements) {
      if (stmt instanceof StmtNS.FunctionDef) {
        if (isPrimitive(stmt.name.lexeme)) {
          throw new ReservedNameError(this.source, stmt.name);
        }
        if (!this.builder.declareFunction(stmt.name.lexeme, stmt.parameters.length)) {
          throw new DuplicateFunctionError(this.source, stmt.name);
        }
        this.declareFunctions(stmt.body);
      } else if (stmt instanceof StmtNS.If) {
        this.declareFunctions(stmt.body);
      }
    }
  }

  private declareLocal(name: Token): void {
    this.locals.set(name.lexeme, this.nextSlot++);
  }

  private getBinaryOpCode(operator: Token): NullaryOpCode {
    switch (operator.type) {
      case TokenType.PLUS:
        return OpCodes.ADD;
      case TokenType.MINUS:
        return OpCodes.SUB;
      case TokenType.LESS:
        return OpCodes.LT;
      default:
        throw new UnsupportedOperatorError(this.source, operator);
    }
  }

  // ========================================================================
  // Expression Visitor Methods
  // ========================================================================

  visitLiteralExpr(expr: ExprNS.Literal): void {
    const value = expr.value;
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw new IntegerRangeError(this.source, expr.startToken);
    }
    this.builder.emitPushConstant(value);
  }

  visitVariableExpr(expr: ExprNS.Variable): void {
    const slot = this.locals.get(expr.name.lexeme);
    if (slot === undefined) {
      throw new UndefinedVariableError(this.source, expr.name);
    }
    this.builder.emitLoadSlot(slot);
  }

  visitBinaryExpr(expr: ExprNS.Binary): void {
    const opcode = this.getBinaryOpCode(expr.operator);
    this.compile(expr.left);
    this.compile(expr.right);
    this.builder.emitNullary(opcode);
  }

  visitCallExpr(expr: ExprNS.Call): void {
    const name = expr.callee.lexeme;
    const numArgs = expr.args.length;

    if (!isPrimitive(name)) {
      const arity = this.builder.functionArity(name);
      if (arity === undefined) {
        throw new UndefinedFunctionError(this.source, expr.callee);
      }
      if (arity !== numArgs) {
        throw new ArityMismatchError(this.source, expr.callee, arity, numArgs);
      }
    }

    for (const arg of expr.args) {
      this.compile(arg);
    }
    this.builder.emitCall(name, numArgs);
  }

  visitGroupingExpr(expr: ExprNS.Grouping): void {
    this.compile(expr.expression);
  }

  // ========================================================================
  // Statement Visitor Methods
  // ========================================================================

  visitFileInputStmt(stmt: StmtNS.FileInput): void {
    this.compileStatements(stmt.statements);
  }

  visitFunctionDefStmt(stmt: StmtNS.FunctionDef): void {
    const name = stmt.name.lexeme;
    const arity = stmt.parameters.length;

    // Keep straight-line execution out of the body
    const doneLabel = this.builder.emitJump(OpCodes.JMP, "function_done");
    this.builder.markFunctionEntry(name);

    // Arguments sit below the callee's frame base, last argument nearest
    for (let i = 0; i < arity; i++) {
      this.builder.emitBindArgument(i, arity - i);
    }

    const childCompiler = this.fromFunctionNode(stmt);
    childCompiler.compileStatements(stmt.body);

    // Falling off the end returns 0
    this.builder.emitPushConstant(0);
    this.builder.emitNullary(OpCodes.RET);

    this.builder.finalizeFunction(name, childCompiler.slotCount);
    this.builder.markLabel(doneLabel);
  }

  visitIfStmt(stmt: StmtNS.If): void {
    this.compile(stmt.condition);
    const elseLabel = this.builder.emitJump(OpCodes.BRF, "if_else");
    this.compileStatements(stmt.body);
    this.builder.markLabel(elseLabel);
  }

  visitLocalStmt(stmt: StmtNS.Local): void {
    // The slot is reserved now but the name is bound only after the
    // initializer, which still sees any earlier binding of the same name
    const slot = this.nextSlot++;
    this.compile(stmt.value);
    this.locals.set(stmt.name.lexeme, slot);
    this.builder.emitStoreSlot(slot);
  }

  visitReturnStmt(stmt: StmtNS.Return): void {
    this.compile(stmt.value);
    this.builder.emitNullary(OpCodes.RET);
  }

  visitSimpleExprStmt(stmt: StmtNS.SimpleExpr): void {
    this.compile(stmt.expression);
    this.builder.emitNullary(OpCodes.POP);
  }
}
