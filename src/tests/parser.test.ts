import { ExprNS, StmtNS } from "../ast-types";
import { ParserError } from "../errors/errors";
import { parse } from "./utils";

function onlyExpression(code: string): ExprNS.Expr {
    const [stmt] = parse(code).statements;
    if (!(stmt instanceof StmtNS.SimpleExpr)) {
        throw new Error("Expected an expression statement");
    }
    return stmt.expression;
}

/** Fully parenthesised rendering of an expression tree. */
function show(expr: ExprNS.Expr): string {
    if (expr instanceof ExprNS.Literal) {
        return String(expr.value);
    }
    if (expr instanceof ExprNS.Variable) {
        return expr.name.lexeme;
    }
    if (expr instanceof ExprNS.Binary) {
        return `(${show(expr.left)} ${expr.operator.lexeme} ${show(expr.right)})`;
    }
    if (expr instanceof ExprNS.Call) {
        return `${expr.callee.lexeme}[${expr.args.map(show).join(", ")}]`;
    }
    if (expr instanceof ExprNS.Grouping) {
        return `{${show(expr.expression)}}`;
    }
    throw new Error("Unknown expression");
}

describe('Parser', () => {
    describe('Statements', () => {
        test('Function declaration', () => {
            const program = parse("function add(a, b) return a + b; end");
            expect(program.statements).toHaveLength(1);

            const fn = program.statements[0];
            expect(fn).toBeInstanceOf(StmtNS.FunctionDef);
            if (!(fn instanceof StmtNS.FunctionDef)) return;
            expect(fn.name.lexeme).toBe("add");
            expect(fn.parameters.map(p => p.lexeme)).toEqual(["a", "b"]);
            expect(fn.body).toHaveLength(1);

            const ret = fn.body[0];
            expect(ret).toBeInstanceOf(StmtNS.Return);
            if (!(ret instanceof StmtNS.Return)) return;
            expect(show(ret.value)).toBe("(a + b)");
        });

        test('Function without parameters', () => {
            const [fn] = parse("function zero() return 0; end").statements;
            expect(fn).toBeInstanceOf(StmtNS.FunctionDef);
            if (!(fn instanceof StmtNS.FunctionDef)) return;
            expect(fn.parameters).toHaveLength(0);
        });

        test('If statement with nested body', () => {
            const [stmt] = parse("if x < 1 then local y = 2; return y; end").statements;
            expect(stmt).toBeInstanceOf(StmtNS.If);
            if (!(stmt instanceof StmtNS.If)) return;
            expect(show(stmt.condition)).toBe("(x < 1)");
            expect(stmt.body.map(s => s.constructor.name)).toEqual(["Local", "Return"]);
        });

        test('Local declaration', () => {
            const [stmt] = parse("local total = f(1) + 2;").statements;
            expect(stmt).toBeInstanceOf(StmtNS.Local);
            if (!(stmt instanceof StmtNS.Local)) return;
            expect(stmt.name.lexeme).toBe("total");
            expect(show(stmt.value)).toBe("(f[1] + 2)");
        });

        test('Statement sequence keeps source order', () => {
            const program = parse("local a = 1; print(a); return a;");
            expect(program.statements.map(s => s.constructor.name))
                .toEqual(["Local", "SimpleExpr", "Return"]);
        });
    });

    describe('Expressions', () => {
        test('Arithmetic is left-associative', () => {
            expect(show(onlyExpression("10 - 3 - 2;"))).toBe("((10 - 3) - 2)");
        });

        test('Comparison binds looser than arithmetic', () => {
            expect(show(onlyExpression("1 + 2 < 3 - 1;"))).toBe("((1 + 2) < (3 - 1))");
        });

        test('Call arguments and grouping', () => {
            expect(show(onlyExpression("print(1, f(2), (3 - x));")))
                .toBe("print[1, f[2], {(3 - x)}]");
        });

        test('Operators the back end rejects still parse', () => {
            expect(show(onlyExpression("2 * 3 > 1;"))).toBe("((2 * 3) > 1)");
        });
    });

    describe('Errors', () => {
        test('Missing equals in local declaration', () => {
            expect(() => parse("local x 1;")).toThrow(ParserError);
            expect(() => parse("local x 1;")).toThrow(
                "Expected '=' in local declaration but found '1' (line 1, column 9)"
            );
        });

        test('Message quotes only the offending line', () => {
            expect(() => parse("local a = 1;\nlocal b 2;\nreturn a;")).toThrow(
                "Expected '=' in local declaration but found '2' (line 2, column 9)\n\n" +
                "local b 2;\n" +
                "        ^ Near here"
            );
        });

        test('Unterminated if body', () => {
            expect(() => parse("if 1 < 2 then return 1;")).toThrow(
                "Expected 'end' but found end of input"
            );
        });

        test('Missing semicolon after return', () => {
            expect(() => parse("function f() return 1 end")).toThrow(
                "Expected ';' after return value but found 'end'"
            );
        });

        test('Dangling operator', () => {
            expect(() => parse("1 + ;")).toThrow("Expected expression but found ';'");
        });
    });
});
