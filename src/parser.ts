import { ExprNS, StmtNS } from "./ast-types";
import { ParserError } from "./errors/errors";
import { Token } from "./tokenizer";
import { TokenType } from "./tokens";

const COMPARISON_OPERATORS: TokenType[] = [TokenType.LESS, TokenType.GREATER];
const ARITHMETIC_OPERATORS: TokenType[] = [
    TokenType.PLUS,
    TokenType.MINUS,
    TokenType.STAR,
    TokenType.SLASH,
    TokenType.PERCENT,
];

/**
 * Recursive-descent parser from tokens to the statement tree.
 *
 * Operators inside one precedence level are left-associative. Comparison binds
 * looser than arithmetic. Every operator token the tokenizer knows is accepted
 * here; whether the back end can compile it is decided by the compiler.
 */
export class Parser {
    private readonly source: string;
    private readonly tokens: Token[];
    private current: number;

    constructor(source: string, tokens: Token[]) {
        this.source = source;
        this.tokens = tokens;
        this.current = 0;
    }

    parse(): StmtNS.FileInput {
        const startToken = this.peek();
        const statements: StmtNS.Stmt[] = [];
        while (!this.check(TokenType.ENDMARKER)) {
            statements.push(this.statement());
        }
        return new StmtNS.FileInput(startToken, this.peek(), statements);
    }

    // ------------------------------------------------------------------
    // Token helpers
    // ------------------------------------------------------------------

    private peek(): Token {
        return this.tokens[Math.min(this.current, this.tokens.length - 1)];
    }

    private previous(): Token {
        return this.tokens[this.current - 1];
    }

    private check(type: TokenType): boolean {
        return this.peek().type === type;
    }

    private advance(): Token {
        const token = this.peek();
        if (token.type !== TokenType.ENDMARKER) {
            this.current++;
        }
        return token;
    }

    private match(...types: TokenType[]): boolean {
        if (types.includes(this.peek().type)) {
            this.advance();
            return true;
        }
        return false;
    }

    private consume(type: TokenType, expected: string): Token {
        if (this.check(type)) {
            return this.advance();
        }
        throw new ParserError(this.source, this.peek(), expected);
    }

    // ------------------------------------------------------------------
    // Statements
    // ------------------------------------------------------------------

    private statement(): StmtNS.Stmt {
        switch (this.peek().type) {
            case TokenType.FUNCTION:
                return this.functionDef();
            case TokenType.IF:
                return this.ifStatement();
            case TokenType.LOCAL:
                return this.localStatement();
            case TokenType.RETURN:
                return this.returnStatement();
            default:
                return this.expressionStatement();
        }
    }

    private block(): StmtNS.Stmt[] {
        const body: StmtNS.Stmt[] = [];
        while (!this.check(TokenType.END)) {
            if (this.check(TokenType.ENDMARKER)) {
                throw new ParserError(this.source, this.peek(), "'end'");
            }
            body.push(this.statement());
        }
        this.advance();
        return body;
    }

    private functionDef(): StmtNS.FunctionDef {
        const startToken = this.advance();
        const name = this.consume(TokenType.NAME, "function name");
        this.consume(TokenType.LPAR, "'(' after function name");

        const parameters: Token[] = [];
        if (!this.check(TokenType.RPAR)) {
            do {
                parameters.push(this.consume(TokenType.NAME, "parameter name"));
            } while (this.match(TokenType.COMMA));
        }
        this.consume(TokenType.RPAR, "',' or ')' after parameter");

        const body = this.block();
        return new StmtNS.FunctionDef(startToken, this.previous(), name, parameters, body);
    }

    private ifStatement(): StmtNS.If {
        const startToken = this.advance();
        const condition = this.expression();
        this.consume(TokenType.THEN, "'then' after if condition");
        const body = this.block();
        return new StmtNS.If(startToken, this.previous(), condition, body);
    }

    private localStatement(): StmtNS.Local {
        const startToken = this.advance();
        const name = this.consume(TokenType.NAME, "variable name after 'local'");
        this.consume(TokenType.EQUAL, "'=' in local declaration");
        const value = this.expression();
        const endToken = this.consume(TokenType.SEMICOLON, "';' after local declaration");
        return new StmtNS.Local(startToken, endToken, name, value);
    }

    private returnStatement(): StmtNS.Return {
        const startToken = this.advance();
        const value = this.expression();
        const endToken = this.consume(TokenType.SEMICOLON, "';' after return value");
        return new StmtNS.Return(startToken, endToken, value);
    }

    private expressionStatement(): StmtNS.SimpleExpr {
        const startToken = this.peek();
        const expression = this.expression();
        const endToken = this.consume(TokenType.SEMICOLON, "';' after expression");
        return new StmtNS.SimpleExpr(startToken, endToken, expression);
    }

    // ------------------------------------------------------------------
    // Expressions
    // ------------------------------------------------------------------

    private expression(): ExprNS.Expr {
        return this.binaryLevel(COMPARISON_OPERATORS, () => this.arithmetic());
    }

    private arithmetic(): ExprNS.Expr {
        return this.binaryLevel(ARITHMETIC_OPERATORS, () => this.primary());
    }

    private binaryLevel(operators: TokenType[], operand: () => ExprNS.Expr): ExprNS.Expr {
        let expr = operand();
        while (this.match(...operators)) {
            const operator = this.previous();
            const right = operand();
            expr = new ExprNS.Binary(expr.startToken, this.previous(), expr, operator, right);
        }
        return expr;
    }

    private primary(): ExprNS.Expr {
        const startToken = this.peek();

        if (this.match(TokenType.NUMBER)) {
            return new ExprNS.Literal(startToken, startToken, Number(startToken.lexeme));
        }

        if (this.match(TokenType.NAME)) {
            if (this.match(TokenType.LPAR)) {
                return this.finishCall(startToken);
            }
            return new ExprNS.Variable(startToken, startToken, startToken);
        }

        if (this.match(TokenType.LPAR)) {
            const expression = this.expression();
            const endToken = this.consume(TokenType.RPAR, "')' after expression");
            return new ExprNS.Grouping(startToken, endToken, expression);
        }

        throw new ParserError(this.source, startToken, "expression");
    }

    private finishCall(callee: Token): ExprNS.Call {
        const args: ExprNS.Expr[] = [];
        if (!this.check(TokenType.RPAR)) {
            do {
                args.push(this.expression());
            } while (this.match(TokenType.COMMA));
        }
        const endToken = this.consume(TokenType.RPAR, "',' or ')' after call argument");
        return new ExprNS.Call(callee, endToken, callee, args);
    }
}
