import { Token } from "./tokenizer";

export namespace ExprNS {
    export interface Visitor<T> {
        visitLiteralExpr(expr: Literal): T;
        visitVariableExpr(expr: Variable): T;
        visitBinaryExpr(expr: Binary): T;
        visitCallExpr(expr: Call): T;
        visitGroupingExpr(expr: Grouping): T;
    }

    export abstract class Expr {
        constructor(public readonly startToken: Token, public readonly endToken: Token) {}

        abstract accept<T>(visitor: Visitor<T>): T;
    }

    /** Integer literal; `startToken` keeps the source text for diagnostics. */
    export class Literal extends Expr {
        constructor(startToken: Token, endToken: Token,
                    public readonly value: number) {
            super(startToken, endToken);
        }

        accept<T>(visitor: Visitor<T>): T {
            return visitor.visitLiteralExpr(this);
        }
    }

    export class Variable extends Expr {
        constructor(startToken: Token, endToken: Token,
                    public readonly name: Token) {
            super(startToken, endToken);
        }

        accept<T>(visitor: Visitor<T>): T {
            return visitor.visitVariableExpr(this);
        }
    }

    export class Binary extends Expr {
        constructor(startToken: Token, endToken: Token,
                    public readonly left: Expr,
                    public readonly operator: Token,
                    public readonly right: Expr) {
            super(startToken, endToken);
        }

        accept<T>(visitor: Visitor<T>): T {
            return visitor.visitBinaryExpr(this);
        }
    }

    export class Call extends Expr {
        constructor(startToken: Token, endToken: Token,
                    public readonly callee: Token,
                    public readonly args: Expr[]) {
            super(startToken, endToken);
        }

        accept<T>(visitor: Visitor<T>): T {
            return visitor.visitCallExpr(this);
        }
    }

    export class Grouping extends Expr {
        constructor(startToken: Token, endToken: Token,
                    public readonly expression: Expr) {
            super(startToken, endToken);
        }

        accept<T>(visitor: Visitor<T>): T {
            return visitor.visitGroupingExpr(this);
        }
    }
}

export namespace StmtNS {
    export interface Visitor<T> {
        visitFileInputStmt(stmt: FileInput): T;
        visitFunctionDefStmt(stmt: FunctionDef): T;
        visitIfStmt(stmt: If): T;
        visitLocalStmt(stmt: Local): T;
        visitReturnStmt(stmt: Return): T;
        visitSimpleExprStmt(stmt: SimpleExpr): T;
    }

    export abstract class Stmt {
        constructor(public readonly startToken: Token, public readonly endToken: Token) {}

        abstract accept<T>(visitor: Visitor<T>): T;
    }

    export class FileInput extends Stmt {
        constructor(startToken: Token, endToken: Token,
                    public readonly statements: Stmt[]) {
            super(startToken, endToken);
        }

        accept<T>(visitor: Visitor<T>): T {
            return visitor.visitFileInputStmt(this);
        }
    }

    export class FunctionDef extends Stmt {
        constructor(startToken: Token, endToken: Token,
                    public readonly name: Token,
                    public readonly parameters: Token[],
                    public readonly body: Stmt[]) {
            super(startToken, endToken);
        }

        accept<T>(visitor: Visitor<T>): T {
            return visitor.visitFunctionDefStmt(this);
        }
    }

    export class If extends Stmt {
        constructor(startToken: Token, endToken: Token,
                    public readonly condition: ExprNS.Expr,
                    public readonly body: Stmt[]) {
            super(startToken, endToken);
        }

        accept<T>(visitor: Visitor<T>): T {
            return visitor.visitIfStmt(this);
        }
    }

    export class Local extends Stmt {
        constructor(startToken: Token, endToken: Token,
                    public readonly name: Token,
                    public readonly value: ExprNS.Expr) {
            super(startToken, endToken);
        }

        accept<T>(visitor: Visitor<T>): T {
            return visitor.visitLocalStmt(this);
        }
    }

    export class Return extends Stmt {
        constructor(startToken: Token, endToken: Token,
                    public readonly value: ExprNS.Expr) {
            super(startToken, endToken);
        }

        accept<T>(visitor: Visitor<T>): T {
            return visitor.visitReturnStmt(this);
        }
    }

    export class SimpleExpr extends Stmt {
        constructor(startToken: Token, endToken: Token,
                    public readonly expression: ExprNS.Expr) {
            super(startToken, endToken);
        }

        accept<T>(visitor: Visitor<T>): T {
            return visitor.visitSimpleExprStmt(this);
        }
    }
}
