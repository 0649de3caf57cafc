import { KEYWORDS, SINGLE_CHAR_TOKENS, TokenType } from "./tokens";
import { SourceLocation, TokenizerError } from "./errors/errors";

export class Token implements SourceLocation {
    constructor(
        public readonly type: TokenType,
        public readonly lexeme: string,
        public readonly line: number,
        public readonly col: number,
        public readonly index: number,
    ) {}
}

function isDigit(c: string): boolean {
    return c >= "0" && c <= "9";
}

function isAlpha(c: string): boolean {
    return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
}

function isAlphaNumeric(c: string): boolean {
    return isAlpha(c) || isDigit(c);
}

export class Tokenizer {
    private readonly source: string;
    private readonly tokens: Token[];
    private start: number;
    private current: number;
    private line: number;
    private col: number;
    private startLine: number;
    private startCol: number;

    constructor(source: string) {
        this.source = source;
        this.tokens = [];
        this.start = 0;
        this.current = 0;
        this.line = 1;
        this.col = 0;
        this.startLine = 1;
        this.startCol = 0;
    }

    private isAtEnd(): boolean {
        return this.current >= this.source.length;
    }

    private peek(offset: number = 0): string {
        const index = this.current + offset;
        return index < this.source.length ? this.source[index] : "\0";
    }

    private advance(): string {
        const c = this.source[this.current];
        this.current++;
        if (c === "\n") {
            this.line++;
            this.col = 0;
        } else {
            this.col++;
        }
        return c;
    }

    private addToken(type: TokenType): void {
        const lexeme = this.source.slice(this.start, this.current);
        this.tokens.push(new Token(type, lexeme, this.startLine, this.startCol, this.start));
    }

    private location(): SourceLocation {
        return { line: this.startLine, col: this.startCol, index: this.start };
    }

    private number(): void {
        while (isDigit(this.peek())) {
            this.advance();
        }
        if (isAlpha(this.peek())) {
            throw new TokenizerError(this.source, this.location(),
                "Identifiers cannot start with a digit");
        }
        this.addToken(TokenType.NUMBER);
    }

    private name(): void {
        while (isAlphaNumeric(this.peek())) {
            this.advance();
        }
        const text = this.source.slice(this.start, this.current);
        this.addToken(KEYWORDS.get(text) ?? TokenType.NAME);
    }

    private comment(): void {
        while (!this.isAtEnd() && this.peek() !== "\n") {
            this.advance();
        }
    }

    private scanToken(): void {
        const c = this.advance();
        switch (c) {
            case " ":
            case "\t":
            case "\r":
            case "\n":
                return;
            case "-":
                // `--` runs to the end of the line
                if (this.peek() === "-") {
                    this.comment();
                    return;
                }
                this.addToken(TokenType.MINUS);
                return;
        }

        const single = SINGLE_CHAR_TOKENS.get(c);
        if (single !== undefined) {
            this.addToken(single);
        } else if (isDigit(c)) {
            this.number();
        } else if (isAlpha(c)) {
            this.name();
        } else {
            throw new TokenizerError(this.source, this.location(),
                `Unrecognized character '${c}'`);
        }
    }

    scanEverything(): Token[] {
        while (!this.isAtEnd()) {
            this.start = this.current;
            this.startLine = this.line;
            this.startCol = this.col;
            this.scanToken();
        }
        this.tokens.push(new Token(TokenType.ENDMARKER, "", this.line, this.col, this.current));
        return this.tokens;
    }
}
