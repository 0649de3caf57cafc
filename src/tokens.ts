export enum TokenType {
    ENDMARKER,
    NAME,
    NUMBER,

    // Keywords
    FUNCTION,
    END,
    IF,
    THEN,
    LOCAL,
    RETURN,

    // Syntax
    SEMICOLON,
    EQUAL,
    COMMA,
    LPAR,
    RPAR,
    PLUS,
    MINUS,
    STAR,
    SLASH,
    PERCENT,
    LESS,
    GREATER,
}

export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
    ["function", TokenType.FUNCTION],
    ["end", TokenType.END],
    ["if", TokenType.IF],
    ["then", TokenType.THEN],
    ["local", TokenType.LOCAL],
    ["return", TokenType.RETURN],
]);

export const SINGLE_CHAR_TOKENS: ReadonlyMap<string, TokenType> = new Map([
    [";", TokenType.SEMICOLON],
    ["=", TokenType.EQUAL],
    [",", TokenType.COMMA],
    ["(", TokenType.LPAR],
    [")", TokenType.RPAR],
    ["+", TokenType.PLUS],
    ["-", TokenType.MINUS],
    ["*", TokenType.STAR],
    ["/", TokenType.SLASH],
    ["%", TokenType.PERCENT],
    ["<", TokenType.LESS],
    [">", TokenType.GREATER],
]);
