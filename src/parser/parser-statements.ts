import {
    BlockStatement, BreakStatement, ContinueStatement, Expression, ExpressionStatement, ForStatement,
    IfStatement, ReturnStatement, Statement, VarDeclaration, WhileStatement
} from '../types';
import { TokenType } from './lexer';
import { Parser } from './parser';
import { parseExpression } from './parser-expression';
import { parseFunctionDeclaration, parseVarDeclaration } from './parser-declarations';

export function parseStatement(parser: Parser): Statement {
    return parser.nested(() => parseStatementKind(parser));
}

function parseStatementKind(parser: Parser): Statement {
    const start = parser.peek();

    if (parser.match(TokenType.VAR, TokenType.CONST)) {
        return parseVarDeclaration(parser, start, []);
    }
    if (parser.match(TokenType.FUNC)) {
        return parseFunctionDeclaration(parser, start, [], true);
    }
    if (parser.match(TokenType.IF)) {
        return parseIfStatement(parser);
    }
    if (parser.match(TokenType.WHILE)) {
        return parseWhileStatement(parser);
    }
    if (parser.match(TokenType.FOR)) {
        return parseForStatement(parser);
    }
    if (parser.match(TokenType.RETURN)) {
        return parseReturnStatement(parser);
    }
    if (parser.match(TokenType.BREAK)) {
        parser.consume(TokenType.SEMICOLON, "Expected ';' after 'break'");
        return { kind: 'break', location: parser.spanFrom(start) } satisfies BreakStatement;
    }
    if (parser.match(TokenType.CONTINUE)) {
        parser.consume(TokenType.SEMICOLON, "Expected ';' after 'continue'");
        return { kind: 'continue', location: parser.spanFrom(start) } satisfies ContinueStatement;
    }
    if (parser.check(TokenType.LEFT_BRACE)) {
        return parseBlockStatement(parser);
    }

    return parseExpressionStatement(parser);
}

export function parseBlockStatement(parser: Parser): BlockStatement {
    const open = parser.consume(TokenType.LEFT_BRACE, "Expected '{' before block");
    const statements: Statement[] = [];

    while (!parser.check(TokenType.RIGHT_BRACE) && !parser.isAtEnd()) {
        statements.push(parseStatement(parser));
    }

    parser.consume(TokenType.RIGHT_BRACE, "Expected '}' after block");

    return {
        kind: 'block',
        statements,
        location: parser.spanFrom(open)
    };
}

function parseExpressionStatement(parser: Parser): ExpressionStatement {
    const start = parser.peek();
    const expression = parseExpression(parser);
    parser.consume(TokenType.SEMICOLON, "Expected ';' after expression");

    return {
        kind: 'expressionStmt',
        expression,
        location: parser.spanFrom(start)
    };
}

function parseIfStatement(parser: Parser): IfStatement {
    const start = parser.previous();
    parser.consume(TokenType.LEFT_PAREN, "Expected '(' after 'if'");
    const condition = parseExpression(parser);
    parser.consume(TokenType.RIGHT_PAREN, "Expected ')' after if condition");

    const thenBranch = parseStatement(parser);
    let elseBranch: Statement | undefined;
    if (parser.match(TokenType.ELSE)) {
        elseBranch = parseStatement(parser);
    }

    return {
        kind: 'if',
        condition,
        thenBranch,
        elseBranch,
        location: parser.spanFrom(start)
    };
}

function parseWhileStatement(parser: Parser): WhileStatement {
    const start = parser.previous();
    parser.consume(TokenType.LEFT_PAREN, "Expected '(' after 'while'");
    const condition = parseExpression(parser);
    parser.consume(TokenType.RIGHT_PAREN, "Expected ')' after while condition");
    const body = parseStatement(parser);

    return {
        kind: 'while',
        condition,
        body,
        location: parser.spanFrom(start)
    };
}

// C-style for loop: every clause is optional
function parseForStatement(parser: Parser): ForStatement {
    const start = parser.previous();
    parser.consume(TokenType.LEFT_PAREN, "Expected '(' after 'for'");

    let initializer: VarDeclaration | ExpressionStatement | undefined;
    if (parser.match(TokenType.SEMICOLON)) {
        initializer = undefined;
    } else if (parser.check(TokenType.VAR) || parser.check(TokenType.CONST)) {
        const keyword = parser.advance();
        initializer = parseVarDeclaration(parser, keyword, []);
    } else {
        initializer = parseExpressionStatement(parser);
    }

    let condition: Expression | undefined;
    if (!parser.check(TokenType.SEMICOLON)) {
        condition = parseExpression(parser);
    }
    parser.consume(TokenType.SEMICOLON, "Expected ';' after loop condition");

    let increment: Expression | undefined;
    if (!parser.check(TokenType.RIGHT_PAREN)) {
        increment = parseExpression(parser);
    }
    parser.consume(TokenType.RIGHT_PAREN, "Expected ')' after for clauses");

    const body = parseStatement(parser);

    return {
        kind: 'for',
        initializer,
        condition,
        increment,
        body,
        location: parser.spanFrom(start)
    };
}

function parseReturnStatement(parser: Parser): ReturnStatement {
    const start = parser.previous();
    let value: Expression | undefined;

    if (!parser.check(TokenType.SEMICOLON)) {
        value = parseExpression(parser);
    }

    parser.consume(TokenType.SEMICOLON, "Expected ';' after return value");

    return {
        kind: 'return',
        value,
        location: parser.spanFrom(start)
    };
}
