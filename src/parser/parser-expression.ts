import {
    ArrayLiteralExpression, AssignExpression, BinaryExpression, BinaryOperator, CallExpression, CompoundOperator,
    ConditionalExpression, Expression, GetExpression, GroupingExpression, IndexExpression, LiteralExpression,
    SetExpression, SetIndexExpression, SourceLocation, SuperExpression, ThisExpression, UnaryExpression,
    UnaryOperator, VariableExpression
} from "../types";
import { Token, TokenType } from "./lexer";
import { Parser, describeToken } from "./parser";

export const MAX_CALL_ARGUMENTS = 255;

const BINARY_OPERATORS: Map<TokenType, BinaryOperator> = new Map([
    [TokenType.PLUS, '+'],
    [TokenType.MINUS, '-'],
    [TokenType.MULTIPLY, '*'],
    [TokenType.DIVIDE, '/'],
    [TokenType.MODULO, '%'],
    [TokenType.POWER, '**'],
    [TokenType.EQUAL, '=='],
    [TokenType.NOT_EQUAL, '!='],
    [TokenType.LESS_THAN, '<'],
    [TokenType.LESS_EQUAL, '<='],
    [TokenType.GREATER_THAN, '>'],
    [TokenType.GREATER_EQUAL, '>='],
    [TokenType.AND, '&&'],
    [TokenType.OR, '||'],
    [TokenType.NULL_COALESCE, '??'],
    [TokenType.BITWISE_AND, '&'],
    [TokenType.BITWISE_OR, '|'],
    [TokenType.BITWISE_XOR, '^'],
    [TokenType.LEFT_SHIFT, '<<'],
    [TokenType.RIGHT_SHIFT, '>>']
]);

// `x op= v` on a variable becomes `x = x op v`; members and elements keep the operator
const COMPOUND_ASSIGNMENTS: Map<TokenType, CompoundOperator> = new Map([
    [TokenType.PLUS_ASSIGN, '+'],
    [TokenType.MINUS_ASSIGN, '-'],
    [TokenType.MULTIPLY_ASSIGN, '*'],
    [TokenType.DIVIDE_ASSIGN, '/'],
    [TokenType.MODULO_ASSIGN, '%']
]);

const UNARY_OPERATORS: Map<TokenType, UnaryOperator> = new Map([
    [TokenType.MINUS, '-'],
    [TokenType.PLUS, '+'],
    [TokenType.NOT, '!'],
    [TokenType.BITWISE_NOT, '~']
]);

function span(from: SourceLocation, to: SourceLocation): SourceLocation {
    return { start: from.start, end: to.end, filename: from.filename };
}

// Expression parsing methods (using precedence climbing)
export function parseExpression(parser: Parser): Expression {
    return parser.nested(() => parseAssignment(parser));
}

function parseAssignment(parser: Parser): Expression {
    const expr = parseConditional(parser);

    if (parser.match(TokenType.ASSIGN, TokenType.PLUS_ASSIGN, TokenType.MINUS_ASSIGN,
        TokenType.MULTIPLY_ASSIGN, TokenType.DIVIDE_ASSIGN, TokenType.MODULO_ASSIGN)) {
        const operatorToken = parser.previous();
        const assigned = parser.nested(() => parseAssignment(parser));
        const operator = COMPOUND_ASSIGNMENTS.get(operatorToken.type);
        const location = span(expr.location, assigned.location);

        switch (expr.kind) {
            case 'variable': {
                const value = operator ? createBinaryExpression(operator, expr, assigned) : assigned;
                return { kind: 'assign', name: expr.name, value, location } satisfies AssignExpression;
            }
            case 'get':
                return {
                    kind: 'set',
                    object: expr.object,
                    name: expr.name,
                    operator,
                    value: assigned,
                    location
                } satisfies SetExpression;
            case 'index':
                return {
                    kind: 'setIndex',
                    object: expr.object,
                    index: expr.index,
                    operator,
                    value: assigned,
                    location
                } satisfies SetIndexExpression;
            default:
                throw parser.error("Invalid assignment target", 'invalidAssignmentTarget', operatorToken);
        }
    }

    return expr;
}

function parseConditional(parser: Parser): Expression {
    const condition = parseNullCoalesce(parser);

    if (parser.match(TokenType.QUESTION)) {
        const thenBranch = parseExpression(parser);
        parser.consume(TokenType.COLON, "Expected ':' after consequent in conditional expression");
        const elseBranch = parser.nested(() => parseConditional(parser));

        return {
            kind: 'conditional',
            condition,
            thenBranch,
            elseBranch,
            location: span(condition.location, elseBranch.location)
        } satisfies ConditionalExpression;
    }

    return condition;
}

function parseNullCoalesce(parser: Parser): Expression {
    return parseBinaryExpression(parser,
        () => parseLogicalOr(parser),
        [TokenType.NULL_COALESCE]
    );
}

function parseLogicalOr(parser: Parser): Expression {
    return parseBinaryExpression(parser,
        () => parseLogicalAnd(parser),
        [TokenType.OR]
    );
}

function parseLogicalAnd(parser: Parser): Expression {
    return parseBinaryExpression(parser,
        () => parseBitwiseOr(parser),
        [TokenType.AND]
    );
}

function parseBitwiseOr(parser: Parser): Expression {
    return parseBinaryExpression(parser,
        () => parseBitwiseXor(parser),
        [TokenType.BITWISE_OR]
    );
}

function parseBitwiseXor(parser: Parser): Expression {
    return parseBinaryExpression(parser,
        () => parseBitwiseAnd(parser),
        [TokenType.BITWISE_XOR]
    );
}

function parseBitwiseAnd(parser: Parser): Expression {
    return parseBinaryExpression(parser,
        () => parseEquality(parser),
        [TokenType.BITWISE_AND]
    );
}

function parseEquality(parser: Parser): Expression {
    return parseBinaryExpression(parser,
        () => parseComparison(parser),
        [TokenType.EQUAL, TokenType.NOT_EQUAL]
    );
}

function parseComparison(parser: Parser): Expression {
    return parseBinaryExpression(parser,
        () => parseShift(parser),
        [TokenType.GREATER_THAN, TokenType.GREATER_EQUAL, TokenType.LESS_THAN, TokenType.LESS_EQUAL]
    );
}

function parseShift(parser: Parser): Expression {
    return parseBinaryExpression(parser,
        () => parseAdditive(parser),
        [TokenType.LEFT_SHIFT, TokenType.RIGHT_SHIFT]
    );
}

function parseAdditive(parser: Parser): Expression {
    return parseBinaryExpression(parser,
        () => parseMultiplicative(parser),
        [TokenType.PLUS, TokenType.MINUS]
    );
}

function parseMultiplicative(parser: Parser): Expression {
    return parseBinaryExpression(parser,
        () => parseExponent(parser),
        [TokenType.MULTIPLY, TokenType.DIVIDE, TokenType.MODULO]
    );
}

// Right-associative: 2 ** 3 ** 2 is 2 ** (3 ** 2)
function parseExponent(parser: Parser): Expression {
    const base = parseUnary(parser);

    if (parser.match(TokenType.POWER)) {
        const exponent = parser.nested(() => parseExponent(parser));
        return createBinaryExpression('**', base, exponent);
    }

    return base;
}

function parseUnary(parser: Parser): Expression {
    const operator = UNARY_OPERATORS.get(parser.peek().type);

    if (operator) {
        const operatorToken = parser.advance();
        const operand = parser.nested(() => parseUnary(parser));
        return {
            kind: 'unary',
            operator,
            operand,
            location: span(parser.locationOf(operatorToken), operand.location)
        } satisfies UnaryExpression;
    }

    return parsePostfix(parser);
}

function parsePostfix(parser: Parser): Expression {
    let expr = parsePrimary(parser);

    for (;;) {
        if (parser.match(TokenType.LEFT_PAREN)) {
            expr = finishCall(parser, expr);
        } else if (parser.match(TokenType.DOT)) {
            const name = consumeMemberName(parser, "Expected property name after '.'");
            expr = {
                kind: 'get',
                object: expr,
                name: name.lexeme,
                location: span(expr.location, parser.locationOf(name))
            } satisfies GetExpression;
        } else if (parser.match(TokenType.LEFT_BRACKET)) {
            const index = parseExpression(parser);
            const close = parser.consume(TokenType.RIGHT_BRACKET, "Expected ']' after index");
            expr = {
                kind: 'index',
                object: expr,
                index,
                location: span(expr.location, parser.locationOf(close))
            } satisfies IndexExpression;
        } else {
            break;
        }
    }

    return expr;
}

function finishCall(parser: Parser, callee: Expression): Expression {
    const args: Expression[] = [];

    if (!parser.check(TokenType.RIGHT_PAREN)) {
        do {
            if (args.length >= MAX_CALL_ARGUMENTS) {
                throw parser.error(`Can't have more than ${MAX_CALL_ARGUMENTS} arguments`, 'tooManyArguments');
            }
            args.push(parseExpression(parser));
        } while (parser.match(TokenType.COMMA));
    }

    const close = parser.consume(TokenType.RIGHT_PAREN, "Expected ')' after arguments");
    return {
        kind: 'call',
        callee,
        arguments: args,
        location: span(callee.location, parser.locationOf(close))
    } satisfies CallExpression;
}

// 'init' is a keyword but also names initializers, so it is accepted as a member name
function consumeMemberName(parser: Parser, message: string): Token {
    if (parser.check(TokenType.INIT)) {
        return parser.advance();
    }
    return parser.consume(TokenType.IDENTIFIER, message);
}

function parsePrimary(parser: Parser): Expression {
    const token = parser.peek();

    switch (token.type) {
        case TokenType.TRUE:
        case TokenType.FALSE:
        case TokenType.NULL:
        case TokenType.INTEGER:
        case TokenType.FLOAT:
        case TokenType.STRING:
        case TokenType.CHAR:
            parser.advance();
            return createLiteral(parser, token);
        case TokenType.THIS:
            parser.advance();
            return { kind: 'this', location: parser.locationOf(token) } satisfies ThisExpression;
        case TokenType.SUPER: {
            parser.advance();
            parser.consume(TokenType.DOT, "Expected '.' after 'super'");
            const member = consumeMemberName(parser, "Expected superclass member name");
            return {
                kind: 'super',
                member: member.lexeme,
                location: parser.spanFrom(token)
            } satisfies SuperExpression;
        }
        case TokenType.IDENTIFIER:
            parser.advance();
            return { kind: 'variable', name: token.lexeme, location: parser.locationOf(token) } satisfies VariableExpression;
        case TokenType.LEFT_PAREN: {
            parser.advance();
            const expression = parseExpression(parser);
            parser.consume(TokenType.RIGHT_PAREN, "Expected ')' after expression");
            return { kind: 'grouping', expression, location: parser.spanFrom(token) } satisfies GroupingExpression;
        }
        case TokenType.LEFT_BRACKET:
            parser.advance();
            return parseArrayLiteral(parser, token);
        default:
            throw parser.error(`Expected expression. Got ${describeToken(token)}`, 'unexpectedToken');
    }
}

// Called after the opening '['; a trailing comma is allowed
function parseArrayLiteral(parser: Parser, open: Token): Expression {
    const elements: Expression[] = [];

    while (!parser.check(TokenType.RIGHT_BRACKET)) {
        elements.push(parseExpression(parser));
        if (!parser.match(TokenType.COMMA)) {
            break;
        }
    }

    parser.consume(TokenType.RIGHT_BRACKET, "Expected ']' after array elements");
    return { kind: 'arrayLiteral', elements, location: parser.spanFrom(open) } satisfies ArrayLiteralExpression;
}

function createLiteral(parser: Parser, token: Token): LiteralExpression {
    return {
        kind: 'literal',
        value: token.literal,
        location: parser.locationOf(token)
    };
}

function createBinaryExpression(operator: BinaryOperator, left: Expression, right: Expression): BinaryExpression {
    return {
        kind: 'binary',
        operator,
        left,
        right,
        location: span(left.location, right.location)
    };
}

function parseBinaryExpression(parser: Parser, parseNext: () => Expression, operators: TokenType[]): Expression {
    let expr = parseNext();

    while (parser.match(...operators)) {
        const operatorToken = parser.previous();
        const operator = BINARY_OPERATORS.get(operatorToken.type);
        if (!operator) {
            throw parser.error(`Unsupported binary operator ${describeToken(operatorToken)}`, 'unexpectedToken', operatorToken);
        }
        const right = parseNext();
        expr = createBinaryExpression(operator, expr, right);
    }

    return expr;
}
