import { ArrayTypeNode, GenericTypeNode, NamedTypeNode, TypeNode } from "../types";
import { Token, TokenType } from "./lexer";
import { Parser, describeToken } from "./parser";

export function parseType(parser: Parser): TypeNode {
    const nameToken = parser.consume(TokenType.IDENTIFIER, "Expected type name");
    let type: TypeNode;

    if (parser.match(TokenType.LESS_THAN)) {
        const typeArguments = parseTypeArgumentList(parser);
        type = {
            kind: 'genericType',
            name: nameToken.lexeme,
            typeArguments,
            location: parser.spanFrom(nameToken)
        } satisfies GenericTypeNode;
    } else {
        type = {
            kind: 'namedType',
            name: nameToken.lexeme,
            location: parser.locationOf(nameToken)
        } satisfies NamedTypeNode;
    }

    return parseArrayTypeSuffix(parser, type, nameToken);
}

// Called after the opening '<'
function parseTypeArgumentList(parser: Parser): TypeNode[] {
    const typeArguments: TypeNode[] = [];

    do {
        typeArguments.push(parser.nested(() => parseType(parser)));
    } while (parser.match(TokenType.COMMA));

    consumeClosingAngle(parser);
    return typeArguments;
}

function parseArrayTypeSuffix(parser: Parser, elementType: TypeNode, start: Token): TypeNode {
    let type = elementType;

    while (parser.check(TokenType.LEFT_BRACKET) && parser.checkNext(TokenType.RIGHT_BRACKET)) {
        parser.advance(); // [
        parser.advance(); // ]
        type = {
            kind: 'arrayType',
            elementType: type,
            location: parser.spanFrom(start)
        } satisfies ArrayTypeNode;
    }

    return type;
}

// Nested generics such as Array<Array<Int>> end in a '>>' token that closes two lists
function consumeClosingAngle(parser: Parser): void {
    if (parser.match(TokenType.GREATER_THAN)) {
        return;
    }

    const token = parser.peek();
    if (token.type !== TokenType.RIGHT_SHIFT) {
        throw parser.error(`Expected '>' after type arguments. Got ${describeToken(token)}`);
    }

    const { start, end } = token.location;
    const first: Token = {
        type: TokenType.GREATER_THAN,
        lexeme: '>',
        literal: token.literal,
        location: { start, end: { line: start.line, column: start.column + 1 }, filename: token.location.filename }
    };
    const second: Token = {
        type: TokenType.GREATER_THAN,
        lexeme: '>',
        literal: token.literal,
        location: { start: { line: start.line, column: start.column + 1 }, end, filename: token.location.filename }
    };
    parser.tokens.splice(parser.current, 1, first, second);
    parser.advance();
}

export function parseTypeParameters(parser: Parser): string[] {
    const typeParameters: string[] = [];
    if (!parser.match(TokenType.LESS_THAN)) {
        return typeParameters;
    }

    do {
        typeParameters.push(parser.consume(TokenType.IDENTIFIER, "Expected type parameter name").lexeme);
    } while (parser.match(TokenType.COMMA));

    parser.consume(TokenType.GREATER_THAN, "Expected '>' after type parameters");
    return typeParameters;
}
