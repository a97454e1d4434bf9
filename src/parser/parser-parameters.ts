import { Expression, Parameter } from '../types';
import { TokenType } from './lexer';
import { Parser } from './parser';
import { parseType } from './parser-types';
import { parseExpression } from './parser-expression';

// Called after the opening '('; consumes the closing ')'
export function parseParameterList(parser: Parser): Parameter[] {
    const parameters: Parameter[] = [];

    if (!parser.check(TokenType.RIGHT_PAREN)) {
        do {
            const name = parser.consume(TokenType.IDENTIFIER, "Expected parameter name");
            parser.consume(TokenType.COLON, "Expected ':' after parameter name");
            const type = parseType(parser);

            let defaultValue: Expression | undefined;
            if (parser.match(TokenType.ASSIGN)) {
                defaultValue = parseExpression(parser);
            }

            parameters.push({
                kind: 'parameter',
                name: name.lexeme,
                type,
                defaultValue,
                location: parser.spanFrom(name)
            });
        } while (parser.match(TokenType.COMMA));
    }

    parser.consume(TokenType.RIGHT_PAREN, "Expected ')' after parameters");
    return parameters;
}
