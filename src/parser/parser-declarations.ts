import {
    BlockStatement, ClassDeclaration, Declaration, EnumCase, EnumDeclaration, Expression, FunctionDeclaration,
    InterfaceDeclaration, Modifier, StructDeclaration, TypeNode, TypeReference, VarDeclaration
} from '../types';
import { Token, TokenType } from './lexer';
import { Parser, describeToken } from './parser';
import { parseType, parseTypeParameters } from './parser-types';
import { parseExpression } from './parser-expression';
import { parseParameterList } from './parser-parameters';
import { parseBlockStatement } from './parser-statements';

const MODIFIERS: Map<TokenType, Modifier> = new Map([
    [TokenType.PUBLIC, 'public'],
    [TokenType.PRIVATE, 'private'],
    [TokenType.PROTECTED, 'protected'],
    [TokenType.INTERNAL, 'internal'],
    [TokenType.FILEPRIVATE, 'fileprivate'],
    [TokenType.STATIC, 'static'],
    [TokenType.FINAL, 'final'],
    [TokenType.ABSTRACT, 'abstract'],
    [TokenType.SEALED, 'sealed'],
    [TokenType.OVERRIDE, 'override'],
    [TokenType.ASYNC, 'async']
]);

const ACCESS_MODIFIERS: ReadonlySet<Modifier> = new Set(['public', 'private', 'protected', 'internal', 'fileprivate']);

/**
 * Parse a run of modifiers. Duplicates and conflicting access levels are rejected here;
 * whether a modifier makes sense on the declaration that follows is left to semantic analysis.
 */
export function parseModifiers(parser: Parser): Modifier[] {
    const modifiers: Modifier[] = [];

    for (;;) {
        const modifier = MODIFIERS.get(parser.peek().type);
        if (!modifier) {
            return modifiers;
        }

        if (modifiers.includes(modifier)) {
            throw parser.error(`'${modifier}' modifier already specified`, 'unexpectedToken');
        }
        if (ACCESS_MODIFIERS.has(modifier) && modifiers.some(m => ACCESS_MODIFIERS.has(m))) {
            throw parser.error(`Conflicting access modifier '${modifier}'`, 'unexpectedToken');
        }

        parser.advance();
        modifiers.push(modifier);
    }
}

export function parseDeclaration(parser: Parser): Declaration {
    const start = parser.peek();
    const modifiers = parseModifiers(parser);

    if (parser.match(TokenType.CLASS)) {
        return parseClassDeclaration(parser, start, modifiers);
    }
    if (parser.match(TokenType.STRUCT)) {
        return parseStructDeclaration(parser, start, modifiers);
    }
    if (parser.match(TokenType.ENUM)) {
        return parseEnumDeclaration(parser, start, modifiers);
    }
    if (parser.match(TokenType.INTERFACE)) {
        return parseInterfaceDeclaration(parser, start, modifiers);
    }
    if (parser.match(TokenType.FUNC)) {
        return parseFunctionDeclaration(parser, start, modifiers, true);
    }
    if (parser.match(TokenType.VAR, TokenType.CONST)) {
        return parseVarDeclaration(parser, start, modifiers);
    }

    const expected = modifiers.length > 0 ? 'Expected declaration after modifiers' : 'Expected declaration';
    throw parser.error(`${expected}. Got ${describeToken(parser.peek())}`, 'unexpectedToken');
}

// Called after 'var' or 'const'
export function parseVarDeclaration(parser: Parser, start: Token, modifiers: Modifier[]): VarDeclaration {
    const isConstant = parser.previous().type === TokenType.CONST;
    const name = parser.consume(TokenType.IDENTIFIER, "Expected variable name");

    let typeAnnotation: TypeNode | undefined;
    if (parser.match(TokenType.COLON)) {
        typeAnnotation = parseType(parser);
    }

    let initializer: Expression | undefined;
    if (parser.match(TokenType.ASSIGN)) {
        initializer = parseExpression(parser);
    }

    parser.consume(TokenType.SEMICOLON, "Expected ';' after variable declaration");

    return {
        kind: 'varDecl',
        name: name.lexeme,
        isConstant,
        typeAnnotation,
        initializer,
        modifiers,
        location: parser.spanFrom(start)
    };
}

/**
 * Called after 'func' (or on 'init' inside a type body). Signatures without a body end in ';'
 * and are only allowed where requireBody is false.
 */
export function parseFunctionDeclaration(parser: Parser, start: Token, modifiers: Modifier[], requireBody: boolean): FunctionDeclaration {
    const name = parser.previous().type === TokenType.INIT
        ? parser.previous()
        : parser.consume(TokenType.IDENTIFIER, "Expected function name");
    const typeParameters = parseTypeParameters(parser);

    parser.consume(TokenType.LEFT_PAREN, `Expected '(' after function name '${name.lexeme}'`);
    const parameters = parseParameterList(parser);

    let returnType: TypeNode | undefined;
    if (parser.match(TokenType.ARROW)) {
        returnType = parseType(parser);
    }

    let body: BlockStatement | undefined;
    if (parser.check(TokenType.LEFT_BRACE) || requireBody) {
        body = parseBlockStatement(parser);
    } else {
        parser.consume(TokenType.SEMICOLON, "Expected '{' or ';' after function signature");
    }

    return {
        kind: 'functionDecl',
        name: name.lexeme,
        typeParameters,
        parameters,
        returnType,
        body,
        modifiers,
        location: parser.spanFrom(start)
    };
}

function parseTypeReference(parser: Parser, message: string): TypeReference {
    const name = parser.consume(TokenType.IDENTIFIER, message);
    return { name: name.lexeme, location: parser.locationOf(name) };
}

function parseTypeReferenceList(parser: Parser, message: string): TypeReference[] {
    const references: TypeReference[] = [];
    do {
        references.push(parseTypeReference(parser, message));
    } while (parser.match(TokenType.COMMA));
    return references;
}

function checkContextualKeyword(parser: Parser, word: string): boolean {
    return parser.check(TokenType.IDENTIFIER) && parser.peek().lexeme === word;
}

interface TypeBody {
    properties: VarDeclaration[];
    methods: FunctionDeclaration[];
}

// Members of a class or struct body, including 'init' initializers
function parseTypeBody(parser: Parser, typeName: string): TypeBody {
    parser.consume(TokenType.LEFT_BRACE, `Expected '{' before body of '${typeName}'`);
    const properties: VarDeclaration[] = [];
    const methods: FunctionDeclaration[] = [];

    while (!parser.check(TokenType.RIGHT_BRACE) && !parser.isAtEnd()) {
        const start = parser.peek();
        const modifiers = parseModifiers(parser);

        if (parser.match(TokenType.VAR, TokenType.CONST)) {
            properties.push(parseVarDeclaration(parser, start, modifiers));
        } else if (parser.match(TokenType.FUNC, TokenType.INIT)) {
            methods.push(parseFunctionDeclaration(parser, start, modifiers, false));
        } else {
            throw parser.error(`Expected member declaration in '${typeName}'. Got ${describeToken(parser.peek())}`, 'unexpectedToken');
        }
    }

    parser.consume(TokenType.RIGHT_BRACE, `Expected '}' after body of '${typeName}'`);
    return { properties, methods };
}

/**
 * class Name<T>: Base, Interface1, Interface2 permits A, B { ... }
 * The first inherited name is recorded as the superclass; whether it really names a class
 * is decided during semantic analysis. 'extends'/'implements' spell the same thing explicitly.
 */
export function parseClassDeclaration(parser: Parser, start: Token, modifiers: Modifier[]): ClassDeclaration {
    const name = parser.consume(TokenType.IDENTIFIER, "Expected class name");
    const typeParameters = parseTypeParameters(parser);

    let superclass: TypeReference | undefined;
    let interfaces: TypeReference[] = [];

    if (parser.match(TokenType.COLON)) {
        const inherited = parseTypeReferenceList(parser, "Expected superclass or interface name");
        superclass = inherited[0];
        interfaces = inherited.slice(1);
    } else {
        if (parser.match(TokenType.EXTENDS)) {
            superclass = parseTypeReference(parser, "Expected superclass name after 'extends'");
        }
        if (parser.match(TokenType.IMPLEMENTS)) {
            interfaces = parseTypeReferenceList(parser, "Expected interface name after 'implements'");
        }
    }

    let permits: TypeReference[] = [];
    if (checkContextualKeyword(parser, 'permits')) {
        parser.advance();
        permits = parseTypeReferenceList(parser, "Expected class name after 'permits'");
    }

    const { properties, methods } = parseTypeBody(parser, name.lexeme);

    return {
        kind: 'classDecl',
        name: name.lexeme,
        typeParameters,
        superclass,
        interfaces,
        properties,
        methods,
        modifiers,
        permits,
        location: parser.spanFrom(start)
    };
}

// Structs have no superclass: every inherited name is an interface
export function parseStructDeclaration(parser: Parser, start: Token, modifiers: Modifier[]): StructDeclaration {
    const name = parser.consume(TokenType.IDENTIFIER, "Expected struct name");
    const typeParameters = parseTypeParameters(parser);

    let interfaces: TypeReference[] = [];
    if (parser.match(TokenType.COLON, TokenType.IMPLEMENTS)) {
        interfaces = parseTypeReferenceList(parser, "Expected interface name");
    }

    const { properties, methods } = parseTypeBody(parser, name.lexeme);

    return {
        kind: 'structDecl',
        name: name.lexeme,
        typeParameters,
        interfaces,
        properties,
        methods,
        modifiers,
        location: parser.spanFrom(start)
    };
}

// enum Name { A; B = 5; case C, D; func method() {} }
export function parseEnumDeclaration(parser: Parser, start: Token, modifiers: Modifier[]): EnumDeclaration {
    const name = parser.consume(TokenType.IDENTIFIER, "Expected enum name");
    parser.consume(TokenType.LEFT_BRACE, "Expected '{' before enum body");

    const cases: EnumCase[] = [];
    const methods: FunctionDeclaration[] = [];

    while (!parser.check(TokenType.RIGHT_BRACE) && !parser.isAtEnd()) {
        const memberStart = parser.peek();
        const memberModifiers = parseModifiers(parser);

        if (parser.match(TokenType.FUNC)) {
            methods.push(parseFunctionDeclaration(parser, memberStart, memberModifiers, true));
            continue;
        }
        if (memberModifiers.length > 0) {
            throw parser.error(`Expected method after modifiers. Got ${describeToken(parser.peek())}`, 'unexpectedToken');
        }

        parser.match(TokenType.CASE);
        do {
            const caseName = parser.consume(TokenType.IDENTIFIER, "Expected enum case name");
            let rawValue: Expression | undefined;
            if (parser.match(TokenType.ASSIGN)) {
                rawValue = parseExpression(parser);
            }
            cases.push({
                kind: 'enumCase',
                name: caseName.lexeme,
                rawValue,
                location: parser.spanFrom(caseName)
            });
        } while (parser.match(TokenType.COMMA));

        // The separator may be omitted before the closing brace
        if (!parser.check(TokenType.RIGHT_BRACE)) {
            parser.consume(TokenType.SEMICOLON, "Expected ';' after enum case");
        }
    }

    parser.consume(TokenType.RIGHT_BRACE, "Expected '}' after enum body");

    return {
        kind: 'enumDecl',
        name: name.lexeme,
        cases,
        methods,
        modifiers,
        location: parser.spanFrom(start)
    };
}

// Interface methods may be bare signatures or carry a default body
export function parseInterfaceDeclaration(parser: Parser, start: Token, modifiers: Modifier[]): InterfaceDeclaration {
    const name = parser.consume(TokenType.IDENTIFIER, "Expected interface name");
    const typeParameters = parseTypeParameters(parser);

    let parents: TypeReference[] = [];
    if (parser.match(TokenType.COLON, TokenType.EXTENDS)) {
        parents = parseTypeReferenceList(parser, "Expected parent interface name");
    }

    parser.consume(TokenType.LEFT_BRACE, "Expected '{' before interface body");
    const methods: FunctionDeclaration[] = [];

    while (!parser.check(TokenType.RIGHT_BRACE) && !parser.isAtEnd()) {
        const memberStart = parser.peek();
        const memberModifiers = parseModifiers(parser);
        parser.consume(TokenType.FUNC, "Expected method signature in interface");
        methods.push(parseFunctionDeclaration(parser, memberStart, memberModifiers, false));
    }

    parser.consume(TokenType.RIGHT_BRACE, "Expected '}' after interface body");

    return {
        kind: 'interfaceDecl',
        name: name.lexeme,
        typeParameters,
        parents,
        methods,
        modifiers,
        location: parser.spanFrom(start)
    };
}
