/**
 * Constructors for unchecked syntax nodes.
 *
 * A parser front end (or a test) builds trees with these. Spans are optional;
 * when omitted each node receives a fresh synthetic span on its own line, so
 * diagnostics still point somewhere distinct.
 */

import {
    AstAssignExpr, AstAwaitExpr, AstBinaryExpr, AstBinaryOp, AstBlockExpr, AstCallExpr, AstDotIdExpr, AstExpr,
    AstExprStatement, AstGenericTerm, AstIdExpr, AstIfArm, AstIfExpr, AstLetStatement, AstLiteral, AstNamedType,
    AstPerm, AstPermissionOp, AstPermissionOpExpr, AstPermType, AstPlacePath, AstReturnExpr, AstSquareBracketExpr,
    AstStatement, AstTupleExpr, AstTupleType, AstType, AstUnaryExpr, AstUnaryOp, Span, SpannedIdentifier
} from './unchecked-ast.js';

let syntheticLine = 0;

/** A span on a line no real source uses; every call returns a new one. */
export function syntheticSpan(): Span {
    const line = 100_000 + syntheticLine++;
    return { start: { line, character: 0 }, end: { line, character: 1 } };
}

export function spanAt(line: number, startCharacter: number, endCharacter: number): Span {
    return { start: { line, character: startCharacter }, end: { line, character: endCharacter } };
}

export function createIdentifier(id: string, span: Span = syntheticSpan()): SpannedIdentifier {
    return { id, span };
}

// ============================================================================
// Types and permissions
// ============================================================================

export function createNamedType(path: string | readonly SpannedIdentifier[], generics: readonly AstGenericTerm[] = [], span: Span = syntheticSpan()): AstNamedType {
    const segments = typeof path === 'string' ? path.split('.').map(id => createIdentifier(id, span)) : path;
    return { $type: 'NamedType', path: segments, generics, span };
}

export function createPermType(perm: AstPerm, type: AstType, span: Span = syntheticSpan()): AstPermType {
    return { $type: 'PermType', perm, type, span };
}

export function createTupleType(elements: readonly AstType[], span: Span = syntheticSpan()): AstTupleType {
    return { $type: 'TupleType', elements, span };
}

export function createPlacePath(path: string, span: Span = syntheticSpan()): AstPlacePath {
    const [root, ...fields] = path.split('.');
    return {
        $type: 'PlacePath',
        root: createIdentifier(root, span),
        fields: fields.map(field => createIdentifier(field, span)),
        span,
    };
}

export function createMyPerm(span: Span = syntheticSpan()): AstPerm {
    return { $type: 'Perm', kind: 'my', places: [], span };
}

export function createOurPerm(span: Span = syntheticSpan()): AstPerm {
    return { $type: 'Perm', kind: 'our', places: [], span };
}

export function createSharedPerm(places: readonly string[], span: Span = syntheticSpan()): AstPerm {
    return { $type: 'Perm', kind: 'shared', places: places.map(place => createPlacePath(place, span)), span };
}

export function createLeasedPerm(places: readonly string[], span: Span = syntheticSpan()): AstPerm {
    return { $type: 'Perm', kind: 'leased', places: places.map(place => createPlacePath(place, span)), span };
}

export function createNamedPerm(name: string, span: Span = syntheticSpan()): AstPerm {
    return { $type: 'Perm', kind: 'named', places: [], name: createIdentifier(name, span), span };
}

// ============================================================================
// Expressions
// ============================================================================

export function createIntegerLiteral(text: string, span: Span = syntheticSpan()): AstLiteral {
    return { $type: 'Literal', literalKind: 'integer', text, span };
}

export function createStringLiteral(text: string, span: Span = syntheticSpan()): AstLiteral {
    return { $type: 'Literal', literalKind: 'string', text, span };
}

export function createBooleanLiteral(value: boolean, span: Span = syntheticSpan()): AstLiteral {
    return { $type: 'Literal', literalKind: 'boolean', text: value ? 'true' : 'false', span };
}

export function createTupleExpr(elements: readonly AstExpr[], span: Span = syntheticSpan()): AstTupleExpr {
    return { $type: 'TupleExpr', elements, span };
}

export function createBinaryExpr(left: AstExpr, op: AstBinaryOp, right: AstExpr, span: Span = syntheticSpan(), opSpan: Span = span): AstBinaryExpr {
    return { $type: 'BinaryExpr', left, op, opSpan, right, span };
}

export function createAssignExpr(place: AstExpr, value: AstExpr, span: Span = syntheticSpan()): AstAssignExpr {
    return { $type: 'AssignExpr', place, value, span };
}

export function createIdExpr(id: string, span: Span = syntheticSpan()): AstIdExpr {
    return { $type: 'IdExpr', id, span };
}

export function createDotIdExpr(owner: AstExpr, member: string | SpannedIdentifier, span: Span = syntheticSpan()): AstDotIdExpr {
    return { $type: 'DotIdExpr', owner, member: typeof member === 'string' ? createIdentifier(member, span) : member, span };
}

export function createSquareBracketExpr(owner: AstExpr, args: readonly AstGenericTerm[], span: Span = syntheticSpan()): AstSquareBracketExpr {
    return { $type: 'SquareBracketExpr', owner, args, span };
}

export function createCallExpr(owner: AstExpr, args: readonly AstExpr[], span: Span = syntheticSpan()): AstCallExpr {
    return { $type: 'CallExpr', owner, args, span };
}

export function createReturnExpr(value?: AstExpr, span: Span = syntheticSpan()): AstReturnExpr {
    return value ? { $type: 'ReturnExpr', value, span } : { $type: 'ReturnExpr', span };
}

export function createAwaitExpr(future: AstExpr, span: Span = syntheticSpan(), awaitSpan: Span = span): AstAwaitExpr {
    return { $type: 'AwaitExpr', future, awaitSpan, span };
}

export function createUnaryExpr(op: AstUnaryOp, operand: AstExpr, span: Span = syntheticSpan(), opSpan: Span = span): AstUnaryExpr {
    return { $type: 'UnaryExpr', op, opSpan, operand, span };
}

export function createIfArm(condition: AstExpr | undefined, body: AstExpr, span: Span = syntheticSpan()): AstIfArm {
    return condition ? { $type: 'IfArm', condition, body, span } : { $type: 'IfArm', body, span };
}

export function createIfExpr(arms: readonly AstIfArm[], span: Span = syntheticSpan()): AstIfExpr {
    return { $type: 'IfExpr', arms, span };
}

export function createPermissionOpExpr(op: AstPermissionOp, value: AstExpr, span: Span = syntheticSpan()): AstPermissionOpExpr {
    return { $type: 'PermissionOpExpr', op, value, span };
}

export function createBlockExpr(statements: readonly AstStatement[], tail?: AstExpr, span: Span = syntheticSpan()): AstBlockExpr {
    return tail ? { $type: 'BlockExpr', statements, tail, span } : { $type: 'BlockExpr', statements, span };
}

export function createLetStatement(name: string | SpannedIdentifier, type?: AstType, initializer?: AstExpr, span: Span = syntheticSpan()): AstLetStatement {
    const id = typeof name === 'string' ? createIdentifier(name, span) : name;
    return { $type: 'LetStatement', name: id, ...(type ? { type } : {}), ...(initializer ? { initializer } : {}), span };
}

export function createExprStatement(expr: AstExpr, span: Span = syntheticSpan()): AstExprStatement {
    return { $type: 'ExprStatement', expr, span };
}
