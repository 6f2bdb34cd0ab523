/**
 * Unchecked syntax tree handed to the checker.
 *
 * Parsing happens elsewhere; the checker only consumes these nodes. Every node
 * is a langium {@link AstNode} and carries the source span it came from.
 */

import type { AstNode } from 'langium';
import type { Range } from 'vscode-languageserver-types';

/** Source span of a node, in LSP coordinates. */
export type Span = Range;

export interface SpannedIdentifier {
    readonly id: string;
    readonly span: Span;
}

interface SpannedNode extends AstNode {
    readonly span: Span;
}

// ============================================================================
// Types and permissions written in the source
// ============================================================================

export interface AstNamedType extends SpannedNode {
    readonly $type: 'NamedType';
    /** `a.b.C` is written as three segments */
    readonly path: readonly SpannedIdentifier[];
    readonly generics: readonly AstGenericTerm[];
}

export interface AstPermType extends SpannedNode {
    readonly $type: 'PermType';
    readonly perm: AstPerm;
    readonly type: AstType;
}

export interface AstTupleType extends SpannedNode {
    readonly $type: 'TupleType';
    readonly elements: readonly AstType[];
}

export type AstType = AstNamedType | AstPermType | AstTupleType;

export type AstPermKind = 'my' | 'our' | 'shared' | 'leased';

export interface AstPerm extends SpannedNode {
    readonly $type: 'Perm';
    readonly kind: AstPermKind | 'named';
    /** Places for `shared[..]` and `leased[..]` */
    readonly places: readonly AstPlacePath[];
    /** Name of a permission variable, when `kind` is `named` */
    readonly name?: SpannedIdentifier;
}

/** A place written as `x` or `x.f.g`. */
export interface AstPlacePath extends SpannedNode {
    readonly $type: 'PlacePath';
    readonly root: SpannedIdentifier;
    readonly fields: readonly SpannedIdentifier[];
}

export type AstGenericTerm = AstType | AstPerm;

export function isAstPerm(node: AstGenericTerm): node is AstPerm {
    return node.$type === 'Perm';
}

// ============================================================================
// Expressions
// ============================================================================

export type AstLiteralKind = 'integer' | 'string' | 'boolean';

export interface AstLiteral extends SpannedNode {
    readonly $type: 'Literal';
    readonly literalKind: AstLiteralKind;
    /** Source text; string literals hold their already-unescaped contents */
    readonly text: string;
}

export interface AstTupleExpr extends SpannedNode {
    readonly $type: 'TupleExpr';
    readonly elements: readonly AstExpr[];
}

export type AstBinaryOp = '+' | '-' | '*' | '/' | '>' | '<' | '>=' | '<=' | '==' | '&&' | '||';

export interface AstBinaryExpr extends SpannedNode {
    readonly $type: 'BinaryExpr';
    readonly op: AstBinaryOp;
    readonly opSpan: Span;
    readonly left: AstExpr;
    readonly right: AstExpr;
}

export interface AstAssignExpr extends SpannedNode {
    readonly $type: 'AssignExpr';
    readonly place: AstExpr;
    readonly value: AstExpr;
}

export interface AstIdExpr extends SpannedNode {
    readonly $type: 'IdExpr';
    readonly id: string;
}

export interface AstDotIdExpr extends SpannedNode {
    readonly $type: 'DotIdExpr';
    readonly owner: AstExpr;
    readonly member: SpannedIdentifier;
}

/** `owner[...]`: generic arguments, or an index once indexing exists. */
export interface AstSquareBracketExpr extends SpannedNode {
    readonly $type: 'SquareBracketExpr';
    readonly owner: AstExpr;
    readonly args: readonly AstGenericTerm[];
}

export interface AstCallExpr extends SpannedNode {
    readonly $type: 'CallExpr';
    readonly owner: AstExpr;
    readonly args: readonly AstExpr[];
}

export interface AstReturnExpr extends SpannedNode {
    readonly $type: 'ReturnExpr';
    readonly value?: AstExpr;
}

export interface AstAwaitExpr extends SpannedNode {
    readonly $type: 'AwaitExpr';
    readonly future: AstExpr;
    readonly awaitSpan: Span;
}

export type AstUnaryOp = 'not' | 'negate';

export interface AstUnaryExpr extends SpannedNode {
    readonly $type: 'UnaryExpr';
    readonly op: AstUnaryOp;
    readonly opSpan: Span;
    readonly operand: AstExpr;
}

export interface AstIfArm extends SpannedNode {
    readonly $type: 'IfArm';
    /** Absent for the trailing `else` arm */
    readonly condition?: AstExpr;
    readonly body: AstExpr;
}

export interface AstIfExpr extends SpannedNode {
    readonly $type: 'IfExpr';
    readonly arms: readonly AstIfArm[];
}

export type AstPermissionOp = 'give' | 'mutate' | 'reference';

export interface AstPermissionOpExpr extends SpannedNode {
    readonly $type: 'PermissionOpExpr';
    readonly op: AstPermissionOp;
    readonly value: AstExpr;
}

export interface AstBlockExpr extends SpannedNode {
    readonly $type: 'BlockExpr';
    readonly statements: readonly AstStatement[];
    /** Value of the block; `()` when absent */
    readonly tail?: AstExpr;
}

export type AstExpr =
    | AstLiteral
    | AstTupleExpr
    | AstBinaryExpr
    | AstAssignExpr
    | AstIdExpr
    | AstDotIdExpr
    | AstSquareBracketExpr
    | AstCallExpr
    | AstReturnExpr
    | AstAwaitExpr
    | AstUnaryExpr
    | AstIfExpr
    | AstPermissionOpExpr
    | AstBlockExpr;

// ============================================================================
// Statements
// ============================================================================

export interface AstLetStatement extends SpannedNode {
    readonly $type: 'LetStatement';
    readonly name: SpannedIdentifier;
    readonly type?: AstType;
    readonly initializer?: AstExpr;
}

export interface AstExprStatement extends SpannedNode {
    readonly $type: 'ExprStatement';
    readonly expr: AstExpr;
}

export type AstStatement = AstLetStatement | AstExprStatement;
