/**
 * The checked expression tree.
 *
 * Every node carries its type. Intermediate values that are used as places
 * (call arguments, method receivers) are bound by explicit `LetIn` nodes, so
 * evaluation order and the transfer of each value are visible in the tree.
 */

import type { AstBinaryOp, AstPermissionOp, Span } from '../../ast/unchecked-ast.js';
import type { Reported } from '../report.js';
import { SymGenericTerm, SymPlace, SymTy } from '../terms/sym-terms.js';
import type { SymField, SymFunction, SymVariable } from '../terms/symbols.js';

export type SymBinaryOp = 'add' | 'sub' | 'mul' | 'div' | 'greaterThan' | 'lessThan' | 'greaterEqual' | 'lessEqual' | 'equalEqual';

const BINARY_OPS: Partial<Record<AstBinaryOp, SymBinaryOp>> = {
    '+': 'add',
    '-': 'sub',
    '*': 'mul',
    '/': 'div',
    '>': 'greaterThan',
    '<': 'lessThan',
    '>=': 'greaterEqual',
    '<=': 'lessEqual',
    '==': 'equalEqual',
};

/** `&&` and `||` have no operator node; they become `if` expressions. */
export function toSymBinaryOp(op: AstBinaryOp): SymBinaryOp | undefined {
    return BINARY_OPS[op];
}

export type SymLiteral = { readonly $type: 'Integral'; readonly bits: bigint };

export interface SymMatchArm {
    /** Absent for the `else` arm */
    readonly condition: SymExpr | undefined;
    readonly body: SymExpr;
}

export type SymExprKind =
    | { readonly $type: 'Semi'; readonly lhs: SymExpr; readonly rhs: SymExpr }
    | { readonly $type: 'Tuple'; readonly elements: readonly SymExpr[] }
    | { readonly $type: 'Primitive'; readonly literal: SymLiteral }
    | { readonly $type: 'ByteLiteral'; readonly bytes: Uint8Array }
    | { readonly $type: 'LetIn'; readonly variable: SymVariable; readonly ty: SymTy; readonly initializer: SymExpr | undefined; readonly body: SymExpr }
    | { readonly $type: 'Await'; readonly future: SymExpr; readonly awaitSpan: Span }
    | { readonly $type: 'Assign'; readonly place: SymPlaceExpr; readonly value: SymExpr }
    | { readonly $type: 'PermissionOp'; readonly op: AstPermissionOp; readonly place: SymPlaceExpr }
    | { readonly $type: 'Call'; readonly fn: SymFunction; readonly substitution: readonly SymGenericTerm[]; readonly argTemps: readonly SymVariable[] }
    | { readonly $type: 'Return'; readonly value: SymExpr }
    | { readonly $type: 'Not'; readonly operand: SymExpr; readonly opSpan: Span }
    | { readonly $type: 'Negate'; readonly operand: SymExpr; readonly opSpan: Span }
    | { readonly $type: 'BinaryOp'; readonly op: SymBinaryOp; readonly lhs: SymExpr; readonly rhs: SymExpr }
    | { readonly $type: 'Match'; readonly arms: readonly SymMatchArm[] }
    | { readonly $type: 'Error'; readonly reported: Reported };

export class SymExpr {
    constructor(
        readonly span: Span,
        readonly ty: SymTy,
        readonly kind: SymExprKind,
    ) { }

    static error(reported: Reported): SymExpr {
        return new SymExpr(reported.span, SymTy.error(reported), { $type: 'Error', reported });
    }

    static booleanLiteral(span: Span, value: boolean): SymExpr {
        return new SymExpr(span, SymTy.boolean(), { $type: 'Primitive', literal: { $type: 'Integral', bits: value ? 1n : 0n } });
    }

    static unit(span: Span): SymExpr {
        return new SymExpr(span, SymTy.unit(), { $type: 'Tuple', elements: [] });
    }

    /** `if condition { then } else { otherwise }`, typed as `then`. */
    static ifThenElse(span: Span, condition: SymExpr, then: SymExpr, otherwise: SymExpr): SymExpr {
        return new SymExpr(span, then.ty, {
            $type: 'Match',
            arms: [
                { condition, body: then },
                { condition: undefined, body: otherwise },
            ],
        });
    }

    /** `let variable: ty = initializer in body` */
    static letIn(variable: SymVariable, ty: SymTy, initializer: SymExpr | undefined, body: SymExpr): SymExpr {
        return new SymExpr(body.span, body.ty, { $type: 'LetIn', variable, ty, initializer, body });
    }
}

export type SymPlaceExprKind =
    | { readonly $type: 'Var'; readonly variable: SymVariable }
    | { readonly $type: 'Field'; readonly owner: SymPlaceExpr; readonly field: SymField }
    | { readonly $type: 'Error'; readonly reported: Reported };

export class SymPlaceExpr {
    constructor(
        readonly span: Span,
        readonly ty: SymTy,
        readonly kind: SymPlaceExprKind,
    ) { }

    static error(reported: Reported): SymPlaceExpr {
        return new SymPlaceExpr(reported.span, SymTy.error(reported), { $type: 'Error', reported });
    }

    toSymPlace(): SymPlace {
        const kind = this.kind;
        switch (kind.$type) {
            case 'Var': return SymPlace.var(kind.variable);
            case 'Field': return SymPlace.field(kind.owner.toSymPlace(), kind.field);
            case 'Error': return SymPlace.error(kind.reported);
        }
    }
}

/** Renders a tree compactly, for logs and test assertions. */
export function symExprToString(expr: SymExpr): string {
    const kind = expr.kind;
    switch (kind.$type) {
        case 'Semi': return `${symExprToString(kind.lhs)}; ${symExprToString(kind.rhs)}`;
        case 'Tuple': return `(${kind.elements.map(symExprToString).join(', ')})`;
        case 'Primitive': return expr.ty === SymTy.boolean() ? String(kind.literal.bits === 1n) : `${kind.literal.bits}`;
        case 'ByteLiteral': return `b"${new TextDecoder().decode(kind.bytes)}"`;
        case 'LetIn': return `let ${kind.variable}: ${kind.ty}${kind.initializer ? ` = ${symExprToString(kind.initializer)}` : ''} in ${symExprToString(kind.body)}`;
        case 'Await': return `${symExprToString(kind.future)}.await`;
        case 'Assign': return `${symPlaceExprToString(kind.place)} = ${symExprToString(kind.value)}`;
        case 'PermissionOp': return `${symPlaceExprToString(kind.place)}.${kind.op}`;
        case 'Call': return `${kind.fn}(${kind.argTemps.join(', ')})`;
        case 'Return': return `return ${symExprToString(kind.value)}`;
        case 'Not': return `!${symExprToString(kind.operand)}`;
        case 'Negate': return `-${symExprToString(kind.operand)}`;
        case 'BinaryOp': return `(${symExprToString(kind.lhs)} ${kind.op} ${symExprToString(kind.rhs)})`;
        case 'Match': return kind.arms
            .map(arm => arm.condition ? `if ${symExprToString(arm.condition)} { ${symExprToString(arm.body)} }` : `{ ${symExprToString(arm.body)} }`)
            .join(' else ');
        case 'Error': return '<error>';
    }
}

export function symPlaceExprToString(place: SymPlaceExpr): string {
    const kind = place.kind;
    switch (kind.$type) {
        case 'Var': return kind.variable.toString();
        case 'Field': return `${symPlaceExprToString(kind.owner)}.${kind.field.name}`;
        case 'Error': return '<error>';
    }
}
