import type { Span } from '../../ast/unchecked-ast.js';
import type { Env } from '../env.js';
import { SymGenericKind, SymVariable } from '../terms/symbols.js';
import type { SymTy } from '../terms/sym-terms.js';
import { SymExpr, SymPlaceExpr } from './sym-expr.js';

/**
 * A value the checker binds to a fresh variable before its first use.
 * Temporaries are wrapped around the enclosing expression as `LetIn` nodes.
 */
export interface Temporary {
    readonly variable: SymVariable;
    readonly ty: SymTy;
    readonly initializer: SymExpr | undefined;
}

export function createTemporary(env: Env, span: Span, ty: SymTy, initializer: SymExpr | undefined): Temporary {
    const variable = new SymVariable(SymGenericKind.Place, undefined, span);
    env.setVariableTy(variable, ty);
    return { variable, ty, initializer };
}

/** Stores `expr` in a new temporary and returns the place naming it. */
export function intoTemporary(env: Env, expr: SymExpr, temporaries: Temporary[]): SymPlaceExpr {
    const temporary = createTemporary(env, expr.span, expr.ty, expr);
    temporaries.push(temporary);
    return new SymPlaceExpr(expr.span, expr.ty, { $type: 'Var', variable: temporary.variable });
}

/** Like {@link intoTemporary}, returning the variable itself. */
export function intoTemporaryVar(env: Env, expr: SymExpr, temporaries: Temporary[]): SymVariable {
    const temporary = createTemporary(env, expr.span, expr.ty, expr);
    temporaries.push(temporary);
    return temporary.variable;
}

/** Wraps `body` in the temporaries, the first one outermost. */
export function encloseInTemporaries(body: SymExpr, temporaries: readonly Temporary[]): SymExpr {
    return temporaries.reduceRight(
        (expr, temporary) => SymExpr.letIn(temporary.variable, temporary.ty, temporary.initializer, expr),
        body,
    );
}
