import type { AstGenericTerm, Span } from '../../ast/unchecked-ast.js';
import { ErrorCode } from '../../codes/errors.js';
import type { Env } from '../env.js';
import { CheckDiagnostic, DiagnosticLevel, Reported, Reporter } from '../report.js';
import { SymTy } from '../terms/sym-terms.js';
import { SymFunction, SymGenericKind } from '../terms/symbols.js';
import type { NameResolution } from './name-resolution.js';
import { SymExpr, SymPlaceExpr } from './sym-expr.js';
import { encloseInTemporaries, intoTemporary, Temporary } from './temporaries.js';

export type ExprResultKind =
    /** Names a location in memory, e.g. a local variable */
    | { readonly $type: 'PlaceExpr'; readonly placeExpr: SymPlaceExpr }
    | { readonly $type: 'Expr'; readonly expr: SymExpr }
    /** `a.b` where `b` is a method, waiting for its call */
    | { readonly $type: 'Method'; readonly selfExpr: SymExpr; readonly idSpan: Span; readonly fn: SymFunction; readonly generics: readonly AstGenericTerm[] | undefined }
    /** A name that is not (yet) an expression, e.g. a class or a module */
    | { readonly $type: 'Other'; readonly resolution: NameResolution };

/**
 * What checking one syntax node produces, before the consumer decides how to
 * use it. Carries the temporaries it created; whoever consumes the result
 * takes them over.
 */
export class ExprResult {
    constructor(
        readonly temporaries: readonly Temporary[],
        readonly span: Span,
        readonly kind: ExprResultKind,
    ) { }

    static err(reported: Reported): ExprResult {
        return new ExprResult([], reported.span, { $type: 'PlaceExpr', placeExpr: SymPlaceExpr.error(reported) });
    }

    static fromExpr(expr: SymExpr, temporaries: readonly Temporary[] = []): ExprResult {
        return new ExprResult(temporaries, expr.span, { $type: 'Expr', expr });
    }

    static fromPlaceExpr(placeExpr: SymPlaceExpr, temporaries: readonly Temporary[] = []): ExprResult {
        return new ExprResult(temporaries, placeExpr.span, { $type: 'PlaceExpr', placeExpr });
    }

    static fromNameResolution(env: Env, resolution: NameResolution, span: Span): ExprResult {
        const sym = resolution.sym;
        if (sym.$type === 'Variable' && sym.variable.kind === SymGenericKind.Place) {
            const ty = env.variableTy(sym.variable);
            return ExprResult.fromPlaceExpr(new SymPlaceExpr(span, ty, { $type: 'Var', variable: sym.variable }));
        }
        return new ExprResult([], span, { $type: 'Other', resolution });
    }

    /** Type of this result used as an expression; anything else is reported. */
    ty(env: Env): SymTy {
        const kind = this.kind;
        switch (kind.$type) {
            case 'PlaceExpr': return kind.placeExpr.ty;
            case 'Expr': return kind.expr.ty;
            case 'Other': return SymTy.error(reportNonExpr(env, this.span, kind.resolution));
            case 'Method': return SymTy.error(reportMissingCallToMethod(env, kind.selfExpr.span, kind.fn));
        }
    }

    /** A value used where a place is needed is stored in a temporary first. */
    intoPlaceExpr(env: Env, temporaries: Temporary[]): SymPlaceExpr {
        temporaries.push(...this.temporaries);
        const kind = this.kind;
        switch (kind.$type) {
            case 'PlaceExpr': return kind.placeExpr;
            case 'Expr': return intoTemporary(env, kind.expr, temporaries);
            case 'Other': return SymPlaceExpr.error(reportNonExpr(env, this.span, kind.resolution));
            case 'Method': return SymPlaceExpr.error(reportMissingCallToMethod(env, kind.selfExpr.span, kind.fn));
        }
    }

    /** A place used as a value is implicitly referenced. */
    intoExpr(env: Env, temporaries: Temporary[]): SymExpr {
        temporaries.push(...this.temporaries);
        const kind = this.kind;
        switch (kind.$type) {
            case 'Expr':
                return kind.expr;
            case 'PlaceExpr': {
                const placeExpr = kind.placeExpr;
                if (placeExpr.kind.$type === 'Error') {
                    return SymExpr.error(placeExpr.kind.reported);
                }
                return new SymExpr(placeExpr.span, placeExpr.ty.shared(placeExpr.toSymPlace()), {
                    $type: 'PermissionOp',
                    op: 'reference',
                    place: placeExpr,
                });
            }
            case 'Other':
                return SymExpr.error(reportNonExpr(env, this.span, kind.resolution));
            case 'Method':
                return SymExpr.error(reportMissingCallToMethod(env, kind.selfExpr.span, kind.fn));
        }
    }

    /** The expression with its temporaries bound around it. */
    intoExprWithEnclosedTemporaries(env: Env): SymExpr {
        const temporaries: Temporary[] = [];
        const expr = this.intoExpr(env, temporaries);
        return encloseInTemporaries(expr, temporaries);
    }
}

export function reportNonExpr(reporter: Reporter, span: Span, resolution: NameResolution): Reported {
    return reporter.report(
        CheckDiagnostic.error(span, 'expected an expression', ErrorCode.PC_EXPECTED_EXPRESSION)
            .label(DiagnosticLevel.Error, span, `I expected to find an expression but I found ${resolution.categorize()}`)
    );
}

export function reportMissingCallToMethod(reporter: Reporter, ownerSpan: Span, method: SymFunction): Reported {
    return reporter.report(
        CheckDiagnostic.error(ownerSpan, 'missing call to method', ErrorCode.PC_MISSING_CALL_TO_METHOD)
            .label(DiagnosticLevel.Error, ownerSpan, `\`${method.name}\` is a method but you don't appear to be calling it`)
            .label(DiagnosticLevel.Help, { start: ownerSpan.end, end: ownerSpan.end }, 'maybe add `()` here?')
    );
}

export function reportNotImplemented(reporter: Reporter, span: Span, what: string): Reported {
    return reporter.report(
        CheckDiagnostic.error(span, 'not implemented yet', ErrorCode.PC_NOT_IMPLEMENTED)
            .label(DiagnosticLevel.Error, span, `sorry, but ${what} have not been implemented yet`)
    );
}

export function reportNotCallable(reporter: Reporter, span: Span): Reported {
    return reporter.report(
        CheckDiagnostic.error(span, 'not callable', ErrorCode.PC_NOT_CALLABLE)
            .label(DiagnosticLevel.Error, span, 'this is not something you can call')
    );
}
