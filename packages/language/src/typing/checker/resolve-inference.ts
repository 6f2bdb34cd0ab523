/**
 * Replaces inference variables in a checked tree by what was inferred for
 * them, once the session has run to completion.
 */

import { ErrorCode } from '../../codes/errors.js';
import type { Env } from '../env.js';
import { Predicate } from '../predicates/predicate.js';
import { CheckDiagnostic, DiagnosticLevel } from '../report.js';
import type { InferVarData } from '../runtime/infer-var.js';
import { TermTransform, transformPerm, transformTerm, transformTy } from '../terms/substitution.js';
import { InferVarIndex, SymGenericTerm, SymPerm, SymTy } from '../terms/sym-terms.js';
import { SymGenericKind } from '../terms/symbols.js';
import { SymExpr, SymExprKind, SymPlaceExpr, SymPlaceExprKind } from './sym-expr.js';

export class InferenceResolver {
    private readonly resolved = new Map<InferVarIndex, SymGenericTerm>();
    private readonly inProgress = new Set<InferVarIndex>();
    private readonly transform: TermTransform;

    constructor(private readonly env: Env) {
        this.transform = { infer: (kind, infer) => this.resolveInfer(kind, infer) };
    }

    resolveTy(ty: SymTy): SymTy {
        return transformTy(ty, this.transform);
    }

    resolvePerm(perm: SymPerm): SymPerm {
        return transformPerm(perm, this.transform);
    }

    private resolveInfer(kind: SymGenericKind, infer: InferVarIndex): SymGenericTerm | undefined {
        const known = this.resolved.get(infer);
        if (known !== undefined) {
            return known;
        }
        // a variable bounded through itself stays as it is
        if (this.inProgress.has(infer)) {
            return undefined;
        }
        this.inProgress.add(infer);
        const data = this.env.runtime.inferVar(infer);
        let term: SymGenericTerm | undefined;
        switch (kind) {
            case SymGenericKind.Type: term = this.resolveTyVar(data); break;
            case SymGenericKind.Perm: term = this.resolvePermVar(data); break;
            case SymGenericKind.Place: term = undefined; break;
        }
        this.inProgress.delete(infer);
        if (term !== undefined) {
            this.resolved.set(infer, term);
        }
        return term;
    }

    private resolveTyVar(data: InferVarData): SymTy {
        const [upper] = data.upperBounds;
        const bound = data.lowerBound?.term ?? upper?.term;
        if (bound instanceof SymTy) {
            return this.resolveTy(bound);
        }
        return SymTy.error(this.env.report(
            CheckDiagnostic.error(data.span, 'type annotations needed', ErrorCode.PC_TYPE_ANNOTATIONS_NEEDED)
                .label(DiagnosticLevel.Error, data.span, 'I could not infer a type for this')
        ));
    }

    /** Without a lower bound a permission is `our` if it had to be copy, `my` otherwise. */
    private resolvePermVar(data: InferVarData): SymPerm {
        const bound = data.lowerBound?.term;
        if (bound instanceof SymPerm) {
            return this.resolvePerm(bound);
        }
        return data.facts.has(Predicate.Copy) ? SymPerm.our() : SymPerm.my();
    }

    resolveExpr(expr: SymExpr): SymExpr {
        return new SymExpr(expr.span, this.resolveTy(expr.ty), this.resolveExprKind(expr.kind));
    }

    private resolveExprKind(kind: SymExprKind): SymExprKind {
        switch (kind.$type) {
            case 'Semi':
                return { ...kind, lhs: this.resolveExpr(kind.lhs), rhs: this.resolveExpr(kind.rhs) };
            case 'Tuple':
                return { ...kind, elements: kind.elements.map(element => this.resolveExpr(element)) };
            case 'LetIn':
                return {
                    ...kind,
                    ty: this.resolveTy(kind.ty),
                    initializer: kind.initializer && this.resolveExpr(kind.initializer),
                    body: this.resolveExpr(kind.body),
                };
            case 'Await':
                return { ...kind, future: this.resolveExpr(kind.future) };
            case 'Assign':
                return { ...kind, place: this.resolvePlaceExpr(kind.place), value: this.resolveExpr(kind.value) };
            case 'PermissionOp':
                return { ...kind, place: this.resolvePlaceExpr(kind.place) };
            case 'Call':
                return { ...kind, substitution: kind.substitution.map(term => transformTerm(term, this.transform)) };
            case 'Return':
                return { ...kind, value: this.resolveExpr(kind.value) };
            case 'Not':
            case 'Negate':
                return { ...kind, operand: this.resolveExpr(kind.operand) };
            case 'BinaryOp':
                return { ...kind, lhs: this.resolveExpr(kind.lhs), rhs: this.resolveExpr(kind.rhs) };
            case 'Match':
                return {
                    ...kind,
                    arms: kind.arms.map(arm => ({
                        condition: arm.condition && this.resolveExpr(arm.condition),
                        body: this.resolveExpr(arm.body),
                    })),
                };
            case 'Primitive':
            case 'ByteLiteral':
            case 'Error':
                return kind;
        }
    }

    resolvePlaceExpr(place: SymPlaceExpr): SymPlaceExpr {
        return new SymPlaceExpr(place.span, this.resolveTy(place.ty), this.resolvePlaceExprKind(place.kind));
    }

    private resolvePlaceExprKind(kind: SymPlaceExprKind): SymPlaceExprKind {
        switch (kind.$type) {
            case 'Field':
                return { ...kind, owner: this.resolvePlaceExpr(kind.owner) };
            case 'Var':
            case 'Error':
                return kind;
        }
    }
}
