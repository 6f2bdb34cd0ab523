import type { PermServices } from '../../perm-module.js';
import { both, either, exists, forAll, require, requireBoth, requireForAll } from '../combinators.js';
import type { Env } from '../env.js';
import { JUST_SO, OrElse } from '../or-else.js';
import { InvariantViolation, Reported } from '../report.js';
import { SymGenericTerm, SymPerm, SymTy } from '../terms/sym-terms.js';
import { Predicate } from './predicate.js';
import type { VarInferFacts } from './var-infer.js';

/**
 * Owned and Lent.
 *
 * A value is owned when nothing in it is borrowed from a place: `my` and `our`
 * are owned, and a named type is owned when every generic argument is. It is
 * lent when some part of it is `shared` or `leased`. Ownership is never a
 * matter of places' types, so these rules do not consult place typing.
 */
export class OwnershipPredicates {
    private readonly varInfer: () => VarInferFacts;

    constructor(services: PermServices) {
        this.varInfer = () => services.predicates.VarInfer;
    }

    // ========================================================================
    // Owned
    // ========================================================================

    async isProvablyOwned(env: Env, term: SymGenericTerm): Promise<boolean> {
        if (term instanceof Reported) throw term;
        if (term instanceof SymTy) return this.tyIsOwned(env, term);
        if (term instanceof SymPerm) return this.permIsOwned(env, term);
        throw new InvariantViolation(`owned query on place \`${term}\``);
    }

    private async tyIsOwned(env: Env, ty: SymTy): Promise<boolean> {
        const kind = ty.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'Perm':
                return both(() => this.permIsOwned(env, kind.perm), () => this.tyIsOwned(env, kind.ty));
            case 'Named':
                return forAll(kind.generics, generic => this.isProvablyOwned(env, generic));
            case 'Infer':
                return this.varInfer().testInferIs(env, kind.infer, Predicate.Owned);
            case 'Var':
                return this.varInfer().testVarIs(env, kind.variable, Predicate.Owned);
            case 'Never':
                return true;
        }
    }

    private async permIsOwned(env: Env, perm: SymPerm): Promise<boolean> {
        const kind = perm.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'My':
            case 'Our':
                return true;
            case 'Shared':
            case 'Leased':
                return false;
            case 'Apply':
                return both(() => this.permIsOwned(env, kind.left), () => this.permIsOwned(env, kind.right));
            case 'Var':
                return this.varInfer().testVarIs(env, kind.variable, Predicate.Owned);
            case 'Infer':
                return this.varInfer().testInferIs(env, kind.infer, Predicate.Owned);
        }
    }

    /** Something in the term is borrowed. */
    isntProvablyOwned(env: Env, term: SymGenericTerm): Promise<boolean> {
        return this.isProvablyLent(env, term);
    }

    async requireOwned(env: Env, term: SymGenericTerm, orElse: OrElse): Promise<void> {
        if (term instanceof Reported) throw term;
        if (term instanceof SymTy) return this.requireTyIsOwned(env, term, orElse);
        if (term instanceof SymPerm) return this.requirePermIsOwned(env, term, orElse);
        throw new InvariantViolation(`owned requirement on place \`${term}\``);
    }

    private async requireTyIsOwned(env: Env, ty: SymTy, orElse: OrElse): Promise<void> {
        const kind = ty.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'Perm':
                return requireBoth(
                    () => this.requirePermIsOwned(env, kind.perm, orElse),
                    () => this.requireTyIsOwned(env, kind.ty, orElse),
                );
            case 'Named':
                return requireForAll(kind.generics, generic => this.requireOwned(env, generic, orElse));
            case 'Infer':
                return this.varInfer().requireInferIs(env, kind.infer, Predicate.Owned, orElse);
            case 'Var':
                return this.varInfer().requireVarIs(env, kind.variable, Predicate.Owned, orElse);
            case 'Never':
                return;
        }
    }

    private async requirePermIsOwned(env: Env, perm: SymPerm, orElse: OrElse): Promise<void> {
        const kind = perm.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'My':
            case 'Our':
                return;
            case 'Shared':
            case 'Leased':
                throw orElse.report(env, JUST_SO);
            case 'Apply':
                return requireBoth(
                    () => this.requirePermIsOwned(env, kind.left, orElse),
                    () => this.requirePermIsOwned(env, kind.right, orElse),
                );
            case 'Var':
                return this.varInfer().requireVarIs(env, kind.variable, Predicate.Owned, orElse);
            case 'Infer':
                return this.varInfer().requireInferIs(env, kind.infer, Predicate.Owned, orElse);
        }
    }

    // ========================================================================
    // Lent
    // ========================================================================

    async isProvablyLent(env: Env, term: SymGenericTerm): Promise<boolean> {
        if (term instanceof Reported) throw term;
        if (term instanceof SymTy) return this.tyIsLent(env, term);
        if (term instanceof SymPerm) return this.permIsLent(env, term);
        throw new InvariantViolation(`lent query on place \`${term}\``);
    }

    private async tyIsLent(env: Env, ty: SymTy): Promise<boolean> {
        const kind = ty.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'Perm':
                return either(() => this.permIsLent(env, kind.perm), () => this.tyIsLent(env, kind.ty));
            case 'Named':
                return exists(kind.generics, generic => this.isProvablyLent(env, generic));
            case 'Infer':
                return this.varInfer().testInferIs(env, kind.infer, Predicate.Lent);
            case 'Var':
                return this.varInfer().testVarIs(env, kind.variable, Predicate.Lent);
            case 'Never':
                return false;
        }
    }

    private async permIsLent(env: Env, perm: SymPerm): Promise<boolean> {
        const kind = perm.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'My':
            case 'Our':
                return false;
            case 'Shared':
            case 'Leased':
                return true;
            case 'Apply':
                return either(() => this.permIsLent(env, kind.left), () => this.permIsLent(env, kind.right));
            case 'Var':
                return this.varInfer().testVarIs(env, kind.variable, Predicate.Lent);
            case 'Infer':
                return this.varInfer().testInferIs(env, kind.infer, Predicate.Lent);
        }
    }

    isntProvablyLent(env: Env, term: SymGenericTerm): Promise<boolean> {
        return this.isProvablyOwned(env, term);
    }

    async requireLent(env: Env, term: SymGenericTerm, orElse: OrElse): Promise<void> {
        if (term instanceof Reported) throw term;
        if (term instanceof SymTy) return this.requireTyIsLent(env, term, orElse);
        if (term instanceof SymPerm) return this.requirePermIsLent(env, term, orElse);
        throw new InvariantViolation(`lent requirement on place \`${term}\``);
    }

    private async requireTyIsLent(env: Env, ty: SymTy, orElse: OrElse): Promise<void> {
        const kind = ty.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'Perm':
                return this.requireApplicationIsLent(env, kind.perm, kind.ty, orElse);
            case 'Named':
                return require(env, exists(kind.generics, generic => this.isProvablyLent(env, generic)), orElse);
            case 'Infer':
                return this.varInfer().requireInferIs(env, kind.infer, Predicate.Lent, orElse);
            case 'Var':
                return this.varInfer().requireVarIs(env, kind.variable, Predicate.Lent, orElse);
            case 'Never':
                throw orElse.report(env, JUST_SO);
        }
    }

    private async requirePermIsLent(env: Env, perm: SymPerm, orElse: OrElse): Promise<void> {
        const kind = perm.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'My':
            case 'Our':
                throw orElse.report(env, JUST_SO);
            case 'Shared':
            case 'Leased':
                return;
            case 'Apply':
                return this.requireApplicationIsLent(env, kind.left, kind.right, orElse);
            case 'Var':
                return this.varInfer().requireVarIs(env, kind.variable, Predicate.Lent, orElse);
            case 'Infer':
                return this.varInfer().requireInferIs(env, kind.infer, Predicate.Lent, orElse);
        }
    }

    private async requireApplicationIsLent(env: Env, lhs: SymPerm, rhs: SymPerm | SymTy, orElse: OrElse): Promise<void> {
        await requireBoth(
            async () => {
                if (!(await this.isProvablyLent(env, rhs))) {
                    await this.requireLent(env, lhs, orElse);
                }
            },
            async () => {
                if (!(await this.isProvablyLent(env, lhs))) {
                    await this.requireLent(env, rhs, orElse);
                }
            },
        );
    }
}
