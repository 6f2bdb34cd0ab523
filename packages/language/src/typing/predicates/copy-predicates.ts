/**
 * The Copy predicate: a value may be duplicated without giving it up.
 *
 * Primitives and shared permissions are copy, classes, futures and `my` are
 * not. A struct or tuple is copy when at least one of its generic arguments
 * is. A permission applied to a type is copy when either side is.
 */

import type { PermServices } from '../../perm-module.js';
import type { PlaceTyper } from '../checker/places.js';
import { either, exists, forAll, both, require, requireBoth, requireForAll } from '../combinators.js';
import type { Env } from '../env.js';
import { becauseOfLeasedPlace, JUST_SO, OrElse } from '../or-else.js';
import { InvariantViolation, Reported } from '../report.js';
import { SymGenericTerm, SymPerm, SymPlace, SymTy } from '../terms/sym-terms.js';
import { Predicate } from './predicate.js';
import type { VarInferFacts } from './var-infer.js';

export class CopyPredicates {
    private readonly varInfer: () => VarInferFacts;
    private readonly places: () => PlaceTyper;

    constructor(services: PermServices) {
        this.varInfer = () => services.predicates.VarInfer;
        this.places = () => services.checking.Places;
    }

    // ========================================================================
    // is_provably_copy
    // ========================================================================

    async isProvablyCopy(env: Env, term: SymGenericTerm): Promise<boolean> {
        if (term instanceof Reported) throw term;
        if (term instanceof SymTy) return this.tyIsCopy(env, term);
        if (term instanceof SymPerm) return this.permIsCopy(env, term);
        throw new InvariantViolation(`copy query on place \`${term}\``);
    }

    private async tyIsCopy(env: Env, ty: SymTy): Promise<boolean> {
        const kind = ty.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'Perm':
                return either(() => this.permIsCopy(env, kind.perm), () => this.tyIsCopy(env, kind.ty));
            case 'Named': {
                const name = kind.name;
                if (name.$type === 'Primitive') return true;
                if (name.$type === 'Future') return false;
                if (name.$type === 'Aggregate' && name.aggregate.isClass) return false;
                return exists(kind.generics, generic => this.isProvablyCopy(env, generic));
            }
            case 'Infer':
                return this.varInfer().testInferIs(env, kind.infer, Predicate.Copy);
            case 'Var':
                return this.varInfer().testVarIs(env, kind.variable, Predicate.Copy);
            case 'Never':
                return true;
        }
    }

    private async permIsCopy(env: Env, perm: SymPerm): Promise<boolean> {
        const kind = perm.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'My':
                return false;
            case 'Our':
            case 'Shared':
                return true;
            case 'Leased':
                return forAll(kind.places, place => this.placeIsCopy(env, place));
            case 'Apply':
                return either(() => this.permIsCopy(env, kind.left), () => this.permIsCopy(env, kind.right));
            case 'Var':
                return this.varInfer().testVarIs(env, kind.variable, Predicate.Copy);
            case 'Infer':
                return this.varInfer().testInferIs(env, kind.infer, Predicate.Copy);
        }
    }

    private async placeIsCopy(env: Env, place: SymPlace): Promise<boolean> {
        return this.tyIsCopy(env, await this.places().placeTy(env, place));
    }

    // ========================================================================
    // isnt_provably_copy
    // ========================================================================

    async isntProvablyCopy(env: Env, term: SymGenericTerm): Promise<boolean> {
        if (term instanceof Reported) throw term;
        if (term instanceof SymTy) return this.tyIsntCopy(env, term);
        if (term instanceof SymPerm) return this.permIsntCopy(env, term);
        throw new InvariantViolation(`copy query on place \`${term}\``);
    }

    private async tyIsntCopy(env: Env, ty: SymTy): Promise<boolean> {
        const kind = ty.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'Perm':
                return both(() => this.permIsntCopy(env, kind.perm), () => this.tyIsntCopy(env, kind.ty));
            case 'Named': {
                const name = kind.name;
                if (name.$type === 'Primitive') return false;
                if (name.$type === 'Future') return true;
                if (name.$type === 'Aggregate' && name.aggregate.isClass) return true;
                return forAll(kind.generics, generic => this.isntProvablyCopy(env, generic));
            }
            case 'Infer':
                return this.varInfer().isntInfer(env, kind.infer, Predicate.Copy);
            case 'Var':
                return !this.varInfer().testVarIs(env, kind.variable, Predicate.Copy);
            case 'Never':
                return false;
        }
    }

    private async permIsntCopy(env: Env, perm: SymPerm): Promise<boolean> {
        const kind = perm.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'My':
                return true;
            case 'Our':
            case 'Shared':
                return false;
            case 'Leased':
                return exists(kind.places, async place => this.tyIsntCopy(env, await this.places().placeTy(env, place)));
            case 'Apply':
                return both(() => this.permIsntCopy(env, kind.left), () => this.permIsntCopy(env, kind.right));
            case 'Var':
                return !this.varInfer().testVarIs(env, kind.variable, Predicate.Copy);
            case 'Infer':
                return this.varInfer().isntInfer(env, kind.infer, Predicate.Copy);
        }
    }

    // ========================================================================
    // require_copy
    // ========================================================================

    async requireCopy(env: Env, term: SymGenericTerm, orElse: OrElse): Promise<void> {
        if (term instanceof Reported) throw term;
        if (term instanceof SymTy) return this.requireTyIsCopy(env, term, orElse);
        if (term instanceof SymPerm) return this.requirePermIsCopy(env, term, orElse);
        throw new InvariantViolation(`copy requirement on place \`${term}\``);
    }

    private async requireTyIsCopy(env: Env, ty: SymTy, orElse: OrElse): Promise<void> {
        const kind = ty.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'Perm':
                return this.requireApplicationIsCopy(env, kind.perm, kind.ty, orElse);
            case 'Named': {
                const name = kind.name;
                if (name.$type === 'Primitive') return;
                if (name.$type === 'Future' || (name.$type === 'Aggregate' && name.aggregate.isClass)) {
                    throw orElse.report(env, { $type: 'ClassIsNotCopy', name: ty.toString() });
                }
                return require(env, exists(kind.generics, generic => this.isProvablyCopy(env, generic)), orElse);
            }
            case 'Infer':
                return this.varInfer().requireInferIs(env, kind.infer, Predicate.Copy, orElse);
            case 'Var':
                return this.varInfer().requireVarIs(env, kind.variable, Predicate.Copy, orElse);
            case 'Never':
                throw orElse.report(env, { $type: 'NeverIsNotCopy' });
        }
    }

    private async requirePermIsCopy(env: Env, perm: SymPerm, orElse: OrElse): Promise<void> {
        const kind = perm.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'My':
                throw orElse.report(env, JUST_SO);
            case 'Our':
            case 'Shared':
                return;
            case 'Leased':
                return requireForAll(kind.places, async place =>
                    this.requireTyIsCopy(env, await this.places().placeTy(env, place), becauseOfLeasedPlace(orElse, place)));
            case 'Apply':
                return this.requireApplicationIsCopy(env, kind.left, kind.right, orElse);
            case 'Var':
                return this.varInfer().requireVarIs(env, kind.variable, Predicate.Copy, orElse);
            case 'Infer':
                return this.varInfer().requireInferIs(env, kind.infer, Predicate.Copy, orElse);
        }
    }

    /**
     * `lhs rhs` is copy if either side is. Each side is tested concurrently;
     * whichever side the other cannot vouch for is required to be copy.
     */
    private async requireApplicationIsCopy(env: Env, lhs: SymPerm, rhs: SymPerm | SymTy, orElse: OrElse): Promise<void> {
        await requireBoth(
            async () => {
                if (!(await this.isProvablyCopy(env, rhs))) {
                    await this.requireCopy(env, lhs, orElse);
                }
            },
            async () => {
                if (!(await this.isProvablyCopy(env, lhs))) {
                    await this.requireCopy(env, rhs, orElse);
                }
            },
        );
    }
}
