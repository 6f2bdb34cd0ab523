/**
 * The Move predicate: a value has unique ownership and is given away on use.
 */

import type { PermServices } from '../../perm-module.js';
import type { PlaceTyper } from '../checker/places.js';
import { both, either, exists, forAll, require, requireBoth, requireForAll } from '../combinators.js';
import type { Env } from '../env.js';
import { JUST_SO, OrElse } from '../or-else.js';
import { InvariantViolation, Reported } from '../report.js';
import { SymGenericTerm, SymPerm, SymTy } from '../terms/sym-terms.js';
import { Predicate } from './predicate.js';
import type { VarInferFacts } from './var-infer.js';

export class MovePredicates {
    private readonly varInfer: () => VarInferFacts;
    private readonly places: () => PlaceTyper;

    constructor(services: PermServices) {
        this.varInfer = () => services.predicates.VarInfer;
        this.places = () => services.checking.Places;
    }

    async isProvablyMove(env: Env, term: SymGenericTerm): Promise<boolean> {
        if (term instanceof Reported) throw term;
        if (term instanceof SymTy) return this.tyIsMove(env, term);
        if (term instanceof SymPerm) return this.permIsMove(env, term);
        throw new InvariantViolation(`move query on place \`${term}\``);
    }

    private async tyIsMove(env: Env, ty: SymTy): Promise<boolean> {
        const kind = ty.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'Perm':
                return both(() => this.permIsMove(env, kind.perm), () => this.tyIsMove(env, kind.ty));
            case 'Named': {
                const name = kind.name;
                if (name.$type === 'Primitive') return false;
                if (name.$type === 'Future') return true;
                if (name.$type === 'Aggregate' && name.aggregate.isClass) return true;
                return exists(kind.generics, generic => this.isProvablyMove(env, generic));
            }
            case 'Infer':
                return this.varInfer().testInferIs(env, kind.infer, Predicate.Move);
            case 'Var':
                return this.varInfer().testVarIs(env, kind.variable, Predicate.Move);
            case 'Never':
                // no rule either way
                return false;
        }
    }

    private async permIsMove(env: Env, perm: SymPerm): Promise<boolean> {
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
                return forAll(kind.places, async place => this.tyIsMove(env, await this.places().placeTy(env, place)));
            case 'Apply':
                return both(() => this.permIsMove(env, kind.left), () => this.permIsMove(env, kind.right));
            case 'Var':
                return this.varInfer().testVarIs(env, kind.variable, Predicate.Move);
            case 'Infer':
                return this.varInfer().testInferIs(env, kind.infer, Predicate.Move);
        }
    }

    async isntProvablyMove(env: Env, term: SymGenericTerm): Promise<boolean> {
        if (term instanceof Reported) throw term;
        if (term instanceof SymTy) return this.tyIsntMove(env, term);
        if (term instanceof SymPerm) return this.permIsntMove(env, term);
        throw new InvariantViolation(`move query on place \`${term}\``);
    }

    private async tyIsntMove(env: Env, ty: SymTy): Promise<boolean> {
        const kind = ty.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'Perm':
                return either(() => this.permIsntMove(env, kind.perm), () => this.tyIsntMove(env, kind.ty));
            case 'Named': {
                const name = kind.name;
                if (name.$type === 'Primitive') return true;
                if (name.$type === 'Future') return false;
                if (name.$type === 'Aggregate' && name.aggregate.isClass) return false;
                return forAll(kind.generics, generic => this.isntProvablyMove(env, generic));
            }
            case 'Infer':
                return this.varInfer().isntInfer(env, kind.infer, Predicate.Move);
            case 'Var':
                return !this.varInfer().testVarIs(env, kind.variable, Predicate.Move);
            case 'Never':
                return false;
        }
    }

    private async permIsntMove(env: Env, perm: SymPerm): Promise<boolean> {
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
                return exists(kind.places, async place => this.tyIsntMove(env, await this.places().placeTy(env, place)));
            case 'Apply':
                return either(() => this.permIsntMove(env, kind.left), () => this.permIsntMove(env, kind.right));
            case 'Var':
                return !this.varInfer().testVarIs(env, kind.variable, Predicate.Move);
            case 'Infer':
                return this.varInfer().isntInfer(env, kind.infer, Predicate.Move);
        }
    }

    async requireMove(env: Env, term: SymGenericTerm, orElse: OrElse): Promise<void> {
        if (term instanceof Reported) throw term;
        if (term instanceof SymTy) return this.requireTyIsMove(env, term, orElse);
        if (term instanceof SymPerm) return this.requirePermIsMove(env, term, orElse);
        throw new InvariantViolation(`move requirement on place \`${term}\``);
    }

    private async requireTyIsMove(env: Env, ty: SymTy, orElse: OrElse): Promise<void> {
        const kind = ty.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'Perm':
                return requireBoth(
                    () => this.requirePermIsMove(env, kind.perm, orElse),
                    () => this.requireTyIsMove(env, kind.ty, orElse),
                );
            case 'Named': {
                const name = kind.name;
                if (name.$type === 'Primitive') {
                    throw orElse.report(env, { $type: 'PrimitiveIsCopy', name: name.primitive.kind });
                }
                if (name.$type === 'Future' || (name.$type === 'Aggregate' && name.aggregate.isClass)) {
                    return;
                }
                return require(env, exists(kind.generics, generic => this.isProvablyMove(env, generic)), orElse);
            }
            case 'Infer':
                return this.varInfer().requireInferIs(env, kind.infer, Predicate.Move, orElse);
            case 'Var':
                return this.varInfer().requireVarIs(env, kind.variable, Predicate.Move, orElse);
            case 'Never':
                return;
        }
    }

    private async requirePermIsMove(env: Env, perm: SymPerm, orElse: OrElse): Promise<void> {
        const kind = perm.kind;
        switch (kind.$type) {
            case 'Error':
                throw kind.reported;
            case 'My':
                return;
            case 'Our':
            case 'Shared':
                throw orElse.report(env, JUST_SO);
            case 'Leased':
                return requireForAll(kind.places, async place => {
                    const placeTy = await this.places().placeTy(env, place);
                    if (!(await this.tyIsMove(env, placeTy))) {
                        throw orElse.report(env, { $type: 'LeasedFromCopyIsCopy', places: [place.toString()] });
                    }
                });
            case 'Apply':
                return requireBoth(
                    () => this.requirePermIsMove(env, kind.left, orElse),
                    () => this.requirePermIsMove(env, kind.right, orElse),
                );
            case 'Var':
                return this.varInfer().requireVarIs(env, kind.variable, Predicate.Move, orElse);
            case 'Infer':
                return this.varInfer().requireInferIs(env, kind.infer, Predicate.Move, orElse);
        }
    }
}
