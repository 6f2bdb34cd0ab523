/**
 * Subtyping between types and between permissions.
 *
 * Types are reduced to red types: the heads are compared structurally and
 * the permissions are compared as chains. Inference variables accumulate
 * bounds instead. The first lower bound recorded for a variable is its
 * representative; later lower bounds must be subtypes of it, and every
 * recorded upper bound must be a supertype of it.
 */

import type { PermServices } from '../../perm-module.js';
import { both, exists, requireBoth, requireForAll } from '../combinators.js';
import type { Env } from '../env.js';
import { becauseOfLowerBound, OrElse } from '../or-else.js';
import type { PermPredicates } from '../predicates/perm-predicates.js';
import { Predicate } from '../predicates/predicate.js';
import type { VarInferFacts } from '../predicates/var-infer.js';
import { InvariantViolation, Reported } from '../report.js';
import { collectVariables } from '../terms/substitution.js';
import {
    InferVarIndex, sameTyName, SymGenericTerm, SymPerm, SymPlace, SymTy, termFromInfer, termToString
} from '../terms/sym-terms.js';
import { Alternative } from './alternatives.js';
import type { Chain, Lien, RedTy, RedTyKind, RedTys } from './red-ty.js';

export class PermSubtyping {
    private readonly redTys: () => RedTys;
    private readonly varInfer: () => VarInferFacts;
    private readonly predicates: () => PermPredicates;

    constructor(services: PermServices) {
        this.redTys = () => services.subtyping.RedTys;
        this.varInfer = () => services.predicates.VarInfer;
        this.predicates = () => services.predicates.Predicates;
    }

    requireAssignableType(env: Env, valueTy: SymTy, targetTy: SymTy, orElse: OrElse): Promise<void> {
        return this.requireSubTys(env, valueTy, targetTy, orElse);
    }

    async requireEqualTypes(env: Env, a: SymTy, b: SymTy, orElse: OrElse): Promise<void> {
        await requireBoth(
            () => this.requireSubTys(env, a, b, orElse),
            () => this.requireSubTys(env, b, a, orElse),
        );
    }

    async requireSubTerms(env: Env, lower: SymGenericTerm, upper: SymGenericTerm, orElse: OrElse): Promise<void> {
        if (lower instanceof Reported) throw lower;
        if (upper instanceof Reported) throw upper;
        if (lower instanceof SymTy && upper instanceof SymTy) {
            return this.requireSubTys(env, lower, upper, orElse);
        }
        if (lower instanceof SymPerm && upper instanceof SymPerm) {
            return this.requireSubPerms(env, lower, upper, orElse);
        }
        if (lower instanceof SymPlace && upper instanceof SymPlace) {
            if (lower !== upper) {
                throw orElse.report(env, { $type: 'NameMismatch', lower: lower.toString(), upper: upper.toString() });
            }
            return;
        }
        throw new InvariantViolation(`relating terms of different kinds: \`${termToString(lower)}\` and \`${termToString(upper)}\``);
    }

    // ========================================================================
    // Types
    // ========================================================================

    async requireSubTys(env: Env, lower: SymTy, upper: SymTy, orElse: OrElse): Promise<void> {
        if (lower === upper) {
            return;
        }
        await env.indent('require sub tys', [lower, upper], async env => {
            const redTys = this.redTys();
            const lowerKind = redTys.toRedTy(lower).kind;
            const upperKind = redTys.toRedTy(upper).kind;

            if (lowerKind.$type === 'Error') throw lowerKind.reported;
            if (upperKind.$type === 'Error') throw upperKind.reported;
            if (lowerKind.$type === 'Never') return;

            const lowerRed = await this.withoutCopyPerm(env, redTys.toRedTy(lower));
            const upperRed = await this.withoutCopyPerm(env, redTys.toRedTy(upper));

            const lowerBare = lowerKind.$type === 'Infer' && lowerRed.perm === SymPerm.my() ? lowerKind.infer : undefined;
            const upperBare = upperKind.$type === 'Infer' && upperRed.perm === SymPerm.my() ? upperKind.infer : undefined;
            if (upperBare !== undefined) {
                if (lowerBare !== undefined) {
                    return this.relateInferVars(env, lowerBare, upperBare, orElse);
                }
                return this.addLowerBound(env, upperBare, lowerRed.perm === SymPerm.my() ? redTys.redTyToTy(lowerKind) : lower, orElse);
            }
            if (lowerBare !== undefined) {
                return this.addUpperBound(env, lowerBare, upperRed.perm === SymPerm.my() ? redTys.redTyToTy(upperKind) : upper, orElse);
            }

            await requireBoth(
                () => this.requireSubPermsOfHeads(env, lowerRed, upperRed, orElse),
                () => this.requireSubRedTys(env, lowerKind, upperKind, orElse),
            );
        });
    }

    /** `perm T` is just `T` when `T` is copy, so `shared[x] u32` reduces to `u32`. */
    private async withoutCopyPerm(env: Env, redTy: RedTy): Promise<RedTy> {
        if (redTy.perm === SymPerm.my() || (redTy.kind.$type !== 'Named' && redTy.kind.$type !== 'Var')) {
            return redTy;
        }
        const head = this.redTys().redTyToTy(redTy.kind);
        if (await this.predicates().isProvably(env, head, Predicate.Copy)) {
            env.log('copy head drops its permission', head);
            return { kind: redTy.kind, perm: SymPerm.my() };
        }
        return redTy;
    }

    /** An inferred head is only known to be copy once its lower bound is. */
    private async requireSubPermsOfHeads(env: Env, lower: RedTy, upper: RedTy, orElse: OrElse): Promise<void> {
        if (lower.perm === upper.perm) {
            return;
        }
        const inferHead = lower.kind.$type === 'Infer' ? lower.kind.infer : upper.kind.$type === 'Infer' ? upper.kind.infer : undefined;
        if (inferHead !== undefined && await this.varInfer().testInferIs(env, inferHead, Predicate.Copy)) {
            return;
        }
        await this.requireSubPerms(env, lower.perm, upper.perm, orElse);
    }

    private async requireSubRedTys(env: Env, lower: RedTyKind, upper: RedTyKind, orElse: OrElse): Promise<void> {
        const redTys = this.redTys();
        if (lower.$type === 'Infer' || upper.$type === 'Infer') {
            // permissions are related separately; relate the heads as bare types
            return this.requireSubTys(env, redTys.redTyToTy(lower), redTys.redTyToTy(upper), orElse);
        }
        if (lower.$type === 'Named' && upper.$type === 'Named' && sameTyName(lower.name, upper.name)) {
            const upperGenerics = upper.generics;
            return requireForAll(lower.generics.map((generic, index) => [generic, upperGenerics[index]] as const),
                ([lowerGeneric, upperGeneric]) => this.requireSubTerms(env, lowerGeneric, upperGeneric, orElse));
        }
        if (lower.$type === 'Var' && upper.$type === 'Var' && lower.variable === upper.variable) {
            return;
        }
        throw orElse.report(env, {
            $type: 'NameMismatch',
            lower: redTys.redTyToTy(lower).toString(),
            upper: redTys.redTyToTy(upper).toString(),
        });
    }

    // ========================================================================
    // Permissions
    // ========================================================================

    async requireSubPerms(env: Env, lower: SymPerm, upper: SymPerm, orElse: OrElse): Promise<void> {
        if (lower === upper) {
            return;
        }
        const redTys = this.redTys();
        const lowerChain = redTys.chainOf(lower);
        const upperChain = redTys.chainOf(upper);

        const lowerBare = redTys.bareInfer(lowerChain);
        const upperBare = redTys.bareInfer(upperChain);
        if (upperBare !== undefined) {
            if (lowerBare !== undefined) {
                return this.relateInferVars(env, lowerBare, upperBare, orElse);
            }
            return this.addLowerBound(env, upperBare, redTys.chainToPerm(lowerChain), orElse);
        }
        if (lowerBare !== undefined) {
            return this.addUpperBound(env, lowerBare, redTys.chainToPerm(upperChain), orElse);
        }

        if (!redTys.chainHasInfer(lowerChain) && !redTys.chainHasInfer(upperChain)) {
            if (!subChains(lowerChain, upperChain)) {
                throw orElse.report(env, {
                    $type: 'PermMismatch',
                    lower: redTys.chainToPerm(lowerChain).toString(),
                    upper: redTys.chainToPerm(upperChain).toString(),
                });
            }
            return;
        }
        return this.requireCompatibleChains(env, redTys.chainToPerm(lowerChain), redTys.chainToPerm(upperChain), orElse);
    }

    /**
     * Chains that mix inference variables with other liens are related by
     * their predicates: both copy, or both move. Whichever alternative is left
     * standing alone is required, which pins down the variables involved.
     */
    private async requireCompatibleChains(env: Env, lower: SymPerm, upper: SymPerm, orElse: OrElse): Promise<void> {
        const predicates = this.predicates();
        const root = Alternative.root();
        const [copyAlternative, moveAlternative] = root.spawnChildren(2);
        const attempt = async ([alternative, predicate]: readonly [Alternative, Predicate]): Promise<boolean> => {
            try {
                const proven = await alternative.ifRequired(
                    () => requireBoth(
                        () => predicates.require(env, lower, predicate, orElse),
                        () => predicates.require(env, upper, predicate, orElse),
                    ),
                    speculation => both(
                        () => predicates.isProvably(env.speculating(speculation), lower, predicate),
                        () => predicates.isProvably(env.speculating(speculation), upper, predicate),
                    ),
                );
                if (proven) {
                    alternative.conclude();
                }
                return proven;
            } finally {
                alternative.release();
            }
        };
        const compatible = await exists([[copyAlternative, Predicate.Copy], [moveAlternative, Predicate.Move]] as const, attempt);
        if (!compatible) {
            throw orElse.report(env, { $type: 'PermMismatch', lower: lower.toString(), upper: upper.toString() });
        }
    }

    // ========================================================================
    // Inference variable bounds
    // ========================================================================

    private async addLowerBound(env: Env, infer: InferVarIndex, term: SymTy | SymPerm, orElse: OrElse): Promise<void> {
        const runtime = env.runtime;
        const data = runtime.inferVar(infer);
        const existing = data.lowerBound;
        if (existing) {
            return this.requireSubTerms(env, term, existing.term, becauseOfLowerBound(orElse, existing.term, existing.orElse));
        }
        this.checkUniverse(env, infer, term, orElse);
        runtime.setLowerBound(infer, { term, orElse });
        await Promise.all([
            ...data.upperBounds.map(bound =>
                this.requireSubTerms(env, term, bound.term, becauseOfLowerBound(bound.orElse, term, orElse))),
            ...[...data.successors].map(successor =>
                this.requireSubTerms(env, term, termFromInfer(data.kind, successor), orElse)),
            this.varInfer().checkFactsAgainstBound(env, infer),
        ]);
    }

    private async addUpperBound(env: Env, infer: InferVarIndex, term: SymTy | SymPerm, orElse: OrElse): Promise<void> {
        const runtime = env.runtime;
        const data = runtime.inferVar(infer);
        this.checkUniverse(env, infer, term, orElse);
        if (!runtime.addUpperBound(infer, { term, orElse })) {
            return;
        }
        const lower = data.lowerBound;
        await Promise.all([
            lower ? this.requireSubTerms(env, lower.term, term, becauseOfLowerBound(orElse, lower.term, lower.orElse)) : undefined,
            ...[...data.predecessors].map(predecessor => this.addUpperBound(env, predecessor, term, orElse)),
        ]);
    }

    private async relateInferVars(env: Env, lower: InferVarIndex, upper: InferVarIndex, orElse: OrElse): Promise<void> {
        const runtime = env.runtime;
        if (lower === upper || !runtime.addEdge(lower, upper)) {
            return;
        }
        const lowerBound = runtime.inferVar(lower).lowerBound;
        const upperBounds = [...runtime.inferVar(upper).upperBounds];
        await Promise.all([
            lowerBound ? this.addLowerBound(env, upper, lowerBound.term, orElse) : undefined,
            ...upperBounds.map(bound => this.addUpperBound(env, lower, bound.term, bound.orElse)),
        ]);
    }

    /** A bound may only mention universal variables the inference variable can see. */
    private checkUniverse(env: Env, infer: InferVarIndex, term: SymTy | SymPerm, orElse: OrElse): void {
        const universe = env.runtime.inferVar(infer).universe;
        for (const variable of collectVariables(term)) {
            if (!universe.canSee(env.runtime.universeOf(variable))) {
                throw orElse.report(env, { $type: 'UniverseEscape', variable: variable.toString() });
            }
        }
    }
}

/** Permission chains without inference variables. */
export function subChains(lower: Chain, upper: Chain): boolean {
    const [lowerHead, ...lowerTail] = lower;
    const [upperHead, ...upperTail] = upper;
    if (lowerHead === undefined) {
        // `my` is a subpermission of itself and of any plain copy permission
        return upperHead === undefined || (upperTail.length === 0 && (upperHead.$type === 'Our' || upperHead.$type === 'Shared'));
    }
    if (upperHead === undefined) {
        return false;
    }
    return subLien(lowerHead, upperHead) && subChains(lowerTail, upperTail);
}

function subLien(lower: Lien, upper: Lien): boolean {
    switch (lower.$type) {
        case 'Our':
            return upper.$type === 'Our' || upper.$type === 'Shared';
        case 'Shared':
            return upper.$type === 'Shared' && placesCovered(lower.places, upper.places);
        case 'Leased':
            return upper.$type === 'Leased' && placesCovered(lower.places, upper.places);
        case 'Var':
            return upper.$type === 'Var' && upper.variable === lower.variable;
        case 'Infer':
            return upper.$type === 'Infer' && upper.infer === lower.infer;
    }
}

/** Every place of `lower` is covered by some place of `upper`. */
function placesCovered(lower: readonly SymPlace[], upper: readonly SymPlace[]): boolean {
    return lower.every(place => upper.some(candidate => candidate.covers(place)));
}
