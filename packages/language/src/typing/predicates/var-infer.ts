import type { PermServices } from '../../perm-module.js';
import type { Env } from '../env.js';
import { becauseOfLowerBound, OrElse } from '../or-else.js';
import type { InferVarIndex } from '../terms/sym-terms.js';
import { SymGenericKind, SymVariable } from '../terms/symbols.js';
import { opposite, Predicate } from './predicate.js';
import type { PermPredicates } from './perm-predicates.js';

/**
 * Fact tables for variables.
 *
 * Universal variables know exactly what their where-clauses assume.
 * Inference variables accumulate required facts, and otherwise answer from
 * their lower bound once one is known.
 */
export class VarInferFacts {
    private readonly predicates: () => PermPredicates;

    constructor(services: PermServices) {
        this.predicates = () => services.predicates.Predicates;
    }

    testVarIs(env: Env, variable: SymVariable, predicate: Predicate): boolean {
        return env.assumes(variable, predicate);
    }

    async requireVarIs(env: Env, variable: SymVariable, predicate: Predicate, orElse: OrElse): Promise<void> {
        if (!env.assumes(variable, predicate)) {
            throw orElse.report(env, { $type: 'VarNotDeclaredToBe', variable: variable.toString(), predicate });
        }
    }

    /**
     * Waits until the variable's facts or lower bound decide `predicate`.
     * Answers `false` if the variable is settled without that happening.
     */
    async testInferIs(env: Env, infer: InferVarIndex, predicate: Predicate): Promise<boolean> {
        const outcome = await env.loopOnInferenceVar(infer, data => {
            if (data.facts.has(predicate)) return true;
            if (data.excluded.has(predicate)) return false;
            return data.lowerBound;
        });
        if (outcome === undefined) return false;
        if (typeof outcome === 'boolean') return outcome;
        return this.predicates().isProvably(env, outcome.term, predicate);
    }

    /** Best current guess at the negation, without waiting. */
    async isntInfer(env: Env, infer: InferVarIndex, predicate: Predicate): Promise<boolean> {
        const data = env.runtime.inferVar(infer);
        if (data.excluded.has(predicate)) return true;
        if (data.facts.has(predicate)) return false;
        if (data.lowerBound) {
            return this.predicates().isntProvably(env, data.lowerBound.term, predicate);
        }
        // nothing requires it yet
        return true;
    }

    /**
     * Records that `predicate` must hold for the variable and checks it against
     * the lower bound, if there is one. Bounds recorded later are checked
     * against the facts by the subtyping engine.
     */
    async requireInferIs(env: Env, infer: InferVarIndex, predicate: Predicate, orElse: OrElse): Promise<void> {
        const data = env.runtime.inferVar(infer);
        if (data.excluded.has(predicate)) {
            throw orElse.report(env, { $type: 'InferIsnt', predicate });
        }
        if (!env.runtime.addFact(infer, predicate, orElse)) {
            return;
        }
        if (data.kind === SymGenericKind.Perm) {
            env.runtime.exclude(infer, opposite(predicate));
        }
        const bound = data.lowerBound;
        if (bound) {
            await this.predicates().require(env, bound.term, predicate, becauseOfLowerBound(orElse, bound.term, bound.orElse));
        }
    }

    /** Checks every fact recorded so far against a newly recorded lower bound. */
    async checkFactsAgainstBound(env: Env, infer: InferVarIndex): Promise<void> {
        const data = env.runtime.inferVar(infer);
        const bound = data.lowerBound;
        if (!bound) {
            return;
        }
        await Promise.all([...data.facts].map(([predicate, orElse]) =>
            this.predicates().require(env, bound.term, predicate, becauseOfLowerBound(orElse, bound.term, bound.orElse))
        ));
    }
}
