import type { PermServices } from '../../perm-module.js';
import type { Env } from '../env.js';
import type { OrElse } from '../or-else.js';
import type { SymGenericTerm } from '../terms/sym-terms.js';
import type { CopyPredicates } from './copy-predicates.js';
import type { MovePredicates } from './move-predicates.js';
import type { OwnershipPredicates } from './ownership-predicates.js';
import { Predicate } from './predicate.js';

/**
 * Dispatches predicate queries to the engine for each predicate.
 * Used wherever the predicate is data: where-clauses and inference facts.
 */
export class PermPredicates {
    private readonly copy: () => CopyPredicates;
    private readonly move: () => MovePredicates;
    private readonly ownership: () => OwnershipPredicates;

    constructor(services: PermServices) {
        this.copy = () => services.predicates.Copy;
        this.move = () => services.predicates.Move;
        this.ownership = () => services.predicates.Ownership;
    }

    isProvably(env: Env, term: SymGenericTerm, predicate: Predicate): Promise<boolean> {
        switch (predicate) {
            case Predicate.Copy: return this.copy().isProvablyCopy(env, term);
            case Predicate.Move: return this.move().isProvablyMove(env, term);
            case Predicate.Owned: return this.ownership().isProvablyOwned(env, term);
            case Predicate.Lent: return this.ownership().isProvablyLent(env, term);
        }
    }

    isntProvably(env: Env, term: SymGenericTerm, predicate: Predicate): Promise<boolean> {
        switch (predicate) {
            case Predicate.Copy: return this.copy().isntProvablyCopy(env, term);
            case Predicate.Move: return this.move().isntProvablyMove(env, term);
            case Predicate.Owned: return this.ownership().isntProvablyOwned(env, term);
            case Predicate.Lent: return this.ownership().isntProvablyLent(env, term);
        }
    }

    async require(env: Env, term: SymGenericTerm, predicate: Predicate, orElse: OrElse): Promise<void> {
        await env.indent(`require ${predicate}`, [term], async env => {
            switch (predicate) {
                case Predicate.Copy: return this.copy().requireCopy(env, term, orElse);
                case Predicate.Move: return this.move().requireMove(env, term, orElse);
                case Predicate.Owned: return this.ownership().requireOwned(env, term, orElse);
                case Predicate.Lent: return this.ownership().requireLent(env, term, orElse);
            }
        });
    }
}
