import type { Span } from '../../ast/unchecked-ast.js';
import type { OrElse } from '../or-else.js';
import type { Predicate } from '../predicates/predicate.js';
import { InferVarIndex, SymGenericTerm, SymPerm, SymTy, termFromInfer } from '../terms/sym-terms.js';
import type { SymGenericKind } from '../terms/symbols.js';
import type { Universe } from '../universe.js';

/** A bound together with the obligation that established it. */
export interface InferBound {
    readonly term: SymTy | SymPerm;
    readonly orElse: OrElse;
}

/**
 * Mutable state of one inference variable.
 *
 * Everything here only ever grows: bounds are added, never replaced, and a
 * recorded fact is never withdrawn. Mutation goes through the
 * {@link CheckRuntime} so that waiting tasks are woken.
 */
export class InferVarData {
    /** First lower bound recorded; later ones must be subtypes of it */
    lowerBound: InferBound | undefined;
    readonly upperBounds: InferBound[] = [];
    /** Inference variables this one must be a subtype of */
    readonly successors = new Set<InferVarIndex>();
    /** Inference variables that must be subtypes of this one */
    readonly predecessors = new Set<InferVarIndex>();
    /** Predicates required to hold, with the obligation that required them */
    readonly facts = new Map<Predicate, OrElse>();
    /** Predicates known not to hold */
    readonly excluded = new Set<Predicate>();
    /** Default to apply when the session stalls and nothing bounds this variable */
    fallback: (() => void) | undefined;

    constructor(
        readonly index: InferVarIndex,
        readonly kind: SymGenericKind,
        readonly span: Span,
        readonly universe: Universe,
    ) { }

    get term(): SymGenericTerm {
        return termFromInfer(this.kind, this.index);
    }

    toString(): string {
        const lower = this.lowerBound ? ` :> ${this.lowerBound.term}` : '';
        const facts = this.facts.size > 0 ? ` [${[...this.facts.keys()].join(', ')}]` : '';
        return `${this.term}${lower}${facts}`;
    }
}
