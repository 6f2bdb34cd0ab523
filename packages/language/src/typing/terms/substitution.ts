import { InvariantViolation, Reported } from '../report.js';
import {
    InferVarIndex, SymGenericTerm, SymPerm, SymPlace, SymTy, termKind, termToString
} from './sym-terms.js';
import { Binder, SymGenericKind, SymInputOutput, SymVariable } from './symbols.js';

/**
 * Replacement hooks for the leaves of a term. A hook returning `undefined`
 * keeps the leaf as it is.
 */
export interface TermTransform {
    variable?(variable: SymVariable): SymGenericTerm | undefined;
    infer?(kind: SymGenericKind, infer: InferVarIndex): SymGenericTerm | undefined;
}

export function transformTerm(term: SymGenericTerm, transform: TermTransform): SymGenericTerm {
    if (term instanceof SymTy) return transformTy(term, transform);
    if (term instanceof SymPerm) return transformPerm(term, transform);
    if (term instanceof SymPlace) return transformPlace(term, transform);
    return term;
}

export function transformTy(ty: SymTy, transform: TermTransform): SymTy {
    const kind = ty.kind;
    switch (kind.$type) {
        case 'Perm':
            return SymTy.perm(transformPerm(kind.perm, transform), transformTy(kind.ty, transform));
        case 'Named':
            return SymTy.named(kind.name, kind.generics.map(generic => transformTerm(generic, transform)));
        case 'Infer': {
            const replacement = transform.infer?.(SymGenericKind.Type, kind.infer);
            return replacement === undefined ? ty : expectTy(replacement);
        }
        case 'Var': {
            const replacement = transform.variable?.(kind.variable);
            return replacement === undefined ? ty : expectTy(replacement);
        }
        case 'Never':
        case 'Error':
            return ty;
    }
}

export function transformPerm(perm: SymPerm, transform: TermTransform): SymPerm {
    const kind = perm.kind;
    switch (kind.$type) {
        case 'My':
        case 'Our':
        case 'Error':
            return perm;
        case 'Shared':
            return SymPerm.shared(kind.places.map(place => transformPlace(place, transform)));
        case 'Leased':
            return SymPerm.leased(kind.places.map(place => transformPlace(place, transform)));
        case 'Apply':
            return SymPerm.apply(transformPerm(kind.left, transform), transformPerm(kind.right, transform));
        case 'Infer': {
            const replacement = transform.infer?.(SymGenericKind.Perm, kind.infer);
            return replacement === undefined ? perm : expectPerm(replacement);
        }
        case 'Var': {
            const replacement = transform.variable?.(kind.variable);
            return replacement === undefined ? perm : expectPerm(replacement);
        }
    }
}

export function transformPlace(place: SymPlace, transform: TermTransform): SymPlace {
    const kind = place.kind;
    switch (kind.$type) {
        case 'Var': {
            const replacement = transform.variable?.(kind.variable);
            return replacement === undefined ? place : expectPlace(replacement);
        }
        case 'Field':
            return SymPlace.field(transformPlace(kind.base, transform), kind.field);
        case 'Index':
            return SymPlace.index(transformPlace(kind.base, transform));
        case 'Infer': {
            const replacement = transform.infer?.(SymGenericKind.Place, kind.infer);
            return replacement === undefined ? place : expectPlace(replacement);
        }
        case 'Error':
            return place;
    }
}

export function expectTy(term: SymGenericTerm): SymTy {
    if (term instanceof SymTy) return term;
    if (term instanceof Reported) return SymTy.error(term);
    throw new InvariantViolation(`expected a type, found ${termKind(term)} \`${termToString(term)}\``);
}

export function expectPerm(term: SymGenericTerm): SymPerm {
    if (term instanceof SymPerm) return term;
    if (term instanceof Reported) return SymPerm.error(term);
    throw new InvariantViolation(`expected a permission, found ${termKind(term)} \`${termToString(term)}\``);
}

export function expectPlace(term: SymGenericTerm): SymPlace {
    if (term instanceof SymPlace) return term;
    if (term instanceof Reported) return SymPlace.error(term);
    throw new InvariantViolation(`expected a place, found ${termKind(term)} \`${termToString(term)}\``);
}

// ============================================================================
// Substitution
// ============================================================================

/** Maps `variables[i]` to `terms[i]`. The caller has already checked kinds. */
export function substitution(variables: readonly SymVariable[], terms: readonly SymGenericTerm[]): TermTransform {
    if (variables.length !== terms.length) {
        throw new InvariantViolation(`substituting ${terms.length} terms for ${variables.length} variables`);
    }
    const map = new Map<SymVariable, SymGenericTerm>();
    variables.forEach((variable, index) => map.set(variable, terms[index]));
    return { variable: variable => map.get(variable) };
}

export function substituteTy(ty: SymTy, variables: readonly SymVariable[], terms: readonly SymGenericTerm[]): SymTy {
    return transformTy(ty, substitution(variables, terms));
}

export function transformInputOutput(io: SymInputOutput, transform: TermTransform): SymInputOutput {
    return {
        inputTys: io.inputTys.map(ty => transformTy(ty, transform)),
        outputTy: transformTy(io.outputTy, transform),
        whereClauses: io.whereClauses.map(clause => ({ ...clause, subject: transformTerm(clause.subject, transform) })),
    };
}

/** Opens the outer binder of a signature, leaving the input binder in place. */
export function openOuterBinder(binder: Binder<Binder<SymInputOutput>>, terms: readonly SymGenericTerm[]): Binder<SymInputOutput> {
    const transform = substitution(binder.variables, terms);
    const inner = binder.boundValue;
    return new Binder(inner.variables, transformInputOutput(inner.boundValue, transform));
}

export function openBinder(binder: Binder<SymInputOutput>, terms: readonly SymGenericTerm[]): SymInputOutput {
    return transformInputOutput(binder.boundValue, substitution(binder.variables, terms));
}

// ============================================================================
// Queries
// ============================================================================

/** Free variables mentioned anywhere in `term`. */
export function collectVariables(term: SymGenericTerm, into: Set<SymVariable> = new Set()): Set<SymVariable> {
    transformTerm(term, {
        variable: variable => {
            into.add(variable);
            return undefined;
        }
    });
    return into;
}
