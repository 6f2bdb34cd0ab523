/**
 * Checked terms: types, permissions and places.
 *
 * Terms are interned. Building the same structure twice returns the same
 * object, so terms can be compared with `===` and used as map keys. Every term
 * class keeps its own table; the key of a compound term is made from the ids of
 * its children.
 */

import { Reported } from '../report.js';
import { Interner } from './interner.js';
import {
    SymAggregate, SymField, SymGenericKind, SymPrimitive, SymPrimitiveKind, SymVariable
} from './symbols.js';

/** Index of an inference variable in the runtime's arena. */
export type InferVarIndex = number;

export type SymTyName =
    | { readonly $type: 'Primitive'; readonly primitive: SymPrimitive }
    | { readonly $type: 'Aggregate'; readonly aggregate: SymAggregate }
    | { readonly $type: 'Future' }
    | { readonly $type: 'Tuple'; readonly arity: number };

export type SymTyKind =
    | { readonly $type: 'Perm'; readonly perm: SymPerm; readonly ty: SymTy }
    | { readonly $type: 'Named'; readonly name: SymTyName; readonly generics: readonly SymGenericTerm[] }
    | { readonly $type: 'Infer'; readonly infer: InferVarIndex }
    | { readonly $type: 'Var'; readonly variable: SymVariable }
    | { readonly $type: 'Never' }
    | { readonly $type: 'Error'; readonly reported: Reported };

export type SymPermKind =
    | { readonly $type: 'My' }
    | { readonly $type: 'Our' }
    | { readonly $type: 'Shared'; readonly places: readonly SymPlace[] }
    | { readonly $type: 'Leased'; readonly places: readonly SymPlace[] }
    | { readonly $type: 'Apply'; readonly left: SymPerm; readonly right: SymPerm }
    | { readonly $type: 'Infer'; readonly infer: InferVarIndex }
    | { readonly $type: 'Var'; readonly variable: SymVariable }
    | { readonly $type: 'Error'; readonly reported: Reported };

export type SymPlaceKind =
    | { readonly $type: 'Var'; readonly variable: SymVariable }
    | { readonly $type: 'Field'; readonly base: SymPlace; readonly field: SymField }
    | { readonly $type: 'Index'; readonly base: SymPlace }
    | { readonly $type: 'Infer'; readonly infer: InferVarIndex }
    | { readonly $type: 'Error'; readonly reported: Reported };

/** Anything that can instantiate a generic parameter. */
export type SymGenericTerm = SymTy | SymPerm | SymPlace | Reported;

// ============================================================================
// Types
// ============================================================================

export class SymTy {
    private static readonly interner = new Interner<SymTy>();

    private constructor(readonly id: number, readonly kind: SymTyKind) { }

    private static intern(kind: SymTyKind): SymTy {
        return SymTy.interner.intern(tyKey(kind), id => new SymTy(id, kind));
    }

    static perm(perm: SymPerm, ty: SymTy): SymTy {
        return SymTy.intern({ $type: 'Perm', perm, ty });
    }

    static named(name: SymTyName, generics: readonly SymGenericTerm[] = []): SymTy {
        return SymTy.intern({ $type: 'Named', name, generics });
    }

    static primitive(primitive: SymPrimitive | SymPrimitiveKind): SymTy {
        const symbol = primitive instanceof SymPrimitive ? primitive : SymPrimitive.of(primitive);
        return SymTy.named({ $type: 'Primitive', primitive: symbol });
    }

    static aggregate(aggregate: SymAggregate, generics: readonly SymGenericTerm[] = []): SymTy {
        return SymTy.named({ $type: 'Aggregate', aggregate }, generics);
    }

    static future(awaited: SymTy): SymTy {
        return SymTy.named({ $type: 'Future' }, [awaited]);
    }

    static tuple(elements: readonly SymTy[]): SymTy {
        return SymTy.named({ $type: 'Tuple', arity: elements.length }, elements);
    }

    /** The empty tuple. */
    static unit(): SymTy {
        return SymTy.tuple([]);
    }

    static boolean(): SymTy {
        return SymTy.primitive('bool');
    }

    static u8(): SymTy {
        return SymTy.primitive('u8');
    }

    static u32(): SymTy {
        return SymTy.primitive('u32');
    }

    static infer(infer: InferVarIndex): SymTy {
        return SymTy.intern({ $type: 'Infer', infer });
    }

    static var(variable: SymVariable): SymTy {
        return SymTy.intern({ $type: 'Var', variable });
    }

    static never(): SymTy {
        return SymTy.intern({ $type: 'Never' });
    }

    static error(reported: Reported): SymTy {
        return SymTy.intern({ $type: 'Error', reported });
    }

    /** `shared[place] this` */
    shared(place: SymPlace): SymTy {
        return SymTy.perm(SymPerm.shared([place]), this);
    }

    /** `leased[place] this` */
    leased(place: SymPlace): SymTy {
        return SymTy.perm(SymPerm.leased([place]), this);
    }

    get isNever(): boolean {
        return this.kind.$type === 'Never';
    }

    toString(): string {
        const kind = this.kind;
        switch (kind.$type) {
            case 'Perm': return `${kind.perm} ${kind.ty}`;
            case 'Named': return namedToString(kind.name, kind.generics);
            case 'Infer': return `?T${kind.infer}`;
            case 'Var': return kind.variable.toString();
            case 'Never': return '!';
            case 'Error': return '<error>';
        }
    }
}

function namedToString(name: SymTyName, generics: readonly SymGenericTerm[]): string {
    const args = generics.map(termToString).join(', ');
    switch (name.$type) {
        case 'Tuple': return `(${args})`;
        case 'Future': return `Future[${args}]`;
        case 'Primitive': return name.primitive.toString();
        case 'Aggregate': return generics.length > 0 ? `${name.aggregate.name}[${args}]` : name.aggregate.name;
    }
}

export function tyNameKey(name: SymTyName): string {
    switch (name.$type) {
        case 'Primitive': return `prim:${name.primitive.kind}`;
        case 'Aggregate': return `agg:${name.aggregate.symbolId}`;
        case 'Future': return 'future';
        case 'Tuple': return `tuple:${name.arity}`;
    }
}

export function sameTyName(a: SymTyName, b: SymTyName): boolean {
    return tyNameKey(a) === tyNameKey(b);
}

function tyKey(kind: SymTyKind): string {
    switch (kind.$type) {
        case 'Perm': return `perm(${kind.perm.id},${kind.ty.id})`;
        case 'Named': return `named(${tyNameKey(kind.name)}:${kind.generics.map(termKey).join(',')})`;
        case 'Infer': return `infer(${kind.infer})`;
        case 'Var': return `var(${kind.variable.symbolId})`;
        case 'Never': return 'never';
        case 'Error': return `error(${kind.reported.id})`;
    }
}

// ============================================================================
// Permissions
// ============================================================================

export class SymPerm {
    private static readonly interner = new Interner<SymPerm>();

    private constructor(readonly id: number, readonly kind: SymPermKind) { }

    private static intern(kind: SymPermKind): SymPerm {
        return SymPerm.interner.intern(permKey(kind), id => new SymPerm(id, kind));
    }

    static my(): SymPerm {
        return SymPerm.intern({ $type: 'My' });
    }

    static our(): SymPerm {
        return SymPerm.intern({ $type: 'Our' });
    }

    static shared(places: readonly SymPlace[]): SymPerm {
        return SymPerm.intern({ $type: 'Shared', places });
    }

    static leased(places: readonly SymPlace[]): SymPerm {
        return SymPerm.intern({ $type: 'Leased', places });
    }

    static apply(left: SymPerm, right: SymPerm): SymPerm {
        return SymPerm.intern({ $type: 'Apply', left, right });
    }

    static infer(infer: InferVarIndex): SymPerm {
        return SymPerm.intern({ $type: 'Infer', infer });
    }

    static var(variable: SymVariable): SymPerm {
        return SymPerm.intern({ $type: 'Var', variable });
    }

    static error(reported: Reported): SymPerm {
        return SymPerm.intern({ $type: 'Error', reported });
    }

    /** Wraps `ty` in this permission; `my` leaves it unchanged. */
    applyToTy(ty: SymTy): SymTy {
        return this.kind.$type === 'My' ? ty : SymTy.perm(this, ty);
    }

    /** The non-application permissions, left to right. */
    leaves(): SymPerm[] {
        const kind = this.kind;
        if (kind.$type === 'Apply') {
            return [...kind.left.leaves(), ...kind.right.leaves()];
        }
        return [this];
    }

    toString(): string {
        const kind = this.kind;
        switch (kind.$type) {
            case 'My': return 'my';
            case 'Our': return 'our';
            case 'Shared': return `shared[${kind.places.join(', ')}]`;
            case 'Leased': return `leased[${kind.places.join(', ')}]`;
            case 'Apply': return `${kind.left} ${kind.right}`;
            case 'Infer': return `?P${kind.infer}`;
            case 'Var': return kind.variable.toString();
            case 'Error': return '<error>';
        }
    }
}

function permKey(kind: SymPermKind): string {
    switch (kind.$type) {
        case 'My': return 'my';
        case 'Our': return 'our';
        case 'Shared': return `shared(${kind.places.map(place => place.id).join(',')})`;
        case 'Leased': return `leased(${kind.places.map(place => place.id).join(',')})`;
        case 'Apply': return `apply(${kind.left.id},${kind.right.id})`;
        case 'Infer': return `infer(${kind.infer})`;
        case 'Var': return `var(${kind.variable.symbolId})`;
        case 'Error': return `error(${kind.reported.id})`;
    }
}

// ============================================================================
// Places
// ============================================================================

export class SymPlace {
    private static readonly interner = new Interner<SymPlace>();

    private constructor(readonly id: number, readonly kind: SymPlaceKind) { }

    private static intern(kind: SymPlaceKind): SymPlace {
        return SymPlace.interner.intern(placeKey(kind), id => new SymPlace(id, kind));
    }

    static var(variable: SymVariable): SymPlace {
        return SymPlace.intern({ $type: 'Var', variable });
    }

    static field(base: SymPlace, field: SymField): SymPlace {
        return SymPlace.intern({ $type: 'Field', base, field });
    }

    static index(base: SymPlace): SymPlace {
        return SymPlace.intern({ $type: 'Index', base });
    }

    static infer(infer: InferVarIndex): SymPlace {
        return SymPlace.intern({ $type: 'Infer', infer });
    }

    static error(reported: Reported): SymPlace {
        return SymPlace.intern({ $type: 'Error', reported });
    }

    /**
     * A place covers itself and every field projection reachable from it:
     * `x` covers `x.f` and `x.f.g`, but `x.f` does not cover `x`.
     */
    covers(other: SymPlace): boolean {
        if (this === other) {
            return true;
        }
        return other.kind.$type === 'Field' && this.covers(other.kind.base);
    }

    toString(): string {
        const kind = this.kind;
        switch (kind.$type) {
            case 'Var': return kind.variable.toString();
            case 'Field': return `${kind.base}.${kind.field.name}`;
            case 'Index': return `${kind.base}[_]`;
            case 'Infer': return `?L${kind.infer}`;
            case 'Error': return '<error>';
        }
    }
}

function placeKey(kind: SymPlaceKind): string {
    switch (kind.$type) {
        case 'Var': return `var(${kind.variable.symbolId})`;
        case 'Field': return `field(${kind.base.id},${kind.field.symbolId})`;
        case 'Index': return `index(${kind.base.id})`;
        case 'Infer': return `infer(${kind.infer})`;
        case 'Error': return `error(${kind.reported.id})`;
    }
}

// ============================================================================
// Generic terms
// ============================================================================

export function termKey(term: SymGenericTerm): string {
    if (term instanceof SymTy) return `T${term.id}`;
    if (term instanceof SymPerm) return `P${term.id}`;
    if (term instanceof SymPlace) return `L${term.id}`;
    return `R${term.id}`;
}

export function termToString(term: SymGenericTerm): string {
    return term instanceof Reported ? '<error>' : term.toString();
}

/** The kind of a term; error terms have none. */
export function termKind(term: SymGenericTerm): SymGenericKind | undefined {
    if (term instanceof SymTy) return SymGenericKind.Type;
    if (term instanceof SymPerm) return SymGenericKind.Perm;
    if (term instanceof SymPlace) return SymGenericKind.Place;
    return undefined;
}

/** Error terms are accepted for any kind. */
export function termHasKind(term: SymGenericTerm, kind: SymGenericKind): boolean {
    const actual = termKind(term);
    return actual === undefined || actual === kind;
}

export function termFromVariable(variable: SymVariable): SymGenericTerm {
    switch (variable.kind) {
        case SymGenericKind.Type: return SymTy.var(variable);
        case SymGenericKind.Perm: return SymPerm.var(variable);
        case SymGenericKind.Place: return SymPlace.var(variable);
    }
}

export function termFromInfer(kind: SymGenericKind, infer: InferVarIndex): SymGenericTerm {
    switch (kind) {
        case SymGenericKind.Type: return SymTy.infer(infer);
        case SymGenericKind.Perm: return SymPerm.infer(infer);
        case SymGenericKind.Place: return SymPlace.infer(infer);
    }
}

