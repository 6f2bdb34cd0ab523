/**
 * Named entities the checker refers to: variables, primitives, aggregates,
 * their members, functions and modules.
 *
 * Symbols are compared by identity. Each one receives a process-wide id used
 * when interning the terms that mention it.
 */

import type { Span } from '../../ast/unchecked-ast.js';
import type { Predicate } from '../predicates/predicate.js';
import { Reported } from '../report.js';
import type { SymGenericTerm, SymTy } from './sym-terms.js';

let symbolCounter = 0;

function nextSymbolId(): number {
    return ++symbolCounter;
}

export enum SymGenericKind {
    Type = 'type',
    Perm = 'perm',
    Place = 'place',
}

/**
 * A variable bound by a binder: a generic parameter (type or permission), or a
 * program variable (place), including compiler-introduced temporaries.
 */
export class SymVariable {
    readonly symbolId = nextSymbolId();

    constructor(
        readonly kind: SymGenericKind,
        readonly name: string | undefined,
        readonly span: Span,
    ) { }

    toString(): string {
        return this.name ?? `^${this.kind}${this.symbolId}`;
    }
}

// ============================================================================
// Primitives
// ============================================================================

export type SymPrimitiveKind =
    | 'bool' | 'char'
    | 'u8' | 'u16' | 'u32' | 'u64' | 'usize'
    | 'i8' | 'i16' | 'i32' | 'i64' | 'isize'
    | 'f32' | 'f64';

const PRIMITIVE_KINDS: readonly SymPrimitiveKind[] = [
    'bool', 'char', 'u8', 'u16', 'u32', 'u64', 'usize', 'i8', 'i16', 'i32', 'i64', 'isize', 'f32', 'f64'
];

const INTEGER_PRIMITIVES: ReadonlySet<SymPrimitiveKind> = new Set<SymPrimitiveKind>([
    'u8', 'u16', 'u32', 'u64', 'usize', 'i8', 'i16', 'i32', 'i64', 'isize'
]);

const FLOAT_PRIMITIVES: ReadonlySet<SymPrimitiveKind> = new Set<SymPrimitiveKind>(['f32', 'f64']);

export class SymPrimitive {
    private static readonly table = new Map<SymPrimitiveKind, SymPrimitive>();

    private constructor(readonly kind: SymPrimitiveKind) { }

    static of(kind: SymPrimitiveKind): SymPrimitive {
        let primitive = SymPrimitive.table.get(kind);
        if (!primitive) {
            primitive = new SymPrimitive(kind);
            SymPrimitive.table.set(kind, primitive);
        }
        return primitive;
    }

    static parse(name: string): SymPrimitive | undefined {
        return isPrimitiveKind(name) ? SymPrimitive.of(name) : undefined;
    }

    get isInteger(): boolean {
        return INTEGER_PRIMITIVES.has(this.kind);
    }

    get isNumeric(): boolean {
        return this.isInteger || FLOAT_PRIMITIVES.has(this.kind);
    }

    toString(): string {
        return this.kind;
    }
}

export function isPrimitiveKind(name: string): name is SymPrimitiveKind {
    return PRIMITIVE_KINDS.some(kind => kind === name);
}

// ============================================================================
// Aggregates, fields and functions
// ============================================================================

export enum SymAggregateStyle {
    Struct = 'struct',
    Class = 'class',
}

export class SymField {
    readonly symbolId = nextSymbolId();

    /**
     * @param ty declared type; mentions the owner's generic parameters as variables
     */
    constructor(
        readonly owner: SymAggregate,
        readonly name: string,
        readonly ty: SymTy,
        readonly span: Span,
    ) { }

    toString(): string {
        return this.name;
    }
}

export type SymAggregateMember = SymField | SymFunction;

export class SymAggregate {
    readonly symbolId = nextSymbolId();
    private readonly members = new Map<string, SymAggregateMember>();

    constructor(
        readonly name: string,
        readonly style: SymAggregateStyle,
        readonly generics: readonly SymVariable[],
        readonly nameSpan: Span,
    ) { }

    get isClass(): boolean {
        return this.style === SymAggregateStyle.Class;
    }

    addField(name: string, ty: SymTy, span: Span): SymField {
        const field = new SymField(this, name, ty, span);
        this.members.set(name, field);
        return field;
    }

    addFunction(fn: SymFunction): SymFunction {
        this.members.set(fn.name, fn);
        return fn;
    }

    member(name: string): SymAggregateMember | undefined {
        return this.members.get(name);
    }

    get fields(): SymField[] {
        return [...this.members.values()].filter((member): member is SymField => member instanceof SymField);
    }

    toString(): string {
        return this.name;
    }
}

export interface SymWhereClause {
    readonly subject: SymGenericTerm;
    readonly predicate: Predicate;
    readonly span: Span;
}

/** Variables bound over a value; substituting them opens the binder. */
export class Binder<T> {
    constructor(
        readonly variables: readonly SymVariable[],
        readonly boundValue: T,
    ) { }
}

export interface SymInputOutput {
    readonly inputTys: readonly SymTy[];
    readonly outputTy: SymTy;
    readonly whereClauses: readonly SymWhereClause[];
}

/**
 * A checked function signature.
 *
 * The outer binder binds every generic parameter in scope for the function
 * (its owner's, then its own); the inner binder binds the input variables,
 * which input types and where-clauses may mention as places.
 */
export interface SymFunctionSignature {
    readonly symbols: {
        /** The function's own generic parameters, a suffix of the outer binder */
        readonly genericVariables: readonly SymVariable[];
        readonly inputVariables: readonly SymVariable[];
    };
    readonly inputOutput: Binder<Binder<SymInputOutput>>;
}

export type SignatureSource = SymFunctionSignature | Reported | (() => SymFunctionSignature | Reported);

export class SymFunction {
    readonly symbolId = nextSymbolId();
    private resolved: SymFunctionSignature | Reported | undefined;

    /**
     * @param hasSelf the first input is the receiver; the function is then called as a method
     */
    constructor(
        readonly name: string,
        readonly nameSpan: Span,
        readonly hasSelf: boolean,
        private readonly signatureSource: SignatureSource,
    ) { }

    /** Throws the recorded {@link Reported} when the signature itself failed to check. */
    checkedSignature(): SymFunctionSignature {
        if (this.resolved === undefined) {
            this.resolved = typeof this.signatureSource === 'function' ? this.signatureSource() : this.signatureSource;
        }
        if (this.resolved instanceof Reported) {
            throw this.resolved;
        }
        return this.resolved;
    }

    toString(): string {
        return this.name;
    }
}

export type SymModuleItem = SymFunction | SymAggregate | SymModule | SymPrimitive;

export class SymModule {
    readonly symbolId = nextSymbolId();
    private readonly items = new Map<string, SymModuleItem>();

    constructor(readonly name: string, readonly span: Span) { }

    add(name: string, item: SymModuleItem): this {
        this.items.set(name, item);
        return this;
    }

    item(name: string): SymModuleItem | undefined {
        return this.items.get(name);
    }

    entries(): IterableIterator<[string, SymModuleItem]> {
        return this.items.entries();
    }

    toString(): string {
        return this.name;
    }
}
