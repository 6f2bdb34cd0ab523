/**
 * Lexical name resolution.
 *
 * A {@link LexicalScope} is a persistent chain of bindings: entering a block
 * or binding a local creates a child scope, so scopes can be shared freely
 * between concurrently checked expressions.
 */

import type { Span, SpannedIdentifier } from '../../ast/unchecked-ast.js';
import { ErrorCode } from '../../codes/errors.js';
import { CheckDiagnostic, DiagnosticLevel, Reported, Reporter } from '../report.js';
import { SymGenericTerm } from '../terms/sym-terms.js';
import {
    SymAggregate, SymField, SymFunction, SymModule, SymModuleItem, SymPrimitive, SymVariable
} from '../terms/symbols.js';

export type NameResolutionSym =
    | { readonly $type: 'Variable'; readonly variable: SymVariable }
    | { readonly $type: 'Function'; readonly fn: SymFunction }
    | { readonly $type: 'Module'; readonly module: SymModule }
    | { readonly $type: 'Aggregate'; readonly aggregate: SymAggregate }
    | { readonly $type: 'Field'; readonly field: SymField }
    | { readonly $type: 'Primitive'; readonly primitive: SymPrimitive };

export function moduleItemSym(item: SymModuleItem): NameResolutionSym {
    if (item instanceof SymFunction) return { $type: 'Function', fn: item };
    if (item instanceof SymAggregate) return { $type: 'Aggregate', aggregate: item };
    if (item instanceof SymModule) return { $type: 'Module', module: item };
    return { $type: 'Primitive', primitive: item };
}

/** Outcome of looking a name up relative to an earlier resolution, e.g. `a.b`. */
export type RelativeResolution =
    | { readonly $type: 'Found'; readonly resolution: NameResolution }
    /** Not a lexical member; type-directed lookup may still apply */
    | { readonly $type: 'NotFound'; readonly resolution: NameResolution };

/**
 * What a name refers to, together with the generic arguments supplied so far
 * (for `Pair[u32].new`, the `u32`).
 */
export class NameResolution {
    constructor(
        readonly sym: NameResolutionSym,
        readonly generics: readonly SymGenericTerm[] = [],
    ) { }

    /** Declaration span of the named thing, when it has one. */
    get span(): Span | undefined {
        const sym = this.sym;
        switch (sym.$type) {
            case 'Variable': return sym.variable.span;
            case 'Function': return sym.fn.nameSpan;
            case 'Module': return sym.module.span;
            case 'Aggregate': return sym.aggregate.nameSpan;
            case 'Field': return sym.field.span;
            case 'Primitive': return undefined;
        }
    }

    /** A phrase naming what kind of thing this is, for diagnostics. */
    categorize(): string {
        const sym = this.sym;
        switch (sym.$type) {
            case 'Variable': return `the variable \`${sym.variable}\``;
            case 'Function': return `the function \`${sym.fn.name}\``;
            case 'Module': return `the module \`${sym.module.name}\``;
            case 'Aggregate': return `the ${sym.aggregate.style} \`${sym.aggregate.name}\``;
            case 'Field': return `the field \`${sym.field.name}\``;
            case 'Primitive': return `the primitive type \`${sym.primitive}\``;
        }
    }

    /**
     * Resolves `id` as a lexical member of this resolution: an item of a
     * module, or a function or field declared in an aggregate. A module
     * without the item is an error; everything else falls back to
     * type-directed lookup.
     */
    resolveRelativeId(reporter: Reporter, id: SpannedIdentifier): RelativeResolution | Reported {
        const sym = this.sym;
        switch (sym.$type) {
            case 'Module': {
                const item = sym.module.item(id.id);
                if (item === undefined) {
                    return reporter.report(
                        CheckDiagnostic.error(id.span, `the module \`${sym.module.name}\` has no item named \`${id.id}\``, ErrorCode.PC_NO_SUCH_ITEM)
                            .label(DiagnosticLevel.Error, id.span, `I could not find \`${id.id}\` in \`${sym.module.name}\``)
                    );
                }
                return { $type: 'Found', resolution: new NameResolution(moduleItemSym(item)) };
            }
            case 'Aggregate': {
                const member = sym.aggregate.member(id.id);
                if (member instanceof SymFunction) {
                    return { $type: 'Found', resolution: new NameResolution({ $type: 'Function', fn: member }, this.generics) };
                }
                if (member instanceof SymField) {
                    return { $type: 'Found', resolution: new NameResolution({ $type: 'Field', field: member }, this.generics) };
                }
                return { $type: 'NotFound', resolution: this };
            }
            case 'Variable':
            case 'Function':
            case 'Field':
            case 'Primitive':
                return { $type: 'NotFound', resolution: this };
        }
    }

    withGenerics(generics: readonly SymGenericTerm[]): NameResolution {
        return new NameResolution(this.sym, generics);
    }
}

export class LexicalScope {
    private constructor(
        private readonly parent: LexicalScope | undefined,
        private readonly entries: ReadonlyMap<string, NameResolutionSym>,
    ) { }

    static empty(): LexicalScope {
        return new LexicalScope(undefined, new Map());
    }

    /** A scope where every item of each module is visible; later modules shadow earlier ones. */
    static forModules(modules: readonly SymModule[]): LexicalScope {
        let scope = LexicalScope.empty();
        for (const module of modules) {
            const entries = new Map<string, NameResolutionSym>();
            for (const [name, item] of module.entries()) {
                entries.set(name, moduleItemSym(item));
            }
            scope = new LexicalScope(scope, entries);
        }
        return scope;
    }

    withEntry(name: string, sym: NameResolutionSym): LexicalScope {
        return new LexicalScope(this, new Map([[name, sym]]));
    }

    withEntries(entries: Iterable<readonly [string, NameResolutionSym]>): LexicalScope {
        return new LexicalScope(this, new Map(entries));
    }

    lookup(name: string): NameResolutionSym | undefined {
        for (let scope: LexicalScope | undefined = this; scope; scope = scope.parent) {
            const sym = scope.entries.get(name);
            if (sym !== undefined) {
                return sym;
            }
        }
        return undefined;
    }

    /** Innermost binding first; primitive type names are always in scope. */
    resolveName(reporter: Reporter, id: string, span: Span): NameResolution | Reported {
        const sym = this.lookup(id);
        if (sym !== undefined) {
            return new NameResolution(sym);
        }
        const primitive = SymPrimitive.parse(id);
        if (primitive !== undefined) {
            return new NameResolution({ $type: 'Primitive', primitive });
        }
        return reporter.report(
            CheckDiagnostic.error(span, `could not find anything named \`${id}\``, ErrorCode.PC_UNRESOLVED_NAME)
                .label(DiagnosticLevel.Error, span, 'I could not find anything with this name :(')
        );
    }
}
