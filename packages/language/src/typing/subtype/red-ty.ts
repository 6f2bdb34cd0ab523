/**
 * Reduced types.
 *
 * A red type is a type with its permissions stripped off into a side channel.
 * Subtyping compares the heads structurally and the permissions as chains of
 * liens.
 */

import type { Reported } from '../report.js';
import { InferVarIndex, SymGenericTerm, SymPerm, SymPlace, SymTy, SymTyName } from '../terms/sym-terms.js';
import type { SymVariable } from '../terms/symbols.js';

export type RedTyKind =
    | { readonly $type: 'Named'; readonly name: SymTyName; readonly generics: readonly SymGenericTerm[] }
    | { readonly $type: 'Infer'; readonly infer: InferVarIndex }
    | { readonly $type: 'Var'; readonly variable: SymVariable }
    | { readonly $type: 'Never' }
    | { readonly $type: 'Error'; readonly reported: Reported };

export interface RedTy {
    readonly kind: RedTyKind;
    /** Every permission that wrapped the head, outermost first */
    readonly perm: SymPerm;
}

/**
 * One link of a permission chain. `my` contributes nothing; `our` and
 * `shared` are copy and replace whatever came before them.
 */
export type Lien =
    | { readonly $type: 'Our' }
    | { readonly $type: 'Shared'; readonly places: readonly SymPlace[] }
    | { readonly $type: 'Leased'; readonly places: readonly SymPlace[] }
    | { readonly $type: 'Var'; readonly variable: SymVariable }
    | { readonly $type: 'Infer'; readonly infer: InferVarIndex };

/** The empty chain is `my`. */
export type Chain = readonly Lien[];

export class RedTys {

    toRedTy(ty: SymTy): RedTy {
        const kind = ty.kind;
        switch (kind.$type) {
            case 'Perm': {
                const inner = this.toRedTy(kind.ty);
                return { kind: inner.kind, perm: composePerms(kind.perm, inner.perm) };
            }
            case 'Named':
                return { kind: { $type: 'Named', name: kind.name, generics: kind.generics }, perm: SymPerm.my() };
            case 'Infer':
            case 'Var':
            case 'Never':
            case 'Error':
                return { kind, perm: SymPerm.my() };
        }
    }

    /** Throws the embedded report when the permission contains an error. */
    chainOf(perm: SymPerm): Chain {
        const chain: Lien[] = [];
        for (const leaf of perm.leaves()) {
            const kind = leaf.kind;
            switch (kind.$type) {
                case 'My':
                    break;
                case 'Our':
                    chain.length = 0;
                    chain.push({ $type: 'Our' });
                    break;
                case 'Shared':
                    chain.length = 0;
                    chain.push({ $type: 'Shared', places: kind.places });
                    break;
                case 'Leased':
                    chain.push({ $type: 'Leased', places: kind.places });
                    break;
                case 'Var':
                    chain.push({ $type: 'Var', variable: kind.variable });
                    break;
                case 'Infer':
                    chain.push({ $type: 'Infer', infer: kind.infer });
                    break;
                case 'Apply':
                    // leaves() flattens applications
                    break;
                case 'Error':
                    throw kind.reported;
            }
        }
        return chain;
    }

    chainToPerm(chain: Chain): SymPerm {
        return chain
            .map(lienToPerm)
            .reduce<SymPerm | undefined>((acc, perm) => acc === undefined ? perm : SymPerm.apply(acc, perm), undefined)
            ?? SymPerm.my();
    }

    chainHasInfer(chain: Chain): boolean {
        return chain.some(lien => lien.$type === 'Infer');
    }

    /** The inference variable when the chain is exactly one, e.g. `?P`. */
    bareInfer(chain: Chain): InferVarIndex | undefined {
        const [first] = chain;
        return chain.length === 1 && first.$type === 'Infer' ? first.infer : undefined;
    }

    /** The red type with its permission put back, as a plain type. */
    redTyToTy(redTy: RedTyKind): SymTy {
        switch (redTy.$type) {
            case 'Named': return SymTy.named(redTy.name, redTy.generics);
            case 'Infer': return SymTy.infer(redTy.infer);
            case 'Var': return SymTy.var(redTy.variable);
            case 'Never': return SymTy.never();
            case 'Error': return SymTy.error(redTy.reported);
        }
    }
}

function composePerms(outer: SymPerm, inner: SymPerm): SymPerm {
    if (outer.kind.$type === 'My') return inner;
    if (inner.kind.$type === 'My') return outer;
    return SymPerm.apply(outer, inner);
}

function lienToPerm(lien: Lien): SymPerm {
    switch (lien.$type) {
        case 'Our': return SymPerm.our();
        case 'Shared': return SymPerm.shared(lien.places);
        case 'Leased': return SymPerm.leased(lien.places);
        case 'Var': return SymPerm.var(lien.variable);
        case 'Infer': return SymPerm.infer(lien.infer);
    }
}
