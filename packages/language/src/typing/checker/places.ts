import type { PermServices } from '../../perm-module.js';
import { ErrorCode } from '../../codes/errors.js';
import type { Env } from '../env.js';
import { CheckDiagnostic, DiagnosticLevel, InvariantViolation } from '../report.js';
import { substituteTy } from '../terms/substitution.js';
import { SymPlace, SymTy } from '../terms/sym-terms.js';
import type { SymField } from '../terms/symbols.js';
import type { RedTys } from '../subtype/red-ty.js';

/**
 * Computes the type of a place.
 *
 * Field projections take the permission of the place they project from:
 * if `p: leased[q] Pair[u32]` then `p.a: leased[q] u32`.
 */
export class PlaceTyper {
    private readonly redTys: () => RedTys;

    constructor(services: PermServices) {
        this.redTys = () => services.subtyping.RedTys;
    }

    async placeTy(env: Env, place: SymPlace): Promise<SymTy> {
        const kind = place.kind;
        switch (kind.$type) {
            case 'Var':
                return env.variableTy(kind.variable);
            case 'Field':
                return this.fieldTy(env, await this.placeTy(env, kind.base), kind.field);
            case 'Error':
                throw kind.reported;
            case 'Index':
            case 'Infer':
                throw new InvariantViolation(`cannot compute the type of place \`${place}\``);
        }
    }

    /** Type of `field` read out of a value of type `ownerTy`. */
    async fieldTy(env: Env, ownerTy: SymTy, field: SymField): Promise<SymTy> {
        const { kind, perm } = this.redTys().toRedTy(ownerTy);
        switch (kind.$type) {
            case 'Named': {
                const name = kind.name;
                if (name.$type !== 'Aggregate' || name.aggregate !== field.owner) {
                    throw new InvariantViolation(`\`${ownerTy}\` has no field \`${field.name}\``);
                }
                return perm.applyToTy(substituteTy(field.ty, name.aggregate.generics, kind.generics));
            }
            case 'Infer': {
                const bound = await env.loopOnInferenceVar(kind.infer, data => data.lowerBound);
                if (bound === undefined || !(bound.term instanceof SymTy)) {
                    throw env.report(
                        CheckDiagnostic.error(env.runtime.inferVar(kind.infer).span, 'type annotations needed', ErrorCode.PC_TYPE_ANNOTATIONS_NEEDED)
                            .label(DiagnosticLevel.Error, field.span, `I need to know the type here to find the field \`${field.name}\``)
                    );
                }
                return perm.applyToTy(await this.fieldTy(env, bound.term, field));
            }
            case 'Error':
                throw kind.reported;
            case 'Var':
            case 'Never':
                throw new InvariantViolation(`\`${ownerTy}\` has no field \`${field.name}\``);
        }
    }
}
