import type { Span, SpannedIdentifier } from '../../ast/unchecked-ast.js';
import { ErrorCode } from '../../codes/errors.js';
import type { PermServices } from '../../perm-module.js';
import type { Env } from '../env.js';
import { CheckDiagnostic, DiagnosticLevel, Reported } from '../report.js';
import type { RedTyKind, RedTys } from '../subtype/red-ty.js';
import { SymTy } from '../terms/sym-terms.js';
import { SymField, SymFunction } from '../terms/symbols.js';
import { ExprResult, reportMissingCallToMethod } from './expr-result.js';
import type { PlaceTyper } from './places.js';
import { SymPlaceExpr } from './sym-expr.js';
import type { Temporary } from './temporaries.js';

/**
 * Type-directed lookup of `owner.id`: fields of classes and structs, and
 * methods, which stay pending until they are called.
 */
export class MemberLookup {
    private readonly redTys: () => RedTys;
    private readonly places: () => PlaceTyper;

    constructor(services: PermServices) {
        this.redTys = () => services.subtyping.RedTys;
        this.places = () => services.checking.Places;
    }

    async lookupMember(env: Env, owner: ExprResult, id: SpannedIdentifier, span: Span): Promise<ExprResult> {
        const kind = owner.kind;
        switch (kind.$type) {
            case 'PlaceExpr':
            case 'Expr': {
                const ownerTy = kind.$type === 'PlaceExpr' ? kind.placeExpr.ty : kind.expr.ty;
                try {
                    return await this.lookupOnTy(env, owner, ownerTy, this.redTys().toRedTy(ownerTy).kind, id, span);
                } catch (error) {
                    if (error instanceof Reported) {
                        return ExprResult.err(error);
                    }
                    throw error;
                }
            }
            case 'Method':
                return ExprResult.err(reportMissingCallToMethod(env, kind.selfExpr.span, kind.fn));
            case 'Other':
                return ExprResult.err(reportNoSuchMember(env, id, kind.resolution.categorize()));
        }
    }

    private async lookupOnTy(env: Env, owner: ExprResult, ownerTy: SymTy, redTy: RedTyKind, id: SpannedIdentifier, span: Span): Promise<ExprResult> {
        switch (redTy.$type) {
            case 'Named': {
                if (redTy.name.$type !== 'Aggregate') {
                    return ExprResult.err(reportNoSuchMember(env, id, `a value of type \`${ownerTy}\``));
                }
                const member = redTy.name.aggregate.member(id.id);
                if (member instanceof SymField) {
                    const temporaries: Temporary[] = [];
                    const ownerPlace = owner.intoPlaceExpr(env, temporaries);
                    const fieldTy = await this.places().fieldTy(env, ownerTy, member);
                    return ExprResult.fromPlaceExpr(
                        new SymPlaceExpr(span, fieldTy, { $type: 'Field', owner: ownerPlace, field: member }),
                        temporaries,
                    );
                }
                if (member instanceof SymFunction) {
                    if (!member.hasSelf) {
                        return ExprResult.err(env.report(
                            CheckDiagnostic.error(id.span, `\`${member.name}\` does not take \`self\``, ErrorCode.PC_ASSOCIATED_FUNCTION_ON_INSTANCE)
                                .label(DiagnosticLevel.Error, id.span, `\`${member.name}\` is an associated function; call it through the type`)
                                .label(DiagnosticLevel.Info, member.nameSpan, `\`${member.name}\` defined here`)
                        ));
                    }
                    const temporaries: Temporary[] = [];
                    const selfExpr = owner.intoExpr(env, temporaries);
                    return new ExprResult(temporaries, span, {
                        $type: 'Method',
                        selfExpr,
                        idSpan: id.span,
                        fn: member,
                        generics: undefined,
                    });
                }
                return ExprResult.err(reportNoSuchMember(env, id, `a value of type \`${ownerTy}\``));
            }
            case 'Infer': {
                const bound = await env.loopOnInferenceVar(redTy.infer, data => data.lowerBound);
                if (bound === undefined || !(bound.term instanceof SymTy)) {
                    return ExprResult.err(env.report(
                        CheckDiagnostic.error(owner.span, 'type annotations needed', ErrorCode.PC_TYPE_ANNOTATIONS_NEEDED)
                            .label(DiagnosticLevel.Error, owner.span, `I need to know the type of this to look up \`${id.id}\``)
                    ));
                }
                return this.lookupOnTy(env, owner, ownerTy, this.redTys().toRedTy(bound.term).kind, id, span);
            }
            case 'Error':
                return ExprResult.err(redTy.reported);
            case 'Var':
            case 'Never':
                return ExprResult.err(reportNoSuchMember(env, id, `a value of type \`${ownerTy}\``));
        }
    }
}

function reportNoSuchMember(env: Env, id: SpannedIdentifier, found: string): Reported {
    return env.report(
        CheckDiagnostic.error(id.span, `no member named \`${id.id}\``, ErrorCode.PC_NO_SUCH_MEMBER)
            .label(DiagnosticLevel.Error, id.span, `I could not find a member \`${id.id}\` on ${found}`)
    );
}
