/**
 * Checking of expressions.
 *
 * Each syntax node is checked into an {@link ExprResult}. Requirements that
 * may need more inference before they can be decided (numeric operands,
 * assignability, awaited futures) are spawned as obligations rather than
 * awaited, so the result type handed back may still be an inference variable.
 */

import type {
    AstBinaryExpr, AstCallExpr, AstDotIdExpr, AstExpr, AstGenericTerm, AstIfExpr, AstLiteral, AstPermissionOp, AstPermissionOpExpr,
    AstSquareBracketExpr, AstUnaryExpr, Span
} from '../../ast/unchecked-ast.js';
import type { WellKnownSymbols } from '../../builtins/prelude.js';
import { ErrorCode } from '../../codes/errors.js';
import type { PermServices } from '../../perm-module.js';
import type { Env } from '../env.js';
import {
    AwaitNonFuture, BadSubtypeError, BooleanExpected, InvalidAssignmentType, InvalidReturnValue, NumericTypeExpected,
    OperandsMustMatch
} from '../or-else.js';
import { CheckDiagnostic, DiagnosticLevel, InvariantViolation, Reported } from '../report.js';
import { SymGenericTerm, SymPlace, SymTy, termHasKind, termKind } from '../terms/sym-terms.js';
import type { SymFunctionSignature, SymVariable } from '../terms/symbols.js';
import type { Blocks } from './block-checker.js';
import type { Calls } from './calls.js';
import { ExprResult, reportMissingCallToMethod, reportNotCallable, reportNotImplemented } from './expr-result.js';
import type { MemberLookup } from './member-lookup.js';
import type { NameResolution } from './name-resolution.js';
import { SymExpr, SymMatchArm, toSymBinaryOp } from './sym-expr.js';
import { intoTemporaryVar, Temporary } from './temporaries.js';
import type { Types } from './type-checker.js';

export class Exprs {
    private readonly wellKnown: () => WellKnownSymbols;
    private readonly memberLookup: () => MemberLookup;
    private readonly calls: () => Calls;
    private readonly blocks: () => Blocks;
    private readonly types: () => Types;

    constructor(services: PermServices) {
        this.wellKnown = () => services.terms.WellKnown;
        this.memberLookup = () => services.checking.MemberLookup;
        this.calls = () => services.checking.Calls;
        this.blocks = () => services.checking.Blocks;
        this.types = () => services.checking.Types;
    }

    checkExpr(env: Env, ast: AstExpr): Promise<ExprResult> {
        return env.indent('check expr', [ast.$type], env => this.checkExprKind(env, ast));
    }

    private async checkExprKind(env: Env, ast: AstExpr): Promise<ExprResult> {
        switch (ast.$type) {
            case 'Literal':
                return this.checkLiteral(env, ast);

            case 'TupleExpr': {
                const temporaries: Temporary[] = [];
                const elements: SymExpr[] = [];
                for (const element of ast.elements) {
                    elements.push((await this.checkExpr(env, element)).intoExpr(env, temporaries));
                }
                const ty = SymTy.tuple(elements.map(element => element.ty));
                return ExprResult.fromExpr(new SymExpr(ast.span, ty, { $type: 'Tuple', elements }), temporaries);
            }

            case 'BinaryExpr':
                return this.checkBinaryExpr(env, ast);

            case 'AssignExpr': {
                const temporaries: Temporary[] = [];
                const place = (await this.checkExpr(env, ast.place)).intoPlaceExpr(env, temporaries);
                const value = (await this.checkExpr(env, ast.value)).intoExpr(env, temporaries);
                env.spawnRequireAssignableType(value.ty, place.ty, new InvalidAssignmentType(value.span, place.span, place.ty, value.ty));
                return ExprResult.fromExpr(new SymExpr(ast.span, SymTy.unit(), { $type: 'Assign', place, value }), temporaries);
            }

            case 'IdExpr': {
                const resolution = env.scope.resolveName(env, ast.id, ast.span);
                if (resolution instanceof Reported) {
                    return ExprResult.err(resolution);
                }
                return ExprResult.fromNameResolution(env, resolution, ast.span);
            }

            case 'DotIdExpr':
                return this.checkDotId(env, ast);

            case 'SquareBracketExpr':
                return this.checkSquareBracket(env, ast);

            case 'CallExpr':
                return this.checkCall(env, ast);

            case 'ReturnExpr': {
                const temporaries: Temporary[] = [];
                const value = ast.value
                    ? (await this.checkExpr(env, ast.value)).intoExpr(env, temporaries)
                    : SymExpr.unit(ast.span);
                const returnTy = env.returnTy;
                if (returnTy === undefined) {
                    return ExprResult.err(env.report(
                        CheckDiagnostic.error(ast.span, 'unexpected `return` statement', ErrorCode.PC_RETURN_OUTSIDE_FUNCTION)
                            .label(DiagnosticLevel.Error, ast.span, 'I did not expect to see a `return` statement here')
                    ));
                }
                env.spawnRequireAssignableType(value.ty, returnTy, new InvalidReturnValue(value.span, value.ty, returnTy));
                return ExprResult.fromExpr(new SymExpr(ast.span, SymTy.never(), { $type: 'Return', value }), temporaries);
            }

            case 'AwaitExpr': {
                const temporaries: Temporary[] = [];
                const future = (await this.checkExpr(env, ast.future)).intoExpr(env, temporaries);
                const awaitedTy = env.freshTyInferenceVar(ast.awaitSpan);
                env.spawnRequireFutureType(future.ty, awaitedTy, new AwaitNonFuture(ast.awaitSpan, future.span, future.ty));
                return ExprResult.fromExpr(
                    new SymExpr(ast.span, awaitedTy, { $type: 'Await', future, awaitSpan: ast.awaitSpan }),
                    temporaries,
                );
            }

            case 'UnaryExpr':
                return this.checkUnaryExpr(env, ast);

            case 'BlockExpr':
                return ExprResult.fromExpr(await this.blocks().checkBlock(env, ast));

            case 'IfExpr':
                return this.checkIf(env, ast);

            case 'PermissionOpExpr':
                return this.checkPermissionOp(env, ast);
        }
    }

    private checkLiteral(env: Env, ast: AstLiteral): ExprResult {
        switch (ast.literalKind) {
            case 'integer': {
                const digits = ast.text.replaceAll('_', '');
                if (!/^[0-9]+$/.test(digits)) {
                    return ExprResult.err(env.report(
                        CheckDiagnostic.error(ast.span, `invalid integer literal \`${ast.text}\``, ErrorCode.PC_INVALID_INTEGER_LITERAL)
                            .label(DiagnosticLevel.Error, ast.span, 'I expected only decimal digits here')
                    ));
                }
                const ty = env.freshTyInferenceVar(ast.span);
                const expr = new SymExpr(ast.span, ty, { $type: 'Primitive', literal: { $type: 'Integral', bits: BigInt(digits) } });
                env.spawnRequireNumericType(ty, new NumericTypeExpected(ast.span, ty));
                return ExprResult.fromExpr(expr);
            }

            case 'string': {
                // `String.literal(b"...", length)`
                const wellKnown = this.wellKnown();
                const bytes = new TextEncoder().encode(ast.text);
                const byteLiteral = new SymExpr(ast.span, wellKnown.pointerTy(SymTy.u8()), { $type: 'ByteLiteral', bytes });
                const length = new SymExpr(ast.span, SymTy.u32(), {
                    $type: 'Primitive',
                    literal: { $type: 'Integral', bits: BigInt(bytes.length) },
                });
                const temporaries: Temporary[] = [];
                const argTemps: SymVariable[] = [
                    intoTemporaryVar(env, byteLiteral, temporaries),
                    intoTemporaryVar(env, length, temporaries),
                ];
                const call = new SymExpr(ast.span, wellKnown.stringTy(), {
                    $type: 'Call',
                    fn: wellKnown.stringLiteralFn,
                    substitution: [],
                    argTemps,
                });
                return ExprResult.fromExpr(call, temporaries);
            }

            case 'boolean':
                switch (ast.text) {
                    case 'true': return ExprResult.fromExpr(SymExpr.booleanLiteral(ast.span, true));
                    case 'false': return ExprResult.fromExpr(SymExpr.booleanLiteral(ast.span, false));
                    default: throw new InvariantViolation(`unrecognized boolean literal \`${ast.text}\``);
                }
        }
    }

    private async checkBinaryExpr(env: Env, ast: AstBinaryExpr): Promise<ExprResult> {
        const temporaries: Temporary[] = [];
        const lhs = (await this.checkExpr(env, ast.left)).intoExpr(env, temporaries);
        const rhs = (await this.checkExpr(env, ast.right)).intoExpr(env, temporaries);

        switch (ast.op) {
            case '&&':
                requireExprHasBoolTy(env, lhs);
                requireExprHasBoolTy(env, rhs);
                // if lhs { if rhs { true } else { false } } else { false }
                return ExprResult.fromExpr(
                    SymExpr.ifThenElse(
                        ast.span,
                        lhs,
                        SymExpr.ifThenElse(ast.span, rhs, SymExpr.booleanLiteral(ast.span, true), SymExpr.booleanLiteral(ast.span, false)),
                        SymExpr.booleanLiteral(ast.span, false),
                    ),
                    temporaries,
                );

            case '||':
                requireExprHasBoolTy(env, lhs);
                requireExprHasBoolTy(env, rhs);
                // if lhs { true } else { if rhs { true } else { false } }
                return ExprResult.fromExpr(
                    SymExpr.ifThenElse(
                        ast.span,
                        lhs,
                        SymExpr.booleanLiteral(ast.span, true),
                        SymExpr.ifThenElse(ast.span, rhs, SymExpr.booleanLiteral(ast.span, true), SymExpr.booleanLiteral(ast.span, false)),
                    ),
                    temporaries,
                );

            case '+':
            case '-':
            case '*':
            case '/':
            case '>':
            case '<':
            case '>=':
            case '<=':
            case '==': {
                const op = toSymBinaryOp(ast.op);
                if (op === undefined) {
                    throw new InvariantViolation(`no operator node for \`${ast.op}\``);
                }
                env.spawnRequireNumericType(lhs.ty, new NumericTypeExpected(lhs.span, lhs.ty, ast.opSpan));
                env.spawnRequireNumericType(rhs.ty, new NumericTypeExpected(rhs.span, rhs.ty, ast.opSpan));
                env.spawnIfNotNever([lhs.ty, rhs.ty], 'require equal operand types', async env => {
                    env.spawnRequireEqualTypes(lhs.ty, rhs.ty, new OperandsMustMatch(ast.opSpan, lhs.ty, rhs.ty));
                });
                // arithmetic takes the type of its left operand
                const isArithmetic = op === 'add' || op === 'sub' || op === 'mul' || op === 'div';
                const ty = isArithmetic ? lhs.ty : SymTy.boolean();
                return ExprResult.fromExpr(new SymExpr(ast.span, ty, { $type: 'BinaryOp', op, lhs, rhs }), temporaries);
            }
        }
    }

    private async checkUnaryExpr(env: Env, ast: AstUnaryExpr): Promise<ExprResult> {
        const temporaries: Temporary[] = [];
        const operand = (await this.checkExpr(env, ast.operand)).intoExpr(env, temporaries);
        switch (ast.op) {
            case 'not':
                requireExprHasBoolTy(env, operand);
                return ExprResult.fromExpr(
                    new SymExpr(ast.span, SymTy.boolean(), { $type: 'Not', operand, opSpan: ast.opSpan }),
                    temporaries,
                );
            case 'negate':
                env.spawnRequireNumericType(operand.ty, new NumericTypeExpected(operand.span, operand.ty, ast.opSpan));
                return ExprResult.fromExpr(
                    new SymExpr(ast.span, operand.ty, { $type: 'Negate', operand, opSpan: ast.opSpan }),
                    temporaries,
                );
        }
    }

    private async checkDotId(env: Env, ast: AstDotIdExpr): Promise<ExprResult> {
        const owner = await this.checkExpr(env, ast.owner);
        const kind = owner.kind;
        switch (kind.$type) {
            case 'PlaceExpr':
            case 'Expr':
                return this.memberLookup().lookupMember(env, owner, ast.member, ast.span);

            case 'Other': {
                const relative = kind.resolution.resolveRelativeId(env, ast.member);
                if (relative instanceof Reported) {
                    return ExprResult.err(relative);
                }
                if (relative.$type === 'Found') {
                    return ExprResult.fromNameResolution(env, relative.resolution, ast.span);
                }
                // not a lexical member; try type-directed lookup
                const fallback = new ExprResult(owner.temporaries, owner.span, { $type: 'Other', resolution: relative.resolution });
                return this.memberLookup().lookupMember(env, fallback, ast.member, ast.span);
            }

            case 'Method':
                return ExprResult.err(reportMissingCallToMethod(env, kind.selfExpr.span, kind.fn));
        }
    }

    private async checkSquareBracket(env: Env, ast: AstSquareBracketExpr): Promise<ExprResult> {
        const owner = await this.checkExpr(env, ast.owner);
        const kind = owner.kind;
        switch (kind.$type) {
            case 'Method':
                if (kind.generics !== undefined) {
                    // `a.b[x][y]`: only `a.b[x]()[y]` could make sense
                    return ExprResult.err(reportMissingCallToMethod(env, kind.selfExpr.span, kind.fn));
                }
                return new ExprResult(owner.temporaries, owner.span, { ...kind, generics: ast.args });

            case 'PlaceExpr':
                if (kind.placeExpr.kind.$type === 'Error') {
                    return ExprResult.err(kind.placeExpr.kind.reported);
                }
                return ExprResult.err(reportNotImplemented(env, ast.span, 'indexing expressions'));
            case 'Expr':
                return ExprResult.err(reportNotImplemented(env, ast.span, 'indexing expressions'));

            case 'Other': {
                const resolution = await this.resolveRelativeGenericArgs(env, kind.resolution, ast.args, ast.span);
                if (resolution instanceof Reported) {
                    return ExprResult.err(resolution);
                }
                return new ExprResult(owner.temporaries, ast.span, { $type: 'Other', resolution });
            }
        }
    }

    /**
     * Applies `Name[args]` to a class or function. For a function the
     * arguments instantiate its own generic parameters; parameters it
     * inherits from its class and that were not given are inferred.
     */
    private async resolveRelativeGenericArgs(
        env: Env,
        resolution: NameResolution,
        asts: readonly AstGenericTerm[],
        span: Span,
    ): Promise<NameResolution | Reported> {
        const sym = resolution.sym;
        let prefix: SymGenericTerm[];
        let expected: readonly SymVariable[];
        let name: string;
        switch (sym.$type) {
            case 'Aggregate':
                if (resolution.generics.length > 0) {
                    return reportUnexpectedGenericArgs(env, span, resolution);
                }
                prefix = [];
                expected = sym.aggregate.generics;
                name = sym.aggregate.name;
                break;
            case 'Function': {
                let signature: SymFunctionSignature;
                try {
                    signature = sym.fn.checkedSignature();
                } catch (error) {
                    if (error instanceof Reported) {
                        return error;
                    }
                    throw error;
                }
                const variables = signature.inputOutput.variables;
                expected = signature.symbols.genericVariables;
                const outer = variables.slice(0, variables.length - expected.length);
                if (resolution.generics.length > outer.length) {
                    // `f[a][b]`
                    return reportUnexpectedGenericArgs(env, span, resolution, `\`${sym.fn.name}\` already has its generic arguments`);
                }
                prefix = [
                    ...resolution.generics,
                    ...env.existentialSubstitution(span, outer.slice(resolution.generics.length)),
                ];
                name = sym.fn.name;
                break;
            }
            case 'Variable':
            case 'Module':
            case 'Field':
            case 'Primitive':
                return reportUnexpectedGenericArgs(env, span, resolution);
        }

        if (asts.length !== expected.length) {
            return env.report(
                CheckDiagnostic.error(span, `expected ${expected.length} generic arguments, but found ${asts.length}`, ErrorCode.PC_GENERIC_ARG_COUNT_MISMATCH)
                    .label(DiagnosticLevel.Error, span, `${asts.length} generic arguments were provided`)
                    .label(DiagnosticLevel.Info, resolution.span ?? span, `\`${name}\` is declared with ${expected.length} generic arguments`)
            );
        }
        const terms: SymGenericTerm[] = [];
        for (const [index, ast] of asts.entries()) {
            const variable = expected[index];
            const term = await this.types().checkGenericTerm(env, ast);
            if (!termHasKind(term, variable.kind)) {
                return env.report(
                    CheckDiagnostic.error(ast.span, `expected \`${variable.kind}\`, found \`${termKind(term)}\``, ErrorCode.PC_GENERIC_KIND_MISMATCH)
                        .label(DiagnosticLevel.Error, ast.span, `this is a \`${termKind(term)}\``)
                        .label(DiagnosticLevel.Info, variable.span, `I expected to find a \`${variable.kind}\``)
                );
            }
            terms.push(term);
        }
        return resolution.withGenerics([...prefix, ...terms]);
    }

    private async checkCall(env: Env, ast: AstCallExpr): Promise<ExprResult> {
        const owner = await this.checkExpr(env, ast.owner);
        const temporaries = [...owner.temporaries];
        const kind = owner.kind;
        if (kind.$type === 'Method') {
            return this.calls().checkMethodCall(env, kind.idSpan, ast.span, kind.fn, kind.selfExpr, ast.args, kind.generics, temporaries);
        }
        if (kind.$type === 'PlaceExpr' && kind.placeExpr.kind.$type === 'Error') {
            return ExprResult.err(kind.placeExpr.kind.reported);
        }
        if (kind.$type === 'Other') {
            const resolution = kind.resolution;
            const sym = resolution.sym;
            if (sym.$type === 'Function') {
                return this.calls().checkFunctionCall(env, owner.span, ast.span, sym.fn, ast.args, resolution.generics, temporaries);
            }
            if (sym.$type === 'Aggregate') {
                return this.calls().checkClassCall(env, owner.span, ast.span, resolution, sym.aggregate, ast.args, temporaries);
            }
        }
        return ExprResult.err(reportNotCallable(env, owner.span));
    }

    private async checkIf(env: Env, ast: AstIfExpr): Promise<ExprResult> {
        const arms: SymMatchArm[] = [];
        let hasElse = false;
        for (const arm of ast.arms) {
            let condition: SymExpr | undefined;
            if (arm.condition) {
                condition = (await this.checkExpr(env, arm.condition)).intoExprWithEnclosedTemporaries(env);
                requireExprHasBoolTy(env, condition);
            } else {
                hasElse = true;
            }
            const body = (await this.checkExpr(env, arm.body)).intoExprWithEnclosedTemporaries(env);
            arms.push({ condition, body });
        }

        // without an `else` the arms cannot produce a value
        const ty = hasElse ? env.freshTyInferenceVar(ast.span) : SymTy.unit();
        for (const arm of arms) {
            env.spawnRequireAssignableType(arm.body.ty, ty, new BadSubtypeError(arm.body.span, arm.body.ty, ty));
        }
        return ExprResult.fromExpr(new SymExpr(ast.span, ty, { $type: 'Match', arms }));
    }

    private async checkPermissionOp(env: Env, ast: AstPermissionOpExpr): Promise<ExprResult> {
        const temporaries: Temporary[] = [];
        const place = (await this.checkExpr(env, ast.value)).intoPlaceExpr(env, temporaries);
        if (place.kind.$type === 'Error') {
            return ExprResult.err(place.kind.reported);
        }
        const ty = permissionOpTy(ast.op, place.ty, place.toSymPlace());
        return ExprResult.fromExpr(new SymExpr(ast.span, ty, { $type: 'PermissionOp', op: ast.op, place }), temporaries);
    }
}

function permissionOpTy(op: AstPermissionOp, ty: SymTy, place: SymPlace): SymTy {
    switch (op) {
        case 'mutate': return ty.leased(place);
        case 'reference': return ty.shared(place);
        case 'give': return ty;
    }
}

function requireExprHasBoolTy(env: Env, expr: SymExpr): void {
    env.spawnRequireAssignableType(expr.ty, SymTy.boolean(), new BooleanExpected(expr.span, expr.ty));
}

function reportUnexpectedGenericArgs(
    env: Env,
    span: Span,
    resolution: NameResolution,
    reason = `${resolution.categorize()} does not take generic arguments`,
): Reported {
    return env.report(
        CheckDiagnostic.error(span, 'unexpected generic arguments', ErrorCode.PC_UNEXPECTED_GENERIC_ARGS)
            .label(DiagnosticLevel.Error, span, reason)
    );
}
