/**
 * Function, method and class calls.
 *
 * All three end up in {@link Calls.checkCallCommon}: the callee's signature is
 * instantiated with the generic arguments, then with one fresh place variable
 * per argument, and the call is assembled as
 *
 * ```
 * let tmp0 = arg0 in
 * let tmp1 = arg1 in
 * callee(tmp0, tmp1)
 * ```
 */

import type { AstExpr, AstGenericTerm, Span } from '../../ast/unchecked-ast.js';
import { ErrorCode } from '../../codes/errors.js';
import type { PermServices } from '../../perm-module.js';
import type { Env } from '../env.js';
import { BadSubtypeError, WhereClauseNotSatisfied } from '../or-else.js';
import { CheckDiagnostic, DiagnosticLevel, InvariantViolation, Reported } from '../report.js';
import { openBinder, openOuterBinder } from '../terms/substitution.js';
import { SymGenericTerm, SymPlace, termHasKind, termKind } from '../terms/sym-terms.js';
import {
    Binder, SymAggregate, SymFunction, SymFunctionSignature, SymGenericKind, SymInputOutput, SymVariable
} from '../terms/symbols.js';
import { ExprResult } from './expr-result.js';
import type { Exprs } from './exprs.js';
import type { NameResolution } from './name-resolution.js';
import { SymExpr } from './sym-expr.js';
import type { Temporary } from './temporaries.js';
import type { Types } from './type-checker.js';

const NEW_METHOD = 'new';

export class Calls {
    private readonly exprs: () => Exprs;
    private readonly types: () => Types;

    constructor(services: PermServices) {
        this.exprs = () => services.checking.Exprs;
        this.types = () => services.checking.Types;
    }

    /**
     * `f(args)`, where `generics` are the arguments given so far
     * (e.g. `Pair[u32].make(..)`); the rest are inferred.
     */
    async checkFunctionCall(
        env: Env,
        functionSpan: Span,
        exprSpan: Span,
        fn: SymFunction,
        astArgs: readonly AstExpr[],
        generics: readonly SymGenericTerm[],
        temporaries: Temporary[],
    ): Promise<ExprResult> {
        env.log('check function call', fn);
        env.log('generics', ...generics);

        const signature = await this.signatureOrCheckArgs(env, fn, astArgs, undefined);
        if (signature instanceof Reported) {
            return ExprResult.err(signature);
        }

        const expectedGenerics = signature.inputOutput.variables;
        if (generics.length > expectedGenerics.length) {
            throw new InvariantViolation(`\`${fn}\` given ${generics.length} generic arguments for ${expectedGenerics.length} parameters`);
        }
        const substitution = [
            ...generics,
            ...env.existentialSubstitution(functionSpan, expectedGenerics.slice(generics.length)),
        ];

        return this.checkCallCommon(env, fn, exprSpan, functionSpan, signature.inputOutput, substitution, astArgs, undefined, temporaries);
    }

    /**
     * `a.b[G](args)`. Explicit generics apply to the function's own
     * parameters only; those it inherits from its class are always inferred.
     */
    async checkMethodCall(
        env: Env,
        idSpan: Span,
        exprSpan: Span,
        fn: SymFunction,
        selfExpr: SymExpr,
        astArgs: readonly AstExpr[],
        generics: readonly AstGenericTerm[] | undefined,
        temporaries: Temporary[],
    ): Promise<ExprResult> {
        const signature = await this.signatureOrCheckArgs(env, fn, astArgs, generics);
        if (signature instanceof Reported) {
            return ExprResult.err(signature);
        }
        const variables = signature.inputOutput.variables;

        let substitution: SymGenericTerm[];
        if (generics === undefined) {
            substitution = env.existentialSubstitution(idSpan, variables);
        } else {
            const fnGenerics = signature.symbols.genericVariables;
            const outerCount = variables.length - fnGenerics.length;
            if (outerCount < 0 || fnGenerics.some((variable, index) => variables[outerCount + index] !== variable)) {
                throw new InvariantViolation(`generics of \`${fn}\` are not a suffix of its signature's binder`);
            }
            substitution = env.existentialSubstitution(idSpan, variables.slice(0, outerCount));

            if (fnGenerics.length !== generics.length) {
                return ExprResult.err(env.report(
                    CheckDiagnostic.error(idSpan, `expected ${fnGenerics.length} generic arguments, but found ${generics.length}`, ErrorCode.PC_GENERIC_ARG_COUNT_MISMATCH)
                        .label(DiagnosticLevel.Error, idSpan, `${generics.length} generic arguments were provided`)
                        .label(DiagnosticLevel.Error, fn.nameSpan, `the function \`${fn.name}\` is declared with ${fnGenerics.length} generic arguments`)
                ));
            }

            for (const [index, astGeneric] of generics.entries()) {
                const variable = fnGenerics[index];
                const term = await this.types().checkGenericTerm(env, astGeneric);
                if (!termHasKind(term, variable.kind)) {
                    return ExprResult.err(env.report(
                        CheckDiagnostic.error(astGeneric.span, `expected \`${variable.kind}\`, found \`${termKind(term)}\``, ErrorCode.PC_GENERIC_KIND_MISMATCH)
                            .label(DiagnosticLevel.Error, idSpan, `this is a \`${termKind(term)}\``)
                            .label(DiagnosticLevel.Info, variable.span, `I expected to find a \`${variable.kind}\``)
                    ));
                }
                substitution.push(term);
            }
        }

        return this.checkCallCommon(env, fn, exprSpan, idSpan, signature.inputOutput, substitution, astArgs, selfExpr, temporaries);
    }

    /** `Class(args)` means `Class.new(args)`. */
    async checkClassCall(
        env: Env,
        classSpan: Span,
        exprSpan: Span,
        resolution: NameResolution,
        aggregate: SymAggregate,
        astArgs: readonly AstExpr[],
        temporaries: Temporary[],
    ): Promise<ExprResult> {
        const relative = resolution.resolveRelativeId(env, { id: NEW_METHOD, span: classSpan });
        if (relative instanceof Reported) {
            return ExprResult.err(relative);
        }
        if (relative.$type === 'Found' && relative.resolution.sym.$type === 'Function') {
            return this.checkFunctionCall(env, classSpan, exprSpan, relative.resolution.sym.fn, astArgs, relative.resolution.generics, temporaries);
        }

        const message = `the class \`${aggregate.name}\` has no \`new\` method`;
        const label = `I could not find a \`new\` method on the class \`${aggregate.name}\``;
        if (relative.$type === 'Found') {
            const found = relative.resolution;
            return ExprResult.err(env.report(
                CheckDiagnostic.error(classSpan, message, ErrorCode.PC_CLASS_NEW_NOT_A_FUNCTION)
                    .label(DiagnosticLevel.Error, classSpan, label)
                    .child(
                        CheckDiagnostic.note(aggregate.nameSpan, 'calling a class is equivalent to calling `new`, but `new` is not a method')
                            .label(DiagnosticLevel.Note, found.span ?? aggregate.nameSpan, `I found a class member named \`new\` but it is ${found.categorize()}, not a method`)
                    )
            ));
        }
        return ExprResult.err(env.report(
            CheckDiagnostic.error(classSpan, message, ErrorCode.PC_CLASS_HAS_NO_NEW)
                .label(DiagnosticLevel.Error, classSpan, label)
                .child(
                    CheckDiagnostic.note(aggregate.nameSpan, `calling a class is equivalent to calling \`new\`, but \`${aggregate.name}\` does not define a \`new\` method`)
                        .label(DiagnosticLevel.Note, aggregate.nameSpan, 'I could not find any class member named `new`')
                )
        ));
    }

    /**
     * The callee's signature. When it failed to check, the arguments are
     * still checked so their own errors are reported.
     */
    private async signatureOrCheckArgs(
        env: Env,
        fn: SymFunction,
        astArgs: readonly AstExpr[],
        generics: readonly AstGenericTerm[] | undefined,
    ): Promise<SymFunctionSignature | Reported> {
        try {
            return fn.checkedSignature();
        } catch (error) {
            if (!(error instanceof Reported)) {
                throw error;
            }
            for (const generic of generics ?? []) {
                await this.types().checkGenericTerm(env, generic);
            }
            for (const astArg of astArgs) {
                await this.exprs().checkExpr(env, astArg);
            }
            return error;
        }
    }

    private async checkCallCommon(
        env: Env,
        fn: SymFunction,
        exprSpan: Span,
        calleeSpan: Span,
        binder: Binder<Binder<SymInputOutput>>,
        substitution: readonly SymGenericTerm[],
        astArgs: readonly AstExpr[],
        selfExpr: SymExpr | undefined,
        temporaries: Temporary[],
    ): Promise<ExprResult> {
        env.log('check call common', fn);
        env.log('substitution', ...substitution);

        const inputBinder = openOuterBinder(binder, substitution);

        const selfArgs = selfExpr ? 1 : 0;
        const expectedInputs = inputBinder.boundValue.inputTys.length;
        const foundInputs = selfArgs + astArgs.length;
        if (foundInputs !== expectedInputs) {
            return ExprResult.err(env.report(
                CheckDiagnostic.error(calleeSpan, `expected ${expectedInputs} arguments, found ${foundInputs}`, ErrorCode.PC_CALL_ARG_COUNT_MISMATCH)
                    .label(DiagnosticLevel.Error, calleeSpan, `I expected \`${fn.name}\` to take ${expectedInputs} arguments but I found ${foundInputs}`)
                    .label(DiagnosticLevel.Info, fn.nameSpan, `\`${fn.name}\` defined here`)
            ));
        }

        const argSpan = (index: number): Span => {
            if (selfExpr && index === 0) {
                return selfExpr.span;
            }
            return astArgs[index - selfArgs]?.span ?? calleeSpan;
        };
        const argTemps = Array.from({ length: expectedInputs }, (_, index) => new SymVariable(SymGenericKind.Place, undefined, argSpan(index)));
        const inputOutput = openBinder(inputBinder, argTemps.map(temp => SymPlace.var(temp)));

        env.log('arg temps', ...argTemps);
        env.log('input output', ...inputOutput.inputTys, inputOutput.outputTy);

        const checkArg = async (index: number): Promise<ExprResult> => {
            const argEnv = env.fork();
            const argTemporaries: Temporary[] = [];
            let expr: SymExpr;
            if (selfExpr && index === 0) {
                expr = selfExpr;
            } else {
                const result = await this.exprs().checkExpr(argEnv, astArgs[index - selfArgs]);
                expr = result.intoExpr(argEnv, argTemporaries);
            }
            const inputTy = inputOutput.inputTys[index];
            argEnv.setVariableTy(argTemps[index], expr.ty);
            argEnv.spawnRequireAssignableType(expr.ty, inputTy, new BadSubtypeError(expr.span, expr.ty, inputTy));
            return ExprResult.fromExpr(expr, argTemporaries);
        };

        for (const clause of inputOutput.whereClauses) {
            env.spawnRequireWhereClause(clause, new WhereClauseNotSatisfied(calleeSpan, clause.span, clause.subject, clause.predicate));
        }

        // arguments are checked concurrently
        const argResults = await Promise.all(argTemps.map((_, index) => checkArg(index)));
        const argExprs = argResults.map(result => result.intoExpr(env, temporaries));

        const call = new SymExpr(exprSpan, inputOutput.outputTy, {
            $type: 'Call',
            fn,
            substitution,
            argTemps,
        });
        const body = argTemps.reduceRight(
            (expr, temp, index) => SymExpr.letIn(temp, argExprs[index].ty, argExprs[index], expr),
            call,
        );
        return ExprResult.fromExpr(body, temporaries);
    }
}
