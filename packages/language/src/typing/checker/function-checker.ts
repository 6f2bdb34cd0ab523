import type { Diagnostic } from 'vscode-languageserver-types';
import type { AstExpr } from '../../ast/unchecked-ast.js';
import type { CheckerConfig } from '../../config/checker-config.js';
import type { CheckLogger } from '../../logging/check-logger.js';
import type { PermServices } from '../../perm-module.js';
import { Env } from '../env.js';
import { InvalidReturnValue } from '../or-else.js';
import { CheckDiagnostic, DiagnosticSink, InvariantViolation, Reported } from '../report.js';
import { CheckRuntime } from '../runtime/check-runtime.js';
import type { SymTy } from '../terms/sym-terms.js';
import type { SymFunction, SymFunctionSignature, SymVariable } from '../terms/symbols.js';
import type { Exprs } from './exprs.js';
import type { LexicalScope, NameResolutionSym } from './name-resolution.js';
import { InferenceResolver } from './resolve-inference.js';
import { SymExpr } from './sym-expr.js';

export interface CheckResult {
    /** The checked tree, inference variables replaced by what was inferred */
    readonly expr: SymExpr;
    readonly diagnostics: readonly CheckDiagnostic[];
    readonly hasErrors: boolean;
    readonly lspDiagnostics: Diagnostic[];
}

/**
 * Entry point of a checking session.
 *
 * Each call creates its own runtime: inference variables never outlive the
 * body they were created for.
 */
export class Functions {
    private readonly config: CheckerConfig;
    private readonly logger: CheckLogger;
    private readonly exprs: () => Exprs;

    constructor(private readonly services: PermServices) {
        this.config = services.config;
        this.logger = services.logging.Logger;
        this.exprs = () => services.checking.Exprs;
    }

    /**
     * Checks `body` as the body of `fn`. The function's generics are opened
     * universally, its where-clauses are assumed, its inputs are in scope and
     * the body must be assignable to its output type.
     */
    async checkFunctionBody(fn: SymFunction, scope: LexicalScope, body: AstExpr): Promise<CheckResult> {
        const sink = new DiagnosticSink();
        const runtime = new CheckRuntime(sink, this.logger, this.config);

        let signature: SymFunctionSignature;
        try {
            signature = fn.checkedSignature();
        } catch (error) {
            if (error instanceof Reported) {
                return this.result(sink, SymExpr.error(error));
            }
            throw error;
        }

        const generics = signature.inputOutput.variables;
        const inputs = signature.inputOutput.boundValue;
        const inputOutput = inputs.boundValue;

        let env = Env.root(this.services, runtime, scope.withEntries(namedVariables(generics)))
            .openUniversally(generics, inputOutput.whereClauses);
        env.log('check function body', fn);
        for (const [index, variable] of inputs.variables.entries()) {
            const name = variable.name;
            if (name === undefined) {
                env.setVariableTy(variable, inputOutput.inputTys[index]);
            } else {
                env = env.withLocal(name, variable, inputOutput.inputTys[index]);
            }
        }
        env = env.withReturnTy(inputOutput.outputTy);

        return this.runSession(env, body, inputOutput.outputTy);
    }

    /** Checks a free-standing expression, where `return` is not allowed. */
    async checkExpression(scope: LexicalScope, ast: AstExpr): Promise<CheckResult> {
        const sink = new DiagnosticSink();
        const runtime = new CheckRuntime(sink, this.logger, this.config);
        return this.runSession(Env.root(this.services, runtime, scope), ast, undefined);
    }

    private async runSession(env: Env, body: AstExpr, expectedTy: SymTy | undefined): Promise<CheckResult> {
        const outcome: { expr?: SymExpr } = {};
        env.spawn('check body', async bodyEnv => {
            outcome.expr = await this.checkBody(bodyEnv, body, expectedTy);
        });
        await env.runtime.drive();

        if (outcome.expr === undefined) {
            throw new InvariantViolation('the body check finished without producing an expression');
        }
        const expr = new InferenceResolver(env).resolveExpr(outcome.expr);
        return this.result(env.runtime.sink, expr);
    }

    private async checkBody(env: Env, body: AstExpr, expectedTy: SymTy | undefined): Promise<SymExpr> {
        try {
            const result = await this.exprs().checkExpr(env, body);
            const expr = result.intoExprWithEnclosedTemporaries(env);
            if (expectedTy !== undefined) {
                env.spawnRequireAssignableType(expr.ty, expectedTy, new InvalidReturnValue(expr.span, expr.ty, expectedTy));
            }
            return expr;
        } catch (error) {
            if (error instanceof Reported) {
                return SymExpr.error(error);
            }
            throw error;
        }
    }

    private result(sink: DiagnosticSink, expr: SymExpr): CheckResult {
        return {
            expr,
            diagnostics: sink.diagnostics,
            hasErrors: sink.hasErrors,
            lspDiagnostics: sink.toLspDiagnostics(this.config.documentUri),
        };
    }
}

function namedVariables(variables: readonly SymVariable[]): Array<[string, NameResolutionSym]> {
    const entries: Array<[string, NameResolutionSym]> = [];
    for (const variable of variables) {
        if (variable.name !== undefined) {
            entries.push([variable.name, { $type: 'Variable', variable }]);
        }
    }
    return entries;
}
