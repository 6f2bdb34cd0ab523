import { expect } from "vitest";
import {
    Binder, CheckDiagnostic, CheckerConfig, CheckResult, CheckRuntime, createPermServices, DiagnosticSink, Env,
    LexicalScope, PermServices, Predicate, SymAggregate, SymAggregateStyle, SymExpr, symExprToString, SymFunction,
    SymFunctionSignature, SymGenericKind, SymModule, SymTy, SymVariable, syntheticSpan, termFromVariable
} from "../src/index.js";
import type { AstExpr } from "../src/index.js";

/**
 * Services, a program module and a scope that sees the prelude and the
 * program. Declarations added to `program` are visible to every check
 * started afterwards.
 */
export function setupChecker(config: Partial<CheckerConfig> = {}) {
    const services = createPermServices(config);
    const program = new SymModule('main', syntheticSpan());
    const scope = () => LexicalScope.forModules([services.terms.WellKnown.module, program]);

    return {
        services,
        program,
        scope,
        newEnv: () => createTestEnv(services, scope()),
        checkExpression: (ast: AstExpr) => services.checking.Functions.checkExpression(scope(), ast),
        checkFunctionBody: (fn: SymFunction, body: AstExpr) => services.checking.Functions.checkFunctionBody(fn, scope(), body),
    };
}

/** A root environment with its own runtime, for driving engines directly. */
export function createTestEnv(services: PermServices, scope: LexicalScope = LexicalScope.empty()): Env {
    const runtime = new CheckRuntime(new DiagnosticSink(), services.logging.Logger, services.config);
    return Env.root(services, runtime, scope);
}

/** A place variable with a recorded type, as if bound by `let`. */
export function declareLocal(env: Env, name: string, ty: SymTy): SymVariable {
    const variable = new SymVariable(SymGenericKind.Place, name, syntheticSpan());
    env.setVariableTy(variable, ty);
    return variable;
}

export function typeVariable(name: string): SymVariable {
    return new SymVariable(SymGenericKind.Type, name, syntheticSpan());
}

export function placeVariable(name: string): SymVariable {
    return new SymVariable(SymGenericKind.Place, name, syntheticSpan());
}

export function declareClass(module: SymModule, name: string, generics: readonly SymVariable[] = []): SymAggregate {
    const aggregate = new SymAggregate(name, SymAggregateStyle.Class, generics, syntheticSpan());
    module.add(name, aggregate);
    return aggregate;
}

export function declareStruct(module: SymModule, name: string, generics: readonly SymVariable[] = []): SymAggregate {
    const aggregate = new SymAggregate(name, SymAggregateStyle.Struct, generics, syntheticSpan());
    module.add(name, aggregate);
    return aggregate;
}

export interface SignatureOptions {
    /** Generics of the function itself, bound after `outerGenerics` */
    generics?: readonly SymVariable[];
    /** Generics inherited from the owning class */
    outerGenerics?: readonly SymVariable[];
    whereClauses?: ReadonlyArray<readonly [SymVariable, Predicate]>;
}

/**
 * A signature whose input types only mention generics, not other inputs.
 * Each input is `[name, type]`.
 */
export function createSignature(
    inputs: ReadonlyArray<readonly [string, SymTy]>,
    output: SymTy,
    options: SignatureOptions = {},
): SymFunctionSignature {
    const generics = options.generics ?? [];
    const inputVariables = inputs.map(([name]) => new SymVariable(SymGenericKind.Place, name, syntheticSpan()));
    const whereClauses = (options.whereClauses ?? []).map(([variable, predicate]) => ({
        subject: termFromVariable(variable),
        predicate,
        span: syntheticSpan(),
    }));
    return {
        symbols: { genericVariables: generics, inputVariables },
        inputOutput: new Binder([...(options.outerGenerics ?? []), ...generics], new Binder(inputVariables, {
            inputTys: inputs.map(([, ty]) => ty),
            outputTy: output,
            whereClauses,
        })),
    };
}

export function declareFunction(
    module: SymModule,
    name: string,
    inputs: ReadonlyArray<readonly [string, SymTy]>,
    output: SymTy,
    options: SignatureOptions = {},
): SymFunction {
    const fn = new SymFunction(name, syntheticSpan(), false, createSignature(inputs, output, options));
    module.add(name, fn);
    return fn;
}

/** A method of `owner`; `self` is its first input. */
export function declareMethod(
    owner: SymAggregate,
    name: string,
    selfTy: SymTy,
    inputs: ReadonlyArray<readonly [string, SymTy]>,
    output: SymTy,
    generics: readonly SymVariable[] = [],
): SymFunction {
    const signature = createSignature([['self', selfTy], ...inputs], output, { generics, outerGenerics: owner.generics });
    return owner.addFunction(new SymFunction(name, syntheticSpan(), true, signature));
}

/** An associated function of `owner`, called through the type. */
export function declareAssociatedFunction(
    owner: SymAggregate,
    name: string,
    inputs: ReadonlyArray<readonly [string, SymTy]>,
    output: SymTy,
): SymFunction {
    const signature = createSignature(inputs, output, { outerGenerics: owner.generics });
    return owner.addFunction(new SymFunction(name, syntheticSpan(), false, signature));
}

export function diagnosticCodes(diagnostics: readonly CheckDiagnostic[]): string[] {
    return diagnostics.map(diagnostic => diagnostic.code ?? diagnostic.message);
}

/** Asserts the check reported nothing and returns the rendered tree. */
export function expectValid(result: CheckResult): string {
    expect(result.diagnostics.map(diagnostic => diagnostic.toString())).toEqual([]);
    return symExprToString(result.expr);
}

export function exprTy(expr: SymExpr): string {
    return expr.ty.toString();
}
