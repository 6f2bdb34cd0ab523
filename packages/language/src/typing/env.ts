import { MultiMap } from 'langium';
import type { Span } from '../ast/unchecked-ast.js';
import type { PermServices } from '../perm-module.js';
import type { LexicalScope } from './checker/name-resolution.js';
import type { OrElse } from './or-else.js';
import type { Predicate } from './predicates/predicate.js';
import { CheckDiagnostic, InvariantViolation, Reported, Reporter } from './report.js';
import type { CheckRuntime, Speculation } from './runtime/check-runtime.js';
import type { InferVarData } from './runtime/infer-var.js';
import { InferVarIndex, SymGenericTerm, SymPerm, SymTy, termFromInfer } from './terms/sym-terms.js';
import { SymGenericKind, SymVariable, SymWhereClause } from './terms/symbols.js';
import { Universe } from './universe.js';

/**
 * The environment a checking step runs in.
 *
 * Environments are immutable values: entering a scope or a universe creates a
 * new one. The runtime, the table of program variable types and the
 * diagnostic sink are shared by every environment of a session.
 */
export class Env implements Reporter {
    private constructor(
        readonly services: PermServices,
        readonly runtime: CheckRuntime,
        readonly scope: LexicalScope,
        readonly universe: Universe,
        /** Declared return type of the enclosing function, if any */
        readonly returnTy: SymTy | undefined,
        private readonly variableTys: Map<SymVariable, SymTy>,
        private readonly assumptions: MultiMap<SymVariable, Predicate>,
        readonly depth: number,
        /** Set while answering a speculative test that may be abandoned */
        private readonly speculation: Speculation | undefined,
    ) { }

    static root(services: PermServices, runtime: CheckRuntime, scope: LexicalScope): Env {
        return new Env(services, runtime, scope, Universe.ROOT, undefined, new Map(), new MultiMap(), 0, undefined);
    }

    /** A copy for a concurrently checked sub-expression. */
    fork(): Env {
        return new Env(this.services, this.runtime, this.scope, this.universe, this.returnTy, this.variableTys, this.assumptions, this.depth + 1, this.speculation);
    }

    withScope(scope: LexicalScope): Env {
        return new Env(this.services, this.runtime, scope, this.universe, this.returnTy, this.variableTys, this.assumptions, this.depth, this.speculation);
    }

    withReturnTy(returnTy: SymTy): Env {
        return new Env(this.services, this.runtime, this.scope, this.universe, returnTy, this.variableTys, this.assumptions, this.depth, this.speculation);
    }

    speculating(speculation: Speculation): Env {
        return new Env(this.services, this.runtime, this.scope, this.universe, this.returnTy, this.variableTys, this.assumptions, this.depth, speculation);
    }

    /** Brings a program variable into scope under `name`. */
    withLocal(name: string, variable: SymVariable, ty: SymTy): Env {
        this.setVariableTy(variable, ty);
        return this.withScope(this.scope.withEntry(name, { $type: 'Variable', variable }));
    }

    /**
     * Enters a fresh universe in which `variables` are universally bound,
     * assuming the given where-clauses about them.
     */
    openUniversally(variables: readonly SymVariable[], whereClauses: readonly SymWhereClause[] = []): Env {
        const universe = this.universe.next();
        for (const variable of variables) {
            this.runtime.declareUniversal(variable, universe);
        }
        const assumptions = new MultiMap<SymVariable, Predicate>([...this.assumptions.entries()]);
        for (const clause of whereClauses) {
            const subject = clause.subject;
            if (subject instanceof SymTy && subject.kind.$type === 'Var') {
                assumptions.add(subject.kind.variable, clause.predicate);
            } else if (subject instanceof SymPerm && subject.kind.$type === 'Var') {
                assumptions.add(subject.kind.variable, clause.predicate);
            }
        }
        return new Env(this.services, this.runtime, this.scope, universe, this.returnTy, this.variableTys, assumptions, this.depth, this.speculation);
    }

    assumes(variable: SymVariable, predicate: Predicate): boolean {
        return this.assumptions.get(variable).includes(predicate);
    }

    // ========================================================================
    // Inference variables
    // ========================================================================

    /** See {@link CheckRuntime.loopOnInferenceVar}. */
    loopOnInferenceVar<T>(infer: InferVarIndex, op: (data: InferVarData) => T | undefined): Promise<T | undefined> {
        return this.runtime.loopOnInferenceVar(infer, op, this.speculation);
    }

    freshInferVar(kind: SymGenericKind, span: Span): InferVarIndex {
        return this.runtime.freshInferVar(kind, span, this.universe);
    }

    freshInferenceTerm(kind: SymGenericKind, span: Span): SymGenericTerm {
        return termFromInfer(kind, this.freshInferVar(kind, span));
    }

    freshTyInferenceVar(span: Span): SymTy {
        return SymTy.infer(this.freshInferVar(SymGenericKind.Type, span));
    }

    freshPermInferenceVar(span: Span): SymPerm {
        return SymPerm.infer(this.freshInferVar(SymGenericKind.Perm, span));
    }

    /** One fresh inference variable per binder variable, of matching kind. */
    existentialSubstitution(span: Span, variables: readonly SymVariable[]): SymGenericTerm[] {
        return variables.map(variable => this.freshInferenceTerm(variable.kind, span));
    }

    // ========================================================================
    // Program variables
    // ========================================================================

    variableTy(variable: SymVariable): SymTy {
        const ty = this.variableTys.get(variable);
        if (ty === undefined) {
            throw new InvariantViolation(`no type recorded for variable \`${variable}\``);
        }
        return ty;
    }

    setVariableTy(variable: SymVariable, ty: SymTy): void {
        this.variableTys.set(variable, ty);
    }

    // ========================================================================
    // Reporting and logging
    // ========================================================================

    report(diagnostic: CheckDiagnostic): Reported {
        this.log('report', diagnostic.message);
        return this.runtime.sink.report(diagnostic);
    }

    log(message: string, ...values: unknown[]): void {
        this.services.logging.Logger.log(this.depth, message, ...values);
    }

    async indent<T>(task: string, values: readonly unknown[], body: (env: Env) => Promise<T>): Promise<T> {
        const logger = this.services.logging.Logger;
        logger.enter(this.depth, task, ...values);
        const result = await body(this.fork());
        logger.leave(this.depth, task, result);
        return result;
    }

    // ========================================================================
    // Spawned obligations
    // ========================================================================

    spawn(description: string, task: (env: Env) => Promise<void>): void {
        const env = this.fork();
        this.runtime.spawn(description, () => task(env));
    }

    spawnRequireAssignableType(value: SymTy, target: SymTy, orElse: OrElse): void {
        this.spawn('require assignable', env => env.services.subtyping.Subtyping.requireAssignableType(env, value, target, orElse));
    }

    spawnRequireEqualTypes(a: SymTy, b: SymTy, orElse: OrElse): void {
        this.spawn('require equal types', env => env.services.subtyping.Subtyping.requireEqualTypes(env, a, b, orElse));
    }

    spawnRequireNumericType(ty: SymTy, orElse: OrElse): void {
        this.spawn('require numeric', env => env.services.subtyping.Numerics.requireNumericType(env, ty, orElse));
    }

    spawnRequireFutureType(ty: SymTy, awaitedTy: SymTy, orElse: OrElse): void {
        this.spawn('require future', env => env.services.subtyping.Futures.requireFutureType(env, ty, awaitedTy, orElse));
    }

    spawnRequireWhereClause(clause: SymWhereClause, orElse: OrElse): void {
        this.spawn('require where-clause', env => env.services.predicates.Predicates.require(env, clause.subject, clause.predicate, orElse));
    }

    /** Spawns `task` unless one of `tys` is already known to be `!`. */
    spawnIfNotNever(tys: readonly SymTy[], description: string, task: (env: Env) => Promise<void>): void {
        if (tys.some(ty => ty.isNever)) {
            return;
        }
        this.spawn(description, task);
    }
}
