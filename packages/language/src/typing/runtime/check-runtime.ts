/**
 * Cooperative scheduler for one checking session.
 *
 * Checking steps are promises. A step that needs to know more about an
 * inference variable parks itself on that variable and is woken whenever the
 * variable's state changes. Obligations are spawned as independent tasks.
 *
 * {@link CheckRuntime.drive} runs the session to completion. Whenever every
 * task is parked it first applies pending defaults (integer literals), then
 * settles the longest-waiting task, telling it that nothing more will be
 * learned about its variable.
 */

import { Deferred, delayNextTick } from 'langium';
import type { Span } from '../../ast/unchecked-ast.js';
import type { CheckerConfig } from '../../config/checker-config.js';
import type { CheckLogger } from '../../logging/check-logger.js';
import type { OrElse } from '../or-else.js';
import type { Predicate } from '../predicates/predicate.js';
import { DiagnosticSink, InvariantViolation, Reported } from '../report.js';
import type { InferVarIndex } from '../terms/sym-terms.js';
import type { SymGenericKind, SymVariable } from '../terms/symbols.js';
import { Universe } from '../universe.js';
import { InferBound, InferVarData } from './infer-var.js';

/** Why a parked task was resumed. */
export type WakeReason = 'changed' | 'settled';

/** A speculative test; once abandoned, nobody waits for its answer. */
export interface Speculation {
    readonly abandoned: boolean;
}

interface ParkedTask {
    readonly infer: InferVarIndex;
    readonly wake: Deferred<WakeReason>;
    readonly speculation: Speculation | undefined;
}

export class CheckRuntime {
    private readonly inferVars: InferVarData[] = [];
    private readonly running = new Set<Promise<void>>();
    private readonly parked = new Set<ParkedTask>();
    private readonly universes = new Map<SymVariable, Universe>();
    private readonly failures: unknown[] = [];
    private settleRounds = 0;

    constructor(
        readonly sink: DiagnosticSink,
        private readonly logger: CheckLogger,
        private readonly config: CheckerConfig,
    ) { }

    // ========================================================================
    // Inference variables
    // ========================================================================

    freshInferVar(kind: SymGenericKind, span: Span, universe: Universe): InferVarIndex {
        const index = this.inferVars.length;
        this.inferVars.push(new InferVarData(index, kind, span, universe));
        this.logger.log(0, `fresh ${kind} inference variable`, index, universe);
        return index;
    }

    inferVar(index: InferVarIndex): InferVarData {
        const data = this.inferVars[index];
        if (data === undefined) {
            throw new InvariantViolation(`no inference variable ${index} in this session`);
        }
        return data;
    }

    declareUniversal(variable: SymVariable, universe: Universe): void {
        this.universes.set(variable, universe);
    }

    /** Variables never opened in this session (e.g. from another signature) belong to the root. */
    universeOf(variable: SymVariable): Universe {
        return this.universes.get(variable) ?? Universe.ROOT;
    }

    setLowerBound(index: InferVarIndex, bound: InferBound): void {
        const data = this.inferVar(index);
        if (data.lowerBound !== undefined) {
            throw new InvariantViolation(`inference variable ${index} already has a lower bound`);
        }
        data.lowerBound = bound;
        this.logger.log(0, 'lower bound', data);
        this.notify(index);
    }

    /** Returns false when an identical upper bound was already recorded. */
    addUpperBound(index: InferVarIndex, bound: InferBound): boolean {
        const data = this.inferVar(index);
        if (data.upperBounds.some(existing => existing.term === bound.term)) {
            return false;
        }
        data.upperBounds.push(bound);
        this.notify(index);
        return true;
    }

    /** Records `lower <: upper` between two variables. Returns false when already known. */
    addEdge(lower: InferVarIndex, upper: InferVarIndex): boolean {
        const lowerData = this.inferVar(lower);
        if (lowerData.successors.has(upper)) {
            return false;
        }
        lowerData.successors.add(upper);
        this.inferVar(upper).predecessors.add(lower);
        this.notify(lower);
        this.notify(upper);
        return true;
    }

    /** Returns false when the fact was already required. */
    addFact(index: InferVarIndex, predicate: Predicate, orElse: OrElse): boolean {
        const data = this.inferVar(index);
        if (data.facts.has(predicate)) {
            return false;
        }
        data.facts.set(predicate, orElse);
        this.notify(index);
        return true;
    }

    exclude(index: InferVarIndex, predicate: Predicate): void {
        const data = this.inferVar(index);
        if (!data.excluded.has(predicate)) {
            data.excluded.add(predicate);
            this.notify(index);
        }
    }

    setFallback(index: InferVarIndex, fallback: () => void): void {
        const data = this.inferVar(index);
        if (data.fallback === undefined) {
            data.fallback = fallback;
        }
    }

    // ========================================================================
    // Scheduling
    // ========================================================================

    /**
     * Starts `task` on a later turn. Its failure is recorded, not propagated:
     * a {@link Reported} failure is already in the sink, anything else aborts
     * the session from {@link drive}.
     */
    spawn(description: string, task: () => Promise<void>): void {
        const promise: Promise<void> = Promise.resolve()
            .then(task)
            .catch((error: unknown) => {
                if (error instanceof Reported) {
                    this.logger.log(0, `${description} failed:`, error.message);
                } else {
                    this.failures.push(error);
                }
            })
            .finally(() => this.running.delete(promise));
        this.running.add(promise);
    }

    /** Parks until the variable changes or the runtime settles it. */
    waitForChange(infer: InferVarIndex, speculation?: Speculation): Promise<WakeReason> {
        const task: ParkedTask = { infer, wake: new Deferred<WakeReason>(), speculation };
        this.parked.add(task);
        return task.wake.promise;
    }

    /**
     * Applies `op` to the variable until it yields a value, parking between
     * attempts. After the variable is settled `op` gets one last try and its
     * answer, possibly `undefined`, is final.
     */
    async loopOnInferenceVar<T>(
        infer: InferVarIndex,
        op: (data: InferVarData) => T | undefined,
        speculation?: Speculation,
    ): Promise<T | undefined> {
        for (;;) {
            const value = op(this.inferVar(infer));
            if (value !== undefined) {
                return value;
            }
            if (await this.waitForChange(infer, speculation) === 'settled') {
                return op(this.inferVar(infer));
            }
        }
    }

    private notify(infer: InferVarIndex): void {
        for (const task of this.parked) {
            if (task.infer === infer) {
                this.parked.delete(task);
                task.wake.resolve('changed');
            }
        }
    }

    /** Runs every spawned task to completion. */
    async drive(): Promise<void> {
        for (;;) {
            await delayNextTick();
            if (this.failures.length > 0) {
                throw this.failures[0];
            }
            if (this.running.size === 0) {
                return;
            }
            if (this.applyFallback()) {
                continue;
            }
            this.settleOldest();
        }
    }

    private applyFallback(): boolean {
        for (const data of this.inferVars) {
            const fallback = data.fallback;
            if (fallback === undefined) {
                continue;
            }
            data.fallback = undefined;
            if (data.lowerBound === undefined) {
                this.logger.log(0, 'applying default for', data);
                fallback();
                return true;
            }
        }
        return false;
    }

    private settleOldest(): void {
        for (const task of this.parked) {
            if (task.speculation?.abandoned) {
                // left pending: its test's outcome is no longer awaited
                this.parked.delete(task);
                this.logger.log(0, 'dropping abandoned waiter on', this.inferVar(task.infer));
            }
        }
        const [oldest] = this.parked;
        if (oldest === undefined) {
            throw new InvariantViolation(`${this.running.size} checking task(s) stalled without waiting on an inference variable`);
        }
        if (++this.settleRounds > this.config.maxSettleRounds) {
            throw new InvariantViolation(`gave up after settling ${this.config.maxSettleRounds} inference variables`);
        }
        this.parked.delete(oldest);
        this.logger.log(0, 'settling', this.inferVar(oldest.infer));
        oldest.wake.resolve('settled');
    }
}
