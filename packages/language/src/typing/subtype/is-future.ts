import type { PermServices } from '../../perm-module.js';
import type { Env } from '../env.js';
import { becauseOfLowerBound, JUST_SO, OrElse } from '../or-else.js';
import { InvariantViolation } from '../report.js';
import { expectTy } from '../terms/substitution.js';
import { SymTy } from '../terms/sym-terms.js';
import type { RedTyKind, RedTys } from './red-ty.js';
import type { PermSubtyping } from './subtyping.js';

export class Futures {
    private readonly redTys: () => RedTys;
    private readonly subtyping: () => PermSubtyping;

    constructor(services: PermServices) {
        this.redTys = () => services.subtyping.RedTys;
        this.subtyping = () => services.subtyping.Subtyping;
    }

    /** Requires `ty` to be a future whose result is assignable to `awaitedTy`. */
    async requireFutureType(env: Env, ty: SymTy, awaitedTy: SymTy, orElse: OrElse): Promise<void> {
        await this.requireFutureRedTy(env, this.redTys().toRedTy(ty).kind, awaitedTy, orElse);
    }

    private async requireFutureRedTy(env: Env, redTy: RedTyKind, awaitedTy: SymTy, orElse: OrElse): Promise<void> {
        switch (redTy.$type) {
            case 'Error':
                throw redTy.reported;
            case 'Named': {
                if (redTy.name.$type !== 'Future') {
                    throw orElse.report(env, JUST_SO);
                }
                const [result] = redTy.generics;
                return this.subtyping().requireSubTys(env, expectTy(result), awaitedTy, orElse);
            }
            case 'Var':
            case 'Never':
                throw orElse.report(env, JUST_SO);
            case 'Infer': {
                // bounds only tighten, so the current lower bound decides
                const bound = await env.loopOnInferenceVar(redTy.infer, data => data.lowerBound);
                if (bound === undefined) {
                    throw orElse.report(env, { $type: 'UnconstrainedInfer', span: env.runtime.inferVar(redTy.infer).span });
                }
                if (!(bound.term instanceof SymTy)) {
                    throw new InvariantViolation(`type inference variable bounded by permission \`${bound.term}\``);
                }
                return this.requireFutureRedTy(
                    env,
                    this.redTys().toRedTy(bound.term).kind,
                    awaitedTy,
                    becauseOfLowerBound(orElse, bound.term, bound.orElse),
                );
            }
        }
    }
}
