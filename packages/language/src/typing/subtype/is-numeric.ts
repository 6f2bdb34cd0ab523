import type { PermServices } from '../../perm-module.js';
import type { CheckerConfig } from '../../config/checker-config.js';
import type { Env } from '../env.js';
import { becauseOfLowerBound, JUST_SO, OrElse } from '../or-else.js';
import { InvariantViolation } from '../report.js';
import { InferVarIndex, SymTy } from '../terms/sym-terms.js';
import type { RedTys } from './red-ty.js';
import type { PermSubtyping } from './subtyping.js';

/**
 * Numeric obligations. Numeric types have no subtypes, so checking the
 * current lower bound of an inference variable is enough.
 *
 * A variable that is required to be numeric gets a default: when nothing
 * else bounds it from below, the runtime makes it the head of its first
 * upper bound, or the configured default integer type.
 */
export class Numerics {
    private readonly config: CheckerConfig;
    private readonly redTys: () => RedTys;
    private readonly subtyping: () => PermSubtyping;

    constructor(services: PermServices) {
        this.config = services.config;
        this.redTys = () => services.subtyping.RedTys;
        this.subtyping = () => services.subtyping.Subtyping;
    }

    /** Numeric heads are copy, so the permissions around them never matter. */
    async requireNumericType(env: Env, ty: SymTy, orElse: OrElse): Promise<void> {
        const redTy = this.redTys().toRedTy(ty).kind;
        switch (redTy.$type) {
            case 'Error':
                throw redTy.reported;
            case 'Never':
                return;
            case 'Var':
                throw orElse.report(env, JUST_SO);
            case 'Named':
                if (redTy.name.$type === 'Primitive' && redTy.name.primitive.isNumeric) {
                    return;
                }
                throw orElse.report(env, JUST_SO);
            case 'Infer': {
                this.setNumericDefault(env, redTy.infer, orElse);
                const bound = await env.loopOnInferenceVar(redTy.infer, data => data.lowerBound);
                if (bound === undefined) {
                    throw orElse.report(env, { $type: 'UnconstrainedInfer', span: env.runtime.inferVar(redTy.infer).span });
                }
                if (!(bound.term instanceof SymTy)) {
                    throw new InvariantViolation(`type inference variable bounded by permission \`${bound.term}\``);
                }
                return this.requireNumericType(env, bound.term, becauseOfLowerBound(orElse, bound.term, bound.orElse));
            }
        }
    }

    private setNumericDefault(env: Env, infer: InferVarIndex, orElse: OrElse): void {
        env.runtime.setFallback(infer, () => {
            const defaultTy = this.defaultTy(env, infer);
            env.log('numeric default', SymTy.infer(infer), defaultTy);
            env.spawn('numeric default', env => this.subtyping().requireSubTys(env, defaultTy, SymTy.infer(infer), orElse));
        });
    }

    private defaultTy(env: Env, infer: InferVarIndex): SymTy {
        for (const bound of env.runtime.inferVar(infer).upperBounds) {
            if (bound.term instanceof SymTy) {
                const head = this.redTys().toRedTy(bound.term).kind;
                if (head.$type === 'Named') {
                    return SymTy.named(head.name, head.generics);
                }
            }
        }
        return SymTy.primitive(this.config.defaultIntegerType);
    }
}
