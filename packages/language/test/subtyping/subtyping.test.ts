import { beforeEach, describe, expect, test } from "vitest";
import {
    Alternative, AwaitNonFuture, BadSubtypeError, Env, NumericTypeExpected, PermServices, Reported, spanAt, subChains,
    SymField, SymPerm, SymPlace, SymTy, syntheticSpan
} from "../../src/index.js";
import { declareLocal, declareStruct, setupChecker, typeVariable } from "../test-utils.js";

async function rejection(promise: Promise<void>): Promise<Reported> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof Reported) return error;
        throw error;
    }
    throw new Error('expected the obligation to fail');
}

describe('Subtyping', () => {
    let services: PermServices;
    let env: Env;
    let stringTy: SymTy;

    beforeEach(() => {
        const checker = setupChecker();
        services = checker.services;
        env = checker.newEnv();
        stringTy = services.terms.WellKnown.stringTy();
    });

    const sub = (lower: SymTy, upper: SymTy, span = syntheticSpan()) =>
        services.subtyping.Subtyping.requireSubTys(env, lower, upper, new BadSubtypeError(span, lower, upper));

    describe('permission chains', () => {
        let x: SymPlace;
        let xFirst: SymPlace;
        const chain = (perm: SymPerm) => services.subtyping.RedTys.chainOf(perm);

        beforeEach(() => {
            const pair = declareStruct(setupChecker().program, 'Pair', [typeVariable('A')]);
            const first: SymField = pair.addField('first', SymTy.u32(), syntheticSpan());
            x = SymPlace.var(declareLocal(env, 'x', SymTy.aggregate(pair, [SymTy.u32()])));
            xFirst = SymPlace.field(x, first);
        });

        test('should make my a subpermission of plain copy permissions', () => {
            expect(subChains(chain(SymPerm.my()), chain(SymPerm.our()))).toBe(true);
            expect(subChains(chain(SymPerm.my()), chain(SymPerm.shared([x])))).toBe(true);
            expect(subChains(chain(SymPerm.my()), chain(SymPerm.leased([x])))).toBe(false);
            expect(subChains(chain(SymPerm.our()), chain(SymPerm.my()))).toBe(false);
        });

        test('should make our a subpermission of shared', () => {
            expect(subChains(chain(SymPerm.our()), chain(SymPerm.shared([x])))).toBe(true);
            expect(subChains(chain(SymPerm.shared([x])), chain(SymPerm.our()))).toBe(false);
        });

        test('should compare places by coverage', () => {
            expect(subChains(chain(SymPerm.leased([xFirst])), chain(SymPerm.leased([x])))).toBe(true);
            expect(subChains(chain(SymPerm.leased([x])), chain(SymPerm.leased([xFirst])))).toBe(false);
            expect(subChains(chain(SymPerm.shared([x])), chain(SymPerm.leased([x])))).toBe(false);
        });

        test('should let shared replace what comes before it', () => {
            const applied = SymPerm.apply(SymPerm.leased([x]), SymPerm.shared([xFirst]));
            expect(chain(applied)).toEqual([{ $type: 'Shared', places: [xFirst] }]);
        });
    });

    describe('types', () => {
        test('should accept a type that only differs by a weaker permission', async () => {
            await sub(stringTy, SymTy.perm(SymPerm.our(), stringTy));
            await sub(SymTy.never(), stringTy);
            expect(env.runtime.sink.diagnostics).toEqual([]);
        });

        test('should report different names', async () => {
            const reported = await rejection(sub(SymTy.u32(), SymTy.boolean()));
            expect(reported.diagnostic.code).toBe('PCE050');
            expect(reported.diagnostic.message).toBe('expected `bool`, found `u32`');
            expect(reported.diagnostic.because).toEqual(['`u32` and `bool` are different types']);
        });

        test('should report a stronger permission expected than given', async () => {
            const reported = await rejection(sub(SymTy.perm(SymPerm.our(), stringTy), stringTy));
            expect(reported.diagnostic.code).toBe('PCE057');
            expect(reported.diagnostic.because).toEqual(['the permission `our` is not a subpermission of `my`']);
        });

        test('should relate generic arguments', async () => {
            const reported = await rejection(sub(SymTy.future(SymTy.u8()), SymTy.future(SymTy.u32())));
            expect(reported.diagnostic.message).toBe('expected `Future[u32]`, found `Future[u8]`');
            expect(reported.diagnostic.because).toEqual(['`u8` and `u32` are different types']);
        });
    });

    describe('inference variables', () => {
        test('should record the first lower bound', async () => {
            const infer = env.freshTyInferenceVar(syntheticSpan());
            await sub(SymTy.u32(), infer);
            expect(env.runtime.inferVar(0).lowerBound?.term).toBe(SymTy.u32());
        });

        test('should check later upper bounds against the lower bound', async () => {
            const infer = env.freshTyInferenceVar(syntheticSpan());
            await sub(SymTy.u32(), infer, spanAt(4, 2, 5));
            const reported = await rejection(sub(infer, SymTy.boolean()));
            expect(reported.diagnostic.message).toBe('expected `bool`, found `?T0`');
            expect(reported.diagnostic.code).toBe('PCE050');
            expect(reported.diagnostic.because).toEqual([
                'the inferred lower bound is `u32` (inferred at 5:3)',
                '`u32` and `bool` are different types',
            ]);
        });

        test('should propagate lower bounds along edges', async () => {
            const lower = env.freshTyInferenceVar(syntheticSpan());
            const upper = env.freshTyInferenceVar(syntheticSpan());
            await sub(lower, upper);
            await sub(SymTy.u8(), lower);
            expect(env.runtime.inferVar(1).lowerBound?.term).toBe(SymTy.u8());
            expect([...env.runtime.inferVar(0).successors]).toEqual([1]);
        });

        test('should keep universal variables out of outer inference variables', async () => {
            const infer = env.freshTyInferenceVar(syntheticSpan());
            const element = typeVariable('T');
            env = env.openUniversally([element]);
            const reported = await rejection(sub(SymTy.var(element), infer));
            expect(reported.diagnostic.code).toBe('PCE059');
            expect(reported.diagnostic.because).toEqual([
                'the generic variable `T` is not in scope where the inference variable was created',
            ]);
        });

        test('should relate chains mixing inference variables by their predicates', async () => {
            const perm = env.freshPermInferenceVar(syntheticSpan());
            const lower = SymTy.perm(SymPerm.apply(SymPerm.our(), perm), stringTy);
            const upper = SymTy.perm(SymPerm.our(), stringTy);
            env.spawnRequireAssignableType(lower, upper, new BadSubtypeError(syntheticSpan(), lower, upper));
            await env.runtime.drive();
            expect(env.runtime.sink.diagnostics).toEqual([]);
        });
    });

    describe('numerics', () => {
        test('should accept numeric primitives and reject others', async () => {
            const numerics = services.subtyping.Numerics;
            await numerics.requireNumericType(env, SymTy.perm(SymPerm.our(), SymTy.u32()), new NumericTypeExpected(syntheticSpan(), SymTy.u32()));
            const reported = await rejection(
                numerics.requireNumericType(env, SymTy.boolean(), new NumericTypeExpected(syntheticSpan(), SymTy.boolean())));
            expect(reported.diagnostic.code).toBe('PCE053');
            expect(reported.diagnostic.message).toBe('expected a numeric type, found `bool`');
        });

        test('should default an unconstrained numeric variable to the configured integer type', async () => {
            const infer = env.freshTyInferenceVar(syntheticSpan());
            env.spawnRequireNumericType(infer, new NumericTypeExpected(syntheticSpan(), infer));
            await env.runtime.drive();
            expect(env.runtime.inferVar(0).lowerBound?.term.toString()).toBe('i32');
            expect(env.runtime.sink.diagnostics).toEqual([]);
        });

        test('should default to the head of the first upper bound', async () => {
            const infer = env.freshTyInferenceVar(syntheticSpan());
            await sub(infer, SymTy.u8());
            env.spawnRequireNumericType(infer, new NumericTypeExpected(syntheticSpan(), infer));
            await env.runtime.drive();
            expect(env.runtime.inferVar(0).lowerBound?.term.toString()).toBe('u8');
            expect(env.runtime.sink.diagnostics).toEqual([]);
        });

        test('should honour a configured default', async () => {
            const checker = setupChecker({ defaultIntegerType: 'u64' });
            const localEnv = checker.newEnv();
            const infer = localEnv.freshTyInferenceVar(syntheticSpan());
            localEnv.spawnRequireNumericType(infer, new NumericTypeExpected(syntheticSpan(), infer));
            await localEnv.runtime.drive();
            expect(localEnv.runtime.inferVar(0).lowerBound?.term.toString()).toBe('u64');
        });
    });

    describe('futures', () => {
        test('should relate the awaited type', async () => {
            const futures = services.subtyping.Futures;
            const future = SymTy.future(SymTy.u32());
            await futures.requireFutureType(env, future, SymTy.u32(), new AwaitNonFuture(syntheticSpan(), syntheticSpan(), future));
            const reported = await rejection(
                futures.requireFutureType(env, SymTy.u32(), SymTy.u32(), new AwaitNonFuture(syntheticSpan(), syntheticSpan(), SymTy.u32())));
            expect(reported.diagnostic.code).toBe('PCE056');
            expect(reported.diagnostic.message).toBe('`await` requires a future, found `u32`');
        });

        test('should wait for the lower bound of an inferred future', async () => {
            const infer = env.freshTyInferenceVar(syntheticSpan());
            const awaited = env.freshTyInferenceVar(syntheticSpan());
            env.spawnRequireFutureType(infer, awaited, new AwaitNonFuture(syntheticSpan(), syntheticSpan(), infer));
            env.spawn('bound the future', async env => {
                await services.subtyping.Subtyping.requireSubTys(env, SymTy.future(SymTy.boolean()), infer,
                    new BadSubtypeError(syntheticSpan(), SymTy.future(SymTy.boolean()), infer));
            });
            await env.runtime.drive();
            expect(env.runtime.inferVar(1).lowerBound?.term).toBe(SymTy.boolean());
            expect(env.runtime.sink.diagnostics).toEqual([]);
        });
    });

    describe('alternatives', () => {
        test('should require the only live child', () => {
            const root = Alternative.root();
            const [first, second] = root.spawnChildren(2);
            expect(first.isRequired).toBe(false);
            second.release();
            expect(first.isRequired).toBe(true);
            first.conclude();
            expect(first.isRequired).toBe(false);
        });

        test('should switch to the requirement once siblings are released', async () => {
            const [first, second] = Alternative.root().spawnChildren(2);
            let required = false;
            const outcome = first.ifRequired(
                async () => { required = true; },
                () => new Promise<boolean>(() => undefined),
            );
            second.release();
            expect(await outcome).toBe(true);
            expect(required).toBe(true);
        });

        test('should not spend settle rounds on abandoned tests', async () => {
            const checker = setupChecker({ maxSettleRounds: 1 });
            const localEnv = checker.newEnv();
            const copy = checker.services.predicates.Copy;
            const speculated = localEnv.freshTyInferenceVar(syntheticSpan());
            const awaited = localEnv.freshTyInferenceVar(syntheticSpan());

            const [first, second] = Alternative.root().spawnChildren(2);
            const outcome = first.ifRequired(
                async () => undefined,
                speculation => copy.isProvablyCopy(localEnv.speculating(speculation), speculated),
            );
            second.release();
            expect(await outcome).toBe(true);

            let answer: boolean | undefined;
            localEnv.spawn('wait for a copy answer', async env => {
                answer = await copy.isProvablyCopy(env, awaited);
            });
            await localEnv.runtime.drive();
            expect(answer).toBe(false);
        });
    });
});
