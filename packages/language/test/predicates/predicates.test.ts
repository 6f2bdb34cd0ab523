import { beforeEach, describe, expect, test } from "vitest";
import {
    Env, PermServices, Predicate, PredicateRequired, Reported, SymAggregate, SymPerm, SymPlace, SymTy, syntheticSpan,
    termFromVariable
} from "../../src/index.js";
import { declareLocal, declareStruct, setupChecker, typeVariable } from "../test-utils.js";

async function rejection(promise: Promise<void>): Promise<Reported> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof Reported) return error;
        throw error;
    }
    throw new Error('expected the requirement to fail');
}

describe('Permission predicates', () => {
    let services: PermServices;
    let env: Env;
    let stringTy: SymTy;
    let pair: SymAggregate;

    beforeEach(() => {
        const checker = setupChecker();
        services = checker.services;
        env = checker.newEnv();
        stringTy = services.terms.WellKnown.stringTy();
        pair = declareStruct(checker.program, 'Pair', [typeVariable('A'), typeVariable('B')]);
    });

    const isCopy = (ty: SymTy | SymPerm) => services.predicates.Copy.isProvablyCopy(env, ty);
    const isMove = (ty: SymTy | SymPerm) => services.predicates.Move.isProvablyMove(env, ty);

    describe('Copy', () => {
        test('should treat primitives as copy and classes as not copy', async () => {
            expect(await isCopy(SymTy.u32())).toBe(true);
            expect(await isCopy(stringTy)).toBe(false);
            expect(await services.predicates.Copy.isntProvablyCopy(env, stringTy)).toBe(true);
        });

        test('should make a struct copy when one generic argument is', async () => {
            expect(await isCopy(SymTy.aggregate(pair, [stringTy, SymTy.u8()]))).toBe(true);
            expect(await isCopy(SymTy.aggregate(pair, [stringTy, stringTy]))).toBe(false);
            expect(await isCopy(SymTy.tuple([]))).toBe(false);
        });

        test('should make a permission application copy when either side is', async () => {
            expect(await isCopy(SymTy.perm(SymPerm.our(), stringTy))).toBe(true);
            expect(await isCopy(SymTy.perm(SymPerm.my(), stringTy))).toBe(false);
            expect(await isCopy(SymPerm.apply(SymPerm.my(), SymPerm.our()))).toBe(true);
        });

        test('should make a lease copy only when the leased places are copy', async () => {
            const count = declareLocal(env, 'count', SymTy.u32());
            const name = declareLocal(env, 'name', stringTy);
            expect(await isCopy(SymPerm.leased([SymPlace.var(count)]))).toBe(true);
            expect(await isCopy(SymPerm.leased([SymPlace.var(name)]))).toBe(false);
            expect(await services.predicates.Copy.isntProvablyCopy(env, SymPerm.leased([SymPlace.var(name)]))).toBe(true);
        });

        test('should consider never copy', async () => {
            expect(await isCopy(SymTy.never())).toBe(true);
        });

        test('should explain why a class is not copy', async () => {
            const orElse = new PredicateRequired(syntheticSpan(), stringTy, Predicate.Copy);
            const reported = await rejection(services.predicates.Copy.requireCopy(env, stringTy, orElse));
            expect(reported.diagnostic.code).toBe('PCE080');
            expect(reported.diagnostic.message).toBe('`String` is not copy');
            expect(reported.diagnostic.because).toEqual(['`String` is not copy']);
            expect(env.runtime.sink.diagnostics).toHaveLength(1);
        });

        test('should refuse to require never to be copy', async () => {
            const orElse = new PredicateRequired(syntheticSpan(), SymTy.never(), Predicate.Copy);
            const reported = await rejection(services.predicates.Copy.requireCopy(env, SymTy.never(), orElse));
            expect(reported.diagnostic.because).toEqual(['the never type `!` is not copy']);
        });
    });

    describe('Move', () => {
        test('should treat classes as move and primitives as not move', async () => {
            expect(await isMove(stringTy)).toBe(true);
            expect(await isMove(SymTy.u32())).toBe(false);
            expect(await isMove(SymTy.future(SymTy.u32()))).toBe(true);
        });

        test('should require both sides of an application to be move', async () => {
            expect(await isMove(SymTy.perm(SymPerm.my(), stringTy))).toBe(true);
            expect(await isMove(SymTy.perm(SymPerm.our(), stringTy))).toBe(false);
        });

        test('should neither prove nor refute that never is move', async () => {
            expect(await isMove(SymTy.never())).toBe(false);
            expect(await services.predicates.Move.isntProvablyMove(env, SymTy.never())).toBe(false);
        });

        test('should accept requiring never to be move', async () => {
            const orElse = new PredicateRequired(syntheticSpan(), SymTy.never(), Predicate.Move);
            await services.predicates.Move.requireMove(env, SymTy.never(), orElse);
            expect(env.runtime.sink.diagnostics).toEqual([]);
        });

        test('should explain why a primitive is not move', async () => {
            const orElse = new PredicateRequired(syntheticSpan(), SymTy.u32(), Predicate.Move);
            const reported = await rejection(services.predicates.Move.requireMove(env, SymTy.u32(), orElse));
            expect(reported.diagnostic.code).toBe('PCE081');
            expect(reported.diagnostic.message).toBe('`u32` is not move');
            expect(reported.diagnostic.because).toEqual(['the primitive type `u32` is copy']);
        });

        test('should explain why a lease of a copy place is not move', async () => {
            const count = declareLocal(env, 'count', SymTy.u32());
            const lease = SymPerm.leased([SymPlace.var(count)]);
            const orElse = new PredicateRequired(syntheticSpan(), lease, Predicate.Move);
            const reported = await rejection(services.predicates.Move.requireMove(env, lease, orElse));
            expect(reported.diagnostic.because).toEqual(['leasing from copy places (count) yields a copy permission']);
        });
    });

    describe('Copy and Move together', () => {
        test('should let a struct be both copy and move through different arguments', async () => {
            const mixed = SymTy.aggregate(pair, [stringTy, SymTy.u8()]);
            expect(await isCopy(mixed)).toBe(true);
            expect(await isMove(mixed)).toBe(true);
        });

        test('should require every leased place to be copy', async () => {
            const count = declareLocal(env, 'count', SymTy.u32());
            const name = declareLocal(env, 'name', stringTy);
            const lease = SymPerm.leased([SymPlace.var(count), SymPlace.var(name)]);
            expect(await isCopy(lease)).toBe(false);
            const orElse = new PredicateRequired(syntheticSpan(), lease, Predicate.Copy);
            const reported = await rejection(services.predicates.Copy.requireCopy(env, lease, orElse));
            expect(reported.diagnostic.code).toBe('PCE080');
            expect(reported.diagnostic.message).toBe('`leased[count, name]` is not copy');
            expect(reported.diagnostic.because).toEqual(['the lease includes `name`, which is not copy', '`String` is not copy']);
        });

        test('should treat our my as copy but not move', async () => {
            const ourMy = SymPerm.apply(SymPerm.our(), SymPerm.my());
            expect(await isCopy(ourMy)).toBe(true);
            const orElse = new PredicateRequired(syntheticSpan(), ourMy, Predicate.Move);
            const reported = await rejection(services.predicates.Move.requireMove(env, ourMy, orElse));
            expect(reported.diagnostic.code).toBe('PCE081');
        });

        test('should decide the requirements on plain permissions', async () => {
            const name = declareLocal(env, 'name', stringTy);
            const shared = SymPerm.shared([SymPlace.var(name)]);
            const requireCopy = (perm: SymPerm) =>
                services.predicates.Copy.requireCopy(env, perm, new PredicateRequired(syntheticSpan(), perm, Predicate.Copy));
            const requireMove = (perm: SymPerm) =>
                services.predicates.Move.requireMove(env, perm, new PredicateRequired(syntheticSpan(), perm, Predicate.Move));

            await requireCopy(SymPerm.our());
            await requireCopy(shared);
            await requireMove(SymPerm.my());
            expect(env.runtime.sink.diagnostics).toEqual([]);

            expect((await rejection(requireCopy(SymPerm.my()))).diagnostic.code).toBe('PCE080');
            expect((await rejection(requireMove(SymPerm.our()))).diagnostic.code).toBe('PCE081');
            expect((await rejection(requireMove(shared))).diagnostic.code).toBe('PCE081');
        });
    });

    describe('Owned and Lent', () => {
        test('should classify permissions', async () => {
            const ownership = services.predicates.Ownership;
            const name = declareLocal(env, 'name', stringTy);
            const shared = SymPerm.shared([SymPlace.var(name)]);

            expect(await ownership.isProvablyOwned(env, SymPerm.our())).toBe(true);
            expect(await ownership.isProvablyOwned(env, shared)).toBe(false);
            expect(await ownership.isProvablyLent(env, shared)).toBe(true);
            expect(await ownership.isProvablyLent(env, SymPerm.apply(SymPerm.my(), shared))).toBe(true);
            expect(await ownership.isProvablyOwned(env, SymPerm.apply(SymPerm.my(), shared))).toBe(false);
        });

        test('should look through generic arguments', async () => {
            const ownership = services.predicates.Ownership;
            const name = declareLocal(env, 'name', stringTy);
            const borrowed = stringTy.shared(SymPlace.var(name));

            expect(await ownership.isProvablyOwned(env, SymTy.aggregate(pair, [SymTy.u32(), stringTy]))).toBe(true);
            expect(await ownership.isProvablyOwned(env, SymTy.aggregate(pair, [SymTy.u32(), borrowed]))).toBe(false);
            expect(await ownership.isProvablyLent(env, SymTy.aggregate(pair, [SymTy.u32(), borrowed]))).toBe(true);
        });

        test('should report a shared permission as not owned', async () => {
            const name = declareLocal(env, 'name', stringTy);
            const shared = SymPerm.shared([SymPlace.var(name)]);
            const orElse = new PredicateRequired(syntheticSpan(), shared, Predicate.Owned);
            const reported = await rejection(services.predicates.Ownership.requireOwned(env, shared, orElse));
            expect(reported.diagnostic.code).toBe('PCE082');
            expect(reported.diagnostic.message).toBe('`shared[name]` is not owned');
        });
    });

    describe('Where-clause assumptions', () => {
        test('should answer from the assumptions of universal variables', async () => {
            const element = typeVariable('T');
            const inner = env.openUniversally([element], [
                { subject: termFromVariable(element), predicate: Predicate.Copy, span: syntheticSpan() },
            ]);
            const ty = SymTy.var(element);

            expect(await services.predicates.Copy.isProvablyCopy(inner, ty)).toBe(true);
            expect(await services.predicates.Move.isProvablyMove(inner, ty)).toBe(false);
            expect(await services.predicates.Copy.isProvablyCopy(env, ty)).toBe(false);
        });

        test('should report a variable lacking the required assumption', async () => {
            const element = typeVariable('T');
            const inner = env.openUniversally([element]);
            const ty = SymTy.var(element);
            const orElse = new PredicateRequired(syntheticSpan(), ty, Predicate.Move);
            const reported = await rejection(services.predicates.Predicates.require(inner, ty, Predicate.Move, orElse));
            expect(reported.diagnostic.message).toBe('`T` is not move');
            expect(reported.diagnostic.because).toEqual(['`T` is not declared to be move']);
        });
    });
});
