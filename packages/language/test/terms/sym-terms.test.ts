import { describe, expect, test } from "vitest";
import {
    Reported, CheckDiagnostic, SymField, SymPerm, SymPlace, SymTy, substituteTy, syntheticSpan, termHasKind, termKind,
    SymGenericKind, SymModule
} from "../../src/index.js";
import { declareStruct, placeVariable, typeVariable } from "../test-utils.js";

describe('Terms', () => {
    const program = new SymModule('terms', syntheticSpan());
    const element = typeVariable('T');
    const pair = declareStruct(program, 'Pair', [element]);
    const first: SymField = pair.addField('first', SymTy.var(element), syntheticSpan());

    test('should intern structurally equal types', () => {
        const a = SymTy.aggregate(pair, [SymTy.u32()]);
        const b = SymTy.aggregate(pair, [SymTy.primitive('u32')]);
        expect(a).toBe(b);
        expect(SymTy.tuple([])).toBe(SymTy.unit());
        expect(SymTy.aggregate(pair, [SymTy.u8()])).not.toBe(a);
    });

    test('should intern permissions and places', () => {
        const x = placeVariable('x');
        expect(SymPerm.my()).toBe(SymPerm.my());
        expect(SymPerm.apply(SymPerm.our(), SymPerm.my())).toBe(SymPerm.apply(SymPerm.our(), SymPerm.my()));
        expect(SymPlace.var(x)).toBe(SymPlace.var(x));
    });

    test('should render terms', () => {
        const x = placeVariable('x');
        const place = SymPlace.field(SymPlace.var(x), first);
        expect(SymTy.aggregate(pair, [SymTy.u32()]).toString()).toBe('Pair[u32]');
        expect(SymTy.tuple([SymTy.u8(), SymTy.boolean()]).toString()).toBe('(u8, bool)');
        expect(SymTy.future(SymTy.unit()).toString()).toBe('Future[()]');
        expect(SymTy.u32().leased(place).toString()).toBe('leased[x.first] u32');
        expect(SymTy.infer(3).toString()).toBe('?T3');
        expect(SymPerm.infer(4).toString()).toBe('?P4');
        expect(SymTy.never().toString()).toBe('!');
    });

    test('should flatten permission applications left to right', () => {
        const x = placeVariable('x');
        const shared = SymPerm.shared([SymPlace.var(x)]);
        const perm = SymPerm.apply(SymPerm.apply(SymPerm.our(), shared), SymPerm.my());
        expect(perm.leaves()).toEqual([SymPerm.our(), shared, SymPerm.my()]);
    });

    test('should leave a type unchanged under my', () => {
        expect(SymPerm.my().applyToTy(SymTy.u32())).toBe(SymTy.u32());
        expect(SymPerm.our().applyToTy(SymTy.u32()).toString()).toBe('our u32');
    });

    test('should cover field projections of a place but not its base', () => {
        const x = placeVariable('x');
        const base = SymPlace.var(x);
        const projection = SymPlace.field(base, first);
        expect(base.covers(projection)).toBe(true);
        expect(base.covers(base)).toBe(true);
        expect(projection.covers(base)).toBe(false);
    });

    test('should substitute generic variables', () => {
        const substituted = substituteTy(SymTy.tuple([SymTy.var(element), SymTy.u8()]), [element], [SymTy.boolean()]);
        expect(substituted).toBe(SymTy.tuple([SymTy.boolean(), SymTy.u8()]));
    });

    test('should accept error terms for every kind', () => {
        const reported = new Reported(CheckDiagnostic.error(syntheticSpan(), 'test failure'));
        expect(termKind(reported)).toBeUndefined();
        expect(termHasKind(reported, SymGenericKind.Perm)).toBe(true);
        expect(termHasKind(SymTy.u8(), SymGenericKind.Perm)).toBe(false);
        expect(termKind(SymPerm.our())).toBe(SymGenericKind.Perm);
    });
});
