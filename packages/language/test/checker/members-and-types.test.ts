import { describe, expect, test } from "vitest";
import {
    createBlockExpr, createDotIdExpr, createIdExpr, createIntegerLiteral, createLeasedPerm, createLetStatement, createMyPerm,
    createNamedPerm, createNamedType, createOurPerm, createPermissionOpExpr, createPermType, createSharedPerm, createTupleType,
    SymPerm, SymTy, syntheticSpan
} from "../../src/index.js";
import type { AstType } from "../../src/index.js";
import { declareFunction, declareStruct, diagnosticCodes, expectValid, exprTy, setupChecker, typeVariable } from "../test-utils.js";

describe('Member lookup', () => {
    const setupBox = () => {
        const checker = setupChecker();
        const element = typeVariable('T');
        const box = declareStruct(checker.program, 'Box', [element]);
        box.addField('value', SymTy.var(element), syntheticSpan());
        const point = declareStruct(checker.program, 'Point');
        point.addField('x', SymTy.u32(), syntheticSpan());
        return { ...checker, box, point };
    };

    test('should find a field of a struct', async () => {
        const { program, point, checkFunctionBody } = setupBox();
        const fn = declareFunction(program, 'getX', [['p', SymTy.aggregate(point)]], SymTy.u32());
        const body = createPermissionOpExpr('give', createDotIdExpr(createIdExpr('p'), 'x'));
        const result = await checkFunctionBody(fn, body);
        expect(expectValid(result)).toBe('p.x.give');
        expect(exprTy(result.expr)).toBe('u32');
    });

    test('should report a missing field', async () => {
        const { program, point, checkFunctionBody } = setupBox();
        const fn = declareFunction(program, 'getY', [['p', SymTy.aggregate(point)]], SymTy.u32());
        const result = await checkFunctionBody(fn, createPermissionOpExpr('give', createDotIdExpr(createIdExpr('p'), 'y')));
        expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE003']);
        expect(result.diagnostics[0].message).toBe('no member named `y`');
    });

    test('should substitute generic arguments into field types', async () => {
        const { program, box, checkFunctionBody } = setupBox();
        const fn = declareFunction(program, 'unbox', [['b', SymTy.aggregate(box, [SymTy.u8()])]], SymTy.u8());
        const result = await checkFunctionBody(fn, createPermissionOpExpr('give', createDotIdExpr(createIdExpr('b'), 'value')));
        expect(result.diagnostics).toEqual([]);
        expect(exprTy(result.expr)).toBe('u8');
    });

    test('should carry the owner permission onto the field', async () => {
        const { program, box, checkFunctionBody } = setupBox();
        const ourBox = SymTy.perm(SymPerm.our(), SymTy.aggregate(box, [SymTy.u8()]));
        const fn = declareFunction(program, 'peek', [['b', ourBox]], SymTy.perm(SymPerm.our(), SymTy.u8()));
        const result = await checkFunctionBody(fn, createPermissionOpExpr('give', createDotIdExpr(createIdExpr('b'), 'value')));
        expect(result.diagnostics).toEqual([]);
        expect(exprTy(result.expr)).toBe('our u8');
    });

    test('should report members missing from a class name', async () => {
        const { checkExpression } = setupChecker();
        const result = await checkExpression(createDotIdExpr(createIdExpr('String'), 'nothing'));
        expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE003']);
    });
});

describe('Type annotations', () => {
    const checkAnnotation = (setup: ReturnType<typeof setupChecker>, type: AstType) =>
        setup.checkExpression(createBlockExpr([createLetStatement('x', type)]));

    test('should check the number of generic arguments', async () => {
        const checker = setupChecker();
        declareStruct(checker.program, 'Pair', [typeVariable('A'), typeVariable('B')]);
        const result = await checkAnnotation(checker, createNamedType('Pair', [createNamedType('u32')]));
        expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE005']);
        expect(result.diagnostics[0].message).toBe('expected 2 generic arguments, found 1');
    });

    test('should check the kind of generic arguments', async () => {
        const checker = setupChecker();
        declareStruct(checker.program, 'Box', [typeVariable('T')]);
        const result = await checkAnnotation(checker, createNamedType('Box', [createMyPerm()]));
        expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE006']);
    });

    test('should reject generic arguments on primitives', async () => {
        const checker = setupChecker();
        const result = await checkAnnotation(checker, createNamedType('u32', [createNamedType('u8')]));
        expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE004']);
    });

    test('should check permissions naming places', async () => {
        const checker = setupChecker();
        const u32 = createNamedType('u32');
        const result = await checker.checkExpression(createBlockExpr([
            createLetStatement('a', u32, createIntegerLiteral('1')),
            createLetStatement('pair', createTupleType([u32, createNamedType('bool')])),
            createLetStatement('r', createPermType(createSharedPerm(['a']), u32), createIdExpr('a')),
            createLetStatement('m', createPermType(createLeasedPerm(['a']), u32), createPermissionOpExpr('mutate', createIdExpr('a'))),
        ]));
        expect(expectValid(result)).toBe(
            'let a: u32 = 1 in let pair: (u32, bool) in let r: shared[a] u32 = a.reference in let m: leased[a] u32 = a.mutate in ()');
    });

    test('should reject a place used as a permission', async () => {
        const checker = setupChecker();
        const result = await checker.checkExpression(createBlockExpr([
            createLetStatement('a', createNamedType('u32'), createIntegerLiteral('1')),
            createLetStatement('b', createPermType(createNamedPerm('a'), createNamedType('u32'))),
        ]));
        expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE008']);
    });

    test('should reject a function used as a type', async () => {
        const checker = setupChecker();
        declareFunction(checker.program, 'helper', [], SymTy.u32());
        const result = await checkAnnotation(checker, createNamedType('helper'));
        expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE007']);
    });

    test('should accept well-formed annotations', async () => {
        const checker = setupChecker();
        expect(expectValid(await checkAnnotation(checker, createNamedType('Future', [createNamedType('u32')]))))
            .toBe('let x: Future[u32] in ()');

        const our = await checker.checkExpression(createBlockExpr([
            createLetStatement('x', createPermType(createOurPerm(), createNamedType('u32')), createIntegerLiteral('1')),
        ]));
        expect(expectValid(our)).toBe('let x: our u32 = 1 in ()');
    });
});
