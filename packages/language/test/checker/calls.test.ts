import { describe, expect, test } from "vitest";
import {
    createBinaryExpr, createBooleanLiteral, createCallExpr, createDotIdExpr, createIdExpr, createIntegerLiteral, createNamedType,
    createPermissionOpExpr, createReturnExpr, createSquareBracketExpr, createStringLiteral, DiagnosticLevel, Predicate, spanAt, SymTy,
    syntheticSpan
} from "../../src/index.js";
import type { AstExpr } from "../../src/index.js";
import {
    declareAssociatedFunction, declareClass, declareFunction, declareMethod, diagnosticCodes, expectValid, exprTy,
    setupChecker, typeVariable
} from "../test-utils.js";

const give = (name: string) => createPermissionOpExpr('give', createIdExpr(name));

describe('Function bodies', () => {
    test('should accept a body of the declared output type', async () => {
        const { program, checkFunctionBody } = setupChecker();
        const id = declareFunction(program, 'id', [['x', SymTy.u32()]], SymTy.u32());
        const result = await checkFunctionBody(id, give('x'));
        expect(expectValid(result)).toBe('x.give');
        expect(exprTy(result.expr)).toBe('u32');
    });

    test('should read a copy parameter as its plain type', async () => {
        const { program, checkFunctionBody } = setupChecker();
        const inc = declareFunction(program, 'inc', [['x', SymTy.u32()]], SymTy.u32());
        const result = await checkFunctionBody(inc, createBinaryExpr(createIdExpr('x'), '+', createIntegerLiteral('1')));
        expect(expectValid(result)).toBe('(x.reference add 1)');
    });

    test('should pass a copy parameter to a call without giving it', async () => {
        const { program, checkFunctionBody } = setupChecker();
        const inc = declareFunction(program, 'inc', [['x', SymTy.u32()]], SymTy.u32());
        const result = await checkFunctionBody(inc, createCallExpr(createIdExpr('inc'), [createIdExpr('x')]));
        expect(expectValid(result)).toMatch(/^let \^place\d+: shared\[x\] u32 = x\.reference in inc\(\^place\d+\)$/);
        expect(exprTy(result.expr)).toBe('u32');
    });

    test('should keep the shared permission of a class parameter read without giving it', async () => {
        const { program, services, checkFunctionBody } = setupChecker();
        const stringTy = services.terms.WellKnown.stringTy();
        const fn = declareFunction(program, 'echo', [['s', stringTy]], stringTy);
        const result = await checkFunctionBody(fn, createIdExpr('s'));
        expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE052']);
        expect(result.diagnostics[0].message).toBe('expected a return value of type `String`, found `shared[s] String`');
    });

    test('should report a body of another type as an invalid return value', async () => {
        const { program, checkFunctionBody } = setupChecker();
        const fn = declareFunction(program, 'count', [], SymTy.u32());
        const result = await checkFunctionBody(fn, createBooleanLiteral(true));
        expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE052']);
    });

    test('should report an integer body where a bool is expected as non-numeric', async () => {
        const { program, checkFunctionBody } = setupChecker();
        const fn = declareFunction(program, 'flag', [], SymTy.boolean());
        const result = await checkFunctionBody(fn, createIntegerLiteral('1'));
        expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE053']);
    });

    test('should type return as never and check its value', async () => {
        const { program, checkFunctionBody } = setupChecker();
        const fn = declareFunction(program, 'five', [], SymTy.u32());
        const result = await checkFunctionBody(fn, createReturnExpr(createIntegerLiteral('5')));
        expect(expectValid(result)).toBe('return 5');
        expect(exprTy(result.expr)).toBe('!');
        const kind = result.expr.kind;
        expect(kind.$type === 'Return' ? exprTy(kind.value) : undefined).toBe('u32');
    });
});

describe('Calls', () => {
    test('should bind each argument to a temporary', async () => {
        const { program, checkExpression } = setupChecker();
        declareFunction(program, 'twice', [['x', SymTy.u32()]], SymTy.u32());
        const result = await checkExpression(createCallExpr(createIdExpr('twice'), [createIntegerLiteral('5')]));
        expect(expectValid(result)).toMatch(/^let \^place\d+: u32 = 5 in twice\(\^place\d+\)$/);
        expect(exprTy(result.expr)).toBe('u32');
    });

    test('should report a wrong number of arguments', async () => {
        const { program, checkExpression } = setupChecker();
        declareFunction(program, 'twice', [['x', SymTy.u32()]], SymTy.u32());
        const result = await checkExpression(createCallExpr(createIdExpr('twice'), []));
        expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE023']);
        expect(result.diagnostics[0].message).toBe('expected 1 arguments, found 0');
    });

    test('should point at the call and the declaration when the argument count is wrong', async () => {
        const { program, checkExpression } = setupChecker();
        const add = declareFunction(program, 'add', [['a', SymTy.u32()], ['b', SymTy.u32()]], SymTy.u32());
        const callSite = spanAt(2, 4, 7);
        const callAdd = (...args: AstExpr[]) => checkExpression(createCallExpr(createIdExpr('add', callSite), args));

        const tooFew = await callAdd(createIntegerLiteral('1'));
        expect(diagnosticCodes(tooFew.diagnostics)).toEqual(['PCE023']);
        expect(tooFew.diagnostics[0].message).toBe('expected 2 arguments, found 1');
        expect(tooFew.diagnostics[0].span).toEqual(callSite);
        expect(tooFew.diagnostics[0].labels).toEqual([
            { level: DiagnosticLevel.Error, span: callSite, message: 'I expected `add` to take 2 arguments but I found 1' },
            { level: DiagnosticLevel.Info, span: add.nameSpan, message: '`add` defined here' },
        ]);

        const tooMany = await callAdd(createIntegerLiteral('1'), createIntegerLiteral('2'), createIntegerLiteral('3'));
        expect(diagnosticCodes(tooMany.diagnostics)).toEqual(['PCE023']);
        expect(tooMany.diagnostics[0].labels.map(label => label.message)).toEqual([
            'I expected `add` to take 2 arguments but I found 3',
            '`add` defined here',
        ]);
    });

    test('should reject calling a value', async () => {
        const { checkExpression } = setupChecker();
        const result = await checkExpression(createCallExpr(createIntegerLiteral('1'), []));
        expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE022']);
    });

    describe('generic functions', () => {
        const declarePick = (whereCopy = false) => {
            const checker = setupChecker();
            const element = typeVariable('T');
            declareFunction(checker.program, 'pick', [['x', SymTy.var(element)]], SymTy.var(element), {
                generics: [element],
                whereClauses: whereCopy ? [[element, Predicate.Copy]] : [],
            });
            return checker;
        };

        test('should infer generic arguments from the arguments', async () => {
            const { checkExpression } = declarePick();
            const result = await checkExpression(createCallExpr(createIdExpr('pick'), [createBooleanLiteral(true)]));
            expect(result.diagnostics).toEqual([]);
            expect(exprTy(result.expr)).toBe('bool');
        });

        test('should take explicit generic arguments', async () => {
            const { checkExpression } = declarePick();
            const callee = createSquareBracketExpr(createIdExpr('pick'), [createNamedType('u8')]);
            const result = await checkExpression(createCallExpr(callee, [createIntegerLiteral('1')]));
            expect(result.diagnostics).toEqual([]);
            expect(exprTy(result.expr)).toBe('u8');
        });

        test('should report too many generic arguments once', async () => {
            const { checkExpression } = declarePick();
            const callee = createSquareBracketExpr(createIdExpr('pick'), [createNamedType('u8'), createNamedType('u8')]);
            const result = await checkExpression(createCallExpr(callee, [createIntegerLiteral('1')]));
            expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE005']);
        });

        test('should reject generic arguments given twice', async () => {
            const { checkExpression } = declarePick();
            const once = createSquareBracketExpr(createIdExpr('pick'), [createNamedType('u32')]);
            const twice = createSquareBracketExpr(once, [createNamedType('u32')]);
            const result = await checkExpression(createCallExpr(twice, [createIntegerLiteral('1')]));
            expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE004']);
            expect(result.diagnostics[0].labels.map(label => label.message)).toEqual(['`pick` already has its generic arguments']);
        });

        test('should check where clauses at the call', async () => {
            const { checkExpression } = declarePick(true);
            const valid = await checkExpression(createCallExpr(createIdExpr('pick'), [createIntegerLiteral('5')]));
            expect(valid.diagnostics).toEqual([]);

            const invalid = await checkExpression(createCallExpr(createIdExpr('pick'), [createStringLiteral('hi')]));
            expect(diagnosticCodes(invalid.diagnostics)).toEqual(['PCE084']);
        });
    });

    describe('classes', () => {
        test('should report a class without new', async () => {
            const { program, checkExpression } = setupChecker();
            declareClass(program, 'Widget');
            const result = await checkExpression(createCallExpr(createIdExpr('Widget'), []));
            expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE024']);
            expect(result.diagnostics[0].message).toBe('the class `Widget` has no `new` method');
        });

        test('should report a new member that is not a function', async () => {
            const { program, checkExpression } = setupChecker();
            declareClass(program, 'Widget').addField('new', SymTy.u32(), syntheticSpan());
            const result = await checkExpression(createCallExpr(createIdExpr('Widget'), []));
            expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE025']);
        });

        test('should call new when a class is called', async () => {
            const { program, checkExpression } = setupChecker();
            const widget = declareClass(program, 'Widget');
            declareAssociatedFunction(widget, 'new', [], SymTy.aggregate(widget));
            const result = await checkExpression(createCallExpr(createIdExpr('Widget'), []));
            expect(expectValid(result)).toBe('new()');
            expect(exprTy(result.expr)).toBe('Widget');
        });
    });

    describe('methods', () => {
        /** Checks `body` as the body of `fn(c: Counter) -> output`. */
        const checkWithCounter = (body: AstExpr, output: SymTy) => {
            const { program, checkFunctionBody } = setupChecker();
            const counter = declareClass(program, 'Counter');
            const counterTy = SymTy.aggregate(counter);
            declareMethod(counter, 'add', counterTy, [['amount', SymTy.u32()]], SymTy.u32());
            const target = typeVariable('U');
            declareMethod(counter, 'convert', counterTy, [['value', SymTy.var(target)]], SymTy.var(target), [target]);
            declareAssociatedFunction(counter, 'make', [], counterTy);
            const fn = declareFunction(program, 'useCounter', [['c', counterTy]], output);
            return checkFunctionBody(fn, body);
        };

        const member = (name: string) => createDotIdExpr(give('c'), name);

        test('should pass the receiver as the first argument', async () => {
            const result = await checkWithCounter(createCallExpr(member('add'), [createIntegerLiteral('1')]), SymTy.u32());
            expect(expectValid(result)).toMatch(
                /^let \^place\d+: Counter = c\.give in let \^place\d+: u32 = 1 in add\(\^place\d+, \^place\d+\)$/);
            expect(exprTy(result.expr)).toBe('u32');
        });

        test('should take explicit generics for the method itself', async () => {
            const callee = createSquareBracketExpr(member('convert'), [createNamedType('bool')]);
            const result = await checkWithCounter(createCallExpr(callee, [createBooleanLiteral(true)]), SymTy.boolean());
            expect(result.diagnostics).toEqual([]);
            expect(exprTy(result.expr)).toBe('bool');
        });

        test('should report a wrong number of method generics', async () => {
            const callee = createSquareBracketExpr(member('convert'), [createNamedType('bool'), createNamedType('u8')]);
            const result = await checkWithCounter(createCallExpr(callee, [createBooleanLiteral(true)]), SymTy.boolean());
            expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE005']);
            expect(result.diagnostics[0].message).toBe('expected 1 generic arguments, but found 2');
        });

        test('should require methods to be called', async () => {
            const result = await checkWithCounter(member('add'), SymTy.u32());
            expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE021']);
        });

        test('should reject associated functions called on an instance', async () => {
            const result = await checkWithCounter(createCallExpr(member('make'), []), SymTy.tuple([]));
            expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE028']);
        });
    });
});
