import { describe, expect, test } from "vitest";
import {
    createAssignExpr, createAwaitExpr, createBinaryExpr, createBlockExpr, createBooleanLiteral, createExprStatement, createIdExpr,
    createIfArm, createIfExpr, createIntegerLiteral, createLetStatement, createNamedType, createPermissionOpExpr, createReturnExpr,
    createStringLiteral, createTupleExpr, createUnaryExpr, symExprToString
} from "../../src/index.js";
import type { AstExpr } from "../../src/index.js";
import { diagnosticCodes, expectValid, exprTy, setupChecker } from "../test-utils.js";

describe('Expression checking', () => {

    describe('literals and operators', () => {
        test('should default an integer sum to i32', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createBinaryExpr(createIntegerLiteral('1'), '+', createIntegerLiteral('2')));
            expect(expectValid(result)).toBe('(1 add 2)');
            expect(exprTy(result.expr)).toBe('i32');
        });

        test('should type comparisons as bool', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createBinaryExpr(createIntegerLiteral('1'), '>', createIntegerLiteral('2')));
            expect(expectValid(result)).toBe('(1 greaterThan 2)');
            expect(exprTy(result.expr)).toBe('bool');
        });

        test('should desugar && into nested ifs', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createBinaryExpr(createBooleanLiteral(true), '&&', createBooleanLiteral(false)));
            expect(expectValid(result)).toBe('if true { if false { true } else { false } } else { false }');
            expect(exprTy(result.expr)).toBe('bool');
        });

        test('should desugar || into nested ifs', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createBinaryExpr(createBooleanLiteral(false), '||', createBooleanLiteral(true)));
            expect(expectValid(result)).toBe('if false { true } else { if true { true } else { false } }');
        });

        test('should ignore underscores in integer literals', async () => {
            const { checkExpression } = setupChecker();
            expect(expectValid(await checkExpression(createIntegerLiteral('1_000')))).toBe('1000');
        });

        test('should honour the configured default integer type', async () => {
            const { checkExpression } = setupChecker({ defaultIntegerType: 'u16' });
            const result = await checkExpression(createIntegerLiteral('7'));
            expect(exprTy(result.expr)).toBe('u16');
        });

        test('should reject an invalid integer literal', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createIntegerLiteral('12a'));
            expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE029']);
            expect(result.diagnostics[0].message).toBe('invalid integer literal `12a`');
            expect(symExprToString(result.expr)).toBe('<error>');
        });

        test('should require numeric operands', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createBinaryExpr(createBooleanLiteral(true), '+', createIntegerLiteral('1')));
            expect(result.hasErrors).toBe(true);
            expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE053', 'PCE053', 'PCE053']);
        });

        test('should check unary operators', async () => {
            const { checkExpression } = setupChecker();
            const not = await checkExpression(createUnaryExpr('not', createBooleanLiteral(true)));
            expect(expectValid(not)).toBe('!true');
            expect(exprTy(not.expr)).toBe('bool');

            const negate = await checkExpression(createUnaryExpr('negate', createIntegerLiteral('4')));
            expect(expectValid(negate)).toBe('-4');
            expect(exprTy(negate.expr)).toBe('i32');
        });

        test('should type tuples element by element', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createTupleExpr([createIntegerLiteral('1'), createBooleanLiteral(true)]));
            expect(expectValid(result)).toBe('(1, true)');
            expect(exprTy(result.expr)).toBe('(i32, bool)');
        });

        test('should check string literals as calls to String.literal', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createStringLiteral('hi'));
            expect(expectValid(result)).toMatch(
                /^let \^place\d+: Pointer\[u8\] = b"hi" in let \^place\d+: u32 = 2 in literal\(\^place\d+, \^place\d+\)$/);
            expect(exprTy(result.expr)).toBe('String');
        });
    });

    describe('if expressions', () => {
        test('should join the arm types', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createIfExpr([
                createIfArm(createBooleanLiteral(true), createIntegerLiteral('1')),
                createIfArm(undefined, createIntegerLiteral('2')),
            ]));
            expect(expectValid(result)).toBe('if true { 1 } else { 2 }');
            expect(exprTy(result.expr)).toBe('i32');
        });

        test('should type an if without else as unit', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createIfExpr([createIfArm(createBooleanLiteral(true), createTupleExpr([]))]));
            expect(expectValid(result)).toBe('if true { () }');
            expect(exprTy(result.expr)).toBe('()');
        });

        test('should require a boolean condition', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createIfExpr([
                createIfArm(createTupleExpr([]), createBooleanLiteral(true)),
                createIfArm(undefined, createBooleanLiteral(false)),
            ]));
            expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE055']);
            expect(result.diagnostics[0].message).toBe('expected `bool`, found `()`');
        });
    });

    describe('names, places and permissions', () => {
        test('should report unresolved names', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createIdExpr('missing'));
            expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE001']);
            expect(result.diagnostics[0].message).toBe('could not find anything named `missing`');
        });

        test('should reject a class used as a value', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createIdExpr('String'));
            expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE020']);
        });

        test('should reference a place used as a value', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createBlockExpr(
                [createLetStatement('x', createNamedType('u32'), createIntegerLiteral('1'))],
                createIdExpr('x'),
            ));
            expect(expectValid(result)).toBe('let x: u32 = 1 in x.reference');
            expect(exprTy(result.expr)).toBe('shared[x] u32');
        });

        test('should initialize a copy variable from another without giving it', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createBlockExpr(
                [
                    createLetStatement('a', createNamedType('u32'), createIntegerLiteral('1')),
                    createLetStatement('b', createNamedType('u32'), createIdExpr('a')),
                ],
                createIdExpr('b'),
            ));
            expect(expectValid(result)).toBe('let a: u32 = 1 in let b: u32 = a.reference in b.reference');
        });

        test('should use an inferred copy variable in arithmetic', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createBlockExpr(
                [createLetStatement('n', undefined, createIntegerLiteral('2'))],
                createBinaryExpr(createIdExpr('n'), '*', createIntegerLiteral('3')),
            ));
            expect(expectValid(result)).toBe('let n: i32 = 2 in (n.reference mul 3)');
        });

        test('should check assignments as statements', async () => {
            const { checkExpression } = setupChecker();
            const declareA = createLetStatement('a', createNamedType('u32'), createIntegerLiteral('1'));
            const assign = (value: AstExpr) => checkExpression(createBlockExpr(
                [declareA, createExprStatement(createAssignExpr(createIdExpr('a'), value))],
                createPermissionOpExpr('give', createIdExpr('a')),
            ));

            const valid = await assign(createIntegerLiteral('2'));
            expect(expectValid(valid)).toBe('let a: u32 = 1 in a = 2; a.give');
            expect(exprTy(valid.expr)).toBe('u32');

            const invalid = await assign(createBooleanLiteral(true));
            expect(diagnosticCodes(invalid.diagnostics)).toEqual(['PCE051']);
        });

        test('should type permission operators', async () => {
            const { checkExpression } = setupChecker();
            const block = (op: 'give' | 'mutate') => createBlockExpr(
                [createLetStatement('x', createNamedType('u32'), createIntegerLiteral('1'))],
                createPermissionOpExpr(op, createIdExpr('x')),
            );

            const given = await checkExpression(block('give'));
            expect(expectValid(given)).toBe('let x: u32 = 1 in x.give');
            expect(exprTy(given.expr)).toBe('u32');

            const mutated = await checkExpression(block('mutate'));
            expect(exprTy(mutated.expr)).toBe('leased[x] u32');
        });
    });

    describe('return and await', () => {
        test('should reject return outside a function', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createReturnExpr());
            expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE026']);
            expect(result.diagnostics[0].message).toBe('unexpected `return` statement');
            expect(symExprToString(result.expr)).toBe('<error>');
        });

        test('should reject awaiting something that is not a future', async () => {
            const { checkExpression } = setupChecker();
            const result = await checkExpression(createAwaitExpr(createBooleanLiteral(true)));
            expect(diagnosticCodes(result.diagnostics)).toEqual(['PCE056', 'PCE058']);
            expect(result.diagnostics[0].message).toBe('`await` requires a future, found `bool`');
        });
    });
});
