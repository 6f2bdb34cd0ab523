import type { AstBlockExpr, AstLetStatement, AstStatement } from '../../ast/unchecked-ast.js';
import type { PermServices } from '../../perm-module.js';
import type { Env } from '../env.js';
import { InvalidLetInitializer } from '../or-else.js';
import { SymGenericKind, SymVariable } from '../terms/symbols.js';
import { SymExpr } from './sym-expr.js';
import type { Exprs } from './exprs.js';
import type { Types } from './type-checker.js';

/**
 * Blocks check into a chain of `let .. in` and `;` nodes ending in the
 * block's tail, so
 *
 * ```
 * { let x = 1; f(x); x }
 * ```
 *
 * becomes `let x: ?T = 1 in f(x); x`.
 */
export class Blocks {
    private readonly exprs: () => Exprs;
    private readonly types: () => Types;

    constructor(services: PermServices) {
        this.exprs = () => services.checking.Exprs;
        this.types = () => services.checking.Types;
    }

    checkBlock(env: Env, ast: AstBlockExpr): Promise<SymExpr> {
        return this.checkStatements(env, ast, 0);
    }

    private async checkStatements(env: Env, block: AstBlockExpr, index: number): Promise<SymExpr> {
        if (index === block.statements.length) {
            if (block.tail === undefined) {
                return SymExpr.unit(block.span);
            }
            return (await this.exprs().checkExpr(env, block.tail)).intoExprWithEnclosedTemporaries(env);
        }

        const statement: AstStatement = block.statements[index];
        switch (statement.$type) {
            case 'LetStatement':
                return this.checkLet(env, statement, body => this.checkStatements(body, block, index + 1));
            case 'ExprStatement': {
                const expr = (await this.exprs().checkExpr(env, statement.expr)).intoExprWithEnclosedTemporaries(env);
                const rest = await this.checkStatements(env, block, index + 1);
                return new SymExpr(statement.span, rest.ty, { $type: 'Semi', lhs: expr, rhs: rest });
            }
        }
    }

    /** The initializer is checked before `name` comes into scope. */
    private async checkLet(env: Env, ast: AstLetStatement, checkBody: (env: Env) => Promise<SymExpr>): Promise<SymExpr> {
        const name = ast.name.id;
        const ty = ast.type
            ? await this.types().checkTy(env, ast.type)
            : env.freshTyInferenceVar(ast.name.span);

        let initializer: SymExpr | undefined;
        if (ast.initializer) {
            initializer = (await this.exprs().checkExpr(env, ast.initializer)).intoExprWithEnclosedTemporaries(env);
            env.spawnRequireAssignableType(initializer.ty, ty, new InvalidLetInitializer(initializer.span, name, ty, initializer.ty));
        }

        const variable = new SymVariable(SymGenericKind.Place, name, ast.name.span);
        const body = await checkBody(env.withLocal(name, variable, ty));
        return SymExpr.letIn(variable, ty, initializer, body);
    }
}
