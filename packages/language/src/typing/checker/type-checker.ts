/**
 * Conversion of types, permissions and places written in the source into
 * terms.
 *
 * Failures are reported and produce error terms, so a bad annotation never
 * stops the surrounding check.
 */

import {
    AstGenericTerm, AstNamedType, AstPerm, AstPlacePath, AstType, isAstPerm, Span, SpannedIdentifier
} from '../../ast/unchecked-ast.js';
import { ErrorCode } from '../../codes/errors.js';
import type { PermServices } from '../../perm-module.js';
import type { Env } from '../env.js';
import { CheckDiagnostic, DiagnosticLevel, Reported } from '../report.js';
import type { RedTys } from '../subtype/red-ty.js';
import {
    SymGenericTerm, SymPerm, SymPlace, SymTy, termHasKind, termKind, termToString
} from '../terms/sym-terms.js';
import { SymField, SymGenericKind, SymVariable } from '../terms/symbols.js';
import { NameResolution } from './name-resolution.js';
import type { PlaceTyper } from './places.js';

const FUTURE_NAME = 'Future';

export class Types {
    private readonly redTys: () => RedTys;
    private readonly places: () => PlaceTyper;

    constructor(services: PermServices) {
        this.redTys = () => services.subtyping.RedTys;
        this.places = () => services.checking.Places;
    }

    async checkGenericTerm(env: Env, ast: AstGenericTerm): Promise<SymGenericTerm> {
        if (isAstPerm(ast)) {
            return this.checkPerm(env, ast);
        }
        // `P` and `x` parse as types; a lone name may stand for a permission or place variable
        if (ast.$type === 'NamedType' && ast.path.length === 1 && ast.generics.length === 0) {
            const [segment] = ast.path;
            const sym = env.scope.lookup(segment.id);
            if (sym?.$type === 'Variable') {
                switch (sym.variable.kind) {
                    case SymGenericKind.Perm: return SymPerm.var(sym.variable);
                    case SymGenericKind.Place: return SymPlace.var(sym.variable);
                    case SymGenericKind.Type: return SymTy.var(sym.variable);
                }
            }
        }
        return this.checkTy(env, ast);
    }

    async checkTy(env: Env, ast: AstType): Promise<SymTy> {
        switch (ast.$type) {
            case 'NamedType':
                return this.checkNamedTy(env, ast);
            case 'PermType': {
                const perm = await this.checkPerm(env, ast.perm);
                return perm.applyToTy(await this.checkTy(env, ast.type));
            }
            case 'TupleType': {
                const elements: SymTy[] = [];
                for (const element of ast.elements) {
                    elements.push(await this.checkTy(env, element));
                }
                return SymTy.tuple(elements);
            }
        }
    }

    private async checkNamedTy(env: Env, ast: AstNamedType): Promise<SymTy> {
        const generics: SymGenericTerm[] = [];
        for (const generic of ast.generics) {
            generics.push(await this.checkGenericTerm(env, generic));
        }

        const [first] = ast.path;
        if (ast.path.length === 1 && first.id === FUTURE_NAME && env.scope.lookup(FUTURE_NAME) === undefined) {
            const reported = this.checkGenericArgs(env, ast, FUTURE_NAME, [SymGenericKind.Type], generics, undefined);
            return reported ? SymTy.error(reported) : SymTy.named({ $type: 'Future' }, generics);
        }

        const resolution = this.resolvePath(env, ast.path);
        if (resolution instanceof Reported) {
            return SymTy.error(resolution);
        }
        const sym = resolution.sym;
        switch (sym.$type) {
            case 'Primitive':
                if (generics.length > 0) {
                    return SymTy.error(reportUnexpectedGenerics(env, ast.span, resolution));
                }
                return SymTy.primitive(sym.primitive);
            case 'Aggregate': {
                const aggregate = sym.aggregate;
                const reported = this.checkGenericArgs(
                    env, ast, aggregate.name, aggregate.generics.map(variable => variable.kind), generics, aggregate.generics,
                );
                return reported ? SymTy.error(reported) : SymTy.aggregate(aggregate, generics);
            }
            case 'Variable':
                if (sym.variable.kind === SymGenericKind.Type) {
                    if (generics.length > 0) {
                        return SymTy.error(reportUnexpectedGenerics(env, ast.span, resolution));
                    }
                    return SymTy.var(sym.variable);
                }
                return SymTy.error(reportExpected(env, ast.span, 'a type', resolution, ErrorCode.PC_EXPECTED_TYPE));
            case 'Function':
            case 'Module':
            case 'Field':
                return SymTy.error(reportExpected(env, ast.span, 'a type', resolution, ErrorCode.PC_EXPECTED_TYPE));
        }
    }

    /** Returns the report when the arguments do not fit the parameters. */
    private checkGenericArgs(
        env: Env,
        ast: AstNamedType,
        name: string,
        expected: readonly SymGenericKind[],
        generics: readonly SymGenericTerm[],
        variables: readonly SymVariable[] | undefined,
    ): Reported | undefined {
        if (expected.length !== generics.length) {
            return env.report(
                CheckDiagnostic.error(ast.span, `expected ${expected.length} generic arguments, found ${generics.length}`, ErrorCode.PC_GENERIC_ARG_COUNT_MISMATCH)
                    .label(DiagnosticLevel.Error, ast.span, `\`${name}\` takes ${expected.length} generic arguments`)
            );
        }
        for (const [index, term] of generics.entries()) {
            const kind = expected[index];
            if (!termHasKind(term, kind)) {
                const termSpan = ast.generics[index].span;
                const diagnostic = CheckDiagnostic.error(termSpan, `expected \`${kind}\`, found \`${termKind(term)}\``, ErrorCode.PC_GENERIC_KIND_MISMATCH)
                    .label(DiagnosticLevel.Error, termSpan, `\`${termToString(term)}\` is a \`${termKind(term)}\``);
                const variable = variables?.[index];
                if (variable) {
                    diagnostic.label(DiagnosticLevel.Info, variable.span, `I expected to find a \`${kind}\``);
                }
                return env.report(diagnostic);
            }
        }
        return undefined;
    }

    async checkPerm(env: Env, ast: AstPerm): Promise<SymPerm> {
        switch (ast.kind) {
            case 'my':
                return SymPerm.my();
            case 'our':
                return SymPerm.our();
            case 'shared':
                return SymPerm.shared(await this.checkPlaces(env, ast.places));
            case 'leased':
                return SymPerm.leased(await this.checkPlaces(env, ast.places));
            case 'named': {
                if (ast.name === undefined) {
                    return SymPerm.error(env.report(
                        CheckDiagnostic.error(ast.span, 'expected a permission', ErrorCode.PC_EXPECTED_PERMISSION)
                    ));
                }
                const resolution = env.scope.resolveName(env, ast.name.id, ast.name.span);
                if (resolution instanceof Reported) {
                    return SymPerm.error(resolution);
                }
                const sym = resolution.sym;
                if (sym.$type === 'Variable' && sym.variable.kind === SymGenericKind.Perm) {
                    return SymPerm.var(sym.variable);
                }
                return SymPerm.error(reportExpected(env, ast.name.span, 'a permission', resolution, ErrorCode.PC_EXPECTED_PERMISSION));
            }
        }
    }

    private async checkPlaces(env: Env, asts: readonly AstPlacePath[]): Promise<SymPlace[]> {
        const places: SymPlace[] = [];
        for (const ast of asts) {
            places.push(await this.checkPlace(env, ast));
        }
        return places;
    }

    async checkPlace(env: Env, ast: AstPlacePath): Promise<SymPlace> {
        const resolution = env.scope.resolveName(env, ast.root.id, ast.root.span);
        if (resolution instanceof Reported) {
            return SymPlace.error(resolution);
        }
        const sym = resolution.sym;
        if (sym.$type !== 'Variable' || sym.variable.kind !== SymGenericKind.Place) {
            return SymPlace.error(reportExpected(env, ast.root.span, 'a place', resolution, ErrorCode.PC_EXPECTED_PLACE));
        }
        let place = SymPlace.var(sym.variable);
        for (const segment of ast.fields) {
            try {
                const field = await this.findField(env, place, segment);
                place = field instanceof Reported ? SymPlace.error(field) : SymPlace.field(place, field);
            } catch (error) {
                if (error instanceof Reported) {
                    return SymPlace.error(error);
                }
                throw error;
            }
            if (place.kind.$type === 'Error') {
                return place;
            }
        }
        return place;
    }

    private async findField(env: Env, base: SymPlace, segment: SpannedIdentifier): Promise<SymField | Reported> {
        const baseTy = await this.places().placeTy(env, base);
        const { kind } = this.redTys().toRedTy(baseTy);
        if (kind.$type === 'Error') {
            return kind.reported;
        }
        if (kind.$type === 'Named' && kind.name.$type === 'Aggregate') {
            const member = kind.name.aggregate.member(segment.id);
            if (member instanceof SymField) {
                return member;
            }
        }
        return env.report(
            CheckDiagnostic.error(segment.span, `no field named \`${segment.id}\``, ErrorCode.PC_NO_SUCH_MEMBER)
                .label(DiagnosticLevel.Error, segment.span, `\`${base}\` has type \`${baseTy}\`, which has no field \`${segment.id}\``)
        );
    }

    /** Resolves `a.b.C`: the first segment lexically, the rest relative to it. */
    private resolvePath(env: Env, path: readonly SpannedIdentifier[]): NameResolution | Reported {
        const [first, ...rest] = path;
        let resolution = env.scope.resolveName(env, first.id, first.span);
        for (const segment of rest) {
            if (resolution instanceof Reported) {
                return resolution;
            }
            const relative = resolution.resolveRelativeId(env, segment);
            if (relative instanceof Reported) {
                return relative;
            }
            if (relative.$type === 'NotFound') {
                return env.report(
                    CheckDiagnostic.error(segment.span, `could not find \`${segment.id}\` in ${resolution.categorize()}`, ErrorCode.PC_UNRESOLVED_NAME)
                        .label(DiagnosticLevel.Error, segment.span, 'I could not find anything with this name :(')
                );
            }
            resolution = relative.resolution;
        }
        return resolution;
    }
}

function reportExpected(env: Env, span: Span, expected: string, resolution: NameResolution, code: ErrorCode): Reported {
    return env.report(
        CheckDiagnostic.error(span, `expected ${expected}`, code)
            .label(DiagnosticLevel.Error, span, `I expected ${expected} but I found ${resolution.categorize()}`)
    );
}

function reportUnexpectedGenerics(env: Env, span: Span, resolution: NameResolution): Reported {
    return env.report(
        CheckDiagnostic.error(span, 'unexpected generic arguments', ErrorCode.PC_UNEXPECTED_GENERIC_ARGS)
            .label(DiagnosticLevel.Error, span, `${resolution.categorize()} does not take generic arguments`)
    );
}
