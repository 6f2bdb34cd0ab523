/**
 * Failure reporting for obligations.
 *
 * Every obligation the checker imposes carries an {@link OrElse}: it knows
 * what was being checked and where, and turns the low-level reason a check
 * failed (a {@link Because}) into the diagnostic the user sees.
 */

import type { Span } from '../ast/unchecked-ast.js';
import { ErrorCode } from '../codes/errors.js';
import { Predicate } from './predicates/predicate.js';
import { CheckDiagnostic, DiagnosticLevel, Reported, Reporter } from './report.js';
import { SymGenericTerm, SymPlace, SymTy, termToString } from './terms/sym-terms.js';

export type Because =
    | { readonly $type: 'JustSo' }
    | { readonly $type: 'NeverIsNotCopy' }
    | { readonly $type: 'ClassIsNotCopy'; readonly name: string }
    | { readonly $type: 'PrimitiveIsCopy'; readonly name: string }
    | { readonly $type: 'LeasedFromCopyIsCopy'; readonly places: readonly string[] }
    | { readonly $type: 'LeasedPlaceIsNotCopy'; readonly place: string; readonly cause: Because }
    | { readonly $type: 'VarNotDeclaredToBe'; readonly variable: string; readonly predicate: Predicate }
    | { readonly $type: 'InferIsnt'; readonly predicate: Predicate }
    | { readonly $type: 'InferredLowerBound'; readonly bound: string; readonly boundSpan: Span | undefined; readonly cause: Because }
    | { readonly $type: 'UnconstrainedInfer'; readonly span: Span }
    | { readonly $type: 'PermMismatch'; readonly lower: string; readonly upper: string }
    | { readonly $type: 'NameMismatch'; readonly lower: string; readonly upper: string }
    | { readonly $type: 'UniverseEscape'; readonly variable: string };

export const JUST_SO: Because = { $type: 'JustSo' };

/** The explanatory notes for a reason, outermost first. */
export function describeBecause(because: Because): string[] {
    switch (because.$type) {
        case 'JustSo':
            return [];
        case 'NeverIsNotCopy':
            return ['the never type `!` is not copy'];
        case 'ClassIsNotCopy':
            return [`\`${because.name}\` is not copy`];
        case 'PrimitiveIsCopy':
            return [`the primitive type \`${because.name}\` is copy`];
        case 'LeasedFromCopyIsCopy':
            return [`leasing from copy places (${because.places.join(', ')}) yields a copy permission`];
        case 'LeasedPlaceIsNotCopy':
            return [`the lease includes \`${because.place}\`, which is not copy`, ...describeBecause(because.cause)];
        case 'VarNotDeclaredToBe':
            return [`\`${because.variable}\` is not declared to be ${because.predicate}`];
        case 'InferIsnt':
            return [`the inferred term cannot be ${because.predicate}`];
        case 'InferredLowerBound':
            return [
                `the inferred lower bound is \`${because.bound}\`${because.boundSpan ? ` (inferred at ${because.boundSpan.start.line + 1}:${because.boundSpan.start.character + 1})` : ''}`,
                ...describeBecause(because.cause),
            ];
        case 'UnconstrainedInfer':
            return ['nothing constrains the inferred type'];
        case 'PermMismatch':
            return [`the permission \`${because.lower}\` is not a subpermission of \`${because.upper}\``];
        case 'NameMismatch':
            return [`\`${because.lower}\` and \`${because.upper}\` are different types`];
        case 'UniverseEscape':
            return [`the generic variable \`${because.variable}\` is not in scope where the inference variable was created`];
    }
}

export abstract class OrElse {
    /** Where the obligation came from */
    abstract readonly span: Span;

    abstract diagnostic(because: Because): CheckDiagnostic;

    report(reporter: Reporter, because: Because): Reported {
        const diagnostic = this.diagnostic(because);
        for (const note of describeBecause(because)) {
            diagnostic.becauseOf(note);
        }
        return reporter.report(diagnostic);
    }

    /** Same obligation, with the reason rewritten before reporting. */
    mapBecause(map: (because: Because) => Because): OrElse {
        return new MappedOrElse(this, map);
    }
}

class MappedOrElse extends OrElse {
    constructor(private readonly inner: OrElse, private readonly map: (because: Because) => Because) {
        super();
    }

    get span(): Span {
        return this.inner.span;
    }

    override report(reporter: Reporter, because: Because): Reported {
        return this.inner.report(reporter, this.map(because));
    }

    diagnostic(because: Because): CheckDiagnostic {
        return this.inner.diagnostic(this.map(because));
    }
}

/**
 * Attaches the provenance of an inferred bound to whatever goes wrong while
 * checking an obligation against that bound.
 */
export function becauseOfLowerBound(orElse: OrElse, bound: SymGenericTerm, boundOrigin: OrElse | undefined): OrElse {
    return orElse.mapBecause(cause => ({
        $type: 'InferredLowerBound',
        bound: termToString(bound),
        boundSpan: boundOrigin?.span,
        cause,
    }));
}

/** Names the leased place whose type kept a lease from being copy. */
export function becauseOfLeasedPlace(orElse: OrElse, place: SymPlace): OrElse {
    return orElse.mapBecause(cause => ({ $type: 'LeasedPlaceIsNotCopy', place: place.toString(), cause }));
}

/** `lower` had to be a subtype of `upper`. */
export class BadSubtypeError extends OrElse {
    constructor(readonly span: Span, private readonly lower: SymGenericTerm, private readonly upper: SymGenericTerm) {
        super();
    }

    diagnostic(because: Because): CheckDiagnostic {
        return CheckDiagnostic.error(this.span, `expected \`${termToString(this.upper)}\`, found \`${termToString(this.lower)}\``, subtypeErrorCode(because))
            .label(DiagnosticLevel.Error, this.span, `this has type \`${termToString(this.lower)}\``);
    }
}

function subtypeErrorCode(because: Because): ErrorCode {
    switch (because.$type) {
        case 'InferredLowerBound': return subtypeErrorCode(because.cause);
        case 'PermMismatch': return ErrorCode.PC_PERMISSION_MISMATCH;
        case 'UniverseEscape': return ErrorCode.PC_UNIVERSE_ESCAPE;
        default: return ErrorCode.PC_TYPE_MISMATCH;
    }
}

export class InvalidAssignmentType extends OrElse {
    constructor(readonly span: Span, private readonly placeSpan: Span, private readonly placeTy: SymTy, private readonly valueTy: SymTy) {
        super();
    }

    diagnostic(): CheckDiagnostic {
        return CheckDiagnostic.error(this.span, `cannot assign a value of type \`${this.valueTy}\` to a place of type \`${this.placeTy}\``, ErrorCode.PC_INVALID_ASSIGNMENT)
            .label(DiagnosticLevel.Error, this.span, `this value has type \`${this.valueTy}\``)
            .label(DiagnosticLevel.Info, this.placeSpan, `this place has type \`${this.placeTy}\``);
    }
}

export class InvalidReturnValue extends OrElse {
    constructor(readonly span: Span, private readonly valueTy: SymTy, private readonly returnTy: SymTy) {
        super();
    }

    diagnostic(): CheckDiagnostic {
        return CheckDiagnostic.error(this.span, `expected a return value of type \`${this.returnTy}\`, found \`${this.valueTy}\``, ErrorCode.PC_INVALID_RETURN_VALUE)
            .label(DiagnosticLevel.Error, this.span, `this has type \`${this.valueTy}\``);
    }
}

export class InvalidLetInitializer extends OrElse {
    constructor(readonly span: Span, private readonly name: string, private readonly declaredTy: SymTy, private readonly valueTy: SymTy) {
        super();
    }

    diagnostic(): CheckDiagnostic {
        return CheckDiagnostic.error(this.span, `\`${this.name}\` has type \`${this.declaredTy}\` but is initialized with a value of type \`${this.valueTy}\``, ErrorCode.PC_INVALID_LET_INITIALIZER);
    }
}

export class NumericTypeExpected extends OrElse {
    /**
     * @param operatorSpan the operator that needs a numeric operand, if any
     */
    constructor(readonly span: Span, private readonly ty: SymTy, private readonly operatorSpan?: Span) {
        super();
    }

    diagnostic(): CheckDiagnostic {
        const diagnostic = CheckDiagnostic.error(this.span, `expected a numeric type, found \`${this.ty}\``, ErrorCode.PC_NUMERIC_TYPE_EXPECTED);
        if (this.operatorSpan) {
            diagnostic.label(DiagnosticLevel.Info, this.operatorSpan, 'this operator requires numeric operands');
        }
        return diagnostic;
    }
}

export class OperandsMustMatch extends OrElse {
    constructor(readonly span: Span, private readonly lhs: SymTy, private readonly rhs: SymTy) {
        super();
    }

    diagnostic(): CheckDiagnostic {
        return CheckDiagnostic.error(this.span, `operands must have the same type, found \`${this.lhs}\` and \`${this.rhs}\``, ErrorCode.PC_OPERANDS_MUST_MATCH);
    }
}

export class BooleanExpected extends OrElse {
    constructor(readonly span: Span, private readonly ty: SymTy) {
        super();
    }

    diagnostic(): CheckDiagnostic {
        return CheckDiagnostic.error(this.span, `expected \`bool\`, found \`${this.ty}\``, ErrorCode.PC_BOOLEAN_EXPECTED);
    }
}

export class AwaitNonFuture extends OrElse {
    constructor(readonly span: Span, private readonly futureSpan: Span, private readonly ty: SymTy) {
        super();
    }

    diagnostic(): CheckDiagnostic {
        return CheckDiagnostic.error(this.span, `\`await\` requires a future, found \`${this.ty}\``, ErrorCode.PC_AWAIT_NON_FUTURE)
            .label(DiagnosticLevel.Info, this.futureSpan, `this has type \`${this.ty}\``);
    }
}

const PREDICATE_CODES: Record<Predicate, ErrorCode> = {
    [Predicate.Copy]: ErrorCode.PC_NOT_COPY,
    [Predicate.Move]: ErrorCode.PC_NOT_MOVE,
    [Predicate.Owned]: ErrorCode.PC_NOT_OWNED,
    [Predicate.Lent]: ErrorCode.PC_NOT_LENT,
};

/** A term had to satisfy a predicate. */
export class PredicateRequired extends OrElse {
    constructor(readonly span: Span, private readonly term: SymGenericTerm, private readonly predicate: Predicate) {
        super();
    }

    diagnostic(): CheckDiagnostic {
        return CheckDiagnostic.error(this.span, `\`${termToString(this.term)}\` is not ${this.predicate}`, PREDICATE_CODES[this.predicate]);
    }
}

export class WhereClauseNotSatisfied extends OrElse {
    constructor(readonly span: Span, private readonly clauseSpan: Span, private readonly subject: SymGenericTerm, private readonly predicate: Predicate) {
        super();
    }

    diagnostic(): CheckDiagnostic {
        return CheckDiagnostic.error(this.span, `where-clause \`${termToString(this.subject)}: ${this.predicate}\` is not satisfied`, ErrorCode.PC_WHERE_CLAUSE_NOT_SATISFIED)
            .label(DiagnosticLevel.Info, this.clauseSpan, 'required by this where-clause');
    }
}
