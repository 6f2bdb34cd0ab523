import {
    Diagnostic, DiagnosticRelatedInformation, DiagnosticSeverity, Location
} from 'vscode-languageserver-types';
import type { Span } from '../ast/unchecked-ast.js';
import { ErrorCode } from '../codes/errors.js';

export enum DiagnosticLevel {
    Error = 'error',
    Warning = 'warning',
    Info = 'info',
    Help = 'help',
    Note = 'note',
}

export interface DiagnosticLabel {
    readonly level: DiagnosticLevel;
    readonly span: Span;
    readonly message: string;
}

/**
 * A structured diagnostic: a primary message with labelled spans, nested
 * child diagnostics and the chain of reasons that led to it.
 */
export class CheckDiagnostic {
    readonly labels: DiagnosticLabel[] = [];
    readonly children: CheckDiagnostic[] = [];
    /** Explanatory notes, outermost reason first */
    readonly because: string[] = [];

    constructor(
        readonly level: DiagnosticLevel,
        readonly span: Span,
        readonly message: string,
        readonly code?: ErrorCode,
    ) { }

    static error(span: Span, message: string, code?: ErrorCode): CheckDiagnostic {
        return new CheckDiagnostic(DiagnosticLevel.Error, span, message, code);
    }

    static note(span: Span, message: string): CheckDiagnostic {
        return new CheckDiagnostic(DiagnosticLevel.Note, span, message);
    }

    label(level: DiagnosticLevel, span: Span, message: string): this {
        this.labels.push({ level, span, message });
        return this;
    }

    child(diagnostic: CheckDiagnostic): this {
        this.children.push(diagnostic);
        return this;
    }

    becauseOf(note: string): this {
        this.because.push(note);
        return this;
    }

    toLspDiagnostic(uri: string): Diagnostic {
        const related: DiagnosticRelatedInformation[] = [
            ...this.labels.map(label => DiagnosticRelatedInformation.create(Location.create(uri, label.span), label.message)),
            ...this.children.map(child => DiagnosticRelatedInformation.create(Location.create(uri, child.span), child.message)),
        ];
        const message = [this.message, ...this.because.map(note => `because ${note}`)].join('\n');
        const diagnostic = Diagnostic.create(this.span, message, toSeverity(this.level), this.code, 'perm');
        if (related.length > 0) {
            diagnostic.relatedInformation = related;
        }
        return diagnostic;
    }

    toString(): string {
        const position = `${this.span.start.line + 1}:${this.span.start.character + 1}`;
        const code = this.code ? ` [${this.code}]` : '';
        return `${this.level}${code} at ${position}: ${this.message}`;
    }
}

function toSeverity(level: DiagnosticLevel): DiagnosticSeverity {
    switch (level) {
        case DiagnosticLevel.Error: return DiagnosticSeverity.Error;
        case DiagnosticLevel.Warning: return DiagnosticSeverity.Warning;
        case DiagnosticLevel.Info: return DiagnosticSeverity.Information;
        case DiagnosticLevel.Help:
        case DiagnosticLevel.Note: return DiagnosticSeverity.Hint;
    }
}

let nextReportedId = 0;

/**
 * Evidence that a diagnostic has been recorded.
 *
 * Thrown to abandon a check that already reported its failure, and embedded in
 * error terms so later stages do not report the same problem twice.
 */
export class Reported extends Error {
    readonly id = ++nextReportedId;

    constructor(readonly diagnostic: CheckDiagnostic) {
        super(diagnostic.message);
        this.name = 'Reported';
    }

    get span(): Span {
        return this.diagnostic.span;
    }
}

/** Something diagnostics can be reported to. */
export interface Reporter {
    report(diagnostic: CheckDiagnostic): Reported;
}

export class DiagnosticSink implements Reporter {
    private readonly recorded: CheckDiagnostic[] = [];

    report(diagnostic: CheckDiagnostic): Reported {
        this.recorded.push(diagnostic);
        return new Reported(diagnostic);
    }

    get diagnostics(): readonly CheckDiagnostic[] {
        return this.recorded;
    }

    get hasErrors(): boolean {
        return this.recorded.some(diagnostic => diagnostic.level === DiagnosticLevel.Error);
    }

    toLspDiagnostics(uri: string): Diagnostic[] {
        return this.recorded.map(diagnostic => diagnostic.toLspDiagnostic(uri));
    }
}

/** A broken internal assumption. Never caught by the checker. */
export class InvariantViolation extends Error {
    constructor(message: string) {
        super(`invariant violated: ${message}`);
        this.name = 'InvariantViolation';
    }
}
