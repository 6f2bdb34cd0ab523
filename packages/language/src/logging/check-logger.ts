import chalk, { Chalk } from 'chalk';
import type { CheckDiagnostic } from '../typing/report.js';
import { DiagnosticLevel } from '../typing/report.js';
import type { PermServices } from '../perm-module.js';

/**
 * Trace output for checking sessions.
 *
 * Silent unless `trace` is enabled in the checker configuration. Nested
 * checking steps are indented by depth.
 */
export class CheckLogger {
    private readonly enabled: boolean;

    constructor(services: PermServices) {
        this.enabled = services.config.trace;
    }

    get isEnabled(): boolean {
        return this.enabled;
    }

    log(depth: number, message: string, ...values: unknown[]): void {
        if (!this.enabled) {
            return;
        }
        const rendered = values.map(value => chalk.cyan(String(value))).join(' ');
        console.debug(`${'  '.repeat(depth)}${chalk.gray('│')} ${message}${rendered ? ' ' + rendered : ''}`);
    }

    enter(depth: number, task: string, ...values: unknown[]): void {
        this.log(depth, chalk.bold(task), ...values);
    }

    leave(depth: number, task: string, result: unknown): void {
        this.log(depth, `${chalk.bold(task)} ${chalk.green('=>')}`, result);
    }
}

/** Human-readable rendering of diagnostics, one block per diagnostic. */
export function formatDiagnostics(diagnostics: readonly CheckDiagnostic[], colors = false): string {
    const paint = colors ? chalk : new Chalk({ level: 0 });
    return diagnostics.map(diagnostic => {
        const color = diagnostic.level === DiagnosticLevel.Error ? paint.red : paint.yellow;
        const lines = [color(diagnostic.toString())];
        for (const label of diagnostic.labels) {
            lines.push(`  ${paint.gray(`${label.span.start.line + 1}:${label.span.start.character + 1}`)} ${label.message}`);
        }
        for (const note of diagnostic.because) {
            lines.push(`  ${paint.blue('because')} ${note}`);
        }
        for (const child of diagnostic.children) {
            lines.push(`  ${paint.blue(child.level)}: ${child.message}`);
        }
        return lines.join('\n');
    }).join('\n');
}
