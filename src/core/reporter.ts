import type { Diagnostic, EvalResult, Severity } from '../types/diagnostic.js';
import type { BatchEntry, BatchSummary } from './batch.js';
import type { Expr } from './expr/ast.js';
import ansis from 'ansis';

export type OutputFormat = 'pretty' | 'plain' | 'json' | 'compact';
export type ColorMode = 'auto' | 'always' | 'never';

export interface ReporterOptions {
    color: ColorMode;
    format: OutputFormat;
    /** Significant digits for results; unset prints the full value. */
    precision?: number;
    verbose?: boolean;
}

export function formatNumber(value: number, precision?: number): string {
    const shown = precision === undefined ? value : Number(value.toPrecision(precision));
    // -0 prints as 0
    return String(shown === 0 ? 0 : shown);
}

export class Reporter {
    private options: ReporterOptions;
    private shouldColor: boolean;
    private startTime: number;

    constructor(options: ReporterOptions) {
        this.options = options;
        this.shouldColor = this.shouldUseColor();
        this.startTime = Date.now();
    }

    private shouldUseColor(): boolean {
        if (this.options.color === 'never') return false;
        if (this.options.color === 'always') return true;
        if (this.options.format === 'plain' || this.options.format === 'json') return false;

        // auto mode: check environment
        const hasNoColor = process.env.NO_COLOR !== undefined;
        const hasForceColor = process.env.FORCE_COLOR !== undefined;
        const isTTY = Boolean(process.stdout.isTTY);

        return !hasNoColor && (hasForceColor || isTTY);
    }

    private getElapsedTime(): string {
        const elapsed = Date.now() - this.startTime;
        return (elapsed / 1000).toFixed(2);
    }

    private colorize(text: string, color: (text: string) => string): string {
        return this.shouldColor ? color(text) : text;
    }

    private getSeverityColor(severity: Severity): (text: string) => string {
        return severity === 'error' ? ansis.red : ansis.yellow;
    }

    formatValue(value: number): string {
        return formatNumber(value, this.options.precision);
    }

    /** One result, as printed in the selected format (json yields a single JSON line). */
    formatResult(result: EvalResult, index?: number): string {
        const { expression } = result;

        if (this.options.format === 'json') {
            const base = index === undefined ? { expression } : { index, expression };
            return JSON.stringify(result.ok
                ? { ...base, ok: true, value: result.value }
                : { ...base, ok: false, error: result.error });
        }

        if (this.options.format === 'compact') {
            return result.ok
                ? `${expression} = ${this.formatValue(result.value)}`
                : `${expression} [${result.error.kind}] E: ${result.error.message}`;
        }

        if (result.ok) {
            const icon = this.colorize('✓', ansis.green);
            const value = this.colorize(this.formatValue(result.value), ansis.bold);
            return `  ${icon} ${this.colorize(expression, ansis.cyan)}  =  ${value}`;
        }

        const icon = this.colorize('✖', ansis.red);
        const kind = this.colorize(`[${result.error.kind}]`, ansis.red);
        return `  ${icon} ${this.colorize(expression, ansis.cyan)}  ${kind}  ${result.error.message}`;
    }

    /** Points at the offending part of the normalized expression, when the error carries a span. */
    formatContext(result: EvalResult): string | undefined {
        if (result.ok || !result.error.span || this.options.format === 'json' || this.options.format === 'compact') {
            return undefined;
        }
        const { start, end } = result.error.span;
        const marker = ' '.repeat(start) + '^'.repeat(Math.max(1, end - start));
        return this.colorize(`    ↳ ${result.normalized}\n      ${marker}`, ansis.dim);
    }

    printResult(result: EvalResult, index?: number): void {
        console.log(this.formatResult(result, index));
        const context = this.formatContext(result);
        if (context) console.log(context);
    }

    printBatch(entries: BatchEntry[]): void {
        for (const entry of entries) {
            this.printResult(entry.result, entry.index);
        }
    }

    printBanner(version: string, count: number): void {
        if (this.options.format !== 'pretty' && this.options.format !== 'plain') {
            return;
        }

        const header = this.colorize(`┌ safecalc ${version}  •  Evaluating ${count} expression${count === 1 ? '' : 's'}`, ansis.bold);
        const divider = this.colorize('└────────────────────────────────────────────────────────', ansis.dim);

        console.log(header);
        console.log(divider);
        console.log();
    }

    printSummary(summary: BatchSummary): void {
        if (this.options.format === 'json') {
            console.log(JSON.stringify({
                summary,
                timing: { elapsedSeconds: this.getElapsedTime() }
            }));
            return;
        }

        if (this.options.format === 'compact') {
            console.log(`Summary: ${summary.passed} passed, ${summary.failed} failed (${this.getElapsedTime()}s)`);
            return;
        }

        const divider = this.colorize('────────────────────────────────────────────────────────', ansis.dim);
        console.log();
        console.log(divider);
        console.log(this.colorize('Summary', ansis.bold));
        console.log();

        console.log(this.colorize('Expressions:', ansis.cyan) + ` ${summary.total}`);
        const passedStr = this.colorize(`Passed: ${summary.passed}`, ansis.green);
        const failedStr = this.colorize(`Failed: ${summary.failed}`, summary.failed > 0 ? ansis.red : ansis.dim);
        console.log(`  ${passedStr}  ${failedStr}`);
        console.log();

        console.log(this.colorize(`Evaluated ${summary.total} expressions in ${this.getElapsedTime()}s`, ansis.dim));
        const exitCode = summary.failed > 0 ? 1 : 0;
        console.log(this.colorize(`Exit code: ${exitCode}`, exitCode === 0 ? ansis.green : ansis.red));
    }

    printAst(ast: Expr): void {
        console.log(JSON.stringify(ast, null, this.options.format === 'json' ? undefined : 2));
    }

    printDiagnostic(diagnostic: Diagnostic): void {
        const { file, code, message, severity, range } = diagnostic;
        if (this.options.format === 'json') {
            console.error(JSON.stringify(diagnostic));
            return;
        }

        const location = range ? `:${range.start.line}:${range.start.col}` : '';
        const label = this.colorize(severity.toUpperCase(), this.getSeverityColor(severity));
        const coloredCode = this.colorize(`[${code}]`, ansis.cyan);
        console.error(`${label}  ${coloredCode}  ${this.colorize(`${file}${location}`, ansis.bold)}  ${message}`);
    }

    printError(message: string): void {
        if (this.options.format === 'json') {
            console.error(JSON.stringify({ error: message }));
            return;
        }

        console.error(this.colorize(`Error: ${message}`, ansis.red));
    }

    printWarning(message: string): void {
        if (this.options.format === 'json') {
            console.warn(JSON.stringify({ warning: message }));
            return;
        }

        console.warn(this.colorize(`Warning: ${message}`, ansis.yellow));
    }

    printInfo(message: string): void {
        if (this.options.format === 'json') return;

        console.log(this.colorize(message, ansis.dim));
    }

    printDebug(message: string): void {
        if (!this.options.verbose) return;
        console.error(this.colorize(`debug: ${message}`, ansis.gray));
    }
}
