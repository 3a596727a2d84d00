import { readFileSync } from 'fs';
import path from 'path';
import fg from 'fast-glob';
import { evaluateBatch, splitExpressions, summarize } from '../core/batch.js';
import type { Settings } from '../core/config.js';
import type { Reporter } from '../core/reporter.js';
import { Session } from '../core/session.js';

export interface BatchInput {
    expressions: string[];
    files: string[];
}

export function createSession(settings: Settings): Session {
    return new Session({ angles: settings.angles, memory: settings.memory });
}

/** Expands glob patterns (relative to `cwd`) and reads one expression per line from each match. */
export async function collectBatchInput(patterns: string[], cwd: string): Promise<BatchInput> {
    const matches = await fg(patterns, { cwd, absolute: true, onlyFiles: true, ignore: ['**/node_modules/**'] });
    const files = matches.sort((a, b) => a.localeCompare(b));
    const expressions = files.flatMap(file => splitExpressions(readFileSync(file, 'utf8')));
    return { expressions, files };
}

export async function readStdin(): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf8');
}

/** Evaluates command-line expressions in order. Returns the process exit code. */
export async function runEval(
    expressions: string[],
    settings: Settings,
    reporter: Reporter,
    showAst = false
): Promise<number> {
    const session = createSession(settings);

    if (showAst) {
        let failed = false;
        for (const expression of expressions) {
            const parsed = session.parse(expression);
            if (parsed.ok) {
                reporter.printAst(parsed.ast);
            } else {
                failed = true;
                for (const error of parsed.errors) {
                    reporter.printError(`${expression}: ${error.message} (at offset ${error.range.start})`);
                }
            }
        }
        return failed ? 1 : 0;
    }

    const entries = await evaluateBatch(session, expressions, {
        mode: settings.concurrent ? 'concurrent' : 'sequential',
        timeoutMs: settings.timeout
    });
    reporter.printBatch(entries);
    return summarize(entries).failed > 0 ? 1 : 0;
}

/** Evaluates expressions from files (or stdin when no patterns are given). Returns the exit code. */
export async function runBatch(
    patterns: string[],
    settings: Settings,
    reporter: Reporter,
    version: string,
    cwd = process.cwd()
): Promise<number> {
    let expressions: string[];

    if (patterns.length > 0) {
        const input = await collectBatchInput(patterns, cwd);
        if (input.files.length === 0) {
            reporter.printError(`No files match ${patterns.join(', ')}`);
            return 2;
        }
        for (const file of input.files) {
            reporter.printDebug(`reading ${path.relative(cwd, file) || file}`);
        }
        expressions = input.expressions;
    } else {
        expressions = splitExpressions(await readStdin());
    }

    if (expressions.length === 0) {
        reporter.printWarning('No expressions entered.');
        return 0;
    }

    const session = createSession(settings);
    reporter.printBanner(version, expressions.length);

    const entries = await evaluateBatch(session, expressions, {
        mode: settings.concurrent ? 'concurrent' : 'sequential',
        timeoutMs: settings.timeout
    });
    const summary = summarize(entries);

    reporter.printBatch(entries);
    reporter.printSummary(summary);

    return summary.failed > 0 ? 1 : 0;
}
