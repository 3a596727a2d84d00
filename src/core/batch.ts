import type { Session } from './session.js';
import type { EvalResult } from '../types/diagnostic.js';
import { normalize } from './expr/normalize.js';

export type BatchMode = 'sequential' | 'concurrent';

export interface BatchOptions {
    mode?: BatchMode;
    /** Per-expression limit in milliseconds; unset or 0 means no limit. */
    timeoutMs?: number;
}

export interface BatchEntry {
    index: number;
    expression: string;
    result: EvalResult;
}

export interface BatchSummary {
    total: number;
    passed: number;
    failed: number;
}

/**
 * Settles `pending` or, after `timeoutMs`, a Timeout error result for `expression`.
 * The timer is always cleared so nothing is left running.
 */
export async function withTimeout(
    pending: Promise<EvalResult>,
    expression: string,
    timeoutMs?: number
): Promise<EvalResult> {
    if (!timeoutMs || timeoutMs <= 0) return pending;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<EvalResult>(resolve => {
        timer = setTimeout(() => resolve({
            ok: false,
            error: { kind: 'Timeout', message: `Evaluation timed out after ${timeoutMs}ms` },
            expression,
            normalized: normalize(expression)
        }), timeoutMs);
    });

    try {
        return await Promise.race([pending, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Evaluates every expression and returns one entry per input, in input order.
 * A failing or timed-out expression never affects its siblings.
 */
export async function evaluateBatch(
    session: Session,
    expressions: string[],
    options: BatchOptions = {}
): Promise<BatchEntry[]> {
    const run = (expression: string) => withTimeout(session.evaluate(expression), expression, options.timeoutMs);

    if (options.mode === 'concurrent') {
        const results = await Promise.all(expressions.map(run));
        return results.map((result, index) => ({ index, expression: expressions[index], result }));
    }

    const entries: BatchEntry[] = [];
    for (const [index, expression] of expressions.entries()) {
        entries.push({ index, expression, result: await run(expression) });
    }
    return entries;
}

export function summarize(entries: BatchEntry[]): BatchSummary {
    const passed = entries.filter(e => e.result.ok).length;
    return { total: entries.length, passed, failed: entries.length - passed };
}

/** Splits batch input into expressions: one per line, skipping blank lines and `#` comments. */
export function splitExpressions(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line !== '' && !line.startsWith('#'));
}
