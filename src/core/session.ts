import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { ExpressionError } from './errors.js';
import { evaluateToNumber } from './expr/evaluator.js';
import { normalize } from './expr/normalize.js';
import { parseExpression } from './expr/parser.js';
import { Registry, type AngleUnit, type MemoryHandle, type RegistryEntry } from './registry.js';
import type { ParseResult } from './expr/ast.js';
import type { EvalError, EvalResult } from '../types/diagnostic.js';

export interface CatalogEntry {
    name: string;
    kind: RegistryEntry['kind'];
    description: string;
}

export interface SessionOptions {
    angles?: AngleUnit;
    memory?: number;
}

/** The single mutable slot of a session. Loads and stores are plain assignments. */
export class MemoryCell implements MemoryHandle {
    private value: number;

    constructor(initial = 0) {
        this.value = initial;
    }

    recall(): number {
        return this.value;
    }

    store(value: number): void {
        this.value = value;
    }
}

export class Session {
    private readonly memory: MemoryCell;
    private readonly registry: Registry;
    public readonly angles: AngleUnit;

    constructor(options: SessionOptions = {}) {
        this.angles = options.angles ?? 'degrees';
        this.memory = new MemoryCell(options.memory ?? 0);
        this.registry = new Registry({ memory: this.memory, angles: this.angles });
    }

    /** Names available to expressions, sorted, with their descriptions. */
    catalog(): CatalogEntry[] {
        return this.registry.names().flatMap(name => {
            const entry = this.registry.get(name);
            return entry ? [{ name, kind: entry.kind, description: entry.description }] : [];
        });
    }

    /** Normalizes and parses without evaluating. */
    parse(expression: string): ParseResult {
        return parseExpression(normalize(expression));
    }

    evaluateSync(expression: string): EvalResult {
        const normalized = normalize(expression);
        const parsed = parseExpression(normalized);

        if (!parsed.ok) {
            const [first] = parsed.errors;
            const error: EvalError = {
                kind: 'ParseError',
                message: parsed.errors.map(e => e.message).join('; '),
                span: first.range
            };
            return { ok: false, error, expression, normalized };
        }

        try {
            const value = evaluateToNumber(parsed.ast, this.registry);
            return { ok: true, value, expression, normalized };
        } catch (e) {
            if (e instanceof ExpressionError) {
                return { ok: false, error: e.toEvalError(), expression, normalized };
            }
            throw e;
        }
    }

    /** Yields once so that concurrently scheduled evaluations interleave, then evaluates. */
    async evaluate(expression: string): Promise<EvalResult> {
        await yieldToEventLoop();
        return this.evaluateSync(expression);
    }

    store(value: number): void {
        if (!Number.isFinite(value)) {
            throw new RangeError(`Cannot store non-finite value ${value} in memory`);
        }
        this.memory.store(value);
    }

    recall(): number {
        return this.memory.recall();
    }

    clear(): void {
        this.memory.store(0);
    }
}
