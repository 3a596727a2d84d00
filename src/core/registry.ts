import { ExpressionError } from './errors.js';
import { describeValue, isList, isNumber, type Value } from './value.js';

export type AngleUnit = 'degrees' | 'radians';

export type RegistryEntry =
    | { kind: 'constant'; value: number; description: string }
    | {
        kind: 'function';
        minArity: number;
        maxArity: number;
        description: string;
        call: (args: Value[]) => number;
    };

/** Read access to the owning session's memory cell. */
export interface MemoryHandle {
    recall(): number;
}

export interface RegistryOptions {
    memory: MemoryHandle;
    angles?: AngleUnit;
}

function numberArg(fn: string, args: Value[], index: number): number {
    const arg = args[index];
    if (arg.kind !== 'number') {
        throw new ExpressionError('TypeMismatch', `${fn}() expects a number, got ${describeValue(arg)}`);
    }
    return arg.value;
}

function domainError(fn: string, detail: string): ExpressionError {
    return new ExpressionError('DomainError', `${fn}(): ${detail}`);
}

function roundHalfEven(x: number, digits: number): number {
    const factor = 10 ** Math.abs(digits);
    if (!Number.isFinite(factor)) return digits > 0 ? x : 0;

    const scaled = digits >= 0 ? x * factor : x / factor;
    if (!Number.isFinite(scaled)) return x;

    const floor = Math.floor(scaled);
    const diff = scaled - floor;
    let rounded: number;
    if (diff > 0.5) rounded = floor + 1;
    else if (diff < 0.5) rounded = floor;
    else rounded = floor % 2 === 0 ? floor : floor + 1;

    // avoid -0 leaking into output
    const result = digits >= 0 ? rounded / factor : rounded * factor;
    return result === 0 ? 0 : result;
}

function factorial(x: number): number {
    const n = Math.trunc(x);
    if (n < 0) throw domainError('factorial', 'not defined for negative values');
    let result = 1;
    for (let i = 2; i <= n; i++) {
        result *= i;
        if (!Number.isFinite(result)) throw domainError('factorial', 'result too large');
    }
    return result;
}

function sumList(args: Value[]): number {
    const list = args[0];
    if (!isList(list)) {
        throw new ExpressionError('TypeMismatch', `sum() expects a list, got ${describeValue(list)}`);
    }
    let total = args.length > 1 ? numberArg('sum', args, 1) : 0;
    for (const item of list.items) {
        if (!isNumber(item)) {
            throw new ExpressionError('TypeMismatch', `sum() list items must be numbers, got ${describeValue(item)}`);
        }
        total += item.value;
    }
    return total;
}

type UnaryFn = (x: number) => number;

function unary(name: string, description: string, fn: UnaryFn): RegistryEntry {
    return {
        kind: 'function',
        minArity: 1,
        maxArity: 1,
        description,
        call: args => fn(numberArg(name, args, 0))
    };
}

function buildEntries(options: RegistryOptions): Map<string, RegistryEntry> {
    const degrees = (options.angles ?? 'degrees') === 'degrees';
    const toRadians = (x: number) => degrees ? x * Math.PI / 180 : x;
    const fromRadians = (x: number) => degrees ? x * 180 / Math.PI : x;
    const unit = degrees ? 'degrees' : 'radians';

    const inverse = (name: string, fn: UnaryFn): UnaryFn => x => {
        if (x < -1 || x > 1) throw domainError(name, 'argument must be between -1 and 1');
        return fromRadians(fn(x));
    };

    const entries = new Map<string, RegistryEntry>();

    entries.set('pi', { kind: 'constant', value: Math.PI, description: 'Ratio of a circle\'s circumference to its diameter.' });
    entries.set('e', { kind: 'constant', value: Math.E, description: 'Euler\'s number.' });
    entries.set('tau', { kind: 'constant', value: 2 * Math.PI, description: 'Two pi.' });

    entries.set('sin', unary('sin', `Sine of an angle in ${unit}.`, x => Math.sin(toRadians(x))));
    entries.set('cos', unary('cos', `Cosine of an angle in ${unit}.`, x => Math.cos(toRadians(x))));
    entries.set('tan', unary('tan', `Tangent of an angle in ${unit}.`, x => Math.tan(toRadians(x))));
    entries.set('asin', unary('asin', `Arc sine, in ${unit}.`, inverse('asin', Math.asin)));
    entries.set('acos', unary('acos', `Arc cosine, in ${unit}.`, inverse('acos', Math.acos)));
    entries.set('atan', unary('atan', `Arc tangent, in ${unit}.`, x => fromRadians(Math.atan(x))));

    entries.set('sqrt', unary('sqrt', 'Square root.', x => {
        if (x < 0) throw domainError('sqrt', 'argument must not be negative');
        return Math.sqrt(x);
    }));

    entries.set('log', {
        kind: 'function',
        minArity: 1,
        maxArity: 2,
        description: 'Natural logarithm, or logarithm to the base given as second argument.',
        call: args => {
            const x = numberArg('log', args, 0);
            if (x <= 0) throw domainError('log', 'argument must be positive');
            if (args.length === 1) return Math.log(x);

            const base = numberArg('log', args, 1);
            if (base <= 0) throw domainError('log', 'base must be positive');
            if (base === 1) throw new ExpressionError('DivisionByZero', 'log(): base 1 divides by zero');
            return Math.log(x) / Math.log(base);
        }
    });
    entries.set('log10', unary('log10', 'Base-10 logarithm.', x => {
        if (x <= 0) throw domainError('log10', 'argument must be positive');
        return Math.log10(x);
    }));

    entries.set('abs', unary('abs', 'Absolute value.', Math.abs));
    entries.set('floor', unary('floor', 'Largest integer not greater than the argument.', Math.floor));
    entries.set('ceil', unary('ceil', 'Smallest integer not less than the argument.', Math.ceil));

    // Ties go to the even neighbour; the optional second argument is the number of decimal places
    entries.set('round', {
        kind: 'function',
        minArity: 1,
        maxArity: 2,
        description: 'Round half to even, optionally to a number of decimal places.',
        call: args => {
            const x = numberArg('round', args, 0);
            const digits = args.length > 1 ? numberArg('round', args, 1) : 0;
            if (!Number.isInteger(digits)) {
                throw new ExpressionError('TypeMismatch', 'round(): number of decimal places must be an integer');
            }
            return roundHalfEven(x, digits);
        }
    });

    const fact = unary('factorial', 'Factorial of the argument truncated to an integer.', factorial);
    entries.set('fact', fact);
    entries.set('factorial', fact);

    entries.set('sum', {
        kind: 'function',
        minArity: 1,
        maxArity: 2,
        description: 'Sum of a list such as [1, 2, 3], plus an optional start value.',
        call: sumList
    });

    entries.set('mem', {
        kind: 'function',
        minArity: 0,
        maxArity: 0,
        description: 'Current memory value.',
        call: () => options.memory.recall()
    });

    return entries;
}

/**
 * Allow-list of names an expression may use. Static entries are fixed at construction;
 * `mem` reads through the memory handle each time it is called.
 */
export class Registry {
    private readonly entries: ReadonlyMap<string, RegistryEntry>;

    constructor(options: RegistryOptions) {
        const entries = buildEntries(options);
        for (const entry of entries.values()) Object.freeze(entry);
        this.entries = entries;
    }

    get(name: string): RegistryEntry | undefined {
        return this.entries.get(name);
    }

    has(name: string): boolean {
        return this.entries.has(name);
    }

    names(): string[] {
        return Array.from(this.entries.keys()).sort();
    }
}
