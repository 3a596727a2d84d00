export type NumberValue = { kind: 'number'; value: number };
export type ListValue = { kind: 'list'; items: Value[] };

/** Intermediate results; only a number may leave the evaluator. */
export type Value = NumberValue | ListValue;

export function isNumber(v: Value): v is NumberValue { return v.kind === 'number'; }
export function isList(v: Value): v is ListValue { return v.kind === 'list'; }

export function createNumber(value: number): NumberValue {
    return { kind: 'number', value };
}

export function createList(items: Value[]): ListValue {
    return { kind: 'list', items };
}

export function describeValue(v: Value): string {
    return v.kind === 'number' ? 'number' : `list of ${v.items.length}`;
}
