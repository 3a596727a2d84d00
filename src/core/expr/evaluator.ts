import { ExpressionError } from '../errors.js';
import type { Registry } from '../registry.js';
import { createList, createNumber, describeValue, isNumber, type Value } from '../value.js';
import type { BinaryOperator, Expr, UnaryOperator } from './ast.js';
import type { Span } from '../../types/diagnostic.js';

function kindOf(node: unknown): string {
    if (typeof node === 'object' && node !== null && 'kind' in node) {
        return String(node.kind);
    }
    return typeof node;
}

function expectNumber(v: Value, context: string, span: Span): number {
    if (!isNumber(v)) {
        throw new ExpressionError('TypeMismatch', `${context} needs a number, got ${describeValue(v)}`, span);
    }
    return v.value;
}

function finite(value: number, context: string, span: Span): number {
    if (Number.isNaN(value)) {
        throw new ExpressionError('DomainError', `${context} is undefined`, span);
    }
    if (!Number.isFinite(value)) {
        throw new ExpressionError('DomainError', `${context} is out of range`, span);
    }
    return value;
}

function power(base: number, exponent: number, span: Span): number {
    if (base === 0 && exponent < 0) {
        throw new ExpressionError('DivisionByZero', 'Zero cannot be raised to a negative power', span);
    }
    if (base < 0 && !Number.isInteger(exponent)) {
        throw new ExpressionError('DomainError', 'Negative base with a fractional exponent has no real result', span);
    }
    return base ** exponent;
}

/** Floor division taken from the remainder so it agrees with `%` on fractional operands (`7 // 0.1` is 69). */
export function floorDivide(left: number, right: number): number {
    const rem = left % right;
    let div = (left - rem) / right;
    if (rem !== 0 && (rem < 0) !== (right < 0)) div -= 1;
    if (div === 0) return 0;

    let floored = Math.floor(div);
    if (div - floored > 0.5) floored += 1;
    return floored;
}

export function applyBinary(op: BinaryOperator, left: number, right: number, span: Span): number {
    switch (op) {
        case '+': return left + right;
        case '-': return left - right;
        case '*': return left * right;
        case '/':
            if (right === 0) throw new ExpressionError('DivisionByZero', 'Division by zero', span);
            return left / right;
        case '//':
            if (right === 0) throw new ExpressionError('DivisionByZero', 'Floor division by zero', span);
            return floorDivide(left, right);
        case '%': {
            if (right === 0) throw new ExpressionError('DivisionByZero', 'Modulo by zero', span);
            // Result takes the sign of the divisor
            const rem = left % right;
            return rem !== 0 && (rem < 0) !== (right < 0) ? rem + right : rem;
        }
        case '**': return power(left, right, span);
        default:
            throw new ExpressionError('UnsupportedExpression', `Operator not allowed: ${String(op)}`, span);
    }
}

export function applyUnary(op: UnaryOperator, operand: number, span: Span): number {
    switch (op) {
        case '-': return -operand;
        case '+': return operand;
        default:
            throw new ExpressionError('UnsupportedExpression', `Unary operator not allowed: ${String(op)}`, span);
    }
}

/**
 * Walks an expression tree against the allow-list in `registry`.
 * Only the node kinds of `Expr` are accepted; anything else is rejected rather than interpreted.
 */
export function evaluateExpr(node: Expr, registry: Registry): Value {
    switch (node.kind) {
        case 'Number':
            return createNumber(node.value);

        case 'Binary': {
            const left = evaluateExpr(node.left, registry);
            const right = evaluateExpr(node.right, registry);
            const context = `Operator '${node.op}'`;
            const result = applyBinary(
                node.op,
                expectNumber(left, context, node.range),
                expectNumber(right, context, node.range),
                node.range
            );
            return createNumber(finite(result, `Result of '${node.op}'`, node.range));
        }

        case 'Unary': {
            const operand = evaluateExpr(node.expr, registry);
            return createNumber(applyUnary(node.op, expectNumber(operand, `Unary '${node.op}'`, node.range), node.range));
        }

        case 'Call':
            return createNumber(evaluateCall(node, registry));

        case 'Ident': {
            const entry = registry.get(node.name);
            if (entry?.kind === 'constant') {
                return createNumber(entry.value);
            }
            const message = entry
                ? `Name '${node.name}' is a function and must be called, e.g. ${node.name}(...)`
                : `Unknown name: '${node.name}'`;
            throw new ExpressionError('UnknownName', message, node.range);
        }

        case 'List':
            return createList(node.elements.map(element => evaluateExpr(element, registry)));

        default:
            throw new ExpressionError('UnsupportedExpression', `Unsupported expression: ${kindOf(node)}`);
    }
}

function evaluateCall(node: Extract<Expr, { kind: 'Call' }>, registry: Registry): number {
    const entry = registry.get(node.callee);
    if (!entry) {
        throw new ExpressionError('UnknownFunction', `Unknown function: '${node.callee}'`, node.range);
    }
    if (entry.kind !== 'function') {
        throw new ExpressionError('NotCallable', `'${node.callee}' is a constant and cannot be called`, node.range);
    }

    const args = node.args.map(arg => evaluateExpr(arg, registry));

    if (args.length < entry.minArity || args.length > entry.maxArity) {
        const expected = entry.minArity === entry.maxArity
            ? `${entry.minArity}`
            : `${entry.minArity} to ${entry.maxArity}`;
        throw new ExpressionError(
            'ArityMismatch',
            `${node.callee}() takes ${expected} argument${entry.maxArity === 1 ? '' : 's'}, got ${args.length}`,
            node.range
        );
    }

    try {
        return finite(entry.call(args), `Result of ${node.callee}()`, node.range);
    } catch (e) {
        if (e instanceof ExpressionError && !e.span) {
            e.span = node.range;
        }
        throw e;
    }
}

/** Evaluates a whole expression, which must reduce to a single number. */
export function evaluateToNumber(node: Expr, registry: Registry): number {
    const value = evaluateExpr(node, registry);
    if (!isNumber(value)) {
        throw new ExpressionError(
            'TypeMismatch',
            `Expression must produce a number, got ${describeValue(value)}`,
            node.range
        );
    }
    return value.value;
}
