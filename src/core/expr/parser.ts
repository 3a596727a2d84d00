import { TokenizerError, tokenize, type Token, type TokenType } from './tokenizer.js';
import type { BinaryOperator, Expr, ExprError, ParseResult } from './ast.js';

// Precedence levels; unary minus/plus sits between multiplicative and power,
// so -2 ** 2 is -(2 ** 2) while -2 * 3 is (-2) * 3
const PRECEDENCE: Record<BinaryOperator, number> = {
    '+': 1, '-': 1,
    '*': 2, '/': 2, '%': 2, '//': 2,
    '**': 4
};
const UNARY_PRECEDENCE = 3;

/** Deepest parser recursion (parentheses, unary operators, powers, calls) accepted before giving up. */
export const MAX_DEPTH = 500;

/**
 * Deepest tree accepted. Left-associative chains such as `1 + 1 + ... + 1` are built
 * without recursion, so this sits well above MAX_DEPTH; it bounds the evaluator's recursion.
 */
export const MAX_TREE_DEPTH = 4000;

function isBinaryOperator(value: string): value is BinaryOperator {
    return Object.prototype.hasOwnProperty.call(PRECEDENCE, value);
}

class ParseAbort extends Error {}

export class Parser {
    private tokens: Token[];
    private current = 0;
    private errors: ExprError[] = [];
    private nesting = 0;
    private depths = new WeakMap<Expr, number>();

    constructor(input: string) {
        try {
            this.tokens = tokenize(input);
        } catch (e) {
            if (!(e instanceof TokenizerError)) throw e;
            this.tokens = [{ kind: 'EOF', value: '', range: { start: input.length, end: input.length } }];
            this.errors.push({ message: e.message, range: e.range });
        }
    }

    public parse(): ParseResult {
        if (this.errors.length > 0) {
            return { ok: false, errors: this.errors };
        }

        try {
            if (this.isAtEnd()) {
                throw this.error(this.peek(), 'Empty expression');
            }

            const ast = this.parseExpr(1);

            if (!this.isAtEnd()) {
                const token = this.peek();
                throw this.error(token, token.kind === 'RParen'
                    ? 'Unbalanced parentheses: unexpected ")"'
                    : `Unexpected ${describe(token)} after expression`);
            }

            return { ok: true, ast };
        } catch (e) {
            if (e instanceof ParseAbort) {
                return { ok: false, errors: this.errors };
            }
            throw e;
        }
    }

    private parseExpr(minPrecedence: number): Expr {
        if (++this.nesting > MAX_DEPTH) {
            throw this.error(this.peek(), 'Expression nested too deeply');
        }

        let left = this.parsePrefix();

        while (this.peek().kind === 'Op') {
            const op = this.peek().value;
            if (!isBinaryOperator(op)) break;

            const precedence = PRECEDENCE[op];
            if (precedence < minPrecedence) break;
            this.advance();

            // '**' is right-associative and its right operand may itself be unary (2 ** -1)
            const right = op === '**'
                ? this.parseExpr(UNARY_PRECEDENCE)
                : this.parseExpr(precedence + 1);

            left = this.node({
                kind: 'Binary',
                op,
                left,
                right,
                range: { start: left.range.start, end: right.range.end }
            }, [left, right]);
        }

        this.nesting--;
        return left;
    }

    private parsePrefix(): Expr {
        if (this.isAtEnd()) {
            throw this.error(this.peek(), 'Unexpected end of expression');
        }

        const token = this.advance();

        if (token.kind === 'Number') {
            const value = Number(token.value);
            if (!Number.isFinite(value)) {
                throw this.error(token, `Number literal out of range: '${token.value}'`);
            }
            return this.node({ kind: 'Number', value, raw: token.value, range: token.range }, []);
        }

        // Ident or Call
        if (token.kind === 'Ident') {
            if (this.match('LParen')) {
                const args = this.parseList('RParen');
                const rparen = this.consume('RParen', 'Unbalanced parentheses: expected ")" after function arguments');
                return this.node({
                    kind: 'Call',
                    callee: token.value,
                    args,
                    range: { start: token.range.start, end: rparen.range.end }
                }, args);
            }
            return this.node({ kind: 'Ident', name: token.value, range: token.range }, []);
        }

        // Grouping adds no node of its own
        if (token.kind === 'LParen') {
            const expr = this.parseExpr(1);
            this.consume('RParen', 'Unbalanced parentheses: expected ")"');
            return expr;
        }

        if (token.kind === 'LBracket') {
            const elements = this.parseList('RBracket');
            const closing = this.consume('RBracket', 'Unbalanced brackets: expected "]"');
            return this.node({
                kind: 'List',
                elements,
                range: { start: token.range.start, end: closing.range.end }
            }, elements);
        }

        if (token.kind === 'Op') {
            const op = token.value;
            if (op === '-' || op === '+') {
                const operand = this.parseExpr(UNARY_PRECEDENCE);
                return this.node({
                    kind: 'Unary',
                    op,
                    expr: operand,
                    range: { start: token.range.start, end: operand.range.end }
                }, [operand]);
            }
        }

        throw this.error(token, `Unexpected ${describe(token)}`);
    }

    /** Comma-separated expressions up to (not including) the closing token; a trailing comma is allowed. */
    private parseList(closing: TokenType): Expr[] {
        const items: Expr[] = [];
        while (!this.check(closing)) {
            items.push(this.parseExpr(1));
            if (!this.match('Comma')) break;
        }
        return items;
    }

    /** Records the depth of a freshly built node and rejects trees deeper than MAX_TREE_DEPTH. */
    private node(expr: Expr, children: Expr[]): Expr {
        const depth = 1 + children.reduce((max, child) => Math.max(max, this.depths.get(child) ?? 1), 0);
        if (depth > MAX_TREE_DEPTH) {
            throw this.error(this.peek(), 'Expression nested too deeply');
        }
        this.depths.set(expr, depth);
        return expr;
    }

    // Helpers
    private isAtEnd(): boolean {
        return this.peek().kind === 'EOF';
    }

    private peek(): Token {
        return this.tokens[this.current];
    }

    private advance(): Token {
        if (!this.isAtEnd()) this.current++;
        return this.tokens[this.current - 1];
    }

    private check(kind: TokenType): boolean {
        if (this.isAtEnd()) return false;
        return this.peek().kind === kind;
    }

    private match(kind: TokenType): boolean {
        if (this.check(kind)) {
            this.advance();
            return true;
        }
        return false;
    }

    private consume(kind: TokenType, message: string): Token {
        if (this.check(kind)) return this.advance();
        throw this.error(this.peek(), message);
    }

    private error(token: Token, message: string): ParseAbort {
        this.errors.push({ message, range: token.range });
        return new ParseAbort(message); // Throw to unwind
    }
}

function describe(token: Token): string {
    switch (token.kind) {
        case 'EOF':
            return 'end of expression';
        case 'Number':
            return `number '${token.value}'`;
        case 'Ident':
            return `name '${token.value}'`;
        case 'Op':
            return `operator '${token.value}'`;
        default:
            return `'${token.value}'`;
    }
}

export function parseExpression(input: string): ParseResult {
    return new Parser(input).parse();
}
