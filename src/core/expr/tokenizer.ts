import type { Span } from '../../types/diagnostic.js';

export type TokenType =
    | 'Number'
    | 'Ident'
    | 'Op'
    | 'LParen'
    | 'RParen'
    | 'LBracket'
    | 'RBracket'
    | 'Comma'
    | 'EOF';

export interface Token {
    kind: TokenType;
    value: string;
    range: Span;
}

export class TokenizerError extends Error {
    constructor(message: string, public range: Span) {
        super(message);
        this.name = 'TokenizerError';
    }
}

// Longest first so '**' and '//' win over '*' and '/'
const OPS = ['**', '//', '*', '/', '%', '+', '-'];

const PUNCTUATION: Record<string, TokenType> = {
    '(': 'LParen',
    ')': 'RParen',
    '[': 'LBracket',
    ']': 'RBracket',
    ',': 'Comma'
};

function isDigit(char: string | undefined): boolean {
    return char !== undefined && char >= '0' && char <= '9';
}

function isLetter(char: string | undefined): boolean {
    return char !== undefined && ((char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z'));
}

function isIdentChar(char: string | undefined): boolean {
    return isLetter(char) || isDigit(char) || char === '_';
}

export function tokenize(input: string): Token[] {
    const tokens: Token[] = [];
    let current = 0;

    while (current < input.length) {
        const char = input[current];

        if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
            current++;
            continue;
        }

        // Number: digits with an optional fraction, or a leading '.', and an optional exponent
        if (isDigit(char) || (char === '.' && isDigit(input[current + 1]))) {
            const start = current;

            while (isDigit(input[current])) current++;
            if (input[current] === '.') {
                current++;
                while (isDigit(input[current])) current++;
            }

            if (input[current] === 'e' || input[current] === 'E') {
                let next = current + 1;
                if (input[next] === '+' || input[next] === '-') next++;
                if (!isDigit(input[next])) {
                    throw new TokenizerError(
                        `Malformed number literal: '${input.slice(start, next)}'`,
                        { start, end: next }
                    );
                }
                current = next;
                while (isDigit(input[current])) current++;
            }

            // '1.2.3' or '2x' would otherwise tokenize as two adjacent operands
            if (input[current] === '.' || isIdentChar(input[current])) {
                let end = current;
                while (input[end] === '.' || isIdentChar(input[end])) end++;
                throw new TokenizerError(
                    `Malformed number literal: '${input.slice(start, end)}'`,
                    { start, end }
                );
            }

            tokens.push({
                kind: 'Number',
                value: input.slice(start, current),
                range: { start, end: current }
            });
            continue;
        }

        if (isLetter(char)) {
            const start = current;
            current++;
            while (isIdentChar(input[current])) current++;

            tokens.push({
                kind: 'Ident',
                value: input.slice(start, current),
                range: { start, end: current }
            });
            continue;
        }

        const op = OPS.find(candidate => input.startsWith(candidate, current));
        if (op) {
            tokens.push({
                kind: 'Op',
                value: op,
                range: { start: current, end: current + op.length }
            });
            current += op.length;
            continue;
        }

        const punctuation = PUNCTUATION[char];
        if (punctuation) {
            tokens.push({ kind: punctuation, value: char, range: { start: current, end: current + 1 } });
            current++;
            continue;
        }

        throw new TokenizerError(`Unexpected character: '${char}'`, { start: current, end: current + 1 });
    }

    tokens.push({ kind: 'EOF', value: '', range: { start: current, end: current } });
    return tokens;
}
