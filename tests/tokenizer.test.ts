import { describe, it, expect } from 'vitest';
import { tokenize, TokenizerError } from '../src/core/expr/tokenizer.js';

describe('tokenize', () => {
    it('produces tokens with offsets and a trailing EOF', () => {
        expect(tokenize('2 ** .5')).toEqual([
            { kind: 'Number', value: '2', range: { start: 0, end: 1 } },
            { kind: 'Op', value: '**', range: { start: 2, end: 4 } },
            { kind: 'Number', value: '.5', range: { start: 5, end: 7 } },
            { kind: 'EOF', value: '', range: { start: 7, end: 7 } }
        ]);
    });

    it('prefers the two-character operators', () => {
        const ops = tokenize('7 // 2 * 3 ** 2').filter(t => t.kind === 'Op').map(t => t.value);
        expect(ops).toEqual(['//', '*', '**']);
    });

    it('reads exponents and trailing dots in number literals', () => {
        const numbers = tokenize('1e3 + 2.5E-2 + 5.').filter(t => t.kind === 'Number').map(t => t.value);
        expect(numbers).toEqual(['1e3', '2.5E-2', '5.']);
    });

    it('reads identifiers with digits and underscores after the first letter', () => {
        const [token] = tokenize('log10_x');
        expect(token).toEqual({ kind: 'Ident', value: 'log10_x', range: { start: 0, end: 7 } });
    });

    it('recognises brackets, parentheses and commas', () => {
        const kinds = tokenize('sum([1, 2])').map(t => t.kind);
        expect(kinds).toEqual(['Ident', 'LParen', 'LBracket', 'Number', 'Comma', 'Number', 'RBracket', 'RParen', 'EOF']);
    });

    it.each([
        ['1.2.3', "Malformed number literal: '1.2.3'", { start: 0, end: 5 }],
        ['2x', "Malformed number literal: '2x'", { start: 0, end: 2 }],
        ['1e+', "Malformed number literal: '1e+'", { start: 0, end: 3 }],
        ['1 & 2', "Unexpected character: '&'", { start: 2, end: 3 }],
        ['_x', "Unexpected character: '_'", { start: 0, end: 1 }],
        ['a.b', "Unexpected character: '.'", { start: 1, end: 2 }]
    ])('rejects %s', (input, message, range) => {
        try {
            tokenize(input);
            expect.unreachable();
        } catch (e) {
            expect(e).toBeInstanceOf(TokenizerError);
            if (e instanceof TokenizerError) {
                expect(e.message).toBe(message);
                expect(e.range).toEqual(range);
            }
        }
    });
});
