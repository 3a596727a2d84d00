import { describe, it, expect, beforeEach } from 'vitest';
import { processReplLine, type ReplState } from '../src/cli/repl.js';
import { Reporter } from '../src/core/reporter.js';
import { Session } from '../src/core/session.js';

describe('processReplLine', () => {
    let session: Session;
    let state: ReplState;
    const reporter = new Reporter({ color: 'never', format: 'pretty' });

    beforeEach(() => {
        session = new Session();
        state = {};
    });

    function run(line: string) {
        return processReplLine(line, session, reporter, state);
    }

    it('evaluates expressions and remembers the last result', () => {
        expect(run('  2 + 2  ')).toEqual({ output: '  ✓ 2 + 2  =  4' });
        expect(state.lastResult).toBe(4);
    });

    it('shows where an expression failed', () => {
        expect(run('1 / 0')).toEqual({
            output: '  ✖ 1 / 0  [DivisionByZero]  Division by zero\n    ↳ 1 / 0\n      ^^^^^'
        });
        expect(state.lastResult).toBeUndefined();
    });

    it('ignores empty lines', () => {
        expect(run('   ')).toEqual({});
    });

    it('stores the last result', () => {
        expect(run(':store')).toEqual({ output: 'No last result to store. Evaluate something first.' });
        run('3 * (4 + 5)');
        expect(run(':store')).toEqual({ output: 'Stored 27 into memory.' });
        expect(session.recall()).toBe(27);
    });

    it('stores an expression and uses it through mem', () => {
        expect(run(':store 7.5')).toEqual({ output: 'Stored 7.5 into memory.' });
        expect(run('mem + 1')).toEqual({ output: '  ✓ mem + 1  =  8.5' });
        expect(run(':recall')).toEqual({ output: 'Memory: 7.5' });
    });

    it('leaves memory alone when the stored expression fails', () => {
        session.store(2);
        expect(run(':store 1/0')).toEqual({ output: '  ✖ 1/0  [DivisionByZero]  Division by zero' });
        expect(session.recall()).toBe(2);
    });

    it('clears memory', () => {
        session.store(9);
        expect(run(':clear')).toEqual({ output: 'Memory cleared.' });
        expect(session.recall()).toBe(0);
    });

    it('lists names', () => {
        const { output } = run(':names');
        expect(output?.split('\n')[0]).toBe('  abs()  Absolute value.');
        expect(output).toContain('  pi  Ratio of a circle\'s circumference to its diameter.');
    });

    it('exits on :quit and its aliases', () => {
        expect(run(':quit')).toEqual({ shouldExit: true });
        expect(run(':q')).toEqual({ shouldExit: true });
        expect(run(':exit')).toEqual({ shouldExit: true });
    });

    it('shows help', () => {
        expect(run(':help').output).toContain(':store <expr>   Evaluate <expr> and store it in memory');
    });

    it('rejects unknown commands', () => {
        expect(run(':bogus')).toEqual({ output: 'Unknown command ":bogus". Type :help for a list of commands.' });
    });
});
