import * as readline from 'readline';
import type { Reporter } from '../core/reporter.js';
import type { Session } from '../core/session.js';

export interface ReplState {
    /** Value of the last successful evaluation, for `:store`. */
    lastResult?: number;
}

export interface ReplOutcome {
    output?: string;
    shouldExit?: boolean;
}

const HELP = `Enter an expression such as 3 * (4 + 5) or sqrt(25) + fact(5).
Use ^ or ** for powers and mem (or mem()) for the stored memory value.

Commands:
  :store          Store the last result in memory
  :store <expr>   Evaluate <expr> and store it in memory
  :recall         Show the memory value
  :clear          Reset memory to 0
  :names          List available constants and functions
  :help           Show this help
  :quit           Exit`;

/** Handles one input line: a `:` command or an expression. */
export function processReplLine(
    line: string,
    session: Session,
    reporter: Reporter,
    state: ReplState
): ReplOutcome {
    const trimmed = line.trim();
    if (trimmed === '') return {};

    if (!trimmed.startsWith(':')) {
        const result = session.evaluateSync(trimmed);
        if (result.ok) state.lastResult = result.value;
        const context = reporter.formatContext(result);
        const formatted = reporter.formatResult(result);
        return { output: context ? `${formatted}\n${context}` : formatted };
    }

    const [command, ...rest] = trimmed.slice(1).split(/\s+/);
    const argument = rest.join(' ');

    switch (command) {
        case 'q':
        case 'quit':
        case 'exit':
            return { shouldExit: true };

        case 'help':
        case 'h':
            return { output: HELP };

        case 'names':
            return {
                output: session.catalog()
                    .map(entry => `  ${entry.kind === 'function' ? `${entry.name}()` : entry.name}  ${entry.description}`)
                    .join('\n')
            };

        case 'store': {
            if (argument !== '') {
                const result = session.evaluateSync(argument);
                if (!result.ok) return { output: reporter.formatResult(result) };
                state.lastResult = result.value;
            }
            if (state.lastResult === undefined) {
                return { output: 'No last result to store. Evaluate something first.' };
            }
            session.store(state.lastResult);
            return { output: `Stored ${reporter.formatValue(state.lastResult)} into memory.` };
        }

        case 'recall':
            return { output: `Memory: ${reporter.formatValue(session.recall())}` };

        case 'clear':
            session.clear();
            return { output: 'Memory cleared.' };

        default:
            return { output: `Unknown command ":${command}". Type :help for a list of commands.` };
    }
}

/** Reads lines until end of input or `:quit`. */
export async function runRepl(session: Session, reporter: Reporter): Promise<void> {
    const interactive = Boolean(process.stdin.isTTY);
    const rl = readline.createInterface({
        input: process.stdin,
        output: interactive ? process.stdout : undefined,
        prompt: 'calc> '
    });
    const state: ReplState = {};

    if (interactive) {
        reporter.printInfo('safecalc interactive mode. Type :help for commands, :quit to exit.');
        rl.prompt();
    }

    try {
        for await (const line of rl) {
            const { output, shouldExit } = processReplLine(line, session, reporter, state);
            if (output) console.log(output);
            if (shouldExit) break;
            if (interactive) rl.prompt();
        }
    } finally {
        rl.close();
    }
}
