#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'fs';
import { applySetting, loadConfig, resolveSettings, type PartialSettings, type Settings } from './core/config.js';
import { Reporter } from './core/reporter.js';
import { runBatch, runEval, createSession } from './cli/commands.js';
import { runRepl } from './cli/repl.js';

const pkg: { version: string } = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));

type GlobalOptions = {
    format?: Settings['format'];
    json?: boolean;
    color?: Settings['color'];
    precision?: number;
    angles?: Settings['angles'];
    memory?: number;
    config?: string;
    profile?: string;
    verbose?: boolean;
};

type BatchOptions = GlobalOptions & {
    concurrent?: boolean;
    timeout?: number;
};

/** Commander argument parser backed by the same validation as the config file. */
function setting<K extends keyof Settings>(key: K): (value: string) => Settings[K] {
    return (value: string) => {
        const target: PartialSettings = {};
        const problem = applySetting(target, key, value);
        const parsed = target[key];
        if (problem || parsed === undefined) {
            throw new InvalidArgumentError(problem ?? `Invalid value for ${key}`);
        }
        return parsed;
    };
}

/** Loads configuration, applies command-line overrides and builds the reporter. */
function prepare(options: BatchOptions): { settings: Settings; reporter: Reporter } {
    const loaded = loadConfig(process.cwd(), options.config);
    const { settings, diagnostics } = resolveSettings(loaded, options.profile, {
        format: options.json ? 'json' : options.format,
        color: options.color,
        precision: options.precision,
        angles: options.angles,
        memory: options.memory,
        concurrent: options.concurrent,
        timeout: options.timeout
    });

    const reporter = new Reporter({
        color: settings.color,
        format: settings.format,
        precision: settings.precision,
        verbose: options.verbose
    });

    if (loaded.filePath) reporter.printDebug(`config: ${loaded.filePath}`);
    for (const diagnostic of [...loaded.diagnostics, ...diagnostics]) {
        reporter.printDiagnostic(diagnostic);
    }

    return { settings, reporter };
}

const program = new Command();

program
    .name('safecalc')
    .description('Sandboxed calculator: evaluates arithmetic expressions against a fixed allow-list of functions')
    .version(pkg.version)
    .option('--format <pretty|plain|json|compact>', 'Output format (pretty, plain, json, compact)', setting('format'))
    .option('--json', 'Shorthand for --format json', false)
    .option('--color <auto|always|never>', 'Color output (auto, always, never)', setting('color'))
    .option('--precision <digits>', 'Significant digits shown for results', setting('precision'))
    .option('--angles <degrees|radians>', 'Angle unit for trigonometric functions', setting('angles'))
    .option('--memory <value>', 'Initial memory value', setting('memory'))
    .option('--config <path>', 'Path to a config file (defaults to .safecalc.yml in the working directory)')
    .option('--profile <name>', 'Use a specific profile from the config file')
    .option('--verbose', 'Print debug information to stderr', false);

program
    .command('eval')
    .description('Evaluate one or more expressions given as arguments')
    .argument('<expressions...>', 'Expressions to evaluate, e.g. "2 ^ 10" "sqrt(25) + fact(5)"')
    .option('--ast', 'Print the parsed syntax tree instead of evaluating', false)
    .option('--concurrent', 'Evaluate all expressions concurrently')
    .option('--timeout <ms>', 'Per-expression timeout in milliseconds', setting('timeout'))
    .action(async (expressions: string[], _options: unknown, command: Command) => {
        const options = command.optsWithGlobals<BatchOptions & { ast?: boolean }>();
        const { settings, reporter } = prepare(options);
        process.exitCode = await runEval(expressions, settings, reporter, options.ast ?? false);
    });

program
    .command('batch')
    .description('Evaluate expressions, one per line, from files (glob patterns allowed) or stdin')
    .argument('[files...]', 'Files or glob patterns; reads stdin when omitted')
    .option('--concurrent', 'Evaluate all expressions concurrently')
    .option('--timeout <ms>', 'Per-expression timeout in milliseconds', setting('timeout'))
    .action(async (files: string[], _options: unknown, command: Command) => {
        const options = command.optsWithGlobals<BatchOptions>();
        const { settings, reporter } = prepare(options);
        process.exitCode = await runBatch(files, settings, reporter, pkg.version);
    });

program
    .command('repl')
    .description('Interactive prompt with memory store, recall and clear')
    .action(async (_options: unknown, command: Command) => {
        const { settings, reporter } = prepare(command.optsWithGlobals<GlobalOptions>());
        await runRepl(createSession(settings), reporter);
    });

program.parseAsync().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
