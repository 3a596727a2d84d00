import { readFileSync, existsSync } from 'fs';
import path from 'path';
import { isMap, isScalar } from 'yaml';
import { getNodeRange, parseYaml, type ParsedYaml } from '../parser/yaml.js';
import type { Diagnostic } from '../types/diagnostic.js';
import type { AngleUnit } from './registry.js';
import type { ColorMode, OutputFormat } from './reporter.js';

export interface Settings {
    format: OutputFormat;
    color: ColorMode;
    /** Significant digits shown for results; unset shows the full value. */
    precision?: number;
    angles: AngleUnit;
    memory: number;
    /** Per-expression timeout in milliseconds for batch evaluation. */
    timeout?: number;
    concurrent: boolean;
}

export type PartialSettings = Partial<Settings>;

export interface LoadedConfig {
    filePath?: string;
    settings: PartialSettings;
    profiles: Map<string, PartialSettings>;
    diagnostics: Diagnostic[];
}

export const DEFAULT_SETTINGS: Settings = {
    format: 'pretty',
    color: 'auto',
    angles: 'degrees',
    memory: 0,
    concurrent: false
};

export const CONFIG_FILENAMES = ['.safecalc.yml', '.safecalc.yaml'];

const FORMATS: OutputFormat[] = ['pretty', 'plain', 'json', 'compact'];
const COLORS: ColorMode[] = ['auto', 'always', 'never'];
const ANGLES: AngleUnit[] = ['degrees', 'radians'];

function oneOf<T extends string>(allowed: readonly T[], value: unknown): T | undefined {
    return allowed.find(candidate => candidate === value);
}

function toNumber(value: unknown): number | undefined {
    if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
}

function toNonNegativeInteger(value: unknown): number | undefined {
    const n = toNumber(value);
    return n !== undefined && Number.isInteger(n) && n >= 0 ? n : undefined;
}

/**
 * Validates one setting and stores it in `target`.
 * Returns an error message when the key is unknown or the value is invalid.
 */
export function applySetting(target: PartialSettings, key: string, value: unknown): string | undefined {
    switch (key) {
        case 'format': {
            const format = oneOf(FORMATS, value);
            if (!format) return `"format" must be one of ${FORMATS.join(', ')}`;
            target.format = format;
            return undefined;
        }
        case 'color': {
            const color = oneOf(COLORS, value);
            if (!color) return `"color" must be one of ${COLORS.join(', ')}`;
            target.color = color;
            return undefined;
        }
        case 'angles': {
            const angles = oneOf(ANGLES, value);
            if (!angles) return `"angles" must be one of ${ANGLES.join(', ')}`;
            target.angles = angles;
            return undefined;
        }
        case 'precision': {
            const precision = toNonNegativeInteger(value);
            if (precision === undefined || precision < 1 || precision > 100) {
                return '"precision" must be an integer between 1 and 100';
            }
            target.precision = precision;
            return undefined;
        }
        case 'timeout': {
            const timeout = toNonNegativeInteger(value);
            if (timeout === undefined) return '"timeout" must be a non-negative integer (milliseconds)';
            target.timeout = timeout;
            return undefined;
        }
        case 'memory': {
            const memory = toNumber(value);
            if (memory === undefined) return '"memory" must be a finite number';
            target.memory = memory;
            return undefined;
        }
        case 'concurrent': {
            if (typeof value !== 'boolean') return '"concurrent" must be true or false';
            target.concurrent = value;
            return undefined;
        }
        default:
            return `Unknown setting "${key}"`;
    }
}

function readSettingsMap(node: unknown, parsed: ParsedYaml, prefix: string[], diagnostics: Diagnostic[]): PartialSettings {
    const settings: PartialSettings = {};
    if (!isMap(node)) return settings;

    for (const pair of node.items) {
        if (!isScalar(pair.key)) continue;
        const key = String(pair.key.value);
        if (prefix.length === 0 && key === 'profiles') continue;

        const valueNode = pair.value;
        const value = isScalar(valueNode) ? valueNode.value : undefined;
        const problem = applySetting(settings, key, value);
        if (problem) {
            diagnostics.push({
                code: 'CONFIG_INVALID_FIELD',
                message: problem,
                severity: 'warning',
                file: parsed.filePath,
                range: getNodeRange(isScalar(valueNode) ? valueNode : pair.key, parsed.lineCounter),
                path: [...prefix, key]
            });
        }
    }

    return settings;
}

/** Parses configuration text. Invalid fields are reported and left out. */
export function parseConfig(text: string, filePath: string): LoadedConfig {
    const { parsed, diagnostics } = parseYaml(text, filePath);
    const loaded: LoadedConfig = { filePath, settings: {}, profiles: new Map(), diagnostics };
    if (!parsed) return loaded;

    const root = parsed.doc.contents;
    if (root === null) return loaded; // empty file

    if (!isMap(root)) {
        diagnostics.push({
            code: 'CONFIG_INVALID_FIELD',
            message: 'Configuration must be a mapping of settings',
            severity: 'warning',
            file: filePath,
            range: getNodeRange(root, parsed.lineCounter)
        });
        return loaded;
    }

    loaded.settings = readSettingsMap(root, parsed, [], diagnostics);

    const profilesNode = root.get('profiles', true);
    if (isMap(profilesNode)) {
        for (const pair of profilesNode.items) {
            if (!isScalar(pair.key) || !isMap(pair.value)) continue;
            const name = String(pair.key.value);
            loaded.profiles.set(name, readSettingsMap(pair.value, parsed, ['profiles', name], diagnostics));
        }
    } else if (profilesNode !== undefined) {
        diagnostics.push({
            code: 'CONFIG_INVALID_FIELD',
            message: '"profiles" must be a mapping of profile names to settings',
            severity: 'warning',
            file: filePath,
            range: isScalar(profilesNode) ? getNodeRange(profilesNode, parsed.lineCounter) : undefined,
            path: ['profiles']
        });
    }

    return loaded;
}

/**
 * Finds the configuration file: the explicit path if given, otherwise the
 * first of CONFIG_FILENAMES present in `cwd`.
 */
export function findConfigFile(cwd: string, explicitPath?: string): string | undefined {
    if (explicitPath) return path.resolve(cwd, explicitPath);
    for (const filename of CONFIG_FILENAMES) {
        const filePath = path.join(cwd, filename);
        if (existsSync(filePath)) return filePath;
    }
    return undefined;
}

export function loadConfig(cwd: string, explicitPath?: string): LoadedConfig {
    const filePath = findConfigFile(cwd, explicitPath);
    if (!filePath) {
        return { settings: {}, profiles: new Map(), diagnostics: [] };
    }
    if (!existsSync(filePath)) {
        return {
            filePath,
            settings: {},
            profiles: new Map(),
            diagnostics: [{
                code: 'CONFIG_NOT_FOUND',
                message: `Config file not found: ${filePath}`,
                severity: 'error',
                file: filePath
            }]
        };
    }
    return parseConfig(readFileSync(filePath, 'utf8'), filePath);
}

/** Defaults, then the file, then the selected profile, then command-line overrides. */
export function resolveSettings(
    loaded: LoadedConfig,
    profile: string | undefined,
    overrides: PartialSettings
): { settings: Settings; diagnostics: Diagnostic[] } {
    const diagnostics: Diagnostic[] = [];
    let fromProfile: PartialSettings = {};

    if (profile !== undefined) {
        const found = loaded.profiles.get(profile);
        if (found) {
            fromProfile = found;
        } else {
            diagnostics.push({
                code: 'CONFIG_UNKNOWN_PROFILE',
                message: `Profile "${profile}" is not defined`,
                severity: 'warning',
                file: loaded.filePath ?? '<none>'
            });
        }
    }

    return {
        settings: { ...DEFAULT_SETTINGS, ...loaded.settings, ...fromProfile, ...stripUndefined(overrides) },
        diagnostics
    };
}

function stripUndefined(settings: PartialSettings): PartialSettings {
    const result: PartialSettings = {};
    for (const [key, value] of Object.entries(settings)) {
        if (value !== undefined) applySetting(result, key, value);
    }
    return result;
}
