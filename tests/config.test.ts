import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import {
    applySetting,
    DEFAULT_SETTINGS,
    loadConfig,
    parseConfig,
    resolveSettings,
    type PartialSettings
} from '../src/core/config.js';

describe('applySetting', () => {
    it('accepts valid values, including numeric strings', () => {
        const target: PartialSettings = {};
        expect(applySetting(target, 'timeout', '250')).toBeUndefined();
        expect(applySetting(target, 'memory', -1.5)).toBeUndefined();
        expect(applySetting(target, 'angles', 'radians')).toBeUndefined();
        expect(target).toEqual({ timeout: 250, memory: -1.5, angles: 'radians' });
    });

    it('explains what is wrong', () => {
        const target: PartialSettings = {};
        expect(applySetting(target, 'format', 'xml')).toBe('"format" must be one of pretty, plain, json, compact');
        expect(applySetting(target, 'precision', 0)).toBe('"precision" must be an integer between 1 and 100');
        expect(applySetting(target, 'concurrent', 'yes')).toBe('"concurrent" must be true or false');
        expect(applySetting(target, 'colour', 'never')).toBe('Unknown setting "colour"');
        expect(target).toEqual({});
    });
});

describe('parseConfig', () => {
    it('reads top-level settings', () => {
        const loaded = parseConfig('format: compact\nprecision: 6\nangles: radians\nconcurrent: true\n', 'cfg.yml');
        expect(loaded.diagnostics).toEqual([]);
        expect(loaded.settings).toEqual({ format: 'compact', precision: 6, angles: 'radians', concurrent: true });
    });

    it('reports invalid fields with their location and keeps the rest', () => {
        const loaded = parseConfig('precision: 0\nbogus: 1\nmemory: 2.5\n', 'cfg.yml');
        expect(loaded.settings).toEqual({ memory: 2.5 });
        expect(loaded.diagnostics.map(d => [d.code, d.severity, d.path, d.range?.start.line])).toEqual([
            ['CONFIG_INVALID_FIELD', 'warning', ['precision'], 1],
            ['CONFIG_INVALID_FIELD', 'warning', ['bogus'], 2]
        ]);
        expect(loaded.diagnostics[1].message).toBe('Unknown setting "bogus"');
    });

    it('reads profiles', () => {
        const text = [
            'precision: 4',
            'profiles:',
            '  ci:',
            '    format: json',
            '    precision: 10',
            '  trig:',
            '    angles: radians',
            ''
        ].join('\n');
        const loaded = parseConfig(text, 'cfg.yml');
        expect(loaded.diagnostics).toEqual([]);
        expect(loaded.settings).toEqual({ precision: 4 });
        expect(loaded.profiles.get('ci')).toEqual({ format: 'json', precision: 10 });
        expect(loaded.profiles.get('trig')).toEqual({ angles: 'radians' });
    });

    it('reports YAML syntax errors', () => {
        const loaded = parseConfig('format: [unclosed\n', 'cfg.yml');
        expect(loaded.settings).toEqual({});
        expect(loaded.diagnostics.length).toBeGreaterThan(0);
        expect(loaded.diagnostics[0]).toMatchObject({ code: 'CONFIG_YAML_SYNTAX', severity: 'error', file: 'cfg.yml' });
    });

    it('rejects a document that is not a mapping', () => {
        const loaded = parseConfig('- 1\n- 2\n', 'cfg.yml');
        expect(loaded.diagnostics.map(d => d.message)).toEqual(['Configuration must be a mapping of settings']);
    });

    it('rejects profiles that are not a mapping', () => {
        const loaded = parseConfig('profiles: 3\n', 'cfg.yml');
        expect(loaded.diagnostics).toMatchObject([{ path: ['profiles'], code: 'CONFIG_INVALID_FIELD' }]);
    });

    it('treats an empty file as no settings', () => {
        const loaded = parseConfig('', 'cfg.yml');
        expect(loaded).toEqual({ filePath: 'cfg.yml', settings: {}, profiles: new Map(), diagnostics: [] });
    });
});

describe('resolveSettings', () => {
    const loaded = parseConfig('precision: 4\nangles: radians\nprofiles:\n  ci:\n    format: json\n    precision: 10\n', 'cfg.yml');

    it('layers defaults, file, profile and overrides', () => {
        const { settings, diagnostics } = resolveSettings(loaded, 'ci', { color: 'never', memory: undefined });
        expect(diagnostics).toEqual([]);
        expect(settings).toEqual({
            ...DEFAULT_SETTINGS,
            format: 'json',
            color: 'never',
            precision: 10,
            angles: 'radians'
        });
    });

    it('lets overrides win over the file', () => {
        const { settings } = resolveSettings(loaded, undefined, { angles: 'degrees', precision: 3 });
        expect(settings.angles).toBe('degrees');
        expect(settings.precision).toBe(3);
    });

    it('warns about an unknown profile', () => {
        const { settings, diagnostics } = resolveSettings(loaded, 'nope', {});
        expect(settings.precision).toBe(4);
        expect(diagnostics).toEqual([{
            code: 'CONFIG_UNKNOWN_PROFILE',
            message: 'Profile "nope" is not defined',
            severity: 'warning',
            file: 'cfg.yml'
        }]);
    });
});

describe('loadConfig', () => {
    let dir: string | undefined;

    afterEach(() => {
        if (dir) rmSync(dir, { recursive: true, force: true });
        dir = undefined;
    });

    function tempDir(): string {
        dir = mkdtempSync(path.join(os.tmpdir(), 'safecalc-config-'));
        return dir;
    }

    it('finds .safecalc.yml in the working directory', () => {
        const cwd = tempDir();
        writeFileSync(path.join(cwd, '.safecalc.yml'), 'format: plain\n');
        const loaded = loadConfig(cwd);
        expect(loaded.filePath).toBe(path.join(cwd, '.safecalc.yml'));
        expect(loaded.settings).toEqual({ format: 'plain' });
    });

    it('returns nothing when no file exists', () => {
        expect(loadConfig(tempDir())).toEqual({ settings: {}, profiles: new Map(), diagnostics: [] });
    });

    it('reports an explicit path that does not exist', () => {
        const cwd = tempDir();
        const loaded = loadConfig(cwd, 'missing.yml');
        expect(loaded.diagnostics).toEqual([{
            code: 'CONFIG_NOT_FOUND',
            message: `Config file not found: ${path.join(cwd, 'missing.yml')}`,
            severity: 'error',
            file: path.join(cwd, 'missing.yml')
        }]);
    });
});
