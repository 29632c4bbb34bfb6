/**
 * Tests for the YAML config file in src/utils/config.ts.
 */
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../errors.js';
import { configPath, loadConfig, saveConfig } from '../utils/config.js';

// ── Temp file helpers ────────────────────────────────────────────────────────

const tmpDirs: string[] = [];

function makeTmpDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gradfetch-test-'));
  tmpDirs.push(dir);
  return dir;
}

function writeConfig(content: string): string {
  const file = path.join(makeTmpDir(), 'config.yaml');
  fs.writeFileSync(file, content);
  return file;
}

afterEach(() => {
  for (const dir of tmpDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tmpDirs.length = 0;
});

describe('configPath', () => {
  it('prefers GRADFETCH_CONFIG', () => {
    expect(configPath({ GRADFETCH_CONFIG: '/etc/gradfetch.yaml', XDG_CONFIG_HOME: '/cfg' })).toBe(
      '/etc/gradfetch.yaml',
    );
  });

  it('uses XDG_CONFIG_HOME when set', () => {
    expect(configPath({ XDG_CONFIG_HOME: '/cfg' })).toBe(path.join('/cfg', 'gradfetch', 'config.yaml'));
  });

  it('falls back to ~/.config', () => {
    expect(configPath({})).toBe(path.join(os.homedir(), '.config', 'gradfetch', 'config.yaml'));
  });
});

describe('loadConfig', () => {
  it('returns null when the file does not exist', () => {
    expect(loadConfig(path.join(makeTmpDir(), 'missing.yaml'))).toBeNull();
  });

  it('treats an empty file as an empty config', () => {
    expect(loadConfig(writeConfig(''))).toEqual({});
  });

  it('parses and validates YAML', () => {
    const file = writeConfig(
      ['preset: transgender', 'mode: 8bit', 'alignment:', '  mode: vertical', '  foreBack: [2, 1]', ''].join('\n'),
    );
    expect(loadConfig(file)).toEqual({
      preset: 'transgender',
      mode: '8bit',
      alignment: { mode: 'vertical', foreBack: [2, 1] },
    });
  });

  it('rejects malformed YAML', () => {
    expect(() => loadConfig(writeConfig('preset: [unclosed\n'))).toThrow(ConfigError);
  });

  it('names the invalid field', () => {
    const file = writeConfig('mode: neon\n');
    expect(() => loadConfig(file)).toThrow(/^Invalid config \(mode: /);
  });

  it('rejects unknown keys', () => {
    expect(() => loadConfig(writeConfig('colour: red\n'))).toThrow(ConfigError);
  });
});

describe('saveConfig', () => {
  it('creates parent directories and round-trips through loadConfig', () => {
    const file = path.join(makeTmpDir(), 'nested', 'dir', 'config.yaml');
    const config = {
      colors: ['#ff0000', '#0000ff'],
      theme: 'light' as const,
      alignment: { mode: 'custom' as const, customColors: { 1: 0, 2: 1 } },
      args: ['--structure', 'OS'],
    };

    saveConfig(config, file);
    expect(loadConfig(file)).toEqual(config);
  });
});
