/**
 * Tests for the backend registry in src/backends/registry.ts.
 * Nothing here spawns a process.
 */
import { describe, expect, it } from 'vitest';
import { ALL_BACKENDS, backends } from '../backends/registry.js';
import { BACKEND_NAMES } from '../types/index.js';
import { BASH_CMD } from '../utils/platform.js';

describe('backend registry', () => {
  it('has one adapter per backend name, keyed by its own name', () => {
    expect([...ALL_BACKENDS]).toEqual([...BACKEND_NAMES]);
    for (const name of ALL_BACKENDS) {
      expect(backends[name].name).toBe(name);
    }
  });

  it('is frozen at runtime (immutable)', () => {
    expect(Object.isFrozen(backends)).toBe(true);
  });
});

describe('neofetch', () => {
  const neofetch = backends.neofetch;

  it('prefers neowofetch', () => {
    expect(neofetch.binaryNames).toEqual(['neowofetch', 'neofetch']);
  });

  it('runs the script through bash', () => {
    expect(neofetch.invocation('/usr/bin/neofetch', ['--ascii'])).toEqual({
      command: BASH_CMD,
      args: ['/usr/bin/neofetch', '--ascii'],
    });
  });

  it('doubles backslashes in the art', () => {
    expect(neofetch.prepareAscii('/\\_/\\')).toBe('/\\\\_/\\\\');
  });

  it('reads the art as a colored ascii source', () => {
    expect(neofetch.asciiArgs('/tmp/art.txt')).toEqual(['--ascii', '--source', '/tmp/art.txt', '--ascii-colors']);
  });

  it('asks for the distro name', () => {
    expect(neofetch.distroNameArgs).toEqual(['ascii_distro_name']);
  });
});

describe('fastfetch', () => {
  it('passes art through --file-raw unchanged', () => {
    const fastfetch = backends.fastfetch;
    expect(fastfetch.prepareAscii('/\\')).toBe('/\\');
    expect(fastfetch.asciiArgs('/tmp/art.txt')).toEqual(['--file-raw', '/tmp/art.txt']);
    expect(fastfetch.invocation('/usr/bin/fastfetch', ['-s', 'OS'])).toEqual({
      command: '/usr/bin/fastfetch',
      args: ['-s', 'OS'],
    });
  });

  it('suggests the old backend on exit code 144 only', () => {
    expect(backends.fastfetch.exitHint?.(144)).toBe(
      "Please upgrade fastfetch to >=1.8.0 or use the 'fastfetch-old' backend",
    );
    expect(backends.fastfetch.exitHint?.(1)).toBeUndefined();
  });

  it('uses --raw for versions before 1.8.0', () => {
    expect(backends['fastfetch-old'].asciiArgs('/tmp/art.txt')).toEqual(['--raw', '/tmp/art.txt']);
    expect(backends['fastfetch-old'].exitHint).toBeUndefined();
  });

  it('prints only the OS name for distro detection', () => {
    expect(backends.fastfetch.distroNameArgs).toEqual(['--logo', 'none', '-s', 'OS', '--disable-linewrap', '--os-key', ' ']);
  });
});
