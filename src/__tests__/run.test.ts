/**
 * Tests for backend discovery in src/backends/run.ts.
 * `spawn` is replaced by an in-process stand-in that answers `which`
 * lookups from the `installed` set.
 */
import { afterEach, describe, expect, it, vi } from 'vitest';

const installed = vi.hoisted(() => new Set<string>());

vi.mock('node:child_process', async () => {
  const { EventEmitter } = await import('node:events');
  return {
    spawn: (_command: string, args: string[]) => {
      const child = Object.assign(new EventEmitter(), { stdout: new EventEmitter() });
      const name = args[0];
      setImmediate(() => {
        if (installed.has(name)) child.stdout.emit('data', Buffer.from(`/usr/bin/${name}\n`));
        child.emit('close', installed.has(name) ? 0 : 1);
      });
      return child;
    },
  };
});

import { backends } from '../backends/registry.js';
import { findBackendBinary, getAvailableBackends } from '../backends/run.js';

afterEach(() => {
  installed.clear();
});

describe('findBackendBinary', () => {
  it('returns the first binary found on PATH', async () => {
    installed.add('neofetch');
    expect(await findBackendBinary(backends.neofetch)).toBe('/usr/bin/neofetch');
  });

  it('prefers neowofetch when both are installed', async () => {
    installed.add('neofetch');
    installed.add('neowofetch');
    expect(await findBackendBinary(backends.neofetch)).toBe('/usr/bin/neowofetch');
  });

  it('returns null when nothing is installed', async () => {
    expect(await findBackendBinary(backends.fastfetch)).toBeNull();
  });
});

describe('getAvailableBackends', () => {
  it('lists backends whose binaries are installed, in registry order', async () => {
    installed.add('fastfetch');
    expect(await getAvailableBackends()).toEqual(['fastfetch', 'fastfetch-old']);
  });

  it('returns an empty list when no backend is installed', async () => {
    expect(await getAvailableBackends()).toEqual([]);
  });
});
