import { BACKEND_NAMES, type BackendName } from '../types/index.js';
import { BASH_CMD } from '../utils/platform.js';

export interface BackendInvocation {
  command: string;
  args: string[];
}

/**
 * Backend interface — single contract for every supported fetch tool.
 * To add a tool, add its name to BACKEND_NAMES and an entry here.
 */
export interface BackendAdapter {
  name: BackendName;
  /** Human-readable label */
  label: string;
  /** Binaries to look for on PATH, in order of preference */
  binaryNames: string[];
  /** Turn the located binary and its arguments into a process invocation */
  invocation: (binaryPath: string, args: string[]) => BackendInvocation;
  /** Adjust recolored art before it is written for the backend */
  prepareAscii: (asc: string) => string;
  /** Args that make the backend print the art stored at `asciiPath` */
  asciiArgs: (asciiPath: string) => string[];
  /** Args that print nothing but the distro name */
  distroNameArgs: string[];
  /** Extra guidance for a failing exit code */
  exitHint?: (exitCode: number | null) => string | undefined;
}

const direct = (binaryPath: string, args: string[]): BackendInvocation => ({ command: binaryPath, args });

const FASTFETCH_DISTRO_ARGS = ['--logo', 'none', '-s', 'OS', '--disable-linewrap', '--os-key', ' '];

/**
 * Central registry — single source of truth for all supported backends.
 * Insertion order determines listing order.
 */
export const backends: Readonly<Record<BackendName, BackendAdapter>> = Object.freeze({
  neofetch: {
    name: 'neofetch',
    label: 'neofetch',
    binaryNames: ['neowofetch', 'neofetch'],
    // neofetch is a bash script; run it through bash so PATH shims and Windows work alike
    invocation: (binaryPath: string, args: string[]) => ({ command: BASH_CMD, args: [binaryPath, ...args] }),
    // neofetch prints the art through printf, which would eat single backslashes
    prepareAscii: (asc: string) => asc.replaceAll('\\', '\\\\'),
    asciiArgs: (asciiPath: string) => ['--ascii', '--source', asciiPath, '--ascii-colors'],
    distroNameArgs: ['ascii_distro_name'],
  },
  fastfetch: {
    name: 'fastfetch',
    label: 'fastfetch',
    binaryNames: ['fastfetch'],
    invocation: direct,
    prepareAscii: (asc: string) => asc,
    asciiArgs: (asciiPath: string) => ['--file-raw', asciiPath],
    distroNameArgs: FASTFETCH_DISTRO_ARGS,
    exitHint: (exitCode: number | null) =>
      exitCode === 144 ? "Please upgrade fastfetch to >=1.8.0 or use the 'fastfetch-old' backend" : undefined,
  },
  'fastfetch-old': {
    name: 'fastfetch-old',
    label: 'fastfetch (<1.8.0)',
    binaryNames: ['fastfetch'],
    invocation: direct,
    prepareAscii: (asc: string) => asc,
    asciiArgs: (asciiPath: string) => ['--raw', asciiPath],
    distroNameArgs: FASTFETCH_DISTRO_ARGS,
  },
});

export const ALL_BACKENDS: readonly BackendName[] = BACKEND_NAMES;
