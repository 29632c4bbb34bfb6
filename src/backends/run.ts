import { spawn } from 'node:child_process';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { BackendExitError, BackendNotFoundError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { BackendName } from '../types/index.js';
import { binaryCandidates, WHICH_CMD } from '../utils/platform.js';
import { type BackendAdapter, backends, ALL_BACKENDS } from './registry.js';

const log = createLogger('backend');

/** Resolve a binary on PATH, or null when it is not installed. */
function which(binaryName: string): Promise<string | null> {
  return new Promise((resolve) => {
    const child = spawn(WHICH_CMD, [binaryName], { stdio: ['ignore', 'pipe', 'ignore'] });
    let stdout = '';
    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString('utf8');
    });
    child.on('close', (code) => {
      const first = stdout.split(/\r?\n/)[0].trim();
      resolve(code === 0 && first ? first : null);
    });
    child.on('error', (err) => {
      log.debug('lookup failed', binaryName, err);
      resolve(null);
    });
  });
}

/** First binary of the adapter found on PATH. */
export async function findBackendBinary(adapter: BackendAdapter): Promise<string | null> {
  for (const name of adapter.binaryNames.flatMap(binaryCandidates)) {
    const found = await which(name);
    if (found) {
      log.debug(`${adapter.name} binary`, found);
      return found;
    }
  }
  return null;
}

/** Backends with at least one binary on PATH. */
export async function getAvailableBackends(): Promise<BackendName[]> {
  const checks = await Promise.all(
    ALL_BACKENDS.map(async (name) => ({ name, ok: (await findBackendBinary(backends[name])) !== null })),
  );
  return checks.filter((c) => c.ok).map((c) => c.name);
}

async function requireBinary(adapter: BackendAdapter): Promise<string> {
  const binary = await findBackendBinary(adapter);
  if (!binary) throw new BackendNotFoundError(adapter.name);
  return binary;
}

/**
 * Print recolored ascii art through a fetch backend.
 * The art goes through a temp file that is removed afterwards.
 */
export async function runBackend(asc: string, name: BackendName, extraArgs: string[] = []): Promise<void> {
  const adapter = backends[name];
  const binary = await requireBinary(adapter);

  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gradfetch-'));
  const asciiPath = path.join(dir, 'ascii.txt');

  try {
    fs.writeFileSync(asciiPath, adapter.prepareAscii(asc));
    const { command, args } = adapter.invocation(binary, [...adapter.asciiArgs(asciiPath), ...extraArgs]);
    log.debug('run', command, args);

    const exitCode = await runInherited(command, args);
    if (exitCode !== 0) throw new BackendExitError(name, exitCode, adapter.exitHint?.(exitCode));
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/** Ask the backend which distro it is running on. */
export async function detectDistroName(name: BackendName): Promise<string> {
  const adapter = backends[name];
  const binary = await requireBinary(adapter);
  const { command, args } = adapter.invocation(binary, adapter.distroNameArgs);
  log.debug('detect distro', command, args);

  const { exitCode, stdout } = await runPiped(command, args);
  if (exitCode !== 0) throw new BackendExitError(name, exitCode, adapter.exitHint?.(exitCode));
  return stdout.trim();
}

/**
 * Run a command sharing this process's terminal
 */
function runInherited(command: string, args: string[]): Promise<number | null> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'inherit' });
    child.on('close', (code) => resolve(code));
    child.on('error', (err) => reject(err));
  });
}

/**
 * Run a command and collect its stdout
 */
function runPiped(command: string, args: string[]): Promise<{ exitCode: number | null; stdout: string }> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'inherit'] });
    let stdout = '';
    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString('utf8');
    });
    child.on('close', (code) => resolve({ exitCode: code, stdout }));
    child.on('error', (err) => reject(err));
  });
}
