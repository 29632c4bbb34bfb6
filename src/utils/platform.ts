/**
 * Cross-platform helpers for locating and spawning fetch backends.
 *
 * On Windows `which` does not exist (`where.exe` does), and a neofetch
 * script needs an explicit bash from Git for Windows or WSL on PATH.
 */

export const IS_WINDOWS = process.platform === 'win32';

/** `'where'` on Windows, `'which'` on Unix */
export const WHICH_CMD = IS_WINDOWS ? 'where' : 'which';

/** Shell used to run bash-script backends such as neofetch */
export const BASH_CMD = IS_WINDOWS ? 'bash.exe' : 'bash';

/** Binary names to try for `name`, with the `.exe` variant on Windows */
export function binaryCandidates(name: string): string[] {
  return IS_WINDOWS ? [name, `${name}.exe`] : [name];
}
