import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import path from 'path';
import { ShellResolutionError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    await fs.access(candidate, fsConstants.X_OK);
    return (await fs.stat(candidate)).isFile();
  } catch (err) {
    logger.trace({ candidate, code: (err as NodeJS.ErrnoException).code }, 'Not an executable candidate');
    return false;
  }
}

/** Full path of a shell given by name (`bash`) or path (`/bin/bash`), symlinks resolved. */
export async function resolveShellPath(shell: string, env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const candidates = shell.includes('/') || shell.includes(path.sep)
    ? [path.resolve(shell)]
    : (env['PATH'] ?? '')
        .split(path.delimiter)
        .filter((dir) => dir.length > 0)
        .map((dir) => path.join(dir, shell));

  for (const candidate of candidates) {
    if (await isExecutableFile(candidate)) {
      const resolved = await fs.realpath(candidate);
      logger.debug({ shell, resolved }, 'Resolved shell');
      return resolved;
    }
  }

  throw new ShellResolutionError(
    `Unable to resolve the path to the executable: "${shell}". ` +
      'It is either not on your PATH or the specified file is not executable.'
  );
}

/**
 * Executable of the process that started this one, so commands run in the
 * shell the user is already in. Falls back to $SHELL where /proc is absent.
 */
export async function getParentShellPath(
  env: NodeJS.ProcessEnv = process.env,
  ppid: number = process.ppid
): Promise<string> {
  try {
    return await fs.realpath(`/proc/${ppid}/exe`);
  } catch (err) {
    const fallback = env['SHELL'];
    if (!fallback) {
      throw new ShellResolutionError('An error occured when trying to get the path of the parent shell.', { cause: err });
    }
    logger.debug({ ppid, fallback }, 'Parent process executable unavailable, using $SHELL');
    try {
      return await fs.realpath(fallback);
    } catch (fallbackErr) {
      throw new ShellResolutionError('An error occured when trying to get the path of the parent shell.', {
        cause: fallbackErr,
      });
    }
  }
}
