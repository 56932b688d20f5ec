import path from 'path';
import { loadEnvConfig, resolveOption } from '../config/env.js';
import { getParentShellPath, resolveShellPath } from '../shell/resolve.js';
import { ShellResolutionError } from '../shared/errors.js';
import { execute } from './execute.js';
import type { RunOptions, ShellCommandResult } from './types.js';

/**
 * Run one command or a list of commands in a shell and report the exit
 * status of every stage of the last command's pipeline.
 *
 * ```ts
 * const { output, pipestatus } = await run('cat access.log | grep 404 | wc -l', { shell: 'bash' });
 * ```
 */
export async function run(command: string | readonly string[], options: RunOptions = {}): Promise<ShellCommandResult> {
  const env = loadEnvConfig();

  const shell = resolveOption(options.shell, env.shell, '');
  const shellPath = shell ? await resolveShellPath(shell) : await getParentShellPath();
  const shellName = path.basename(shellPath);
  // Started directly from node (or given node itself), there is no shell to borrow.
  if (shellName.startsWith('node')) {
    throw new ShellResolutionError(`Process "${shellName}" is not a shell. Please provide a shell name or path.`);
  }

  const commands = typeof command === 'string' ? [command] : [...command];

  return execute(commands, {
    shellPath,
    check: resolveOption(options.check, env.check, true),
    showOutput: resolveOption(options.showOutput, env.showOutput, true),
    showCommands: resolveOption(options.showCommands, env.showCommands, true),
  });
}
