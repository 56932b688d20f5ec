import type { Dialect } from './dialect.js';
import { reporterCommand } from '../status/reporter.js';
import { ShellRunnerError, ShellRunnerErrorCode } from '../shared/errors.js';

/**
 * Build the script handed to the shell: every command is followed by a
 * status report of its pipeline and, with `checkEnabled`, an exit when any
 * stage failed. Killing the child from outside is too slow to stop the
 * next command, so the shell has to exit by itself.
 *
 * `echo a | false` in bash becomes:
 *   echo a | false; "/usr/bin/node" -e "…" "${PIPESTATUS[*]}" || exit "$?"
 */
export function assemble(
  commands: readonly string[],
  dialect: Dialect,
  checkEnabled: boolean,
  reporter: string = reporterCommand()
): string {
  if (commands.length === 0) {
    throw new ShellRunnerError(ShellRunnerErrorCode.INVALID_ARGUMENT, 'At least one command is required');
  }

  const exitClause = checkEnabled ? ` || exit "${dialect.lastStatusExpr}"` : '';
  const statusCommand = `${reporter} "${dialect.pipeStatusExpr}"${exitClause}`;

  return commands.flatMap((command) => [command, statusCommand]).join('; ');
}

/**
 * Wrap a script so the shell itself sends its stderr into its stdout.
 * One pipe keeps the order in which the commands wrote; reading two pipes
 * and interleaving them does not.
 */
export function mergeStderr(script: string, dialect: Dialect): string {
  return `${dialect.groupOpen}\n${script}\n${dialect.groupClose}`;
}
