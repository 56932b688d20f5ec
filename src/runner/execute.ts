// Execution layer: spawns the shell on the assembled script and drives the
// demuxer over its stdout, into which the script sends its own stderr,
// until the child exits. Every run,
// from run() or from a caller that resolved its own shell, passes through here.
import execa from 'execa';
import { dialectForPath } from '../shell/dialect.js';
import { assemble, mergeStderr } from '../shell/assembler.js';
import { reporterCommand } from '../status/reporter.js';
import { StreamDemuxer } from '../status/demux.js';
import { aggregate } from '../status/aggregator.js';
import { ShellCommandError, ShellRunnerError, ShellRunnerErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ExecuteOptions, ShellCommandResult } from './types.js';

export async function execute(commands: readonly string[], options: ExecuteOptions): Promise<ShellCommandResult> {
  const out = options.output ?? process.stdout;
  const dialect = dialectForPath(options.shellPath);
  const script = assemble(commands, dialect, options.check, reporterCommand(options.runtimePath));
  logger.debug({ shell: options.shellPath, dialect: dialect.name, script }, 'Assembled script');

  // The user's commands, never the script with its status reports.
  if (options.showCommands) {
    out.write(`Executing: ${commands.join('; ')}\n`);
  }

  const child = execa(options.shellPath, ['-c', mergeStderr(script, dialect)], {
    buffer: false,
    reject: false,
    // Inherited so commands that prompt for input still work.
    stdin: 'inherit',
    // Only the shell's own diagnostics (a script it cannot parse) land here.
    stderr: 'inherit',
  });

  const demuxer = new StreamDemuxer({
    onOutput: options.showOutput ? (visible) => out.write(visible) : undefined,
    onPayload: (payload) => logger.debug({ payload }, 'Captured status report'),
  });
  let exitCode: number | undefined;
  try {
    if (child.pid === undefined || !child.stdout) {
      const failed = await child;
      throw new ShellRunnerError(ShellRunnerErrorCode.SPAWN_FAILED, `Failed to start ${options.shellPath}`, {
        command: failed.command,
      });
    }

    // UTF-8 decoding keeps multi-byte markers whole across reads.
    child.stdout.setEncoding('utf8');
    for await (const chunk of child.stdout) {
      demuxer.feed(String(chunk));
    }

    const completed = await child;
    exitCode = completed.exitCode;
    logger.debug({ exitCode, signal: completed.signal }, 'Shell exited');
  } finally {
    if (child.exitCode === null && child.signalCode === null) {
      child.kill();
    }
    child.stdout?.destroy();
  }

  const { output, payloads } = demuxer.end();
  const { status, pipestatus } = aggregate(payloads);
  const result: ShellCommandResult = { output: output.trimEnd(), status, pipestatus };

  if (options.check && pipestatus.some((code) => code !== 0)) {
    throw new ShellCommandError(`Command exited with non-zero status: [${pipestatus.join(', ')}]`, result);
  }

  logger.debug({ status, pipestatus, shellExitCode: exitCode }, 'Commands finished');
  return result;
}
