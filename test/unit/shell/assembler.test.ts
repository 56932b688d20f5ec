import { assemble, mergeStderr } from '../../../src/shell/assembler.js';
import { dialectFor } from '../../../src/shell/dialect.js';
import { reporterCommand } from '../../../src/status/reporter.js';
import { ShellRunnerError, ShellRunnerErrorCode } from '../../../src/shared/errors.js';

const REPORTER = 'report';

describe('assemble', () => {
  it('follows each command with a status report', () => {
    const script = assemble(['echo a', 'echo b | cat'], dialectFor('bash'), false, REPORTER);
    expect(script).toBe('echo a; report "${PIPESTATUS[*]}"; echo b | cat; report "${PIPESTATUS[*]}"');
  });

  it('adds an exit clause when check is enabled', () => {
    const script = assemble(['true | false'], dialectFor('fish'), true, REPORTER);
    expect(script).toBe('true | false; report "$pipestatus" || exit "$status"');
  });

  it('uses $? for POSIX shells', () => {
    expect(assemble(['ls'], dialectFor('sh'), true, REPORTER)).toBe('ls; report "$?" || exit "$?"');
  });

  it('emits one status report per command', () => {
    const commands = ['a', 'b', 'c', 'd'];
    const script = assemble(commands, dialectFor('zsh'), false, REPORTER);
    expect(script.split('; report "$pipestatus"')).toHaveLength(commands.length + 1);
  });

  it('is byte-identical across calls', () => {
    const first = assemble(['echo hi', 'false'], dialectFor('bash'), true);
    const second = assemble(['echo hi', 'false'], dialectFor('bash'), true);
    expect(first).toBe(second);
  });

  it('uses the Node reporter by default', () => {
    expect(assemble(['true'], dialectFor('sh'), false)).toBe(`true; ${reporterCommand()} "$?"`);
  });

  it('rejects an empty command list', () => {
    let caught: unknown;
    try {
      assemble([], dialectFor('bash'), true);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ShellRunnerError);
    expect(caught).toMatchObject({ code: ShellRunnerErrorCode.INVALID_ARGUMENT });
  });
});

describe('mergeStderr', () => {
  it('groups a POSIX script and redirects its stderr', () => {
    expect(mergeStderr('echo a; report "$?"', dialectFor('sh'))).toBe('{\necho a; report "$?"\n} 2>&1');
  });

  it('uses the same group for bash and zsh', () => {
    expect(mergeStderr('x', dialectFor('bash'))).toBe('{\nx\n} 2>&1');
    expect(mergeStderr('x', dialectFor('zsh'))).toBe('{\nx\n} 2>&1');
  });

  it('uses begin/end for fish', () => {
    expect(mergeStderr('x', dialectFor('fish'))).toBe('begin\nx\nend 2>&1');
  });
});
