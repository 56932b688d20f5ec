// The status reporter is a one-line Node program the assembled script runs
// after every command. It prints the shell-expanded pipestatus between the
// markers and exits with the first non-zero stage, so `|| exit` can stop
// the script without any shell-specific parsing.
//
// The program travels inside double quotes in every dialect, so its text
// must not contain `"`, `$`, a backtick or a backslash other than the
// marker escapes. Markers are written as escapes: a shell that echoes a
// failing command line back (fish does) must not print a real marker.
import { STATUS_CLOSE, STATUS_OPEN, escapeForSource } from './markers.js';
import { ShellRunnerError, ShellRunnerErrorCode } from '../shared/errors.js';

// Characters that double quotes do not protect in at least one dialect.
const UNQUOTABLE = /["$`\\]/;

export const REPORTER_SOURCE =
  "const a=process.argv[1]||'';" +
  `process.stdout.write('${escapeForSource(STATUS_OPEN)} : '+a+' : ${escapeForSource(STATUS_CLOSE)}');` +
  "const c=a.split(' ').map(Number).find(n=>n>0);" +
  'process.exitCode=c===undefined?0:c;';

/** Command prefix that runs the reporter; the pipestatus argument is appended by the assembler. */
export function reporterCommand(runtimePath: string = process.execPath): string {
  if (UNQUOTABLE.test(runtimePath)) {
    throw new ShellRunnerError(
      ShellRunnerErrorCode.INVALID_ARGUMENT,
      `Runtime path cannot be quoted for the shell: ${runtimePath}`,
      { runtimePath }
    );
  }
  return `"${runtimePath}" -e "${REPORTER_SOURCE}"`;
}
