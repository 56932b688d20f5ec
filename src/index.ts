export { run } from './runner/run.js';
export { execute } from './runner/execute.js';
export type { ShellCommandResult, ExecuteOptions, RunOptions } from './runner/types.js';
export {
  ShellRunnerError,
  ShellRunnerErrorCode,
  ShellCommandError,
  ShellResolutionError,
  EnvironmentVariableError,
} from './shared/errors.js';
export { dialectFor, dialectForPath } from './shell/dialect.js';
export type { Dialect, DialectName } from './shell/dialect.js';
export { assemble, mergeStderr } from './shell/assembler.js';
export { resolveShellPath, getParentShellPath } from './shell/resolve.js';
export { reporterCommand, REPORTER_SOURCE } from './status/reporter.js';
export { STATUS_OPEN, STATUS_CLOSE } from './status/markers.js';
export { StreamDemuxer, demux } from './status/demux.js';
export type { DemuxHandlers, DemuxResult, DemuxState } from './status/demux.js';
export { aggregate, parsePayload, formatPayload } from './status/aggregator.js';
export { loadEnvConfig, resolveOption, ENV_VARS } from './config/env.js';
export type { EnvConfig } from './config/env.js';
