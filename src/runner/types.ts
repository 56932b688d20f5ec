/** Outcome of one run of a command list. */
export interface ShellCommandResult {
  /** Visible output of every command, stderr included, trailing whitespace trimmed. */
  readonly output: string;
  /** Rightmost failing stage of the last command, or its final stage when all passed. */
  readonly status: number;
  /** Exit code of each pipeline stage of the last command. */
  readonly pipestatus: number[];
}

export interface ExecuteOptions {
  /** Resolved, executable shell. Its base name selects the dialect. */
  shellPath: string;
  /** Stop at the first failing stage and reject with ShellCommandError. */
  check: boolean;
  /** Echo visible output live while the commands run. */
  showOutput: boolean;
  /** Print the command list before running it. */
  showCommands: boolean;
  /** Node executable that runs the status reporter. Defaults to the current one. */
  runtimePath?: string;
  /** Where echoed commands and output go. Defaults to process.stdout. */
  output?: NodeJS.WritableStream;
}

export interface RunOptions {
  /** Shell name or path. Empty or omitted means the shell that started this process. */
  shell?: string;
  check?: boolean;
  showOutput?: boolean;
  showCommands?: boolean;
}
