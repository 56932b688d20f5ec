// Shell dialect table: how each shell spells "last exit status" and
// "exit status of every pipeline stage". Unknown shells get the POSIX
// spelling, where only the final stage's status is ever visible.
import path from 'path';

export type DialectName = 'bash' | 'zsh' | 'fish' | 'posix';

export interface Dialect {
  readonly name: DialectName;
  readonly lastStatusExpr: string;
  readonly pipeStatusExpr: string;
  /** Opens a command group in the current shell (no subshell, so `exit` still ends the script). */
  readonly groupOpen: string;
  /** Closes the group, sending its stderr into its stdout. */
  readonly groupClose: string;
}

const DIALECTS: Readonly<Record<DialectName, Dialect>> = {
  bash: { name: 'bash', lastStatusExpr: '$?', pipeStatusExpr: '${PIPESTATUS[*]}', groupOpen: '{', groupClose: '} 2>&1' },
  zsh: { name: 'zsh', lastStatusExpr: '$status', pipeStatusExpr: '$pipestatus', groupOpen: '{', groupClose: '} 2>&1' },
  fish: { name: 'fish', lastStatusExpr: '$status', pipeStatusExpr: '$pipestatus', groupOpen: 'begin', groupClose: 'end 2>&1' },
  posix: { name: 'posix', lastStatusExpr: '$?', pipeStatusExpr: '$?', groupOpen: '{', groupClose: '} 2>&1' },
};

const SHELL_DIALECTS: ReadonlyMap<string, DialectName> = new Map<string, DialectName>([
  ['bash', 'bash'],
  ['zsh', 'zsh'],
  ['fish', 'fish'],
]);

export function dialectFor(shellBaseName: string): Dialect {
  return DIALECTS[SHELL_DIALECTS.get(shellBaseName) ?? 'posix'];
}

export function dialectForPath(shellPath: string): Dialect {
  return dialectFor(path.basename(shellPath));
}
