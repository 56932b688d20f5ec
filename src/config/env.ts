// Environment configuration. Every option of run() can also come from a
// SHELLRUNNER_* variable; an explicit argument always wins, then the
// variable, then the built-in default.
import { z } from 'zod';
import { EnvironmentVariableError } from '../shared/errors.js';

export const ENV_VARS = {
  shell: 'SHELLRUNNER_SHELL',
  check: 'SHELLRUNNER_CHECK',
  showOutput: 'SHELLRUNNER_SHOW_OUTPUT',
  showCommands: 'SHELLRUNNER_SHOW_COMMANDS',
} as const;

const booleanFlag = z
  .string()
  .toLowerCase()
  .pipe(z.enum(['true', 'false']))
  .transform((value) => value === 'true');

export interface EnvConfig {
  shell?: string;
  check?: boolean;
  showOutput?: boolean;
  showCommands?: boolean;
}

function readBoolean(env: NodeJS.ProcessEnv, variable: string): boolean | undefined {
  const raw = env[variable];
  if (raw === undefined) return undefined;
  const parsed = booleanFlag.safeParse(raw);
  if (!parsed.success) {
    throw new EnvironmentVariableError(variable, raw);
  }
  return parsed.data;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    shell: env[ENV_VARS.shell],
    check: readBoolean(env, ENV_VARS.check),
    showOutput: readBoolean(env, ENV_VARS.showOutput),
    showCommands: readBoolean(env, ENV_VARS.showCommands),
  };
}

export function resolveOption<T>(argument: T | undefined, fromEnv: T | undefined, fallback: T): T {
  if (argument !== undefined) return argument;
  if (fromEnv !== undefined) return fromEnv;
  return fallback;
}
