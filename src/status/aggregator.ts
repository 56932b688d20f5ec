import { ShellRunnerError, ShellRunnerErrorCode } from '../shared/errors.js';
import type { ShellCommandResult } from '../runner/types.js';

const PAYLOAD_PATTERN = /^ : (.*) : $/s;
const STATUS_PATTERN = /^\d+$/;

export function formatPayload(statuses: readonly number[]): string {
  // BigInt prints every integer in plain digits, where Number switches to 1e+21.
  return ` : ${statuses.map((status) => BigInt(status).toString()).join(' ')} : `;
}

/** `" : 0 1 0 : "` -> `[0, 1, 0]` */
export function parsePayload(payload: string): number[] {
  const match = PAYLOAD_PATTERN.exec(payload);
  if (!match) {
    throw new ShellRunnerError(ShellRunnerErrorCode.STATUS_NOT_CAPTURED, `Malformed status report: ${JSON.stringify(payload)}`);
  }
  const tokens = (match[1] ?? '').split(/\s+/).filter((token) => token.length > 0);
  return tokens.map((token) => {
    if (!STATUS_PATTERN.test(token)) {
      throw new ShellRunnerError(
        ShellRunnerErrorCode.STATUS_NOT_CAPTURED,
        `Malformed exit status "${token}" in status report: ${JSON.stringify(payload)}`
      );
    }
    return Number(token);
  });
}

/**
 * Every payload is parsed, but only the last one counts: it belongs to the
 * last command. Earlier ones exist so the script can stop early under
 * check-on-failure.
 */
export function aggregate(payloads: readonly string[]): Pick<ShellCommandResult, 'status' | 'pipestatus'> {
  const parsed = payloads.map(parsePayload);
  const pipestatus = parsed[parsed.length - 1] ?? [];
  const final = pipestatus[pipestatus.length - 1];
  if (final === undefined) {
    throw new ShellRunnerError(
      ShellRunnerErrorCode.STATUS_NOT_CAPTURED,
      'Something went wrong. Failed to capture an exit status.',
      { payloads: [...payloads] }
    );
  }

  // The rightmost failing stage, as a shell with pipefail would report it.
  const status = [...pipestatus].reverse().find((code) => code !== 0) ?? final;
  return { status, pipestatus };
}
