import pino from 'pino';

// stderr only: stdout carries the echoed command output.
export const logger = pino(
  {
    name: 'pipestatus-runner',
    level: process.env['LOG_LEVEL'] ?? 'warn',
  },
  pino.destination({ dest: 2, sync: true })
);
