import pino from 'pino';

function defaultLevel(): string {
  if (process.env['DEVTASKS_LOG_LEVEL']) return process.env['DEVTASKS_LOG_LEVEL'];
  return process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

// stderr only: stdout belongs to the commands we run.
export const logger = pino(
  {
    name: 'devtasks',
    level: defaultLevel(),
  },
  pino.destination(2)
);
