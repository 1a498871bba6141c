/**
 * pino logging for applockd. One JSON line per record on stdout.
 *
 *   const log = createLogger('lock-coordinator');
 *   log.info({ appKey, processId }, 'suspending process');
 */

import pino from 'pino';

/** Fields that may carry a password or its hash, at any nesting level used in log calls */
const REDACTED_PATHS = [
  'secret',
  'password_hash',
  'current_password',
  'new_password',
  '*.secret',
  '*.password_hash',
  '*.current_password',
  '*.new_password',
];

const rootLogger = pino({
  name: 'applock',
  level: process.env.LOG_LEVEL || 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  formatters: {
    level: (label) => ({ level: label }),
  },
});

export function createLogger(module: string): pino.Logger {
  return rootLogger.child({ module });
}
