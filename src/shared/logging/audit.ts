/**
 * Audit records for lock decisions (interceptions, unlocks, denials).
 * Uses structured pino logger at info level.
 */
import { createLogger } from './logger.js';

const log = createLogger('audit');

export type AuditAction =
  | 'intercept'
  | 'unlock'
  | 'deny'
  | 'vanished'
  | 'superseded'
  | 'relock'
  | 'policy_reload'
  | 'policy_update';

export function auditLog(
  action: AuditAction,
  appKey?: string,
  details?: Record<string, unknown>
): void {
  log.info({
    audit: true,
    action,
    ...(appKey ? { app: appKey } : {}),
    ...(details ? { details } : {}),
  }, `audit: ${action}`);
}
