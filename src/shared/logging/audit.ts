/**
 * Audit logging for lock overrides.
 * Force releases and lifecycle cascades bypass the holder check, so each one
 * leaves an info-level record naming who triggered it.
 */
import { createLogger } from './logger.js';

const log = createLogger('audit');

export function auditLog(
  action: string,
  actor: string,
  resourceIds?: string[],
  details?: Record<string, unknown>
): void {
  log.info({
    audit: true,
    action,
    actor,
    ...(resourceIds && resourceIds.length > 0 ? { resources: resourceIds } : {}),
    ...(details ? { details } : {}),
  }, `audit: ${action}`);
}
