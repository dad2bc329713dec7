/**
 * src/modules/_shared/best-effort.ts
 *
 * WHY:
 * - Some writes are bookkeeping around the primary operation: login timestamps,
 *   reverse-reference lists (org.business_units, org.projects, project.modules).
 *   Their failure must be visible in logs but must never fail the request.
 *
 * HOW TO USE:
 *   await bestEffort(logger, { msg: 'bu.create.org_link_failed', flow, requestId }, () =>
 *     orgRepo.addChild(orgId, 'business_units', buId),
 *   );
 */

import type { Logger } from '../../shared/logger/logger';

export type BestEffortLog = Readonly<{ msg: string; flow: string; requestId: string }> &
  Readonly<Record<string, unknown>>;

/** Resolves true when `write` completed and reported success. */
export async function bestEffort(
  logger: Logger,
  log: BestEffortLog,
  write: () => Promise<boolean>,
): Promise<boolean> {
  try {
    const applied = await write();
    if (!applied) logger.warn({ ...log, outcome: 'no_match' });
    return applied;
  } catch (error) {
    logger.warn({
      ...log,
      outcome: 'failed',
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
