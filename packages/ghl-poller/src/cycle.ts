import type { CycleSummary } from '@commission-sync/shared';
import { fetchOpportunities } from './fetch-opportunities';
import { reconcileAll, type UpdaterDeps } from './reconcile';

/** One full pass: fetch every opportunity and reconcile each in turn. */
export async function runCycle(deps: UpdaterDeps): Promise<CycleSummary> {
  const startedAt = new Date().toISOString();
  const totals = await reconcileAll(deps, fetchOpportunities(deps.api, deps.config));
  return { startedAt, finishedAt: new Date().toISOString(), ...totals };
}
