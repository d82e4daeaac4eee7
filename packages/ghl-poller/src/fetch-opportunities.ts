/**
 * Poller: walk every pipeline of the location and yield its opportunities page by page.
 * Read-only. Any error ends the iteration, which aborts the current cycle.
 */
import { AuthError, createLogger } from '@commission-sync/shared';
import type { CommissionConfig, OpportunityStatus } from './config';
import { fetchOpportunityPage, getOpportunity, listPipelines, type GhlApi } from './ghl-client';
import type { GhlOpportunity } from './ghl-schemas';
import { toOpportunityRecord, type GhlOpportunityRecord } from './map-opportunity';

const log = createLogger('ghl-fetch-opportunities', 'ghl');

export const PAGE_LIMIT = 100;
const MAX_PAGES_PER_PIPELINE = 100; // safety limit

export type PollerConfig = Pick<CommissionConfig, 'opportunityStatus' | 'loanAmountFieldKey'>;

async function* fetchPipelineOpportunities(
  api: GhlApi,
  pipelineId: string,
  status: OpportunityStatus
): AsyncGenerator<GhlOpportunity, void, undefined> {
  let startAfterId: string | undefined;
  let startAfter: number | undefined;

  for (let page = 1; page <= MAX_PAGES_PER_PIPELINE; page++) {
    const data = await fetchOpportunityPage(api, pipelineId, {
      status,
      limit: PAGE_LIMIT,
      startAfterId,
      startAfter,
    });
    const opportunities = data.opportunities;
    log.debug({ pipelineId, page, pageResults: opportunities.length }, 'Fetched opportunities page');
    yield* opportunities;

    const nextId = data.meta?.startAfterId ?? undefined;
    const nextAfter = data.meta?.startAfter ?? undefined;
    if (opportunities.length < PAGE_LIMIT || !nextId || nextId === startAfterId) return;
    startAfterId = nextId;
    startAfter = nextAfter;
  }
  log.warn({ pipelineId, maxPages: MAX_PAGES_PER_PIPELINE }, 'Page limit reached, remaining opportunities skipped');
}

/**
 * Lazily fetch the opportunities of every pipeline as OpportunityRecords.
 * Order is whatever the API returns.
 */
export async function* fetchOpportunities(
  api: GhlApi,
  config: PollerConfig
): AsyncGenerator<GhlOpportunityRecord, void, undefined> {
  const pipelines = await listPipelines(api);
  let total = 0;
  for (const pipeline of pipelines) {
    for await (const raw of fetchPipelineOpportunities(api, pipeline.id, config.opportunityStatus)) {
      total++;
      yield toOpportunityRecord(raw, pipeline.id, config.loanAmountFieldKey);
    }
  }
  log.info({ pipelines: pipelines.length, opportunities: total }, 'Fetch complete');
}

/**
 * Look up one opportunity. With a pipeline id this is a single GET; otherwise (or when that
 * misses or fails for any reason but credentials) every pipeline is searched, which costs a
 * full fetch.
 */
export async function findOpportunity(
  api: GhlApi,
  config: PollerConfig,
  opportunityId: string,
  pipelineId?: string
): Promise<GhlOpportunityRecord | null> {
  if (pipelineId) {
    try {
      const raw = await getOpportunity(api, pipelineId, opportunityId);
      if (raw) return toOpportunityRecord(raw, pipelineId, config.loanAmountFieldKey);
    } catch (err) {
      if (err instanceof AuthError) throw err;
      log.warn({ opportunityId, pipelineId, err }, 'Direct lookup failed, falling back to search');
    }
  }
  log.info({ opportunityId }, 'Searching all pipelines for opportunity');
  for await (const record of fetchOpportunities(api, config)) {
    if (record.id === opportunityId) return record;
  }
  return null;
}
