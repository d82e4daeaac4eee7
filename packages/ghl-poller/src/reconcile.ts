/**
 * Updater: bring one opportunity's value in line with its loan amount commission.
 * At most one write per record per call; equal values (in cents) are left alone.
 */
import {
  DataError,
  NotFoundError,
  calculateCommission,
  createLogger,
  isFatal,
  isSameAmount,
  parseMoney,
  type ReconcileResult,
  type Logger,
} from '@commission-sync/shared';
import type { CommissionConfig } from './config';
import { findOpportunity } from './fetch-opportunities';
import { updateOpportunity, type GhlApi } from './ghl-client';
import { buildUpdatePayload, type GhlOpportunityRecord } from './map-opportunity';

const defaultLog = createLogger('ghl-updater', 'ghl');

export interface UpdaterDeps {
  api: GhlApi;
  config: Pick<CommissionConfig, 'commissionRate' | 'loanAmountFieldKey' | 'opportunityStatus'>;
  log?: Logger;
}

export interface BatchResult {
  fetched: number;
  updated: number;
  skipped: number;
  failed: number;
}

/**
 * Reconcile a single record. Throws DataError for an unreadable loan amount and passes
 * through client errors (TransientError, CrmApiError, AuthError) from the write.
 */
export async function reconcile(deps: UpdaterDeps, record: GhlOpportunityRecord): Promise<ReconcileResult> {
  const log = deps.log ?? defaultLog;
  if (!record.loanAmount.ok) {
    throw new DataError(record.loanAmount.reason, record.id);
  }
  const loanAmount = record.loanAmount.value;
  if (loanAmount <= 0) {
    return { status: 'skipped', opportunityId: record.id, reason: 'no-loan-amount', value: record.monetaryValue };
  }

  const target = calculateCommission(loanAmount, deps.config.commissionRate);
  if (isSameAmount(record.monetaryValue, target)) {
    log.debug({ opportunityId: record.id, value: target }, 'Value already correct');
    return { status: 'skipped', opportunityId: record.id, reason: 'unchanged', value: target };
  }

  log.info(
    { opportunityId: record.id, loanAmount, previousValue: record.monetaryValue, value: target },
    'Updating opportunity value'
  );
  await updateOpportunity(deps.api, record.pipelineId, record.id, buildUpdatePayload(record.raw, target));
  return { status: 'updated', opportunityId: record.id, previousValue: record.monetaryValue, value: target };
}

/**
 * Reconcile records one at a time. A failing record is logged and counted; the rest still run.
 * Fatal errors (credential rejected) and errors raised by the record source end the batch.
 */
export async function reconcileAll(
  deps: UpdaterDeps,
  records: AsyncIterable<GhlOpportunityRecord> | Iterable<GhlOpportunityRecord>
): Promise<BatchResult> {
  const log = deps.log ?? defaultLog;
  const result: BatchResult = { fetched: 0, updated: 0, skipped: 0, failed: 0 };

  for await (const record of records) {
    result.fetched++;
    try {
      const outcome = await reconcile(deps, record);
      if (outcome.status === 'updated') result.updated++;
      else result.skipped++;
    } catch (err) {
      if (isFatal(err)) throw err;
      result.failed++;
      if (err instanceof DataError) {
        log.warn({ opportunityId: record.id, reason: err.message }, 'Skipping opportunity: invalid loan amount');
      } else {
        log.error({ opportunityId: record.id, err }, 'Failed to update opportunity');
      }
    }
  }
  return result;
}

export interface ReconcileByIdInput {
  opportunityId: string;
  pipelineId?: string;
  /** Loan amount carried by the webhook; replaces the custom field when readable. */
  loanAmount?: unknown;
}

/** Webhook path: fetch one opportunity, optionally override its loan amount, reconcile it. */
export async function reconcileById(deps: UpdaterDeps, input: ReconcileByIdInput): Promise<ReconcileResult> {
  const log = deps.log ?? defaultLog;
  const record = await findOpportunity(deps.api, deps.config, input.opportunityId, input.pipelineId);
  if (!record) {
    throw new NotFoundError(`Opportunity ${input.opportunityId} not found`);
  }

  if (input.loanAmount !== undefined && input.loanAmount !== null) {
    const override = parseMoney(input.loanAmount);
    if (override == null) {
      log.warn(
        { opportunityId: record.id, loanAmount: input.loanAmount },
        'Ignoring unreadable loan amount from webhook payload'
      );
    } else {
      return reconcile(deps, { ...record, loanAmount: { ok: true, value: override } });
    }
  }
  return reconcile(deps, record);
}

export function describeResult(result: ReconcileResult): string {
  if (result.status === 'updated') return `Updated value to ${result.value.toFixed(2)}`;
  if (result.reason === 'unchanged') return 'No update needed (value already correct)';
  return 'Skipped: no loan amount';
}
