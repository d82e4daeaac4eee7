/**
 * Shared types for the commission sync
 */

/** Custom field entry on a CRM opportunity (GHL v1 uses `id`; some payloads carry `key`). */
export interface CustomFieldValue {
  id?: string | null;
  key?: string | null;
  value?: unknown;
  fieldValue?: unknown;
}

/** Loan amount as read from the custom field; unreadable values are kept with the reason so the updater can skip them. */
export type LoanAmount = { ok: true; value: number } | { ok: false; reason: string };

/** Opportunity as the updater sees it, mapped from the raw CRM payload */
export interface OpportunityRecord<TRaw = unknown> {
  id: string;
  pipelineId: string;
  loanAmount: LoanAmount;
  /** Current opportunity value; absent or non-numeric counts as 0. */
  monetaryValue: number;
  raw: TRaw;
}

export type SkipReason = 'unchanged' | 'no-loan-amount';

export type ReconcileResult =
  | {
      status: 'updated';
      opportunityId: string;
      previousValue: number;
      value: number;
    }
  | {
      status: 'skipped';
      opportunityId: string;
      reason: SkipReason;
      value: number;
    };

/** Totals for one fetch-and-reconcile pass */
export interface CycleSummary {
  startedAt: string;
  finishedAt: string;
  fetched: number;
  updated: number;
  skipped: number;
  failed: number;
}
