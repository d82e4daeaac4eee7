/**
 * Map GHL opportunity payloads to OpportunityRecord, and rebuild the update payload.
 * GHL v1 answers a PUT carrying only monetaryValue with 422, so the update repeats
 * status, stage, title and contact name from the opportunity as fetched.
 */
import { parseMoney, readLoanAmount, type OpportunityRecord } from '@commission-sync/shared';
import type { OpportunityUpdatePayload } from './ghl-client';
import type { GhlOpportunity } from './ghl-schemas';

export type GhlOpportunityRecord = OpportunityRecord<GhlOpportunity>;

function str(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const s = value.trim();
  return s ? s : undefined;
}

function pick(source: Record<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const v = str(source[key]);
    if (v) return v;
  }
  return undefined;
}

function joinName(source: Record<string, unknown>): string | undefined {
  const first = pick(source, ['firstName', 'first_name']) ?? '';
  const last = pick(source, ['lastName', 'last_name']) ?? '';
  return str(`${first} ${last}`);
}

export function toOpportunityRecord(
  raw: GhlOpportunity,
  pipelineId: string,
  loanAmountFieldKey: string
): GhlOpportunityRecord {
  return {
    id: raw.id,
    pipelineId: str(raw.pipelineId) ?? pipelineId,
    loanAmount: readLoanAmount(raw.customFields, loanAmountFieldKey),
    monetaryValue: parseMoney(raw.monetaryValue) ?? 0,
    raw,
  };
}

/** Opportunity title: the dedicated keys first, then the ambiguous `name`. */
export function opportunityTitle(raw: GhlOpportunity): string | undefined {
  return pick(raw, ['opportunity_name', 'title', 'name']);
}

/** Contact name from the nested contact, then root-level name fields. */
export function contactName(raw: GhlOpportunity): string | undefined {
  const contact: Record<string, unknown> = raw.contact ?? {};
  return (
    pick(contact, ['name', 'full_name', 'fullName']) ??
    joinName(contact) ??
    pick(raw, ['contact_name', 'full_name', 'fullName']) ??
    joinName(raw)
  );
}

export function buildUpdatePayload(raw: GhlOpportunity, monetaryValue: number): OpportunityUpdatePayload {
  const payload: OpportunityUpdatePayload = { monetaryValue };
  const status = str(raw.status);
  const stageId = str(raw.pipelineStageId);
  if (status) payload.status = status;
  if (stageId) payload.pipelineStageId = stageId;

  const title = opportunityTitle(raw);
  // `name` maps to the linked contact in v1; the title is a last resort
  const name = contactName(raw) ?? title;
  if (name) payload.name = name;
  if (title) payload.title = title;
  return payload;
}
