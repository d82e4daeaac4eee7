import type { CustomFieldValue, LoanAmount } from './types';

/**
 * Commission math. Amounts are compared and rounded in integer cents,
 * half up (away from zero), so a value written once reads back as equal.
 */

/** Scale to cents. 15 significant digits strips binary noise such as 1.005 * 100 = 100.49999999999999. */
export function toCents(amount: number): number {
  const scaled = Number((amount * 100).toPrecision(15));
  return Math.sign(scaled) * Math.round(Math.abs(scaled));
}

export function roundToCents(amount: number): number {
  return toCents(amount) / 100;
}

/** Target opportunity value for a loan amount. */
export function calculateCommission(loanAmount: number, commissionRate: number): number {
  return roundToCents(loanAmount * commissionRate);
}

export function isSameAmount(a: number, b: number): boolean {
  return toCents(a) === toCents(b);
}

/**
 * Parse a money value as the CRM stores it: a number, or a string such as "$150,000.50".
 * Returns null for anything that is not a finite number once cleaned.
 */
export function parseMoney(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const cleaned = value.replace(/[$,]/g, '').trim();
  if (!cleaned) return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

/** Find the loan amount custom field (matched by id or key) and parse its value. */
export function readLoanAmount(
  customFields: ReadonlyArray<CustomFieldValue> | null | undefined,
  fieldKey: string
): LoanAmount {
  const fields = customFields ?? [];
  const field = fields.find((f) => f.id === fieldKey || f.key === fieldKey);
  if (!field) {
    const available = fields.map((f) => f.key ?? f.id ?? '?');
    return {
      ok: false,
      reason: `Loan amount field '${fieldKey}' not found (available: ${available.join(', ') || 'none'})`,
    };
  }
  const rawValue = field.value ?? field.fieldValue;
  if (rawValue == null || rawValue === '') {
    return { ok: false, reason: `Loan amount field '${fieldKey}' is empty` };
  }
  const value = parseMoney(rawValue);
  if (value == null) {
    return { ok: false, reason: `Loan amount field '${fieldKey}' is not numeric: ${JSON.stringify(rawValue)}` };
  }
  return { ok: true, value };
}
