/**
 * Process configuration, read once from the environment at startup.
 * The returned object is frozen and passed explicitly to the client, updater, loop and server.
 */
import cron from 'node-cron';
import { z } from 'zod';
import { ConfigError } from '@commission-sync/shared';

export const OPPORTUNITY_STATUSES = ['open', 'won', 'lost', 'abandoned', 'all'] as const;
export type OpportunityStatus = (typeof OPPORTUNITY_STATUSES)[number];

const DEFAULT_API_BASE_URL = 'https://rest.gohighlevel.com/v1';
const DEFAULT_LOAN_AMOUNT_FIELD_KEY = 'loan_with_mipfunding_fee';

const emptyAsUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const positiveInt = (fallback: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(fallback));

const flag = z.preprocess(
  emptyAsUndefined,
  z
    .enum(['1', '0', 'true', 'false'])
    .default('0')
    .transform((v) => v === '1' || v === 'true')
);

const EnvSchema = z.object({
  GHL_ACCESS_TOKEN: z.preprocess(emptyAsUndefined, z.string({ required_error: 'Required' }).min(1)),
  COMMISSION_RATE: z.preprocess(
    (v) => {
      const s = emptyAsUndefined(v);
      return typeof s === 'string' ? Number(s) : s;
    },
    z
      .number({ required_error: 'Required', invalid_type_error: 'Expected a number' })
      .gt(0, 'Must be greater than 0')
      .lte(1, 'Must be a fraction (0.10 = 10%)')
  ),
  POLL_INTERVAL_SECONDS: positiveInt(600),
  REQUEST_TIMEOUT_MS: positiveInt(15_000),
  LOAN_AMOUNT_FIELD_KEY: z.preprocess(emptyAsUndefined, z.string().default(DEFAULT_LOAN_AMOUNT_FIELD_KEY)),
  GHL_API_BASE_URL: z.preprocess(emptyAsUndefined, z.string().url().default(DEFAULT_API_BASE_URL)),
  GHL_LOCATION_ID: z.preprocess(emptyAsUndefined, z.string().optional()),
  OPPORTUNITY_STATUS: z.preprocess(emptyAsUndefined, z.enum(OPPORTUNITY_STATUSES).default('open')),
  POLL_CRON: z.preprocess(
    emptyAsUndefined,
    z
      .string()
      .refine((expr) => cron.validate(expr), 'Invalid cron expression')
      .optional()
  ),
  RUN_ONCE: flag,
  HOST: z.preprocess(emptyAsUndefined, z.string().default('0.0.0.0')),
  PORT: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(0).max(65535).default(8080)),
});

export interface CommissionConfig {
  accessToken: string;
  commissionRate: number;
  pollIntervalSeconds: number;
  requestTimeoutMs: number;
  loanAmountFieldKey: string;
  apiBaseUrl: string;
  locationId: string | undefined;
  opportunityStatus: OpportunityStatus;
  pollCron: string | undefined;
  runOnce: boolean;
  host: string;
  port: number;
}

/** Read the location_id claim from a GHL JWT without verifying it. Returns undefined for opaque tokens. */
export function locationIdFromToken(token: string): string | undefined {
  const parts = token.split('.');
  if (parts.length < 2) return undefined;
  try {
    const payload: unknown = JSON.parse(Buffer.from(parts[1], 'base64url').toString('utf8'));
    if (payload && typeof payload === 'object' && 'location_id' in payload) {
      const id = payload.location_id;
      return typeof id === 'string' && id ? id : undefined;
    }
  } catch {
    return undefined;
  }
  return undefined;
}

/**
 * Validate the environment and build the config. Throws ConfigError listing every bad variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<CommissionConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues: Record<string, string[]> = {};
    for (const [key, messages] of Object.entries(parsed.error.flatten().fieldErrors)) {
      if (messages && messages.length > 0) issues[key] = messages;
    }
    const summary = Object.entries(issues)
      .map(([key, messages]) => `${key}: ${messages.join('; ')}`)
      .join(', ');
    throw new ConfigError(`Invalid configuration: ${summary}`, issues);
  }
  const e = parsed.data;
  return Object.freeze({
    accessToken: e.GHL_ACCESS_TOKEN,
    commissionRate: e.COMMISSION_RATE,
    pollIntervalSeconds: e.POLL_INTERVAL_SECONDS,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    loanAmountFieldKey: e.LOAN_AMOUNT_FIELD_KEY,
    apiBaseUrl: e.GHL_API_BASE_URL.replace(/\/$/, ''),
    locationId: e.GHL_LOCATION_ID ?? locationIdFromToken(e.GHL_ACCESS_TOKEN),
    opportunityStatus: e.OPPORTUNITY_STATUS,
    pollCron: e.POLL_CRON,
    runOnce: e.RUN_ONCE,
    host: e.HOST,
    port: e.PORT,
  });
}
