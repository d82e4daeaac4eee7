/**
 * GoHighLevel REST v1 client: pipelines, opportunity pages, single opportunity, update.
 * Every call carries a bounded timeout. HTTP failures are classified into the shared
 * error taxonomy so the poll loop can tell fatal from transient.
 */
import type { z } from 'zod';
import {
  AuthError,
  CrmApiError,
  TransientError,
  createLogger,
  errorMessage,
} from '@commission-sync/shared';
import type { CommissionConfig, OpportunityStatus } from './config';
import {
  ghlOpportunityPageSchema,
  ghlOpportunitySchema,
  ghlPipelinesResponseSchema,
  type GhlOpportunity,
  type GhlOpportunityPage,
  type GhlPipeline,
} from './ghl-schemas';

const log = createLogger('ghl-client', 'ghl');

const DELAY_MS = 250;
const MAX_429_RETRIES = 2;
const MAX_RETRY_WAIT_MS = 30_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface GhlApi {
  baseUrl: string;
  accessToken: string;
  locationId: string | undefined;
  timeoutMs: number;
  fetch: FetchLike;
}

export function createGhlApi(
  config: Pick<CommissionConfig, 'apiBaseUrl' | 'accessToken' | 'locationId' | 'requestTimeoutMs'>,
  fetchImpl: FetchLike = fetch
): GhlApi {
  return {
    baseUrl: config.apiBaseUrl.replace(/\/$/, ''),
    accessToken: config.accessToken,
    locationId: config.locationId,
    timeoutMs: config.requestTimeoutMs,
    fetch: fetchImpl,
  };
}

/** Fields sent on PUT /pipelines/{pipelineId}/opportunities/{id} */
export interface OpportunityUpdatePayload {
  monetaryValue: number;
  status?: string;
  pipelineStageId?: string;
  title?: string;
  name?: string;
}

export interface OpportunityPageParams {
  status: OpportunityStatus;
  limit: number;
  startAfterId?: string;
  startAfter?: number;
}

type Query = Record<string, string | number | undefined>;

async function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

function classifyFailure(method: string, path: string, status: number, text: string): Error {
  const message = `GHL ${method} ${path} failed: ${status} ${text}`.trim();
  if (status === 401 || status === 403) return new AuthError(message, status);
  if (status === 408 || status === 429 || status >= 500) return new TransientError(message, status);
  return new CrmApiError(message, status, text);
}

/** Read the body as text; a failed read (reset, timeout mid-body) is transient. */
async function readText(res: Response, method: string, path: string): Promise<string> {
  try {
    return await res.text();
  } catch (err) {
    throw new TransientError(`GHL ${method} ${path} failed reading body: ${errorMessage(err)}`, res.status, {
      cause: err,
    });
  }
}

async function ghlRequest(
  api: GhlApi,
  method: 'GET' | 'PUT',
  path: string,
  options: { query?: Query; body?: unknown } = {}
): Promise<Response> {
  const url = new URL(`${api.baseUrl}${path}`);
  for (const [key, value] of Object.entries(options.query ?? {})) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }

  for (let retry = 0; ; retry++) {
    let res: Response;
    try {
      res = await api.fetch(url.toString(), {
        method,
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${api.accessToken}`,
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(api.timeoutMs),
      });
    } catch (err) {
      // fetch rejects on DNS/connection errors and on the timeout signal
      throw new TransientError(`GHL ${method} ${path} failed: ${errorMessage(err)}`, undefined, {
        cause: err,
      });
    }

    if (res.status === 429 && retry < MAX_429_RETRIES) {
      const retryAfter = res.headers.get('Retry-After');
      const parsed = retryAfter ? parseInt(retryAfter, 10) * 1000 : DELAY_MS;
      const wait = Number.isFinite(parsed) ? Math.min(parsed, MAX_RETRY_WAIT_MS) : DELAY_MS;
      log.warn({ retry, waitMs: wait, path }, 'Rate limited (429), retrying');
      await sleep(wait);
      continue;
    }

    if (!res.ok) {
      const text = await readText(res, method, path);
      log.error({ method, path, status: res.status, body: text }, 'GHL request failed');
      throw classifyFailure(method, path, res.status, text);
    }
    return res;
  }
}

async function readJson<T extends z.ZodTypeAny>(
  res: Response,
  schema: T,
  path: string
): Promise<z.infer<T>> {
  let json: unknown;
  try {
    json = await res.json();
  } catch (err) {
    throw new TransientError(`GHL ${path} returned invalid JSON: ${errorMessage(err)}`, res.status, {
      cause: err,
    });
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new CrmApiError(`GHL ${path} returned an unexpected shape: ${detail}`, res.status, JSON.stringify(json));
  }
  return parsed.data;
}

/** GET /pipelines/ (scoped to the location when known) */
export async function listPipelines(api: GhlApi): Promise<GhlPipeline[]> {
  const path = '/pipelines/';
  const res = await ghlRequest(api, 'GET', path, { query: { locationId: api.locationId } });
  const data = await readJson(res, ghlPipelinesResponseSchema, path);
  log.debug({ pipelines: data.pipelines.length }, 'Fetched pipelines');
  return data.pipelines;
}

/** GET /pipelines/{pipelineId}/opportunities, one page */
export async function fetchOpportunityPage(
  api: GhlApi,
  pipelineId: string,
  params: OpportunityPageParams
): Promise<GhlOpportunityPage> {
  const path = `/pipelines/${encodeURIComponent(pipelineId)}/opportunities`;
  const res = await ghlRequest(api, 'GET', path, {
    query: {
      limit: params.limit,
      status: params.status,
      startAfterId: params.startAfterId,
      startAfter: params.startAfter,
    },
  });
  return readJson(res, ghlOpportunityPageSchema, path);
}

/** GET /pipelines/{pipelineId}/opportunities/{id}. Returns null on 404. */
export async function getOpportunity(
  api: GhlApi,
  pipelineId: string,
  opportunityId: string
): Promise<GhlOpportunity | null> {
  const path = `/pipelines/${encodeURIComponent(pipelineId)}/opportunities/${encodeURIComponent(opportunityId)}`;
  try {
    const res = await ghlRequest(api, 'GET', path);
    return await readJson(res, ghlOpportunitySchema, path);
  } catch (err) {
    if (err instanceof CrmApiError && err.status === 404) {
      log.warn({ opportunityId, pipelineId }, 'Opportunity not found in pipeline');
      return null;
    }
    throw err;
  }
}

/** PUT /pipelines/{pipelineId}/opportunities/{id} */
export async function updateOpportunity(
  api: GhlApi,
  pipelineId: string,
  opportunityId: string,
  payload: OpportunityUpdatePayload
): Promise<void> {
  const path = `/pipelines/${encodeURIComponent(pipelineId)}/opportunities/${encodeURIComponent(opportunityId)}`;
  const res = await ghlRequest(api, 'PUT', path, { body: payload });
  // Drain the body so the connection can be reused
  await readText(res, 'PUT', path);
  log.info({ opportunityId, monetaryValue: payload.monetaryValue }, 'Opportunity value updated');
}
