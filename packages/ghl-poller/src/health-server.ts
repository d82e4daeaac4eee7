/**
 * Liveness and webhook endpoints.
 *
 *   GET  /         service banner
 *   GET  /health   loop state and last cycle (503 once halted)
 *   POST /webhook  reconcile one opportunity when the CRM reports a change
 */
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import {
  AuthError,
  createLogger,
  errorMessage,
  type CycleSummary,
  type ReconcileResult,
} from '@commission-sync/shared';
import type { LoopState } from './poll-loop';
import { describeResult, type ReconcileByIdInput } from './reconcile';

const log = createLogger('health-server', 'http');

const MAX_BODY_BYTES = 1024 * 1024;
const LOAN_AMOUNT_KEYS = ['loan-amount', 'loan_amount', 'Loan Amount', 'loan amount'];

/** The slice of PollLoop the health endpoint reports. */
export interface LoopStatus {
  readonly state: LoopState;
  readonly lastCycle: CycleSummary | null;
  readonly lastError: string | null;
  readonly cycles: number;
}

export interface HealthServerDeps {
  loop: LoopStatus;
  reconcileById: (input: ReconcileByIdInput) => Promise<ReconcileResult>;
}

class BadRequest extends Error {}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new BadRequest('Payload too large');
    chunks.push(buf);
  }
  const text = Buffer.concat(chunks).toString('utf8').trim();
  if (!text) throw new BadRequest('No JSON payload provided');
  try {
    return JSON.parse(text);
  } catch {
    throw new BadRequest('Invalid JSON payload');
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  if (typeof value === 'number') return String(value);
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/** Pull the opportunity id, pipeline id and optional loan amount out of a webhook body. */
export function parseWebhookPayload(body: unknown): ReconcileByIdInput {
  if (!isRecord(body)) throw new BadRequest('No JSON payload provided');
  const opportunityId = nonEmptyString(body.id);
  if (!opportunityId) throw new BadRequest("Missing 'id' in payload");
  // Both casings show up depending on the workflow that sends the webhook
  const pipelineId = nonEmptyString(body.pipelineId) ?? nonEmptyString(body.pipeline_id);
  const customData = isRecord(body.customData) ? body.customData : {};
  const key = LOAN_AMOUNT_KEYS.find((k) => customData[k] != null && customData[k] !== '');
  return {
    opportunityId,
    pipelineId,
    loanAmount: key ? customData[key] : undefined,
  };
}

async function handleWebhook(deps: HealthServerDeps, req: IncomingMessage, res: ServerResponse): Promise<void> {
  let input: ReconcileByIdInput;
  try {
    input = parseWebhookPayload(await readJsonBody(req));
  } catch (err) {
    if (err instanceof BadRequest) {
      sendJson(res, 400, { error: err.message });
      return;
    }
    throw err;
  }

  log.info({ opportunityId: input.opportunityId, pipelineId: input.pipelineId }, 'Webhook received');
  try {
    const result = await deps.reconcileById(input);
    sendJson(res, 200, { status: 'success', result: result.status, message: describeResult(result) });
  } catch (err) {
    if (err instanceof AuthError) {
      log.error({ err }, 'Webhook processing rejected by CRM credentials');
      sendJson(res, 502, { status: 'error', reason: err.message });
      return;
    }
    // 200 so the CRM does not retry a webhook that will keep failing the same way
    log.warn({ opportunityId: input.opportunityId, err }, 'Webhook processing failed');
    sendJson(res, 200, { status: 'ignored', reason: errorMessage(err) });
  }
}

function handleHealth(deps: HealthServerDeps, res: ServerResponse): void {
  const { state, lastCycle, lastError, cycles } = deps.loop;
  sendJson(res, state === 'halted' ? 503 : 200, { status: state, cycles, lastCycle, lastError });
}

export function createHealthServer(deps: HealthServerDeps): Server {
  return createServer((req, res) => {
    const url = new URL(req.url || '/', 'http://localhost');

    if (url.pathname === '/' && req.method === 'GET') {
      sendJson(res, 200, { status: 'active', service: 'Commission Updater' });
      return;
    }
    if (url.pathname === '/health' && req.method === 'GET') {
      handleHealth(deps, res);
      return;
    }
    if (url.pathname === '/webhook' && req.method === 'POST') {
      handleWebhook(deps, req, res).catch((err) => {
        log.error({ err }, 'Webhook handler error');
        if (!res.headersSent) sendJson(res, 500, { error: 'Internal error' });
        else res.end();
      });
      return;
    }

    res.writeHead(404, { 'Content-Type': 'text/plain' });
    res.end('Not found');
  });
}

/** Close the server, resolving once open connections are done. */
export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
