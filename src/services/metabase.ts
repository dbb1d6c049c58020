/**
 * Metabase loader
 *
 * Logs in with the service account, runs a saved question ("card") and hands
 * the result to the Normalizer. Any failure on the way (network, HTTP status,
 * login, timeout, malformed payload) is logged and reported as an empty
 * result; callers never see a transport error.
 */

import type { LoadResult, RawColumns } from '../types';
import { normalizeDataset } from '../compliance/normalizer';
import { ContextualError, toError, withTimeout } from '../utils/errors';
import { debug, generateCorrelationId, logCaughtError, logEvent } from '../utils/logger';

export interface MetabaseConfig {
  baseUrl: string;
  username: string;
  password: string;
  timeoutMs: number;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface MetabaseClient {
  authenticate(): Promise<string>;
  fetchTable(queryId: number): Promise<LoadResult>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Metabase's JSON export is an array of row objects; turn it into the column
 * mapping the Normalizer takes. Columns appear in first-seen order and a row
 * lacking a column gets null there.
 */
export function rowsToColumns(rows: unknown[]): RawColumns | unknown[] {
  if (!rows.every(isRecord)) return rows;

  const columns = new Map<string, unknown[]>();
  for (const row of rows) {
    for (const name of Object.keys(row)) {
      if (!columns.has(name)) columns.set(name, []);
    }
  }
  for (const row of rows) {
    for (const [name, values] of columns) {
      values.push(Object.hasOwn(row, name) ? row[name] : null);
    }
  }
  return Object.fromEntries(columns);
}

export function createMetabaseClient(
  config: MetabaseConfig,
  fetchImpl: FetchLike = (input, init) => fetch(input, init),
  correlationId: string = generateCorrelationId()
): MetabaseClient {
  let sessionPromise: Promise<string> | null = null;

  async function postJson(path: string, init: RequestInit, operation: string, queryId?: number): Promise<unknown> {
    const url = `${config.baseUrl}${path}`;
    const controller = new AbortController();
    let response: Response;
    try {
      response = await withTimeout(
        fetchImpl(url, { method: 'POST', ...init, signal: controller.signal }),
        config.timeoutMs,
        `${operation} timed out`
      );
    } catch (error) {
      controller.abort();
      const err = toError(error);
      throw new ContextualError(`${operation} failed: ${err.message}`, { operation, queryId }, err);
    }

    if (!response.ok) {
      throw new ContextualError(
        `${operation} failed: HTTP ${response.status} ${response.statusText}`.trim(),
        { operation, queryId, additionalInfo: { status: response.status } }
      );
    }

    try {
      return await response.json();
    } catch (error) {
      const err = toError(error);
      throw new ContextualError(`${operation} returned invalid JSON: ${err.message}`, { operation, queryId }, err);
    }
  }

  async function login(): Promise<string> {
    const body = await postJson('/api/session', {
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ username: config.username, password: config.password }),
    }, 'metabase_login');

    if (!isRecord(body) || typeof body.id !== 'string' || !body.id) {
      throw new ContextualError('metabase_login failed: response carried no session id', { operation: 'metabase_login' });
    }
    debug('Metabase', 'Session established');
    return body.id;
  }

  function authenticate(): Promise<string> {
    if (!sessionPromise) {
      sessionPromise = login();
      // cleared on failure so the next call logs in again
      void sessionPromise.catch(() => {
        sessionPromise = null;
      });
    }
    return sessionPromise;
  }

  async function fetchTable(queryId: number): Promise<LoadResult> {
    const startedAt = Date.now();
    try {
      const token = await authenticate();
      const payload = await postJson(`/api/card/${queryId}/query/json`, {
        headers: { 'X-Metabase-Session': token },
      }, 'metabase_query', queryId);

      const dataset = normalizeDataset(Array.isArray(payload) ? rowsToColumns(payload) : payload);
      logEvent('dataset_loaded', {
        correlationId,
        queryId,
        rows: dataset.rows.length,
        columns: dataset.columns.length,
        latency_ms: Date.now() - startedAt,
      });
      return { status: 'ok', queryId, dataset };
    } catch (error) {
      logCaughtError(correlationId, 'metabase_fetch_table', error, queryId);
      const reason = toError(error).message;
      return { status: 'empty', queryId, reason };
    }
  }

  return { authenticate, fetchTable };
}
