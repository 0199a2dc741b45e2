import { z } from 'zod';
import { NetworkError } from '../engine/errors';
import { log } from '../engine/logger';
import type { DatasetRecord } from '../engine/transcode';

export const SUBSCRIPTION_KEY_HEADER = 'Ocp-Apim-Subscription-Key';
export const DEFAULT_TIMEOUT_MS = 30_000;

export type FetchOutcome =
  | { kind: 'fetched'; records: DatasetRecord[] }
  | { kind: 'empty' }
  | { kind: 'degraded'; error: NetworkError };

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export type SportsDataClientOptions = {
  timeoutMs?: number;
  fetchFn?: FetchFn;
};

const RecordSchema = z.record(z.unknown());

const MAX_DROPPED_LOGS = 10;

const isEmptyObject = (value: unknown): boolean =>
  value !== null && typeof value === 'object' && !Array.isArray(value) && Object.keys(value).length === 0;

const hasName = (value: unknown): value is { name: string } =>
  value !== null && typeof value === 'object' && 'name' in value && typeof value.name === 'string';

const hasErrorCode = (value: unknown): value is { code: string } =>
  value !== null && typeof value === 'object' && 'code' in value && typeof value.code === 'string';

/**
 * Map whatever fetch() threw to one of the request failure classes.
 * Undici reports DNS and socket failures as a TypeError whose cause carries an errno code.
 */
export const classifyFetchError = (err: unknown): NetworkError => {
  if (err instanceof NetworkError) {
    return err;
  }

  // AbortSignal.timeout rejects with a DOMException named TimeoutError
  if (hasName(err) && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return new NetworkError('timeout', 'Request timed out', { cause: err });
  }

  if (err instanceof TypeError && hasErrorCode(err.cause)) {
    return new NetworkError('connection', `Network connection error (${err.cause.code})`, { cause: err });
  }

  const detail = err instanceof Error ? err.message : String(err);
  return new NetworkError('request', `Request failed: ${detail}`, { cause: err });
};

/**
 * Client for the SportsData.io REST API.
 * One GET per call, no retries and no pagination.
 */
export class SportsDataClient {
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private droppedLogCount = 0;

  constructor(options: SportsDataClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  /**
   * Fetch the full dataset. Failures degrade to zero records, but stay visible as
   * a "degraded" outcome carrying the classified error.
   */
  async fetchDataset(endpoint: string, apiKey: string): Promise<FetchOutcome> {
    try {
      const response = await this.fetchFn(endpoint, {
        method: 'GET',
        headers: {
          [SUBSCRIPTION_KEY_HEADER]: apiKey,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        throw new NetworkError('http', `HTTP error occurred: ${response.status} ${response.statusText}`.trim(), {
          status: response.status,
        });
      }

      const body: unknown = await response.json();
      const records = this.toRecords(body);
      if (records.length === 0) {
        return { kind: 'empty' };
      }
      return { kind: 'fetched', records };
    } catch (err) {
      return { kind: 'degraded', error: classifyFetchError(err) };
    }
  }

  /** An array body yields its object entries; a single non-empty object is one record. */
  private toRecords(body: unknown): DatasetRecord[] {
    if (isEmptyObject(body)) {
      return [];
    }

    const items: unknown[] = Array.isArray(body) ? body : [body];
    const records: DatasetRecord[] = [];

    for (const [index, item] of items.entries()) {
      const result = RecordSchema.safeParse(item);
      if (result.success) {
        records.push(result.data);
        continue;
      }

      if (this.droppedLogCount < MAX_DROPPED_LOGS) {
        log.warn(`[fetch] Dropping entry ${index}: expected an object, got ${String(JSON.stringify(item)).slice(0, 200)}`);
        this.droppedLogCount++;
        if (this.droppedLogCount === MAX_DROPPED_LOGS) {
          log.warn('[fetch] Suppressing further dropped-entry warnings...');
        }
      }
    }

    return records;
  }
}
