import { randomUUID } from 'node:crypto';
import type { ConcurrencyLimiter } from '../lib/concurrency.js';
import { PipelineError, errorMessage, isPipelineError } from '../lib/errors.js';
import logger, { type Logger } from '../lib/logger.js';
import { withTimeout } from '../lib/timeout.js';
import { computeDedupKey } from './dedup-key.js';
import { PLATFORM_RESULT_CAPS, type ProfileSource } from './profile-source.js';
import type { AudienceRepository, ClientRepository } from './repositories.js';
import { isSupportedPlatform, normalizePlatform, type ClientRecord, type RawRecord } from './types.js';

export interface IngestionDeps {
  clients: ClientRepository;
  audience: AudienceRepository;
  source: ProfileSource;
  sourceTimeoutMs: number;
  now?: () => Date;
}

export interface IngestionResult {
  client_id: string;
  platform: string;
  stored_count: number;
  skipped_count: number;
  total_processed: number;
  skipped_reason?: 'unsupported_platform';
}

export interface BatchIngestionEntry {
  client_id: string;
  ok: boolean;
  stored_count?: number;
  error?: string;
}

function isEmptyRecord(record: RawRecord): boolean {
  return Object.keys(record).length === 0;
}

/**
 * Persists each non-empty record at most once per (client, platform, key).
 * An insert the store rejects as a duplicate counts as skipped, which keeps
 * concurrent runs over the same data from double-storing.
 */
export async function storeRecords(
  clientId: string,
  platform: string,
  records: ReadonlyArray<RawRecord | null | undefined>,
  deps: Pick<IngestionDeps, 'audience' | 'now'>,
): Promise<Omit<IngestionResult, 'skipped_reason'>> {
  const fetchedAt = (deps.now?.() ?? new Date()).toISOString();
  let storedCount = 0;
  let skippedCount = 0;

  for (const [ordinal, record] of records.entries()) {
    if (!record || isEmptyRecord(record)) {
      skippedCount += 1;
      continue;
    }

    const uniqueKey = computeDedupKey(platform, record, ordinal);
    if (await deps.audience.exists(clientId, platform, uniqueKey)) {
      skippedCount += 1;
      continue;
    }

    const result = await deps.audience.insert({
      id: randomUUID(),
      client_id: clientId,
      platform,
      fetched_at: fetchedAt,
      unique_key: uniqueKey,
      position: ordinal,
      payload: record,
    });
    if (result.inserted) {
      storedCount += 1;
    } else {
      skippedCount += 1;
    }
  }

  return {
    client_id: clientId,
    platform,
    stored_count: storedCount,
    skipped_count: skippedCount,
    total_processed: records.length,
  };
}

/**
 * Fetches audience records for one client and stores the new ones. On success
 * the client moves to `data_fetched`; a source failure leaves it untouched.
 */
export async function ingestForClient(
  client: ClientRecord,
  deps: IngestionDeps,
  log: Logger = logger.child({ client_id: client.id }),
): Promise<IngestionResult> {
  const platform = normalizePlatform(client.platform);
  if (!isSupportedPlatform(platform)) {
    log.warn({ platform }, 'Skipping ingestion for unsupported platform');
    return {
      client_id: client.id,
      platform,
      stored_count: 0,
      skipped_count: 0,
      total_processed: 0,
      skipped_reason: 'unsupported_platform',
    };
  }

  const limit = PLATFORM_RESULT_CAPS[platform];
  const abort = new AbortController();
  let records: RawRecord[];
  try {
    records = await withTimeout(
      deps.source.fetch({
        platform,
        searchTerms: client.search_terms,
        profession: client.preferred_profession,
        location: client.preferred_location,
        limit,
      }, abort.signal),
      deps.sourceTimeoutMs,
      `${platform} profile source timed out after ${deps.sourceTimeoutMs}ms`,
      () => abort.abort(),
    );
  } catch (error) {
    if (isPipelineError(error)) throw error;
    throw new PipelineError('SourceUnavailable', errorMessage(error), { cause: error });
  }

  const result = await storeRecords(client.id, platform, records.slice(0, limit), deps);

  await deps.clients.update(client.id, {
    status: 'data_fetched',
    data_fetched_at: (deps.now?.() ?? new Date()).toISOString(),
    profiles_count: result.stored_count,
    last_error: null,
  });

  log.info({
    platform,
    stored_count: result.stored_count,
    skipped_count: result.skipped_count,
    total_processed: result.total_processed,
  }, 'Audience ingestion complete');
  return result;
}

/**
 * Ingests every registered client through the shared pool. A failing client
 * is logged and reported; it never stops the rest of the batch.
 */
export async function runBatchIngestion(
  deps: IngestionDeps,
  limit: ConcurrencyLimiter,
): Promise<BatchIngestionEntry[]> {
  const clients = await deps.clients.list();
  logger.info({ client_count: clients.length }, 'Batch ingestion started');

  const entries = await Promise.all(clients.map((client) => limit(async (): Promise<BatchIngestionEntry> => {
    const log = logger.child({ client_id: client.id });
    try {
      const result = await ingestForClient(client, deps, log);
      return { client_id: client.id, ok: true, stored_count: result.stored_count };
    } catch (error) {
      const reason = errorMessage(error);
      log.error({ error: reason }, 'Batch ingestion failed for client');
      return { client_id: client.id, ok: false, error: reason };
    }
  })));

  const failed = entries.filter((entry) => !entry.ok).length;
  logger.info({ client_count: clients.length, failed }, 'Batch ingestion finished');
  return entries;
}
