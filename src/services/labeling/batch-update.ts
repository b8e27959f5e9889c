/**
 * Batched label updates
 *
 * Records are written in batches. A batch that fails is retried from the
 * first record not yet applied, split into smaller mini-batches on each
 * attempt, until it goes through or the attempt budget runs out:
 *
 *   Attempt(offset, n) -> Success
 *   Attempt(offset, n) -> PartialFailure(offset') -> Attempt(offset', n + 1)
 *
 * Applied records are never resent.
 *
 * @module services/labeling/batch-update
 */

import type { PlatformTransport, UpdateRecord } from '../platform/transport.js';
import { chunk, sleep } from '../../utils/concurrency.js';
import { errorMessage, type Logger } from '../../utils/logger.js';
import { updateFailedError } from '../../server/errors.js';

export const DEFAULT_UPDATE_BATCH_SIZE = 50;
export const DEFAULT_MAX_UPDATE_ATTEMPTS = 10;
export const DEFAULT_UPDATE_BACKOFF_MS = 1000;

export interface BatchUpdateOptions {
  batchSize?: number;
  /** Skip batches before this index (for resuming an interrupted run) */
  firstBatch?: number;
  /** Attempts per batch, the first included */
  maxAttempts?: number;
  backoffMs?: number;
  log: Logger;
}

export interface BatchUpdateResult {
  batches: number;
  batchesApplied: number;
  recordsApplied: number;
  /** Attempts across every applied batch */
  attempts: number;
  /** Update requests sent, failed ones included */
  requests: number;
}

type BatchState =
  | { kind: 'attempt'; offset: number; attempt: number }
  | { kind: 'partial-failure'; offset: number; attempt: number; error: unknown }
  | { kind: 'success'; attempt: number };

/**
 * Mini-batch size for an attempt: the batch divided by the attempt number,
 * never less than one record
 */
export function miniBatchSize(batchLength: number, attempt: number): number {
  return Math.max(1, Math.floor(batchLength / attempt));
}

class BatchRunner {
  requests = 0;

  constructor(
    private readonly transport: PlatformTransport,
    private readonly collectionId: string,
    private readonly batch: readonly UpdateRecord[]
  ) {}

  /**
   * Send mini-batches from `offset` until one fails or the batch is done
   */
  async attempt(offset: number, attempt: number): Promise<BatchState> {
    const size = miniBatchSize(this.batch.length, attempt);
    let applied = offset;
    while (applied < this.batch.length) {
      const mini = this.batch.slice(applied, applied + size);
      this.requests++;
      try {
        await this.transport.update(this.collectionId, mini);
      } catch (error) {
        return { kind: 'partial-failure', offset: applied, attempt, error };
      }
      applied += mini.length;
    }
    return { kind: 'success', attempt };
  }
}

/**
 * Write records in batches, retrying contended batches with shrinking
 * mini-batches
 *
 * @throws SyncError UPDATE_FAILED once a batch exhausts its attempts
 */
export async function applyUpdatesInBatches(
  transport: PlatformTransport,
  collectionId: string,
  records: readonly UpdateRecord[],
  options: BatchUpdateOptions
): Promise<BatchUpdateResult> {
  const batchSize = options.batchSize ?? DEFAULT_UPDATE_BATCH_SIZE;
  const firstBatch = options.firstBatch ?? 0;
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_UPDATE_ATTEMPTS;
  const backoffMs = options.backoffMs ?? DEFAULT_UPDATE_BACKOFF_MS;
  const { log } = options;

  const batches = records.length > 0 ? chunk(records, batchSize) : [];
  const result: BatchUpdateResult = {
    batches: batches.length,
    batchesApplied: 0,
    recordsApplied: 0,
    attempts: 0,
    requests: 0,
  };

  for (let i = firstBatch; i < batches.length; i++) {
    const batch = batches[i];
    const runner = new BatchRunner(transport, collectionId, batch);
    log.info(`Running update on batch ${i + 1}/${batches.length} (${batch.length} files)`);

    let state: BatchState = { kind: 'attempt', offset: 0, attempt: 1 };
    while (state.kind !== 'success') {
      if (state.kind === 'attempt') {
        state = await runner.attempt(state.offset, state.attempt);
        continue;
      }

      const { offset, attempt, error } = state;
      if (attempt >= maxAttempts) {
        result.requests += runner.requests;
        throw updateFailedError(
          `Update of batch ${i} failed after ${attempt} attempts at offset ${offset}: ${errorMessage(error)}`,
          { batch: i, offset, attempts: attempt, cause: errorMessage(error) }
        );
      }

      const next = attempt + 1;
      log.warn(
        `Update of batch ${i} failed at offset ${offset} (attempt ${attempt}/${maxAttempts}): ${errorMessage(error)}. ` +
          `Retrying with mini-batches of ${miniBatchSize(batch.length, next)}`
      );
      if (backoffMs > 0) await sleep(backoffMs);
      state = { kind: 'attempt', offset, attempt: next };
    }

    result.batchesApplied++;
    result.recordsApplied += batch.length;
    result.attempts += state.attempt;
    result.requests += runner.requests;
  }

  return result;
}
