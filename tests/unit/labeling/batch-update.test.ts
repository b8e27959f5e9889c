/**
 * Batched update retry tests
 *
 * FakeTransport fails update requests through its onUpdate hook; backoff is
 * disabled so retries run immediately.
 *
 * @module tests/unit/labeling/batch-update
 */

import { describe, it, expect } from 'vitest';
import { applyUpdatesInBatches, miniBatchSize } from '../../../src/services/labeling/batch-update.js';
import type { UpdateRecord } from '../../../src/services/platform/transport.js';
import { SyncError } from '../../../src/server/errors.js';
import { FakeTransport } from '../helpers/fake-transport.js';
import { captureLogger, messagesAt } from '../helpers/fixtures.js';

function records(n: number): UpdateRecord[] {
  return Array.from({ length: n }, (_, i) => ({ uid: `r${i}`, Total: i }));
}

function setup(): FakeTransport {
  const transport = new FakeTransport();
  transport.addCollection('invoices', 'col-1');
  return transport;
}

const indexOf = (record: UpdateRecord): number => Number(record.uid.slice(1));

describe('miniBatchSize', () => {
  it('divides the batch by the attempt number', () => {
    expect(miniBatchSize(10, 1)).toBe(10);
    expect(miniBatchSize(10, 3)).toBe(3);
    expect(miniBatchSize(3, 5)).toBe(1);
  });
});

describe('applyUpdatesInBatches', () => {
  it('writes every batch in order', async () => {
    const transport = setup();
    const { log, lines } = captureLogger();

    const result = await applyUpdatesInBatches(transport, 'col-1', records(5), { batchSize: 2, backoffMs: 0, log });

    expect(result).toEqual({ batches: 3, batchesApplied: 3, recordsApplied: 5, attempts: 3, requests: 3 });
    expect(transport.updateCalls.map((c) => c.records.map((r) => r.uid))).toEqual([['r0', 'r1'], ['r2', 'r3'], ['r4']]);
    expect(messagesAt(lines, 'info')[0]).toBe('Running update on batch 1/3 (2 files)');
  });

  it('shrinks mini-batches until a contended batch goes through', async () => {
    const transport = setup();
    transport.onUpdate = (batch) => {
      if (batch.length > 1 && batch.some((r) => indexOf(r) >= 6)) {
        throw new Error('409: update conflict');
      }
    };

    const result = await applyUpdatesInBatches(transport, 'col-1', records(10), {
      batchSize: 10,
      backoffMs: 0,
      log: captureLogger().log,
    });

    expect(result.attempts).toBe(6);
    expect(result.requests).toBe(11);
    expect(transport.updateCalls).toHaveLength(11);
    expect(transport.appliedRecords.map((r) => r.uid)).toEqual(records(10).map((r) => r.uid));
  });

  it('resumes from the first record not yet applied', async () => {
    const transport = setup();
    let failures = 0;
    transport.onUpdate = (batch) => {
      if (batch.some((r) => r.uid === 'r3') && failures++ === 0) {
        throw new Error('409: update conflict');
      }
    };

    await applyUpdatesInBatches(transport, 'col-1', records(4), { batchSize: 4, backoffMs: 0, log: captureLogger().log });

    // attempt 1 fails whole; attempt 2 sends halves
    expect(transport.updateCalls.map((c) => c.records.map((r) => r.uid))).toEqual([
      ['r0', 'r1', 'r2', 'r3'],
      ['r0', 'r1'],
      ['r2', 'r3'],
    ]);
  });

  it('fails with UPDATE_FAILED once the attempts run out', async () => {
    const transport = setup();
    transport.onUpdate = () => {
      throw new Error('boom');
    };

    const run = applyUpdatesInBatches(transport, 'col-1', records(2), {
      maxAttempts: 3,
      backoffMs: 0,
      log: captureLogger().log,
    });

    await expect(run).rejects.toBeInstanceOf(SyncError);
    await expect(run).rejects.toMatchObject({
      category: 'UPDATE_FAILED',
      message: 'Update of batch 0 failed after 3 attempts at offset 0: boom',
    });
    expect(transport.updateCalls).toHaveLength(3);
  });

  it('skips batches before firstBatch', async () => {
    const transport = setup();

    const result = await applyUpdatesInBatches(transport, 'col-1', records(5), {
      batchSize: 2,
      firstBatch: 1,
      backoffMs: 0,
      log: captureLogger().log,
    });

    expect(result).toEqual({ batches: 3, batchesApplied: 2, recordsApplied: 3, attempts: 2, requests: 2 });
    expect(transport.appliedRecords.map((r) => r.uid)).toEqual(['r2', 'r3', 'r4']);
  });

  it('does nothing for no records', async () => {
    const transport = setup();
    const result = await applyUpdatesInBatches(transport, 'col-1', [], { log: captureLogger().log });
    expect(result).toEqual({ batches: 0, batchesApplied: 0, recordsApplied: 0, attempts: 0, requests: 0 });
    expect(transport.updateCalls).toEqual([]);
  });
});
