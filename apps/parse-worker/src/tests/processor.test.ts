import assert from 'node:assert/strict';

import { ExtractionConfigError } from '../../../../shared/extraction/index.js';
import {
  calculateBackoffDelay,
  determineRetryOutcome,
  handleJobFailure,
  parseJobPayload,
  shouldSkipJob,
  type JobStore,
} from '../processor.js';
import { parseProcessorConfig, parseProcessorConfigJson } from '../processorConfig.js';
import type { ParseJob } from '../types.js';

class MemoryJobStore implements JobStore {
  readonly values = new Map<string, string>();
  readonly lists = new Map<string, string[]>();

  async set(key: string, value: string, secondsToken?: 'EX', seconds?: number, nx?: 'NX'): Promise<'OK' | null> {
    if (nx === 'NX' && this.values.has(key)) return null;
    this.values.set(key, value);
    return 'OK';
  }

  async lpush(key: string, ...elements: string[]): Promise<number> {
    const list = this.lists.get(key) ?? [];
    list.unshift(...elements.reverse());
    this.lists.set(key, list);
    return list.length;
  }
}

function immediately(task: () => void): void {
  task();
}

function testJobPayloads(): void {
  assert.equal(parseJobPayload('not json'), null);
  assert.equal(parseJobPayload(JSON.stringify({ docId: 'd1', filename: 'a.png' })), null);
  assert.equal(parseJobPayload(JSON.stringify({ docId: '', filename: 'a.png', text: 'x' })), null);

  assert.deepEqual(parseJobPayload(JSON.stringify({ docId: 'd1', filename: 'a.png', text: 'Total: 5', extra: true })), {
    docId: 'd1',
    filename: 'a.png',
    text: 'Total: 5',
  });

  const paged = parseJobPayload(
    JSON.stringify({ docId: 'd2', filename: 'b.png', profile: 'invoice', pages: [{ text: 'page' }] })
  );
  assert.deepEqual(paged?.pages, [{ text: 'page', confidence: 0 }]);
  assert.equal(paged?.profile, 'invoice');
}

function testRetryOutcome(): void {
  assert.deepEqual(determineRetryOutcome(1, 3), { status: 'retry', delayMs: 5000 });
  assert.deepEqual(determineRetryOutcome(2, 3), { status: 'retry', delayMs: 10000 });
  assert.deepEqual(determineRetryOutcome(3, 3), { status: 'dead_letter', delayMs: 0 });
  assert.equal(calculateBackoffDelay(0), 5000);
  assert.equal(calculateBackoffDelay(20), 60000);
}

async function testRetriesBypassDedupe(): Promise<void> {
  const store = new MemoryJobStore();
  const job: ParseJob = { docId: 'd1', filename: 'a.png', text: 'Total: 5', dedupeKey: 'upload-1' };

  assert.equal(await shouldSkipJob(store, job, 600), false);
  assert.equal(await shouldSkipJob(store, job, 600), true);

  const first = await handleJobFailure(store, job, new Error('boom'), {
    queueName: 'parse:jobs',
    maxAttempts: 2,
    schedule: immediately,
  });
  assert.equal(first.status, 'retry');
  assert.equal(first.delayMs, 5000);
  const queued = store.lists.get('parse:jobs') ?? [];
  assert.equal(queued.length, 1);
  const requeued = parseJobPayload(queued[0]);
  assert.equal(requeued?.attempts, 1);
  assert.equal(requeued?.dedupeKey, 'upload-1');
  assert.equal(await shouldSkipJob(store, first.job, 600), false);

  const second = await handleJobFailure(store, first.job, new Error('boom again'), {
    queueName: 'parse:jobs',
    maxAttempts: 2,
    schedule: immediately,
  });
  assert.equal(second.status, 'dead_letter');
  assert.equal(store.lists.get('parse:jobs')?.length, 1);
  const deadLetters = store.lists.get('parse:jobs:dlq') ?? [];
  assert.equal(deadLetters.length, 1);
  assert.equal(parseJobPayload(deadLetters[0])?.attempts, 2);

  const errorRecord: unknown = JSON.parse(store.values.get('parse:error:d1') ?? '{}');
  assert.deepEqual(
    typeof errorRecord === 'object' && errorRecord !== null && 'attempts' in errorRecord ? errorRecord.attempts : null,
    2
  );
}

function testProcessorConfig(): void {
  const config = parseProcessorConfig({
    extraction: {
      enable_adaptive_fields: false,
      fields: [{ name: 'Amount', pattern: '金额', post_process: 'amount_normalize' }],
    },
    validation: {
      confidence_threshold: 0.7,
      required_fields: ['Amount'],
      amount_limits: { max_amount: 100 },
      validation_checks: ['amount_reasonable'],
    },
  });
  assert.equal(config.extraction.enableAdaptiveFields, false);
  assert.deepEqual(config.extraction.fields[0].pattern, ['金额']);
  assert.equal(config.extraction.fields[0].postProcess, 'amount_normalize');
  assert.deepEqual(config.validation, {
    confidenceThreshold: 0.7,
    requiredFields: ['Amount'],
    amountLimits: { maxAmount: 100 },
    checks: ['amount_reasonable'],
  });

  assert.equal(parseProcessorConfig({ extraction: {} }).validation, null);
  assert.deepEqual(parseProcessorConfig({ extraction: {}, validation: {} }).validation, {
    confidenceThreshold: 0.8,
    requiredFields: [],
    checks: [],
  });
}

function testProcessorConfigErrors(): void {
  assert.throws(
    () => parseProcessorConfig({ extraction: {}, validation: { confidenceThreshold: 1.5 } }),
    (err: unknown) => err instanceof ExtractionConfigError && /validation\.confidenceThreshold/.test(err.message)
  );
  assert.throws(() => parseProcessorConfig({}), /Invalid processor config/);
  assert.throws(() => parseProcessorConfigJson('[oops'), /not valid JSON/);
}

void (async function run() {
  testJobPayloads();
  testRetryOutcome();
  await testRetriesBypassDedupe();
  testProcessorConfig();
  testProcessorConfigErrors();
  console.log('All parse job tests passed');
})();
