import type { Redis } from 'ioredis';
import { z } from 'zod';
import logger from './lib/logger.js';
import type { DocumentProcessor } from './pipeline.js';
import { parseProcessorConfigJson } from './processorConfig.js';
import type { ParseJob, ParseResultPayload } from './types.js';

const BoundingBoxSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

const OcrPageSchema = z.object({
  text: z.string(),
  confidence: z.number().min(0).max(100).default(0),
  boundingBoxes: z.array(BoundingBoxSchema).optional(),
});

export const ParseJobSchema = z
  .object({
    docId: z.string().min(1),
    filename: z.string().min(1),
    pages: z.array(OcrPageSchema).optional(),
    text: z.string().nullable().optional(),
    confidence: z.number().min(0).max(100).optional(),
    profile: z.string().nullable().optional(),
    dedupeKey: z.string().nullable().optional(),
    attempts: z.number().int().nonnegative().optional(),
    source: z.string().nullable().optional(),
  })
  .refine((job) => Boolean(job.pages?.length) || typeof job.text === 'string', {
    message: 'Job needs OCR pages or text',
  });

export function parseJobPayload(raw: string): ParseJob | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    logger.error({ err }, 'Failed to parse job payload');
    return null;
  }
  const result = ParseJobSchema.safeParse(parsed);
  if (!result.success) {
    logger.error({ issues: result.error.issues }, 'Rejected malformed job');
    return null;
  }
  return result.data;
}

/**
 * The slice of the Redis client that dedupe and retry bookkeeping use. `Redis`
 * from ioredis satisfies it.
 */
export interface JobStore {
  set(key: string, value: string, secondsToken: 'EX', seconds: number, nx: 'NX'): Promise<'OK' | null>;
  set(key: string, value: string): Promise<'OK' | null>;
  lpush(key: string, ...elements: string[]): Promise<number>;
}

/**
 * Only first deliveries are deduped. A requeued retry carries the same key while
 * the first claim is still live, so it must not be checked again.
 */
export async function shouldSkipJob(store: JobStore, job: ParseJob, ttlSeconds: number): Promise<boolean> {
  if (!job.dedupeKey || (job.attempts ?? 0) > 0) return false;
  const key = `parse:dedupe:${job.dedupeKey}`;
  const wasSet = await store.set(key, Date.now().toString(), 'EX', ttlSeconds, 'NX');
  return wasSet === null;
}

/**
 * Profiles are processor configs stored under `profile:<name>`. A missing or invalid
 * profile falls back to the default processor rather than failing the job.
 */
export async function resolveProcessor(
  redis: Redis,
  base: DocumentProcessor,
  profile: string | null | undefined
): Promise<DocumentProcessor> {
  if (!profile) return base;
  const raw = await redis.get(`profile:${profile}`);
  if (!raw) {
    logger.warn({ profile }, 'Unknown profile; using default config');
    return base;
  }
  try {
    return base.withConfig(parseProcessorConfigJson(raw));
  } catch (err) {
    logger.warn({ err, profile }, 'Invalid profile config; using default config');
    return base;
  }
}

export async function processParseJob(
  redis: Redis,
  base: DocumentProcessor,
  job: ParseJob
): Promise<ParseResultPayload> {
  const startedAt = Date.now();
  const processor = await resolveProcessor(redis, base, job.profile);
  const output = processor.process(job);
  return {
    ok: true,
    docId: job.docId,
    profile: job.profile ?? null,
    output,
    processedAt: new Date().toISOString(),
    metrics: { latencyMs: Date.now() - startedAt },
  };
}

const BASE_BACKOFF_MS = 5000;
const MAX_BACKOFF_MS = 60000;

export function calculateBackoffDelay(attempt: number): number {
  return Math.min(Math.max(1, attempt) * BASE_BACKOFF_MS, MAX_BACKOFF_MS);
}

export function determineRetryOutcome(
  attempts: number,
  maxAttempts: number
): { status: 'retry' | 'dead_letter'; delayMs: number } {
  const status = attempts >= maxAttempts ? 'dead_letter' : 'retry';
  return { status, delayMs: status === 'retry' ? calculateBackoffDelay(attempts) : 0 };
}

export interface JobFailureOptions {
  queueName: string;
  maxAttempts: number;
  /** Runs the requeue after the backoff delay; defaults to `setTimeout`. */
  schedule?: (task: () => void, delayMs: number) => void;
}

export type JobFailureOutcome = {
  status: 'retry' | 'dead_letter';
  delayMs: number;
  job: ParseJob;
};

function scheduleWithTimer(task: () => void, delayMs: number): void {
  setTimeout(task, delayMs);
}

export async function handleJobFailure(
  store: JobStore,
  job: ParseJob,
  error: unknown,
  options: JobFailureOptions
): Promise<JobFailureOutcome> {
  const attempts = Number(job.attempts ?? 0) + 1;
  const stack = error instanceof Error ? error.stack ?? error.message : String(error);
  await store.set(
    `parse:error:${job.docId}`,
    JSON.stringify({
      message: error instanceof Error ? error.message : 'Unknown error',
      stack,
      attempts,
      at: new Date().toISOString(),
    })
  );

  const retryJob: ParseJob = { ...job, attempts };
  const { status, delayMs } = determineRetryOutcome(attempts, options.maxAttempts);
  if (status === 'dead_letter') {
    logger.warn({ docId: job.docId, attempts }, 'Job moved to dead-letter list');
    await store.lpush(`${options.queueName}:dlq`, JSON.stringify(retryJob));
    return { status, delayMs, job: retryJob };
  }
  const schedule = options.schedule ?? scheduleWithTimer;
  schedule(() => {
    store.lpush(options.queueName, JSON.stringify(retryJob)).catch((err: unknown) => {
      logger.error({ err, docId: job.docId }, 'Failed to requeue job');
    });
  }, delayMs);
  return { status, delayMs, job: retryJob };
}

async function postToWebhook(
  job: ParseJob,
  payload: ParseResultPayload,
  webhook: { url: string; token: string | null }
): Promise<void> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
  };
  if (webhook.token) {
    headers.Authorization = `Bearer ${webhook.token}`;
  }

  const res = await fetch(webhook.url, {
    method: 'POST',
    headers,
    body: JSON.stringify({ docId: job.docId, filename: job.filename, result: payload }),
  });
  if (!res.ok) {
    const text = await res.text();
    throw new Error(`HTTP ${res.status}: ${text}`);
  }
}

export async function writeResult(
  redis: Redis,
  job: ParseJob,
  payload: ParseResultPayload,
  webhook: { url: string | null; token: string | null }
): Promise<void> {
  await redis.set(`parse:result:${job.docId}`, JSON.stringify(payload));
  await redis.publish('parse:done', job.docId);
  if (webhook.url) {
    try {
      await postToWebhook(job, payload, { url: webhook.url, token: webhook.token });
    } catch (err) {
      logger.error({ err, docId: job.docId }, 'Failed to POST result');
      throw err;
    }
  }
}
