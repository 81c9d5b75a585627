import { resolve } from 'node:path';
import { config as loadEnv } from 'dotenv';

loadEnv();

function readEnv(name: string): string | null {
  const value = process.env[name];
  if (!value) return null;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : null;
}

function readNumberEnv(name: string, fallback: number): number {
  const raw = readEnv(name);
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export interface WorkerConfig {
  redisUrl: string;
  queueName: string;
  healthPort: number;
  processorConfigPath: string;
  maxAttempts: number;
  dedupeTtlSeconds: number;
  lowConfidenceThreshold: number;
  webhookUrl: string | null;
  webhookToken: string | null;
  /** When set, each result is also written to `<outputDir>/<docId>/`. */
  outputDir: string | null;
}

export function getWorkerConfig(): WorkerConfig {
  return {
    redisUrl: readEnv('REDIS_URL') || 'redis://localhost:6379',
    queueName: readEnv('PARSE_QUEUE') || 'parse:jobs',
    healthPort: readNumberEnv('PARSE_WORKER_PORT', 8091),
    processorConfigPath: resolve(readEnv('PARSE_CONFIG_PATH') || 'config/processor.json'),
    maxAttempts: readNumberEnv('PARSE_MAX_ATTEMPTS', 3),
    dedupeTtlSeconds: readNumberEnv('PARSE_DEDUPE_TTL_SECONDS', 60 * 10),
    lowConfidenceThreshold: readNumberEnv('LOW_CONFIDENCE_THRESHOLD', 80),
    webhookUrl: readEnv('RESULT_WEBHOOK_URL'),
    webhookToken: readEnv('RESULT_WEBHOOK_TOKEN'),
    outputDir: readEnv('PARSE_OUTPUT_DIR'),
  };
}
