import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { join } from 'node:path';
import { Redis } from 'ioredis';
import { PatternEntityRecognizer } from '../../../shared/extraction/index.js';
import { getWorkerConfig, type WorkerConfig } from './config.js';
import logger from './lib/logger.js';
import { DocumentProcessor } from './pipeline.js';
import {
  handleJobFailure,
  parseJobPayload,
  processParseJob,
  shouldSkipJob,
  writeResult,
} from './processor.js';
import { loadProcessorConfig } from './processorConfig.js';
import { saveResults } from './results.js';
import { sleep } from './utils.js';

class ParseWorker {
  private redis: Redis;
  private running = false;
  private redisConnected = false;
  private lastProcessedAt: number | null = null;
  private readonly startedAt = Date.now();
  private healthServer: Server | null = null;

  constructor(
    private readonly config: WorkerConfig,
    private readonly processor: DocumentProcessor
  ) {
    this.redis = new Redis(config.redisUrl, { lazyConnect: false });
    this.redis.on('ready', () => {
      this.redisConnected = true;
      logger.info({ queue: config.queueName }, 'Connected to Redis');
    });
    this.redis.on('end', () => {
      this.redisConnected = false;
      logger.warn('Redis connection ended');
    });
    this.redis.on('error', (err) => {
      this.redisConnected = false;
      logger.error({ err }, 'Redis error');
    });
  }

  private markProcessed(): void {
    this.lastProcessedAt = Date.now();
  }

  private startHealthServer(): void {
    if (this.healthServer) return;
    this.healthServer = createServer((req: IncomingMessage, res: ServerResponse) => {
      if (req.url === '/health') {
        this.respondHealth(res).catch((error: unknown) => {
          res.writeHead(500, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ status: 'error', message: error instanceof Error ? error.message : String(error) }));
        });
      } else {
        res.writeHead(404).end();
      }
    });
    this.healthServer.listen(this.config.healthPort, () => {
      logger.info({ port: this.config.healthPort }, 'Health server listening');
    });
  }

  private async respondHealth(res: ServerResponse): Promise<void> {
    let queueDepth: number | null = null;
    try {
      queueDepth = await this.redis.llen(this.config.queueName);
    } catch {
      queueDepth = null;
    }
    const { extraction } = this.processor.config;
    const payload = {
      redis: {
        connected: this.redisConnected,
        queueDepth,
      },
      extraction: {
        declaredFields: extraction.fields.length,
        adaptiveFields: extraction.enableAdaptiveFields,
      },
      lastProcessedAt: this.lastProcessedAt ? new Date(this.lastProcessedAt).toISOString() : null,
      uptimeSec: Math.floor((Date.now() - this.startedAt) / 1000),
    };
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(payload));
  }

  async start() {
    this.running = true;
    logger.info('Starting parse worker');
    this.startHealthServer();
    while (this.running) {
      try {
        const result = await this.redis.brpop(this.config.queueName, 0);
        if (!result) continue;
        const [, rawJob] = result;
        const job = parseJobPayload(rawJob);
        if (!job) {
          this.markProcessed();
          continue;
        }

        if (await shouldSkipJob(this.redis, job, this.config.dedupeTtlSeconds)) {
          logger.info({ docId: job.docId, source: job.source ?? 'unknown' }, 'Skipping deduped job');
          this.markProcessed();
          continue;
        }

        const started = Date.now();
        try {
          const payload = await processParseJob(this.redis, this.processor, job);
          await writeResult(this.redis, job, payload, {
            url: this.config.webhookUrl,
            token: this.config.webhookToken,
          });
          if (this.config.outputDir) {
            await saveResults([payload.output], join(this.config.outputDir, job.docId), {
              lowConfidenceThreshold: this.config.lowConfidenceThreshold,
            });
          }
          logger.info(
            {
              docId: job.docId,
              profile: payload.profile,
              latencyMs: payload.metrics.latencyMs,
              fields: payload.output.extractedFields.length,
              lowConfidence: payload.output.lowConfidenceFields.length,
              ocrConfidence: payload.output.overallConfidence,
            },
            'Processed job'
          );
        } catch (err) {
          const outcome = await handleJobFailure(this.redis, job, err, {
            queueName: this.config.queueName,
            maxAttempts: this.config.maxAttempts,
          });
          logger.error(
            { err, docId: job.docId, attempts: outcome.job.attempts, status: outcome.status, retryInMs: outcome.delayMs },
            'Job failed'
          );
        } finally {
          logger.debug({ docId: job.docId, elapsed: Date.now() - started }, 'Job completed (success or retry scheduled)');
          this.markProcessed();
        }
      } catch (err) {
        logger.error({ err }, 'Worker loop error');
        await sleep(1000);
      }
    }
  }

  async stop() {
    this.running = false;
    if (this.healthServer) {
      await new Promise<void>((resolve) => {
        this.healthServer?.close(() => resolve());
      });
      this.healthServer = null;
    }
    await this.redis.quit();
  }
}

async function main() {
  const config = getWorkerConfig();
  const processorConfig = await loadProcessorConfig(config.processorConfigPath);
  const processor = new DocumentProcessor(processorConfig, {
    recognizer: new PatternEntityRecognizer(),
    lowConfidenceThreshold: config.lowConfidenceThreshold,
  });
  logger.info(
    { configPath: config.processorConfigPath, fields: processorConfig.extraction.fields.length },
    'Loaded processor config'
  );

  const worker = new ParseWorker(config, processor);
  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    worker
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  await worker.start();
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Fatal error');
  process.exit(1);
});
