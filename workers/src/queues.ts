/**
 * BullMQ connection and the extraction queue.
 * One job per document; the document's identity key is the job id, so BullMQ
 * ignores a second enqueue while a job for the same content exists. A job that
 * ended in failure is removed first so the document can be retried.
 */

import { Queue } from "bullmq";
import { Redis } from "ioredis";
import type { ExtractJobData, ExtractionResult } from "./types.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";

export const EXTRACT_QUEUE_NAME = "submittal-extract";
export const EXTRACT_JOB_NAME = "extract";

export type ExtractQueue = Queue<ExtractJobData, ExtractionResult>;

export function createQueueConnection(
  redisUrl: string,
  logger: Logger = createConsoleLogger("Redis"),
): Redis {
  const connection = new Redis(redisUrl, {
    maxRetriesPerRequest: null, // Required for BullMQ
    enableReadyCheck: false,
  });

  connection.on("error", (err: Error) => {
    logger.error("Connection error:", err.message);
  });

  connection.on("connect", () => {
    logger.info("Connected");
  });

  return connection;
}

export function createExtractQueue(connection: Redis): ExtractQueue {
  return new Queue<ExtractJobData, ExtractionResult>(EXTRACT_QUEUE_NAME, {
    connection,
    defaultJobOptions: {
      // Pipeline failures come back as results, not throws
      attempts: 1,
      removeOnComplete: {
        age: 24 * 60 * 60, // Keep completed jobs for 24 hours
        count: 1000,
      },
      removeOnFail: {
        age: 7 * 24 * 60 * 60, // Keep failed jobs for 7 days
      },
    },
  });
}

export interface ExtractJobStatus {
  jobId: string;
  state: string;
  result: ExtractionResult | null;
  failedReason?: string;
}

/**
 * What the HTTP layer needs from the queue.
 */
export interface ExtractJobQueue {
  /** Returns the job id, which is the identity key */
  enqueue(filePath: string, identityKey: string): Promise<string>;
  status(jobId: string): Promise<ExtractJobStatus | null>;
}

export class BullExtractJobQueue implements ExtractJobQueue {
  constructor(
    private readonly queue: ExtractQueue,
    private readonly logger: Logger = createConsoleLogger("Queues"),
  ) {}

  async enqueue(filePath: string, identityKey: string): Promise<string> {
    // A finished failure would hold the job id until BullMQ expires it
    const previous = await this.queue.getJob(identityKey);
    if (previous) {
      const state = await previous.getState();
      const failedResult =
        state === "completed" && previous.returnvalue?.success === false;
      if (state === "failed" || failedResult) {
        this.logger.info(`Retrying ${identityKey} after a failed run`);
        await previous.remove();
      }
    }

    const job = await this.queue.add(
      EXTRACT_JOB_NAME,
      { filePath, requestedAt: new Date().toISOString() },
      { jobId: identityKey },
    );
    return job.id ?? identityKey;
  }

  async status(jobId: string): Promise<ExtractJobStatus | null> {
    const job = await this.queue.getJob(jobId);
    if (!job) {
      return null;
    }

    return {
      jobId,
      state: await job.getState(),
      result: job.returnvalue ?? null,
      failedReason: job.failedReason || undefined,
    };
  }
}

// Graceful shutdown
export async function closeQueue(
  queue: ExtractQueue,
  connection: Redis,
  logger: Logger = createConsoleLogger("Queues"),
): Promise<void> {
  await queue.close();
  await connection.quit();
  logger.info("Closed");
}
