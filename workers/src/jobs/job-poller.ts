/**
 * External Job Poller
 *
 * Resolves a long-running external job to its payload, reusing work from
 * earlier runs. Per identity key the order is:
 * 1. a completed payload in the store is returned without any network call;
 * 2. a stored resumption handle is polled again;
 * 3. otherwise the job is submitted and its handle persisted before the
 *    first poll, so a crash mid-job can still be resumed.
 *
 * Polling uses a fixed attempt budget with a fixed delay. A terminal error
 * raises `ExternalJobError` and leaves the handle in place; exhausting the
 * budget raises `ExternalJobTimeout`. Retrying is left to the caller.
 */

import type { JobStore } from "./job-store.js";
import type { Logger } from "../logger.js";
import { createConsoleLogger } from "../logger.js";
import { ExternalJobError, ExternalJobTimeout } from "../errors.js";

export type PollOutcome =
  | { status: "pending" }
  | { status: "complete"; payload: unknown }
  | { status: "error"; error: string };

export interface ExternalJobSource {
  /** Submits the job and returns its resumption handle */
  submit(): Promise<string>;
  poll(handle: string): Promise<PollOutcome>;
}

export interface ExternalJobPollerOptions {
  /** Default: 300 */
  maxAttempts?: number;
  /** Delay between polls in ms. Default: 2000 */
  intervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export type JobResolution = "cached" | "resumed" | "submitted";

export interface ResolvedJob {
  payload: unknown;
  resolution: JobResolution;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class ExternalJobPoller {
  private readonly maxAttempts: number;
  private readonly intervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(
    private readonly store: JobStore,
    options: ExternalJobPollerOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? 300;
    this.intervalMs = options.intervalMs ?? 2000;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createConsoleLogger("JobPoller");

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError(
        `maxAttempts must be a positive integer, got ${this.maxAttempts}`,
      );
    }
  }

  async resolve(key: string, source: ExternalJobSource): Promise<ResolvedJob> {
    const completed = await this.store.loadComplete(key);
    if (completed) {
      this.logger.info(`Loaded complete result from cache: ${key}`);
      return { payload: completed.payload, resolution: "cached" };
    }

    let handle = await this.store.loadResumptionHandle(key);
    let resolution: JobResolution = "resumed";

    if (handle) {
      this.logger.info(`Resuming polling for ${key}`);
    } else {
      handle = await source.submit();
      await this.store.persistResumptionHandle(key, handle);
      resolution = "submitted";
      this.logger.info(`Submitted ${key}, saved resumption handle`);
    }

    const payload = await this.pollUntilDone(key, handle, source);
    return { payload, resolution };
  }

  private async pollUntilDone(
    key: string,
    handle: string,
    source: ExternalJobSource,
  ): Promise<unknown> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const outcome = await source.poll(handle);

      switch (outcome.status) {
        case "complete":
          await this.store.persistComplete(key, outcome.payload);
          this.logger.info(`Completed and cached: ${key}`);
          return outcome.payload;
        case "error":
          throw new ExternalJobError(
            `External job for ${key} failed: ${outcome.error}`,
            key,
          );
        case "pending":
          if (attempt < this.maxAttempts) {
            await this.sleep(this.intervalMs);
          }
          break;
      }
    }

    throw new ExternalJobTimeout(key, this.maxAttempts);
  }
}
