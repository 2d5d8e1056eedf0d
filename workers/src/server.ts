/**
 * HTTP surface: health check, enqueue a submittal, read a job's result.
 */

import express from "express";
import type { Express, Request, Response } from "express";
import { resolve } from "path";
import { z } from "zod";
import type { ExtractJobQueue } from "./queues.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { deriveIdentityKey } from "./jobs/identity.js";
import { errorMessage } from "./errors.js";
import { isNotFoundError } from "./utils/guards.js";

const extractRequestSchema = z.object({
  filePath: z.string().trim().min(1),
});

export interface AppOptions {
  queue: ExtractJobQueue;
  version?: string;
  logger?: Logger;
}

export function createApp(options: AppOptions): Express {
  const { queue } = options;
  const version = options.version ?? "local-dev";
  const logger = options.logger ?? createConsoleLogger("Server");

  const app = express();
  app.use(express.json());

  /**
   * Health check endpoint
   */
  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      version,
      status: "healthy",
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * Queue a submittal PDF for extraction
   *
   * The job id is the document's identity key, so posting the same file
   * again returns the existing job.
   */
  app.post("/extract", async (req: Request, res: Response) => {
    const parsed = extractRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: "Missing required field: filePath",
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return;
    }

    const filePath = resolve(parsed.data.filePath);

    try {
      const identityKey = await deriveIdentityKey(filePath);
      const jobId = await queue.enqueue(filePath, identityKey);
      logger.info(`Queued ${filePath} as ${jobId}`);

      res.status(202).json({ success: true, jobId, filePath });
    } catch (error) {
      if (isNotFoundError(error)) {
        res.status(404).json({ error: `File ${filePath} not found` });
        return;
      }
      const message = errorMessage(error);
      logger.error("Failed to queue submittal:", message);
      res.status(500).json({ error: "Failed to queue submittal", message });
    }
  });

  /**
   * Job state and, once completed, the extraction result
   */
  app.get("/extract/:jobId", async (req: Request, res: Response) => {
    try {
      const status = await queue.status(req.params.jobId);
      if (!status) {
        res.status(404).json({ error: `Job ${req.params.jobId} not found` });
        return;
      }
      res.json(status);
    } catch (error) {
      const message = errorMessage(error);
      logger.error("Failed to read job:", message);
      res.status(500).json({ error: "Failed to read job", message });
    }
  });

  return app;
}
