/**
 * Validation Suite: HTTP server
 * Routes exercised over a real listener with an in-memory job queue.
 */

import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import type { Server } from "http";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { createApp } from "./server.js";
import type { ExtractJobQueue, ExtractJobStatus } from "./queues.js";
import { deriveIdentityKey } from "./jobs/identity.js";
import { silentLogger } from "./logger.js";

const completed: ExtractJobStatus = {
  jobId: "done-0123456789abcdef",
  state: "completed",
  result: { success: false, error: "boom", products: [] },
};

const enqueue = vi.fn(
  async (_filePath: string, identityKey: string) => identityKey,
);
const status = vi.fn(async (jobId: string) =>
  jobId === completed.jobId ? completed : null,
);
const queue: ExtractJobQueue = { enqueue, status };

describe("server", () => {
  let server: Server;
  let baseUrl: string;
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "server-test-"));
    const app = createApp({ queue, version: "test", logger: silentLogger });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server is not listening on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve())),
    );
    await rm(dir, { recursive: true, force: true });
  });

  function post(body: unknown) {
    return fetch(`${baseUrl}/extract`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  it("should report health", async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      version: "test",
      status: "healthy",
    });
  });

  it("should queue an existing file under its identity key", async () => {
    const filePath = join(dir, "Door Hardware.pdf");
    await writeFile(filePath, "%PDF-1.4 server test");

    const response = await post({ filePath });

    const jobId = await deriveIdentityKey(filePath);
    expect(response.status).toBe(202);
    expect(await response.json()).toEqual({ success: true, jobId, filePath });
    expect(enqueue).toHaveBeenLastCalledWith(filePath, jobId);
  });

  it("should reject a request without a file path", async () => {
    const response = await post({ path: "x.pdf" });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      error: "Missing required field: filePath",
    });
  });

  it("should answer 404 for a missing file", async () => {
    const filePath = join(dir, "missing.pdf");

    const response = await post({ filePath });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: `File ${filePath} not found`,
    });
  });

  it("should return the status of a known job", async () => {
    const response = await fetch(`${baseUrl}/extract/${completed.jobId}`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(completed);
  });

  it("should answer 404 for an unknown job", async () => {
    const response = await fetch(`${baseUrl}/extract/nope`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: "Job nope not found" });
  });
});
