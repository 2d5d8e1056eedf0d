/**
 * Job Store
 *
 * Persistence for long-running external jobs, keyed by document identity.
 * Per key the store holds at most one completed payload and one resumption
 * handle; `persistComplete` removes the handle so a finished key is never
 * resubmitted. Named artifacts (rendered page images) sit beside the jobs.
 *
 * Layout of `FileJobStore` under its root directory:
 * - `<namespace>/<key>.json`         completed payload
 * - `<namespace>/<key>.handle.json`  resumption handle
 * - `<artifact>/<key>.json`          named artifacts
 */

import { randomUUID } from "crypto";
import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { dirname, join } from "path";
import { z } from "zod";
import type { Logger } from "../logger.js";
import { createConsoleLogger } from "../logger.js";
import { errorMessage } from "../errors.js";
import { isNotFoundError } from "../utils/guards.js";
import { sanitizeForPath } from "../utils/hash.js";

export interface CompletedJob {
  payload: unknown;
  /** ISO timestamp of when the payload was persisted */
  completedAt: string;
}

export interface JobStore {
  loadComplete(key: string): Promise<CompletedJob | null>;
  loadResumptionHandle(key: string): Promise<string | null>;
  persistResumptionHandle(key: string, handle: string): Promise<void>;
  /** Stores the payload and deletes the resumption handle */
  persistComplete(key: string, payload: unknown): Promise<void>;
  loadArtifact(name: string, key: string): Promise<unknown | null>;
  persistArtifact(name: string, key: string, value: unknown): Promise<void>;
}

const completedFileSchema = z.object({
  completedAt: z.string(),
  payload: z.unknown(),
});

const handleFileSchema = z.object({
  handle: z.string().min(1),
  savedAt: z.string(),
});

const artifactFileSchema = z.object({
  savedAt: z.string(),
  value: z.unknown(),
});

/**
 * Filesystem-backed store. Every write goes to a temporary file first and is
 * renamed into place, so readers see either the old file or the new one.
 */
export class FileJobStore implements JobStore {
  constructor(
    private readonly rootDir: string,
    private readonly namespace: string = "datalab",
    private readonly logger: Logger = createConsoleLogger("JobStore"),
  ) {}

  private path(dir: string, key: string, suffix = ".json"): string {
    return join(this.rootDir, dir, `${sanitizeForPath(key)}${suffix}`);
  }

  private async writeAtomic(path: string, value: unknown): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    const tempPath = `${path}.${randomUUID()}.tmp`;
    await writeFile(tempPath, JSON.stringify(value), "utf-8");
    try {
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  /**
   * Reads and validates a JSON file. Missing files are null; unreadable or
   * invalid ones are logged and treated as missing.
   */
  private async readValidated<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T | null> {
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }

    try {
      const result = schema.safeParse(JSON.parse(raw));
      if (result.success) {
        return result.data;
      }
      this.logger.warn(`Ignoring malformed cache file ${path}`);
    } catch (error) {
      this.logger.warn(
        `Ignoring corrupt cache file ${path}: ${errorMessage(error)}`,
      );
    }
    return null;
  }

  async loadComplete(key: string): Promise<CompletedJob | null> {
    const file = await this.readValidated(
      this.path(this.namespace, key),
      completedFileSchema,
    );
    if (!file) {
      return null;
    }
    return { payload: file.payload, completedAt: file.completedAt };
  }

  async loadResumptionHandle(key: string): Promise<string | null> {
    const file = await this.readValidated(
      this.path(this.namespace, key, ".handle.json"),
      handleFileSchema,
    );
    return file?.handle ?? null;
  }

  async persistResumptionHandle(key: string, handle: string): Promise<void> {
    await this.writeAtomic(this.path(this.namespace, key, ".handle.json"), {
      handle,
      savedAt: new Date().toISOString(),
    });
  }

  async persistComplete(key: string, payload: unknown): Promise<void> {
    await this.writeAtomic(this.path(this.namespace, key), {
      completedAt: new Date().toISOString(),
      payload,
    });
    await rm(this.path(this.namespace, key, ".handle.json"), { force: true });
  }

  async loadArtifact(name: string, key: string): Promise<unknown | null> {
    const file = await this.readValidated(
      this.path(name, key),
      artifactFileSchema,
    );
    return file ? (file.value ?? null) : null;
  }

  async persistArtifact(
    name: string,
    key: string,
    value: unknown,
  ): Promise<void> {
    await this.writeAtomic(this.path(name, key), {
      savedAt: new Date().toISOString(),
      value,
    });
  }
}

/**
 * Process-local store, used when on-disk caching is disabled and in tests.
 * Values are kept serialized so callers never share references with it.
 */
export class InMemoryJobStore implements JobStore {
  private readonly completed = new Map<string, string>();
  private readonly handles = new Map<string, string>();
  private readonly artifacts = new Map<string, string>();

  async loadComplete(key: string): Promise<CompletedJob | null> {
    const stored = this.completed.get(key);
    if (stored === undefined) {
      return null;
    }
    const file = completedFileSchema.parse(JSON.parse(stored));
    return { payload: file.payload, completedAt: file.completedAt };
  }

  async loadResumptionHandle(key: string): Promise<string | null> {
    return this.handles.get(key) ?? null;
  }

  async persistResumptionHandle(key: string, handle: string): Promise<void> {
    this.handles.set(key, handle);
  }

  async persistComplete(key: string, payload: unknown): Promise<void> {
    this.completed.set(
      key,
      JSON.stringify({ completedAt: new Date().toISOString(), payload }),
    );
    this.handles.delete(key);
  }

  async loadArtifact(name: string, key: string): Promise<unknown | null> {
    const stored = this.artifacts.get(`${name}/${key}`);
    return stored === undefined ? null : JSON.parse(stored);
  }

  async persistArtifact(
    name: string,
    key: string,
    value: unknown,
  ): Promise<void> {
    this.artifacts.set(`${name}/${key}`, JSON.stringify(value));
  }
}
