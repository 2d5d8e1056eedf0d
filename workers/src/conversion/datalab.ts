/**
 * Datalab Marker Conversion Client
 *
 * Submits a PDF to the Datalab "marker" API and polls the returned
 * `request_check_url` until the conversion is complete. The check URL is the
 * resumption handle persisted by the job poller.
 */

import { readFile } from "fs/promises";
import { basename } from "path";
import { z } from "zod";
import type { ExternalJobSource, PollOutcome } from "../jobs/job-poller.js";
import type { Logger } from "../logger.js";
import { createConsoleLogger } from "../logger.js";
import { ExternalJobError, requireCredential } from "../errors.js";

export const DEFAULT_DATALAB_ENDPOINT = "https://www.datalab.to/api/v1/marker";

export interface MarkerOptions {
  use_llm: boolean;
  force_ocr: boolean;
  output_format: "json" | "markdown" | "html";
  paginate: boolean;
  strip_existing_ocr: boolean;
  disable_image_extraction: boolean;
  debug: boolean;
}

export const DEFAULT_MARKER_OPTIONS: MarkerOptions = {
  use_llm: true,
  force_ocr: true,
  output_format: "json",
  paginate: true,
  strip_existing_ocr: false,
  disable_image_extraction: false,
  debug: true,
};

export interface DatalabClientOptions {
  /** Checked when the first request is made */
  apiKey?: string;
  endpoint?: string;
  markerOptions?: Partial<MarkerOptions>;
  logger?: Logger;
}

const submitResponseSchema = z.object({
  request_check_url: z.string().min(1).nullish(),
  error: z.string().nullish(),
});

const checkResponseSchema = z
  .object({
    status: z.string().optional(),
    error: z.unknown().optional(),
  })
  .passthrough();

export class DatalabClient {
  private readonly endpoint: string;
  private readonly markerOptions: MarkerOptions;
  private readonly logger: Logger;

  constructor(private readonly options: DatalabClientOptions = {}) {
    this.endpoint = options.endpoint ?? DEFAULT_DATALAB_ENDPOINT;
    this.markerOptions = { ...DEFAULT_MARKER_OPTIONS, ...options.markerOptions };
    this.logger = options.logger ?? createConsoleLogger("Datalab");
  }

  private headers(): Record<string, string> {
    return {
      "X-API-Key": requireCredential(this.options.apiKey, "DATALAB_API_KEY"),
    };
  }

  /**
   * Uploads the document and returns the URL to poll for its result.
   */
  async submit(filePath: string): Promise<string> {
    const headers = this.headers();
    const content = await readFile(filePath);

    const form = new FormData();
    form.append(
      "file",
      new Blob([new Uint8Array(content)], { type: "application/pdf" }),
      basename(filePath),
    );
    for (const [field, value] of Object.entries(this.markerOptions)) {
      form.append(field, String(value));
    }

    this.logger.info(`Submitting to Datalab: ${basename(filePath)}`);

    const response = await fetch(this.endpoint, {
      method: "POST",
      headers,
      body: form,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new ExternalJobError(
        `Datalab error (${response.status}): ${error}`,
      );
    }

    const parsed = submitResponseSchema.safeParse(await response.json());
    if (!parsed.success || !parsed.data.request_check_url) {
      const detail = parsed.success ? parsed.data.error : undefined;
      throw new ExternalJobError(
        `Datalab response has no request_check_url${detail ? `: ${detail}` : ""}`,
      );
    }

    return parsed.data.request_check_url;
  }

  /**
   * Checks a submitted conversion. Statuses other than "complete", "error"
   * and "failed" are treated as still running.
   */
  async poll(checkUrl: string): Promise<PollOutcome> {
    const response = await fetch(checkUrl, {
      method: "GET",
      headers: this.headers(),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new ExternalJobError(
        `Datalab check failed (${response.status}): ${error}`,
      );
    }

    const payload: unknown = await response.json();
    const parsed = checkResponseSchema.safeParse(payload);
    if (!parsed.success) {
      return { status: "pending" };
    }

    switch (parsed.data.status) {
      case "complete":
        return { status: "complete", payload };
      case "error":
      case "failed":
        return {
          status: "error",
          error: `Datalab failed: ${describeError(parsed.data.error)}`,
        };
      default:
        return { status: "pending" };
    }
  }

  /**
   * Binds a document to this client as a source for the job poller.
   */
  source(filePath: string): ExternalJobSource {
    return {
      submit: () => this.submit(filePath),
      poll: (handle) => this.poll(handle),
    };
  }
}

function describeError(error: unknown): string {
  if (error === undefined || error === null) return "unknown error";
  return typeof error === "string" ? error : JSON.stringify(error);
}
