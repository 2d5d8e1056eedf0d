/**
 * Environment configuration, parsed once at the entry points and passed
 * explicitly into every component.
 */

import { join } from "path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { PROVIDER_NAMES } from "./llm/types.js";
import type { LLMConfig } from "./llm/types.js";
import type { SelectionOrder } from "./types.js";
import { DEFAULT_DATALAB_ENDPOINT } from "./conversion/datalab.js";

export const DEFAULT_MODEL = "claude-sonnet-4-20250514";

/** Which candidate text the judge indexes against */
export type JudgeInput = "raw" | "normalized";

export interface ExtractorConfig {
  cache: {
    enabled: boolean;
    dir: string;
  };
  llm: LLMConfig;
  datalab: {
    apiKey?: string;
    endpoint: string;
    pollAttempts: number;
    pollIntervalMs: number;
  };
  pipeline: {
    maxPages: number;
    renderDpi: number;
    judgeInput: JudgeInput;
    selectionOrder: SelectionOrder;
  };
  redisUrl: string;
  port: number;
  workerConcurrency: number;
}

const flag = z
  .string()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => value === "true" || value === "1" || value === "yes");

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  CACHE_DIR: z.string().default("cache"),
  CACHE_ENABLED: flag.default("true"),
  LLM_CACHE_ENABLED: flag.default("false"),
  LLM_PROVIDER: z.enum(PROVIDER_NAMES).default("anthropic"),
  LLM_MODEL: z.string().optional(),
  ANTHROPIC_MODEL: z.string().optional(),
  LLM_VISION_MODEL: z.string().optional(),
  LLM_ENDPOINT: z.string().url().optional(),
  LLM_API_KEY: z.string().optional(),
  LLM_NUM_CTX: positiveInt.default(8192),
  ANTHROPIC_API_KEY: z.string().optional(),
  DATALAB_API_KEY: z.string().optional(),
  DATALAB_ENDPOINT: z.string().url().default(DEFAULT_DATALAB_ENDPOINT),
  DATALAB_POLL_ATTEMPTS: positiveInt.default(300),
  DATALAB_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(2000),
  MAX_PAGES: positiveInt.default(10),
  RENDER_DPI: positiveInt.default(200),
  JUDGE_INPUT: z.enum(["raw", "normalized"]).default("raw"),
  SELECTION_ORDER: z.enum(["selection", "candidate"]).default("selection"),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  PORT: positiveInt.default(8080),
  WORKER_CONCURRENCY: positiveInt.default(1),
});

/**
 * Unset and empty variables are treated alike, so `KEY=` in a .env file
 * falls back to the default.
 */
function withoutEmpty(
  env: Record<string, string | undefined>,
): Record<string, string> {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      present[key] = value.trim();
    }
  }
  return present;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ExtractorConfig {
  const parsed = envSchema.safeParse(withoutEmpty(env));

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = String(issue.path[0] ?? "environment");
    throw new ConfigurationError(
      variable,
      `Invalid ${variable}: ${issue.message}`,
    );
  }

  const vars = parsed.data;
  const textModel = vars.LLM_MODEL ?? vars.ANTHROPIC_MODEL ?? DEFAULT_MODEL;

  return {
    cache: { enabled: vars.CACHE_ENABLED, dir: vars.CACHE_DIR },
    llm: {
      provider: vars.LLM_PROVIDER,
      endpoint: vars.LLM_ENDPOINT,
      apiKey: vars.LLM_API_KEY,
      anthropicApiKey: vars.ANTHROPIC_API_KEY,
      textModel,
      visionModel: vars.LLM_VISION_MODEL ?? textModel,
      numCtx: vars.LLM_NUM_CTX,
      cache: {
        enabled: vars.LLM_CACHE_ENABLED,
        dir: join(vars.CACHE_DIR, "llm"),
      },
    },
    datalab: {
      apiKey: vars.DATALAB_API_KEY,
      endpoint: vars.DATALAB_ENDPOINT,
      pollAttempts: vars.DATALAB_POLL_ATTEMPTS,
      pollIntervalMs: vars.DATALAB_POLL_INTERVAL_MS,
    },
    pipeline: {
      maxPages: vars.MAX_PAGES,
      renderDpi: vars.RENDER_DPI,
      judgeInput: vars.JUDGE_INPUT,
      selectionOrder: vars.SELECTION_ORDER,
    },
    redisUrl: vars.REDIS_URL,
    port: vars.PORT,
    workerConcurrency: vars.WORKER_CONCURRENCY,
  };
}
