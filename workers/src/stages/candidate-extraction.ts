/**
 * Stage 1: high-recall candidate pass over the converted document text.
 */

import type { LLMClient } from "../llm/index.js";
import type { Logger } from "../logger.js";
import { createConsoleLogger } from "../logger.js";
import {
  CANDIDATES_SYSTEM_PROMPT,
  buildCandidatesPrompt,
} from "../llm/prompts/candidates.js";

export interface CandidateExtractor {
  /** Returns the model's raw answer, unparsed */
  extract(text: string, documentName: string): Promise<string>;
}

export const CANDIDATES_MAX_TOKENS = 4000;

export class LlmCandidateExtractor implements CandidateExtractor {
  constructor(
    private readonly client: Pick<LLMClient, "chat">,
    private readonly logger: Logger = createConsoleLogger("Candidates"),
  ) {}

  async extract(text: string, documentName: string): Promise<string> {
    this.logger.info(
      `Extracting candidates from ${documentName} (${text.length} chars)`,
    );

    const response = await this.client.chat(
      CANDIDATES_SYSTEM_PROMPT,
      buildCandidatesPrompt(text, documentName),
      {
        temperature: 0,
        maxTokens: CANDIDATES_MAX_TOKENS,
        cachePrefix: "candidates",
      },
    );

    return response.content;
  }
}
