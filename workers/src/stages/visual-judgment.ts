/**
 * Stage 2: asks a vision model which candidates carry a selection mark.
 */

import type { LLMClient } from "../llm/index.js";
import type { PageImage } from "../types.js";
import type { Logger } from "../logger.js";
import { createConsoleLogger } from "../logger.js";
import { JUDGE_SYSTEM_PROMPT, buildJudgePrompt } from "../llm/prompts/judge.js";

export interface VisualJudge {
  /** Returns the model's raw answer, unparsed */
  judge(images: readonly PageImage[], candidatesText: string): Promise<string>;
}

export const JUDGE_MAX_TOKENS = 1800;

export const EMPTY_CANDIDATES_ANSWER = JSON.stringify({
  selected_ids: [],
  evidence: "empty candidates",
});

export class LlmVisualJudge implements VisualJudge {
  constructor(
    private readonly client: Pick<LLMClient, "vision">,
    private readonly logger: Logger = createConsoleLogger("Judge"),
  ) {}

  async judge(
    images: readonly PageImage[],
    candidatesText: string,
  ): Promise<string> {
    if (!candidatesText) {
      this.logger.info("No candidate text, skipping visual judgment");
      return EMPTY_CANDIDATES_ANSWER;
    }

    this.logger.info(`Judging selection marks over ${images.length} pages`);

    const response = await this.client.vision(
      JUDGE_SYSTEM_PROMPT,
      buildJudgePrompt(candidatesText),
      images,
      {
        temperature: 0,
        maxTokens: JUDGE_MAX_TOKENS,
        cachePrefix: "judge",
      },
    );

    return response.content;
  }
}
