export const JUDGE_SYSTEM_PROMPT =
  "Return ONLY one JSON object with keys: selected_ids (array of integers), " +
  "evidence (string). Start with '{' and end with '}'. No prose, no preamble.";

const JUDGE_RULES = `Find visual selection marks on the provided PDF images.
Use these rules:
- Treat the provided candidates JSON verbatim.
- If root is an array, index = array index (0-based).
- If root is an object with an array (e.g., 'products'/'items'), index = that array index (0-based).
- Return ONLY JSON: {"selected_ids": [...], "evidence": "..."}.`;

/**
 * Indexing rules followed by the candidate text the indices refer to.
 * The page images are sent after this text.
 */
export function buildJudgePrompt(candidatesText: string): string {
  return `${JUDGE_RULES}\n\nCANDIDATES_JSON:\n${candidatesText}`;
}
