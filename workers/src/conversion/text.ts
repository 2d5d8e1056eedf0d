import { isRecord } from "../utils/guards.js";

const TAG = /<[^<]+?>/g;

function childrenOf(node: unknown): unknown[] {
  if (!isRecord(node)) return [];
  const { children } = node;
  return Array.isArray(children) ? children : [];
}

/**
 * Flattens a completed marker conversion (`json.children` pages holding
 * `children` blocks) into plain text. Each block's `html` fragment is
 * stripped of tags and kept, followed by a newline, when anything but
 * whitespace remains. Nodes of the wrong shape are skipped.
 */
export function extractTextFromConversion(payload: unknown): string {
  const document = isRecord(payload) ? payload.json : undefined;
  let text = "";

  for (const page of childrenOf(document)) {
    for (const block of childrenOf(page)) {
      if (!isRecord(block) || typeof block.html !== "string") continue;
      const fragment = block.html.replace(TAG, "");
      if (fragment.trim()) {
        text += `${fragment}\n`;
      }
    }
  }

  return text;
}
