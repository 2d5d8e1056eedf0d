import { candidatesResponseSchema } from "../schemas/product.js";
import { zodToTs } from "../schemas/utils.js";

export const CANDIDATES_SYSTEM_PROMPT =
  "You are an information-extraction engine. " +
  "Return the result as a single JSON object. No prose. " +
  "If a field is unknown, use null (or [] for arrays). Do not invent data.";

export const JSON_ONLY_INSTRUCTION =
  "Return ONLY JSON. Start with '{' and end with '}'.";

const SCHEMA_BLOCK = zodToTs(candidatesResponseSchema, "CandidatesResponse");

/**
 * High-recall instructions followed by the schema and the document text.
 */
export function buildCandidatesPrompt(
  text: string,
  documentName: string,
): string {
  return `${JSON_ONLY_INSTRUCTION}

You are extracting products from a construction submittal.
Extract ALL product variants mentioned in this document.

Include:
 - Every variant in tables (all thicknesses, all model numbers)
 - Every type/series mentioned (e.g., 812, 813, 814, 815, 817)
 - All options and configurations

Domain examples:
 - Gypsum: ALL thicknesses (1/4", 1/2", 5/8"), ALL types (XP, Fire-Shield, etc)
 - Screws: ALL models in the catalog
 - Insulation: ALL type numbers in the series

Extract everything - we'll filter later.
Output as JSON matching this interface:
${SCHEMA_BLOCK}
=== DOCUMENT (${documentName}) ===
${text}
=== END DOCUMENT ===`;
}
