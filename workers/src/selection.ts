/**
 * Judge Answer Parsing
 *
 * Reads the stage-2 answer into a `SelectionResult` and applies it to the
 * candidate list. Indices are zero-based positions; anything the model
 * returns that is not an index is discarded.
 */

import { parseModelJson } from "./json-salvage.js";
import { isRecord } from "./utils/guards.js";
import type {
  CandidateList,
  Product,
  SelectionOrder,
  SelectionResult,
} from "./types.js";

export type SelectionPayload =
  | { field: "selected_ids"; ids: readonly unknown[]; evidence: unknown }
  | { field: "selected"; ids: readonly unknown[]; evidence: unknown }
  | { field: "none"; evidence: unknown };

/**
 * Finds the index list in a parsed judge answer: `selected_ids` when it is
 * an array, else `selected` when that is one.
 */
export function classifySelectionPayload(value: unknown): SelectionPayload {
  if (!isRecord(value)) {
    return { field: "none", evidence: undefined };
  }

  const { selected_ids, selected, evidence } = value;
  if (Array.isArray(selected_ids)) {
    return { field: "selected_ids", ids: selected_ids, evidence };
  }
  if (Array.isArray(selected)) {
    return { field: "selected", ids: selected, evidence };
  }
  return { field: "none", evidence };
}

const DIGITS = /^\d+$/;

function toIndex(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : undefined;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return DIGITS.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
  }
  return undefined;
}

function toEvidence(value: unknown): string {
  if (value === undefined || value === null) return "";
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Parses a judge answer. Never throws: unparseable text selects nothing.
 */
export function parseSelection(text: string): SelectionResult {
  const parsed = parseModelJson(text);
  const payload = classifySelectionPayload(parsed.ok ? parsed.value : null);

  const selected_ids: number[] = [];
  if (payload.field !== "none") {
    for (const raw of payload.ids) {
      const index = toIndex(raw);
      if (index !== undefined) {
        selected_ids.push(index);
      }
    }
  }

  return { selected_ids, evidence: toEvidence(payload.evidence) };
}

/**
 * Picks the selected candidates, dropping indices outside `[0, N)`.
 *
 * With order "selection" the result follows `ids`, repeats included. With
 * order "candidate" it is the candidate list filtered to the selected
 * positions.
 */
export function applySelection(
  candidates: CandidateList,
  ids: readonly number[],
  order: SelectionOrder = "selection",
): Product[] {
  const inRange = (index: number): boolean =>
    index >= 0 && index < candidates.length;

  if (order === "candidate") {
    const chosen = new Set(ids.filter(inRange));
    return candidates.filter((_, index) => chosen.has(index));
  }

  return ids.filter(inRange).map((index) => candidates[index]);
}
