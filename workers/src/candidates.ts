/**
 * Candidate Normalizer
 *
 * Turns the salvaged stage-1 answer into an ordered `CandidateList`. The
 * model may answer with a bare array or with an object holding the list under
 * `products` or `items`; each item is coerced into a fully-populated Product.
 */

import { parseModelJson } from "./json-salvage.js";
import { MalformedInputError } from "./errors.js";
import { isPresent, isRecord } from "./utils/guards.js";
import type { CandidateList, Product } from "./types.js";

export type CandidateRoot =
  | { kind: "array"; items: readonly unknown[] }
  | { kind: "object-with-products"; items: readonly unknown[] }
  | { kind: "object-with-items"; items: readonly unknown[] }
  | { kind: "unrecognized" };

type CandidateRootKind = CandidateRoot["kind"];

/**
 * Decides where the candidate list lives in a parsed stage-1 answer. An
 * object without an array under `products` or `items` is unrecognized; its
 * other values are never treated as candidates.
 */
export function classifyCandidateRoot(value: unknown): CandidateRoot {
  if (Array.isArray(value)) {
    return { kind: "array", items: value };
  }
  if (isRecord(value)) {
    const { products, items } = value;
    if (Array.isArray(products)) {
      return { kind: "object-with-products", items: products };
    }
    if (Array.isArray(items)) {
      return { kind: "object-with-items", items };
    }
  }
  return { kind: "unrecognized" };
}

const FIELD_SOURCES = {
  product_name: ["product_name", "name", "title", "product"],
  variant_identifier: [
    "variant_identifier",
    "series",
    "series_type",
    "type",
    "model",
  ],
  product_family: ["product_family", "family"],
  manufacturer: ["manufacturer", "brand"],
} as const satisfies Record<keyof Product, readonly string[]>;

function firstPresent(
  item: Record<string, unknown>,
  keys: readonly string[],
): string | undefined {
  for (const key of keys) {
    const value = item[key];
    if (isPresent(value)) {
      return typeof value === "string" ? value : JSON.stringify(value);
    }
  }
  return undefined;
}

/**
 * Maps each item to a Product, one per item and in the same order. Items
 * that are not objects are read as `{}` and come out fully defaulted; the
 * default variant is the item's position.
 */
export function coerceItemsToProducts(items: readonly unknown[]): Product[] {
  return items.map((raw, index) => {
    const item = isRecord(raw) ? raw : {};
    return {
      product_name:
        firstPresent(item, FIELD_SOURCES.product_name) ?? "Unknown Product",
      variant_identifier:
        firstPresent(item, FIELD_SOURCES.variant_identifier) ?? String(index),
      product_family:
        firstPresent(item, FIELD_SOURCES.product_family) ?? "Unknown Family",
      manufacturer:
        firstPresent(item, FIELD_SOURCES.manufacturer) ??
        "Unknown Manufacturer",
    };
  });
}

export interface NormalizedCandidates {
  candidates: CandidateList;
  rootKind: CandidateRootKind | "unparseable";
  /** Set when the answer held no parseable JSON */
  error?: MalformedInputError;
}

/**
 * Salvages, parses, unwraps and coerces a stage-1 answer. Never throws: an
 * unparseable answer or an unrecognized root yields an empty list.
 */
export function normalizeCandidates(
  text: string,
  documentName: string,
): NormalizedCandidates {
  const parsed = parseModelJson(text);
  if (!parsed.ok) {
    return {
      candidates: [],
      rootKind: "unparseable",
      error: new MalformedInputError(
        `Candidate answer for ${documentName} is not JSON: ${parsed.error.message}`,
        text,
      ),
    };
  }

  const root = classifyCandidateRoot(parsed.value);
  if (root.kind === "unrecognized") {
    return { candidates: [], rootKind: root.kind };
  }

  return { candidates: coerceItemsToProducts(root.items), rootKind: root.kind };
}

/**
 * Serializes a candidate list the way the judge receives it when it is shown
 * the normalized list instead of the raw stage-1 answer.
 */
export function serializeCandidates(candidates: CandidateList): string {
  return JSON.stringify({ products: candidates }, null, 2);
}
