/**
 * Record Types for the Extraction Pipeline
 *
 * Defines the contracts between the conversion service, the two model stages,
 * and the callers of the pipeline. Field names of `Product` and the judge
 * payload are snake_case because they are the wire format shared with the
 * model and with API consumers.
 */

// ============================================================================
// Products
// ============================================================================

export interface Product {
  readonly product_name: string;
  /** Key distinguishing feature, e.g. a model or series code */
  readonly variant_identifier: string;
  readonly product_family: string;
  readonly manufacturer: string;
}

/**
 * Stage-1 candidates in order of appearance. Stage 2 refers to them purely by
 * position, so the list is never re-sorted or de-duplicated.
 */
export type CandidateList = readonly Product[];

export const ANNOTATION_TYPES = [
  "highlight",
  "box",
  "circle",
  "none",
  "unknown",
] as const;

// ============================================================================
// Stage 2
// ============================================================================

export interface SelectionResult {
  /** Zero-based candidate indices, possibly out of range */
  selected_ids: number[];
  evidence: string;
}

/**
 * How `selected_ids` are applied to the candidate list.
 * - "selection": follow the order (and repeats) of `selected_ids`
 * - "candidate": keep candidates in list order if their index was selected
 */
export type SelectionOrder = "selection" | "candidate";

// ============================================================================
// Rendering
// ============================================================================

export interface PageImage {
  /** Zero-based page position */
  pageNumber: number;
  mediaType: string;
  /** Base64-encoded image bytes */
  base64: string;
}

// ============================================================================
// Pipeline Results
// ============================================================================

export interface ExtractionSuccess {
  success: true;
  identity_key: string;
  evidence: string;
  products: Product[];
  candidates: Product[];
  judge_response: SelectionResult;
}

export interface ExtractionFailure {
  success: false;
  error: string;
  products: [];
}

export type ExtractionResult = ExtractionSuccess | ExtractionFailure;

// ============================================================================
// Queue Jobs
// ============================================================================

export interface ExtractJobData {
  /** Absolute or worker-relative path to the submittal PDF */
  filePath: string;
  /** ISO timestamp of the enqueue request */
  requestedAt: string;
}
