/**
 * JSON Salvage
 *
 * Recovers a parseable JSON value from free-text model output: code fences,
 * surrounding prose, markup wrappers, comments, trailing commas, smart quotes
 * and output that was cut off mid-string or mid-container.
 *
 * `extractJsonBlock` and `cleanJsonMinorIssues` are total string functions and
 * never throw. `parseModelJson` reports a parse failure as a value; deciding
 * what an unparseable answer means is left to the caller.
 */

import { MalformedInputError, errorMessage } from "./errors.js";

const BOM = /^\uFEFF+/;
const FENCE_OPEN = /^```(?:json|JSON)?\s*\n?/gm;
const FENCE_CLOSE = /\n?```$/;
const LEADING_TAG = /^\s*<[^>]+>\s*/;
const TRAILING_TAG = /\s*<\/[^>]+>\s*$/;
const TRAILING_COMMA = /,(\s*[}\]])/g;
const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F]/g;

const HEX_DIGIT = /^[0-9A-Fa-f]$/;
const BARE_TOKEN = /[^\s,:[\]{}"]+$/;
const JSON_LITERAL =
  /^(?:true|false|null|-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?)$/;

const CLOSER: Record<string, string> = { "{": "}", "[": "]" };

/**
 * Progress of the member being read in an open container. Arrays only use
 * `value` (expecting an element) and `done`.
 */
type MemberState = "key" | "in-key" | "colon" | "value" | "done";

interface Frame {
  opener: "{" | "[";
  member: MemberState;
  /** Where the current member begins: after the opener, or at its comma. */
  memberStart: number;
}

/** True when the block ends in a number or literal cut short, like `tru` or `1.`. */
function endsInPartialLiteral(block: string): boolean {
  const token = BARE_TOKEN.exec(block);
  return token !== null && !JSON_LITERAL.test(token[0]);
}

function firstOpener(text: string): number {
  const brace = text.indexOf("{");
  const bracket = text.indexOf("[");
  if (brace === -1) return bracket;
  if (bracket === -1) return brace;
  return Math.min(brace, bracket);
}

/**
 * Cuts the first top-level JSON object or array out of `text`, closing an
 * unterminated string and any containers left open by truncation.
 *
 * The opener is whichever of `{` and `[` occurs first. The block ends where
 * that opener is balanced; closers that do not match the innermost open
 * container are skipped. Without any opener the stripped text is returned
 * unchanged, which callers must read as "no JSON found".
 */
export function extractJsonBlock(text: string): string {
  let s = text.replace(BOM, "").trim();

  if (s.startsWith("```")) {
    s = s.replace(FENCE_OPEN, "").replace(FENCE_CLOSE, "");
  }

  s = s.replace(LEADING_TAG, "").replace(TRAILING_TAG, "");

  const start = firstOpener(s);
  if (start === -1) {
    return s;
  }

  const stack: Frame[] = [];
  let inString = false;
  let escaped = false;
  // Index of the backslash of an unfinished \uXXXX escape
  let unicodeStart = -1;
  let end = s.length;

  for (let i = start; i < s.length; i++) {
    const c = s[i];
    const top = stack[stack.length - 1];

    if (inString) {
      if (unicodeStart !== -1) {
        // The fourth hex digit, or a non-hex character, ends the escape
        if (i - unicodeStart >= 5 || !HEX_DIGIT.test(c)) {
          unicodeStart = -1;
        } else {
          continue;
        }
      }
      if (escaped) {
        escaped = false;
        if (c === "u") unicodeStart = i - 1;
      } else if (c === "\\") {
        escaped = true;
      } else if (c === '"') {
        inString = false;
        if (top?.member === "in-key") top.member = "colon";
      }
      continue;
    }

    if (c === '"') {
      inString = true;
      if (top?.member === "key") top.member = "in-key";
      else if (top?.member === "value") top.member = "done";
    } else if (c === "{" || c === "[") {
      if (top?.member === "value") top.member = "done";
      const opener = c === "{" ? "{" : "[";
      stack.push({
        opener,
        member: opener === "{" ? "key" : "value",
        memberStart: i + 1,
      });
    } else if (c === "}" || c === "]") {
      if (top !== undefined && CLOSER[top.opener] === c) {
        stack.pop();
        if (stack.length === 0) {
          end = i + 1;
          break;
        }
      }
    } else if (c === ",") {
      if (top !== undefined) {
        top.member = top.opener === "{" ? "key" : "value";
        top.memberStart = i;
      }
    } else if (c === ":") {
      if (top?.member === "colon") top.member = "value";
    } else if (!/\s/.test(c)) {
      if (top?.member === "value") top.member = "done";
    }
  }

  let block = s.slice(start, end);
  const open = stack[stack.length - 1];

  if (
    open !== undefined &&
    ((open.opener === "{" && open.member !== "done") ||
      (!inString && endsInPartialLiteral(block)))
  ) {
    // Drop the unfinished member back to its comma or the opener
    block = s.slice(start, open.memberStart);
  } else if (inString) {
    if (unicodeStart !== -1) {
      block = block.slice(0, unicodeStart - start);
    } else if (escaped) {
      // A dangling backslash would escape the synthesized quote
      block = block.slice(0, -1);
    }
    block += '"';
  }

  for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
    block += CLOSER[frame.opener];
  }

  return block;
}

/**
 * Removes `//` line comments and `/* *\/` block comments outside of JSON
 * strings. An unclosed block comment is left in place.
 */
function stripComments(s: string): string {
  let out = "";
  let inString = false;
  let escaped = false;

  for (let i = 0; i < s.length; i++) {
    const c = s[i];

    if (inString) {
      out += c;
      if (escaped) {
        escaped = false;
      } else if (c === "\\") {
        escaped = true;
      } else if (c === '"') {
        inString = false;
      }
      continue;
    }

    if (c === '"') {
      inString = true;
      out += c;
    } else if (c === "/" && s[i + 1] === "/") {
      const newline = s.indexOf("\n", i);
      if (newline === -1) break;
      // Keep the newline itself
      i = newline - 1;
    } else if (c === "/" && s[i + 1] === "*") {
      const close = s.indexOf("*/", i + 2);
      if (close === -1) {
        out += s.slice(i);
        break;
      }
      i = close + 1;
    } else {
      out += c;
    }
  }

  return out;
}

/**
 * Repairs the small syntax slips models make in otherwise valid JSON:
 * comments, trailing commas, non-breaking spaces, smart quotes and stray
 * control characters (tab, LF and CR are kept).
 */
export function cleanJsonMinorIssues(text: string): string {
  if (!text) {
    return text;
  }

  // Quotes are normalized first so comment stripping sees the strings
  const normalized = text
    .replace(BOM, "")
    .replace(/\u00A0/g, " ")
    .replace(/[\u201C\u201D]/g, '"')
    .replace(/[\u2018\u2019]/g, "'");

  return stripComments(normalized)
    .replace(TRAILING_COMMA, "$1")
    .replace(CONTROL_CHARS, "");
}

export type ParsedModelJson =
  | { ok: true; value: unknown; json: string }
  | { ok: false; error: MalformedInputError; json: string };

/**
 * Salvages, cleans and parses model output in one step.
 */
export function parseModelJson(text: string): ParsedModelJson {
  const json = cleanJsonMinorIssues(extractJsonBlock(text));

  try {
    const value: unknown = JSON.parse(json);
    return { ok: true, value, json };
  } catch (error) {
    return {
      ok: false,
      json,
      error: new MalformedInputError(
        `No parseable JSON in model output: ${errorMessage(error)}`,
        text,
      ),
    };
  }
}
