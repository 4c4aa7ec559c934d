import { z } from "zod";

import { omitUndefinedEntries } from "./utils/object.js";

/** Maximum number of characters preserved in error messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 120;

/**
 * Collapses whitespace, trims surrounding spaces and enforces the maximum length
 * for an error message. If the provided text is empty once trimmed a generic
 * fallback is returned so clients never receive an empty string.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/** Empty hints collapse to `undefined`; long ones are truncated. */
export function normaliseErrorHint(hint?: string): string | undefined {
  if (hint === undefined) {
    return undefined;
  }
  const collapsed = hint.replace(/\s+/g, " ").trim();
  if (collapsed.length === 0) {
    return undefined;
  }
  if (collapsed.length <= ERROR_TEXT_MAX_LENGTH) {
    return collapsed;
  }
  return `${collapsed.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/** Machine readable representation of a thrown error. */
export interface NormalisedError {
  code: string;
  message: string;
  hint?: string;
  details?: unknown;
}

/** Codes applied when the thrown value does not carry its own. */
export interface ErrorCodes {
  defaultCode: string;
  /** Code used for zod validation failures. */
  invalidInputCode?: string;
}

interface CodedError {
  code: string;
  hint?: unknown;
  details?: unknown;
}

function isCodedError(error: unknown): error is CodedError {
  return typeof error === "object" && error !== null && "code" in error && typeof error.code === "string";
}

/**
 * Normalises an arbitrary error into a structured representation. Zod errors
 * map to {@link ErrorCodes.invalidInputCode}; errors exposing a string `code`
 * keep it along with their `hint` and `details`.
 */
export function normaliseDistanceError(error: unknown, codes: ErrorCodes): NormalisedError {
  const message = error instanceof Error ? error.message : String(error);
  let code = codes.defaultCode;
  let hint: string | undefined;
  let details: unknown;

  if (error instanceof z.ZodError) {
    code = codes.invalidInputCode ?? codes.defaultCode;
    hint = "invalid_input";
    details = { issues: error.issues };
  } else if (isCodedError(error)) {
    code = error.code;
    if (typeof error.hint === "string") {
      hint = error.hint;
    }
    details = error.details;
  }

  return {
    code,
    message: normaliseErrorMessage(message),
    ...omitUndefinedEntries({
      hint: normaliseErrorHint(hint),
      details,
    }),
  };
}
