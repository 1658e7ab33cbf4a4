import { z } from "zod";

import type { StructuredLogger } from "../logger.js";

/**
 * Structured payload returned by tool handlers when an error occurs. The MCP
 * transport expects the `content` array to contain textual JSON so downstream
 * clients can parse the code, hint and optional details.
 */
export interface ToolErrorResponse {
  [key: string]: unknown;
  isError: true;
  content: Array<{ type: "text"; text: string }>;
}

/** Machine readable view of a thrown error. */
export interface NormalisedToolError {
  code: string;
  message: string;
  hint?: string;
  details?: unknown;
}

export interface ToolErrorCodes {
  /** Applied when the error carries no code of its own. */
  defaultCode: string;
  /** Applied to zod input failures. */
  invalidInputCode?: string;
}

export const COACH_ERROR_CODES: ToolErrorCodes = {
  defaultCode: "E-COACH-UNEXPECTED",
  invalidInputCode: "E-COACH-INVALID-INPUT",
};

/**
 * Normalises an arbitrary error into a structured representation. Zod
 * validation errors map to the invalid-input code; errors exposing a string
 * `code` keep it along with their `hint` and `details`.
 */
export function normaliseToolError(error: unknown, codes: ToolErrorCodes): NormalisedToolError {
  const message = (error instanceof Error ? error.message : String(error)).trim() || "unexpected error";

  if (error instanceof z.ZodError) {
    return {
      code: codes.invalidInputCode ?? codes.defaultCode,
      message,
      hint: "invalid_input",
      details: { issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })) },
    };
  }

  const normalised: NormalisedToolError = { code: codes.defaultCode, message };
  if (typeof error === "object" && error !== null) {
    if ("code" in error && typeof error.code === "string") {
      normalised.code = error.code;
    }
    if ("hint" in error && typeof error.hint === "string" && error.hint.length > 0) {
      normalised.hint = error.hint;
    }
    if ("details" in error && error.details !== undefined) {
      normalised.details = error.details;
    }
  }
  return normalised;
}

/** Logs the failure and wraps it as an MCP error result. */
export function coachToolError(
  logger: StructuredLogger,
  toolName: string,
  error: unknown,
  context: Record<string, unknown> = {},
  codes: ToolErrorCodes = COACH_ERROR_CODES,
): ToolErrorResponse {
  const normalised = normaliseToolError(error, codes);
  logger.error(`${toolName}_failed`, {
    ...context,
    message: normalised.message,
    code: normalised.code,
    details: normalised.details,
  });

  const payload: Record<string, unknown> = {
    ok: false,
    error: normalised.code,
    tool: toolName,
    message: normalised.message,
  };
  if (normalised.hint) {
    payload.hint = normalised.hint;
  }
  if (normalised.details !== undefined) {
    payload.details = normalised.details;
  }
  return {
    isError: true,
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
  };
}
