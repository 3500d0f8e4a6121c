import { z } from "zod";

import { SupervisorError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { omitUndefinedEntries } from "../utils/object.js";

/**
 * Structured payload returned by tool handlers when an error occurs. The MCP
 * transport expects the `content` array to contain textual JSON so clients can
 * parse the code, hint and optional details.
 */
export interface ToolErrorResponse {
  [key: string]: unknown;
  isError: true;
  content: Array<{ type: "text"; text: string }>;
}

export interface NormalisedToolError {
  code: string;
  message: string;
  hint?: string;
  details?: Record<string, unknown>;
}

const UNEXPECTED_CODE = "E-SUPERVISOR-UNEXPECTED";
const INVALID_INPUT_CODE = "E-SUPERVISOR-INVALID-INPUT";
const MAX_MESSAGE_LENGTH = 1_000;

/**
 * Maps any thrown value to a code, message, hint and details. Supervisor
 * errors keep their own code; zod failures become invalid-input errors.
 */
export function normaliseToolError(error: unknown): NormalisedToolError {
  const rawMessage = error instanceof Error ? error.message : String(error);
  const message =
    rawMessage.length > MAX_MESSAGE_LENGTH ? `${rawMessage.slice(0, MAX_MESSAGE_LENGTH - 1)}…` : rawMessage;

  if (error instanceof z.ZodError) {
    return { code: INVALID_INPUT_CODE, message, hint: "invalid_input", details: { issues: error.issues } };
  }
  if (error instanceof SupervisorError) {
    return {
      code: error.code,
      message,
      ...omitUndefinedEntries({
        hint: error.hint.trim().length > 0 ? error.hint : undefined,
        details: Object.keys(error.details).length > 0 ? error.details : undefined,
      }),
    };
  }
  return { code: UNEXPECTED_CODE, message };
}

/** Logs the failure of {@link toolName} and returns the `isError` response. */
export function supervisorToolError(
  logger: StructuredLogger,
  toolName: string,
  error: unknown,
  context: Record<string, unknown> = {},
): ToolErrorResponse {
  const normalised = normaliseToolError(error);
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
