// =============================================================================
// @tidewire/server: Shared tool response plumbing
// =============================================================================
// Every tool times its handler, logs the call, and answers with pretty JSON
// text. Thrown errors become `isError` responses; a handler reports an
// expected miss (unknown id, nothing to show) by returning `toolError`.
// =============================================================================

import { errorMessage, type Logger } from "@tidewire/shared";
import { logToolCall } from "../logger.js";

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

export function jsonResult(value: unknown): ToolResponse {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

export function toolError(message: string): ToolResponse {
  return {
    content: [{ type: "text" as const, text: `Error: ${message}` }],
    isError: true,
  };
}

export async function runTool(
  logger: Logger,
  toolName: string,
  input: Record<string, unknown>,
  handler: () => Promise<ToolResponse>,
): Promise<ToolResponse> {
  const start = performance.now();
  try {
    const response = await handler();
    const durationMs = performance.now() - start;
    if (response.isError) {
      logToolCall(logger, toolName, input, durationMs, response.content[0]?.text);
    } else {
      logToolCall(logger, toolName, input, durationMs);
    }
    return response;
  } catch (err) {
    const durationMs = performance.now() - start;
    const message = errorMessage(err);
    logToolCall(logger, toolName, input, durationMs, message);
    return toolError(`${toolName} failed: ${message}`);
  }
}
