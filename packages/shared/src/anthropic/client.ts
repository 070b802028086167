// =============================================================================
// @tidewire/shared: Anthropic structured completion client
// =============================================================================
// Every analysis call asks for a JSON object. The object is obtained by
// forcing a single tool call whose input schema is the wanted shape, so the
// reply never has to be scraped out of prose. Validation of the returned
// object is the caller's job.
// =============================================================================

import Anthropic from "@anthropic-ai/sdk";
import { TidewireError } from "../errors.js";

const DEFAULT_MAX_TOKENS = 8192;

export type JsonObjectSchema = {
  type: "object";
  properties: Record<string, unknown>;
  required: string[];
};

export interface CompletionRequest {
  system?: string;
  prompt: string;
  toolName: string;
  toolDescription: string;
  schema: JsonObjectSchema;
  maxTokens?: number;
}

export interface LlmClient {
  readonly model: string;
  /** Returns the forced tool call's input, unvalidated */
  complete(request: CompletionRequest): Promise<unknown>;
}

export function createAnthropicClient(apiKey: string): Anthropic {
  return new Anthropic({ apiKey });
}

export function createAnthropicLlm(client: Anthropic, model: string): LlmClient {
  return {
    model,
    async complete(request) {
      const response = await client.messages.create({
        model,
        max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
        ...(request.system ? { system: request.system } : {}),
        messages: [{ role: "user", content: request.prompt }],
        tools: [
          {
            name: request.toolName,
            description: request.toolDescription,
            input_schema: request.schema,
          },
        ],
        tool_choice: { type: "tool", name: request.toolName },
      });

      for (const block of response.content) {
        if (block.type === "tool_use" && block.name === request.toolName) {
          return block.input;
        }
      }

      throw new TidewireError(
        `Model returned no ${request.toolName} call (stop_reason: ${response.stop_reason ?? "unknown"})`,
      );
    },
  };
}
