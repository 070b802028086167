// =============================================================================
// @tidewire/server: Briefing tool: get_briefing
// =============================================================================

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { GetBriefingInput } from "@tidewire/shared";
import type { ToolRegistrar, AppDependencies } from "../server.js";
import { jsonResult, runTool, toolError } from "./respond.js";

export const registerBriefingTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { stores, logger } = deps;

  // Latest briefing, or the latest one created on `date` (UTC)
  server.tool("get_briefing", GetBriefingInput.shape, async (input) =>
    runTool(logger, "get_briefing", input, async () => {
      const briefing = input.date
        ? await stores.briefings.forDate(input.date)
        : await stores.briefings.latest();
      if (!briefing) {
        return toolError(
          input.date ? `No briefing for ${input.date}` : "No briefing has been generated yet",
        );
      }
      return jsonResult(briefing);
    }),
  );
};
