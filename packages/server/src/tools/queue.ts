// =============================================================================
// @tidewire/server: Queue tool: skip_queue_item
// =============================================================================

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SkipQueueItemInput, skipQueueItem } from "@tidewire/shared";
import type { ToolRegistrar, AppDependencies } from "../server.js";
import { jsonResult, runTool, toolError } from "./respond.js";

export const registerQueueTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { stores, logger, clock, operator } = deps;

  server.tool("skip_queue_item", SkipQueueItemInput.shape, async (input) =>
    runTool(logger, "skip_queue_item", input, async () => {
      const skipped = await skipQueueItem(
        stores.publishQueue,
        input.id,
        input.reason,
        operator,
        clock(),
      );
      if (!skipped) {
        const item = await stores.publishQueue.get(input.id);
        return toolError(
          item
            ? `Queue item "${input.id}" is ${item.status} and cannot be skipped`
            : `Queue item "${input.id}" not found`,
        );
      }
      return jsonResult({ id: input.id, status: "skipped", reason: input.reason, operator });
    }),
  );
};
