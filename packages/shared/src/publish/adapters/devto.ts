import { z } from "zod";
import { err, ok } from "../../types.js";
import { requestJson, unexpectedResponse } from "./http.js";
import type { AdapterOptions, PlatformAdapter } from "./types.js";

const DEVTO_URL = "https://dev.to/api/articles";

const DevtoArticleSchema = z.object({ id: z.union([z.number(), z.string()]) });

export function createDevtoAdapter(
  apiKey: string,
  options: AdapterOptions & { tags?: string[] },
): PlatformAdapter {
  const tags = options.tags ?? ["ai", "technology", "news"];

  return {
    platform: "devto",
    async publish(request, signal) {
      const response = await requestJson(
        "devto",
        DEVTO_URL,
        {
          method: "POST",
          headers: { "api-key": apiKey, "content-type": "application/json" },
          body: JSON.stringify({
            article: {
              title: request.title ?? request.body.slice(0, 60),
              body_markdown: request.body,
              published: true,
              tags,
            },
          }),
          signal,
        },
        options,
      );
      if (!response.ok) return response;

      const parsed = DevtoArticleSchema.safeParse(response.value.body);
      if (!parsed.success) return err(unexpectedResponse("devto", "missing article id"));
      return ok({ platformId: String(parsed.data.id) });
    },
  };
}
