import { z } from "zod";
import { err, ok } from "../../types.js";
import { requestJson, unexpectedResponse } from "./http.js";
import type { AdapterOptions, PlatformAdapter } from "./types.js";

const MEDIUM_API = "https://api.medium.com/v1";

const MediumEnvelopeSchema = z.object({ data: z.object({ id: z.string() }) });

export function createMediumAdapter(
  token: string,
  options: AdapterOptions,
): PlatformAdapter {
  const headers = {
    authorization: `Bearer ${token}`,
    "content-type": "application/json",
  };

  return {
    platform: "medium",
    async publish(request, signal) {
      const me = await requestJson(
        "medium",
        `${MEDIUM_API}/me`,
        { method: "GET", headers, signal },
        options,
      );
      if (!me.ok) return me;
      const user = MediumEnvelopeSchema.safeParse(me.value.body);
      if (!user.success) return err(unexpectedResponse("medium", "missing user id"));

      const post = await requestJson(
        "medium",
        `${MEDIUM_API}/users/${encodeURIComponent(user.data.data.id)}/posts`,
        {
          method: "POST",
          headers,
          body: JSON.stringify({
            title: request.title ?? request.body.slice(0, 60),
            contentFormat: "markdown",
            content: request.body,
            publishStatus: "public",
            tags: ["artificial-intelligence", "technology"],
          }),
          signal,
        },
        options,
      );
      if (!post.ok) return post;

      const parsed = MediumEnvelopeSchema.safeParse(post.value.body);
      if (!parsed.success) return err(unexpectedResponse("medium", "missing post id"));
      return ok({ platformId: parsed.data.data.id });
    },
  };
}
