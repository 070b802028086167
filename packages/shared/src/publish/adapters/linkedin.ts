import { z } from "zod";
import { err, ok } from "../../types.js";
import { requestJson, unexpectedResponse } from "./http.js";
import type { AdapterOptions, PlatformAdapter } from "./types.js";

const LINKEDIN_API = "https://api.linkedin.com/v2";
export const LINKEDIN_MAX_CHARS = 3000;

const UserInfoSchema = z.object({ sub: z.string() });
const UgcPostSchema = z.object({ id: z.string() }).partial();

export function createLinkedinAdapter(
  token: string,
  options: AdapterOptions,
): PlatformAdapter {
  return {
    platform: "linkedin",
    async publish(request, signal) {
      const me = await requestJson(
        "linkedin",
        `${LINKEDIN_API}/userinfo`,
        { method: "GET", headers: { authorization: `Bearer ${token}` }, signal },
        options,
      );
      if (!me.ok) return me;
      const user = UserInfoSchema.safeParse(me.value.body);
      if (!user.success) return err(unexpectedResponse("linkedin", "missing member id"));

      const post = await requestJson(
        "linkedin",
        `${LINKEDIN_API}/ugcPosts`,
        {
          method: "POST",
          headers: {
            authorization: `Bearer ${token}`,
            "content-type": "application/json",
            "x-restli-protocol-version": "2.0.0",
          },
          body: JSON.stringify({
            author: `urn:li:person:${user.data.sub}`,
            lifecycleState: "PUBLISHED",
            specificContent: {
              "com.linkedin.ugc.ShareContent": {
                shareCommentary: { text: request.body.slice(0, LINKEDIN_MAX_CHARS) },
                shareMediaCategory: "NONE",
              },
            },
            visibility: {
              "com.linkedin.ugc.MemberNetworkVisibility": "PUBLIC",
            },
          }),
          signal,
        },
        options,
      );
      if (!post.ok) return post;

      const id =
        post.value.headers.get("x-restli-id") ??
        UgcPostSchema.safeParse(post.value.body).data?.id;
      if (!id) return err(unexpectedResponse("linkedin", "missing post URN"));
      return ok({ platformId: id });
    },
  };
}
