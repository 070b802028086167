import { z } from "zod";
import { err, ok } from "../../types.js";
import { failure, requestJson, unexpectedResponse } from "./http.js";
import type { AdapterOptions, FailureKind, PlatformAdapter } from "./types.js";

const HASHNODE_URL = "https://gql.hashnode.com/";

const PUBLISH_POST_MUTATION = `
  mutation PublishPost($input: PublishPostInput!) {
    publishPost(input: $input) {
      post { id }
    }
  }
`;

const HashnodeResponseSchema = z.object({
  data: z
    .object({
      publishPost: z.object({ post: z.object({ id: z.string() }) }).nullable(),
    })
    .nullable()
    .optional(),
  errors: z
    .array(
      z.object({
        message: z.string(),
        extensions: z.object({ code: z.string().optional() }).optional(),
      }),
    )
    .optional(),
});

const GRAPHQL_ERROR_KINDS = new Map<string, FailureKind>([
  ["UNAUTHENTICATED", "auth"],
  ["FORBIDDEN", "auth"],
  ["TOO_MANY_REQUESTS", "rate_limit"],
  ["INTERNAL_SERVER_ERROR", "server"],
]);

/** Kind of the first error with a known `extensions.code`, else payload */
export function classifyGraphqlErrors(
  errors: Array<{ extensions?: { code?: string } }>,
): FailureKind {
  for (const error of errors) {
    const kind = GRAPHQL_ERROR_KINDS.get(error.extensions?.code ?? "");
    if (kind) return kind;
  }
  return "payload";
}

export function createHashnodeAdapter(
  credentials: { apiKey: string; publicationId: string },
  options: AdapterOptions,
): PlatformAdapter {
  return {
    platform: "hashnode",
    async publish(request, signal) {
      const response = await requestJson(
        "hashnode",
        HASHNODE_URL,
        {
          method: "POST",
          headers: {
            authorization: credentials.apiKey,
            "content-type": "application/json",
          },
          body: JSON.stringify({
            query: PUBLISH_POST_MUTATION,
            variables: {
              input: {
                title: request.title ?? request.body.slice(0, 60),
                contentMarkdown: request.body,
                publicationId: credentials.publicationId,
                tags: [
                  { slug: "artificial-intelligence", name: "Artificial Intelligence" },
                  { slug: "technology-news", name: "Technology News" },
                ],
              },
            },
          }),
          signal,
        },
        options,
      );
      if (!response.ok) return response;

      const parsed = HashnodeResponseSchema.safeParse(response.value.body);
      if (!parsed.success) return err(unexpectedResponse("hashnode", parsed.error.message));

      // GraphQL reports request errors with HTTP 200
      if (parsed.data.errors && parsed.data.errors.length > 0) {
        const message = parsed.data.errors.map((e) => e.message).join("; ");
        const kind = classifyGraphqlErrors(parsed.data.errors);
        return err(failure(kind, `hashnode GraphQL error: ${message}`));
      }

      const id = parsed.data.data?.publishPost?.post.id;
      if (!id) return err(unexpectedResponse("hashnode", "missing post id"));
      return ok({ platformId: id });
    },
  };
}
