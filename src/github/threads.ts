import { z } from "zod";
import type { ReviewComment, ReviewThread } from "./types.js";

// Fixed page size: PRs beyond 100 threads, or threads beyond 100 comments,
// are truncated.
export const REVIEW_THREADS_QUERY = `
  query($owner: String!, $repo: String!, $pr: Int!) {
    repository(owner: $owner, name: $repo) {
      pullRequest(number: $pr) {
        reviewThreads(first: 100) {
          nodes {
            isResolved
            isOutdated
            comments(first: 100) {
              nodes {
                id
                author {
                  login
                }
                body
                path
                line
                originalLine
                diffHunk
                url
              }
            }
          }
        }
      }
    }
  }
`;

const commentNodeSchema = z.object({
  id: z.string(),
  author: z.object({ login: z.string() }).nullable(),
  body: z.string(),
  path: z.string().nullish(),
  line: z.number().int().nullish(),
  originalLine: z.number().int().nullish(),
  diffHunk: z.string().nullish(),
  url: z.string().nullish(),
});

const threadNodeSchema = z.object({
  isResolved: z.boolean(),
  isOutdated: z.boolean(),
  comments: z.object({
    nodes: z.array(commentNodeSchema.nullable()),
  }),
});

export const reviewThreadsDataSchema = z.object({
  repository: z.object({
    pullRequest: z.object({
      reviewThreads: z.object({
        nodes: z.array(threadNodeSchema.nullable()),
      }),
    }),
  }),
});

type CommentNode = z.infer<typeof commentNodeSchema>;

function toComment(node: CommentNode): ReviewComment {
  return {
    id: node.id,
    author: node.author?.login ?? null,
    path: node.path ?? null,
    line: node.line ?? null,
    originalLine: node.originalLine ?? null,
    body: node.body,
    diffHunk: node.diffHunk ?? null,
    url: node.url ?? null,
  };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Converts the `data` payload of the review threads query into threads.
 * Throws when the payload does not have the expected shape.
 */
export function parseReviewThreads(data: unknown): ReviewThread[] {
  const parsed = reviewThreadsDataSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(
      `Unexpected review threads response: ${describeIssues(parsed.error)}`,
    );
  }

  const threads: ReviewThread[] = [];
  for (const node of parsed.data.repository.pullRequest.reviewThreads.nodes) {
    if (!node) continue;
    threads.push({
      isResolved: node.isResolved,
      isOutdated: node.isOutdated,
      comments: node.comments.nodes
        .filter((c): c is CommentNode => c !== null)
        .map(toComment),
    });
  }
  return threads;
}
