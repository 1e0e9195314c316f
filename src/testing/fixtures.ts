import type { ReviewComment, ReviewThread } from "../github/types.js";

export function makeComment(overrides: Partial<ReviewComment> = {}): ReviewComment {
  return {
    id: "PRRC_1",
    author: "alice",
    path: "src/app.ts",
    line: 12,
    originalLine: 12,
    body: "Consider extracting this.",
    diffHunk: null,
    url: null,
    ...overrides,
  };
}

export function makeThread(
  overrides: Partial<ReviewThread> = {},
): ReviewThread {
  return {
    isResolved: false,
    isOutdated: false,
    comments: [makeComment()],
    ...overrides,
  };
}

/** A `data` payload as returned by the review threads query. */
export function reviewThreadsData(threadNodes: unknown[]): unknown {
  return {
    repository: {
      pullRequest: {
        reviewThreads: { nodes: threadNodes },
      },
    },
  };
}

export function commentNode(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: "PRRC_1",
    author: { login: "alice" },
    body: "Consider extracting this.",
    path: "src/app.ts",
    line: 12,
    originalLine: 12,
    diffHunk: "@@ -10,3 +10,4 @@\n+const x = 1;",
    url: "https://github.com/acme/widgets/pull/7#discussion_r1",
    ...overrides,
  };
}
