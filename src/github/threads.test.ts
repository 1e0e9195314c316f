import { describe, expect, it } from "vitest";
import { commentNode, reviewThreadsData } from "../testing/fixtures.js";
import { parseReviewThreads } from "./threads.js";

describe("parseReviewThreads", () => {
  it("maps thread and comment nodes in source order", () => {
    const data = reviewThreadsData([
      {
        isResolved: false,
        isOutdated: true,
        comments: {
          nodes: [
            commentNode(),
            commentNode({
              id: "PRRC_2",
              author: { login: "bob" },
              body: "Done.",
            }),
          ],
        },
      },
      {
        isResolved: true,
        isOutdated: false,
        comments: { nodes: [] },
      },
    ]);

    const threads = parseReviewThreads(data);

    expect(threads).toHaveLength(2);
    expect(threads[0]).toEqual({
      isResolved: false,
      isOutdated: true,
      comments: [
        {
          id: "PRRC_1",
          author: "alice",
          body: "Consider extracting this.",
          path: "src/app.ts",
          line: 12,
          originalLine: 12,
          diffHunk: "@@ -10,3 +10,4 @@\n+const x = 1;",
          url: "https://github.com/acme/widgets/pull/7#discussion_r1",
        },
        {
          id: "PRRC_2",
          author: "bob",
          body: "Done.",
          path: "src/app.ts",
          line: 12,
          originalLine: 12,
          diffHunk: "@@ -10,3 +10,4 @@\n+const x = 1;",
          url: "https://github.com/acme/widgets/pull/7#discussion_r1",
        },
      ],
    });
    expect(threads[1]).toEqual({
      isResolved: true,
      isOutdated: false,
      comments: [],
    });
  });

  it("keeps deleted authors and missing positions as null", () => {
    const data = reviewThreadsData([
      {
        isResolved: false,
        isOutdated: true,
        comments: {
          nodes: [
            commentNode({
              author: null,
              line: null,
              path: undefined,
              diffHunk: null,
              url: undefined,
            }),
          ],
        },
      },
    ]);

    const [thread] = parseReviewThreads(data);

    expect(thread.comments[0]).toMatchObject({
      author: null,
      line: null,
      path: null,
      diffHunk: null,
      url: null,
    });
  });

  it("drops null list entries", () => {
    const data = reviewThreadsData([
      null,
      {
        isResolved: true,
        isOutdated: false,
        comments: { nodes: [null, commentNode()] },
      },
    ]);

    const threads = parseReviewThreads(data);

    expect(threads).toHaveLength(1);
    expect(threads[0].comments).toHaveLength(1);
  });

  it("fails when the nesting path is missing", () => {
    expect(() => parseReviewThreads({ repository: {} })).toThrow(
      "Unexpected review threads response: repository.pullRequest: Required",
    );
  });

  it("fails when a field has the wrong type", () => {
    const data = reviewThreadsData([
      { isResolved: "yes", isOutdated: false, comments: { nodes: [] } },
    ]);

    expect(() => parseReviewThreads(data)).toThrow(
      "repository.pullRequest.reviewThreads.nodes.0.isResolved",
    );
  });
});
