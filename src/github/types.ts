export interface RepoRef {
  owner: string;
  repo: string;
}

export interface ReviewComment {
  readonly id: string;
  /** null when the author's account no longer exists */
  readonly author: string | null;
  readonly path: string | null;
  /** null when the comment's position is no longer in the diff */
  readonly line: number | null;
  readonly originalLine: number | null;
  readonly body: string;
  readonly diffHunk: string | null;
  readonly url: string | null;
}

export interface ReviewThread {
  readonly isResolved: boolean;
  readonly isOutdated: boolean;
  /** Originating comment first, then replies in creation order. */
  readonly comments: readonly ReviewComment[];
}

export type PullRequestTarget =
  | { kind: "number"; number: number }
  | { kind: "none"; branch: string };

/** Everything the report needs from the hosting platform. */
export interface ReviewPlatform {
  findPullRequestForBranch(repo: RepoRef, branch: string): Promise<number | null>;
  fetchReviewThreads(repo: RepoRef, prNumber: number): Promise<ReviewThread[]>;
}
