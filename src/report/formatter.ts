import type { ReviewComment, ReviewThread } from "../github/types.js";

export interface PartitionedThreads {
  unresolved: ReviewThread[];
  resolved: ReviewThread[];
}

export function partitionThreads(
  threads: readonly ReviewThread[],
): PartitionedThreads {
  return {
    unresolved: threads.filter((t) => !t.isResolved),
    resolved: threads.filter((t) => t.isResolved),
  };
}

function statusLabel(thread: ReviewThread): string {
  const status = thread.isResolved ? "✅ RESOLVED" : "🔴 UNRESOLVED";
  return thread.isOutdated ? `${status} (outdated)` : status;
}

function authorOf(comment: ReviewComment): string {
  return comment.author ?? "Unknown";
}

/** Lines for one thread, or none when the thread has no comments. */
export function renderThread(thread: ReviewThread): string[] {
  const [first, ...replies] = thread.comments;
  if (!first) return [];

  const path = first.path ?? "unknown file";
  const line = first.line ?? first.originalLine ?? "?";
  const lines = [
    `### ${statusLabel(thread)}: ${authorOf(first)} on \`${path}:${line}\``,
    "",
  ];

  if (first.url) {
    lines.push(`[View on GitHub](${first.url})`, "");
  }
  if (first.diffHunk) {
    lines.push("```diff", first.diffHunk, "```", "");
  }
  lines.push(first.body, "");

  if (replies.length > 0) {
    lines.push("**Replies:**", "");
    for (const reply of replies) {
      lines.push(`- **${authorOf(reply)}**: ${reply.body}`);
    }
    lines.push("");
  }

  lines.push("---", "");
  return lines;
}

export function renderReport(
  threads: readonly ReviewThread[],
  prNumber: number,
): string {
  const { unresolved, resolved } = partitionThreads(threads);
  const noun = threads.length === 1 ? "thread" : "threads";

  const lines = [
    `# PR #${prNumber} Review Comments (${threads.length} ${noun})`,
    "",
    `Unresolved: ${unresolved.length} | Resolved: ${resolved.length}`,
    "",
  ];

  if (unresolved.length > 0) {
    lines.push("## Unresolved", "");
    for (const thread of unresolved) lines.push(...renderThread(thread));
  }
  if (resolved.length > 0) {
    lines.push("## Resolved", "");
    for (const thread of resolved) lines.push(...renderThread(thread));
  }

  return lines.join("\n");
}
