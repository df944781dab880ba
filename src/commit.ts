/**
 * Commits the regenerated dashboard back to the checked-out branch.
 *
 * Mirrors `git add <files> && git diff --staged --quiet || (git commit && git push)`:
 * an artifact identical to the committed one produces no commit.
 */

import * as core from "@actions/core";
import { GitCommandError, type GitRunner } from "./git";

export const BOT_USER_NAME = "github-actions[bot]";
export const BOT_USER_EMAIL = "github-actions[bot]@users.noreply.github.com";

export interface CommitOptions {
  files: string[];
  message: string;
  userName?: string;
  userEmail?: string;
  /** Push after committing (default true) */
  push?: boolean;
}

export interface CommitResult {
  committed: boolean;
  sha?: string;
}

/**
 * Stages `files` and commits them when the index differs from HEAD.
 *
 * @throws GitCommandError when any git step fails
 */
export async function commitArtifact(
  git: GitRunner,
  options: CommitOptions,
): Promise<CommitResult> {
  await git.exec(["config", "user.name", options.userName ?? BOT_USER_NAME]);
  await git.exec(["config", "user.email", options.userEmail ?? BOT_USER_EMAIL]);
  await git.exec(["add", "--", ...options.files]);

  // Exit code 0: nothing staged, 1: staged changes
  const diff = await git.exec(["diff", "--staged", "--quiet"], {
    ignoreReturnCode: true,
  });
  if (diff.exitCode === 0) {
    core.info(`No changes to ${options.files.join(", ")}; skipping commit`);
    return { committed: false };
  }
  if (diff.exitCode !== 1) {
    throw new GitCommandError(["diff"], diff);
  }

  await git.exec(["commit", "-m", options.message]);
  const sha = (await git.exec(["rev-parse", "HEAD"])).stdout.trim();
  core.info(`Committed ${options.files.join(", ")} as ${sha}`);

  if (options.push ?? true) {
    await git.exec(["push"]);
    core.info("Pushed dashboard commit");
  }

  return { committed: true, sha };
}
