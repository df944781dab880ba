/**
 * Static Hosting Branch Deployment
 *
 * Publishes the contents of a directory to a branch served as a static
 * site (GitHub Pages). Each deploy:
 * 1. Clones the hosting branch into a temp directory, or starts it as an
 *    orphan branch when it does not exist yet
 * 2. Replaces the branch content with the publish directory
 * 3. Commits and pushes, unless the content is unchanged
 */

import * as core from "@actions/core";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { BOT_USER_EMAIL, BOT_USER_NAME } from "./commit";
import { createGitRunner, GitCommandError, type GitRunner } from "./git";

/** Never published, whatever `exclude` says */
const ALWAYS_EXCLUDED = [".git", "node_modules"];

/**
 * Deployment options
 */
export interface DeployOptions {
  /** Directory whose contents become the branch content */
  publishDir: string;
  publishBranch: string;
  /** Top-level names in `publishDir` left out of the branch */
  exclude?: string[];
  message: string;
  /** Commit the published content was built from */
  sourceSha?: string;
  token: string;
  owner: string;
  repo: string;
  /** Defaults to https://github.com */
  serverUrl?: string;
  /** Creates the git runner for the temp work tree */
  createGit?: (cwd: string) => GitRunner;
}

/**
 * Result of a deployment
 */
export interface DeployResult {
  status: "deployed" | "unchanged";
  sha?: string;
}

/**
 * Builds the authenticated HTTPS remote for the repository.
 */
export function remoteUrl(
  serverUrl: string,
  owner: string,
  repo: string,
  token: string,
): string {
  const url = new URL(`${serverUrl.replace(/\/$/, "")}/${owner}/${repo}.git`);
  url.username = "x-access-token";
  url.password = token;
  return url.toString();
}

/**
 * Removes everything in `dir` except the `.git` directory.
 */
export async function clearWorkTree(dir: string): Promise<void> {
  const entries = await fs.readdir(dir);
  for (const entry of entries) {
    if (entry === ".git") continue;
    await fs.rm(path.join(dir, entry), { recursive: true, force: true });
  }
}

/**
 * Copies the top-level entries of `source` into `target`, skipping excluded
 * names.
 *
 * @returns The copied entry names, sorted
 */
export async function copyPublishDir(
  source: string,
  target: string,
  exclude: string[] = [],
): Promise<string[]> {
  const skipped = new Set([...ALWAYS_EXCLUDED, ...exclude]);
  const entries = (await fs.readdir(source)).filter((e) => !skipped.has(e));
  entries.sort();

  for (const entry of entries) {
    await fs.cp(path.join(source, entry), path.join(target, entry), {
      recursive: true,
    });
  }
  return entries;
}

async function checkoutBranch(
  git: GitRunner,
  branch: string,
  remote: string,
): Promise<void> {
  const cloneArgs = ["clone", "--depth", "1", "--single-branch", "--branch", branch, remote, "."];
  const clone = await git.exec(cloneArgs, { ignoreReturnCode: true });
  if (clone.exitCode === 0) {
    core.info(`Checked out existing branch ${branch}`);
    return;
  }
  if (!/Remote branch .* not found/.test(clone.stderr)) {
    throw new GitCommandError(cloneArgs, clone);
  }

  core.info(`Branch ${branch} does not exist yet; creating it`);
  await git.exec(["init"]);
  await git.exec(["checkout", "--orphan", branch]);
  await git.exec(["remote", "add", "origin", remote]);
}

/**
 * Publishes `publishDir` to `publishBranch`.
 *
 * @throws GitCommandError when cloning, committing or pushing fails
 */
export async function deployToBranch(
  options: DeployOptions,
): Promise<DeployResult> {
  const createGit = options.createGit ?? createGitRunner;
  const publishDir = path.resolve(options.publishDir);
  const remote = remoteUrl(
    options.serverUrl ?? "https://github.com",
    options.owner,
    options.repo,
    options.token,
  );

  core.info(
    `Deploying ${publishDir} to ${options.owner}/${options.repo}@${options.publishBranch}`,
  );

  const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "dashboard-publish-"));
  try {
    const git = createGit(workDir);
    await checkoutBranch(git, options.publishBranch, remote);

    await clearWorkTree(workDir);
    const copied = await copyPublishDir(publishDir, workDir, options.exclude);
    await fs.writeFile(path.join(workDir, ".nojekyll"), "");
    core.debug(`Published entries: ${copied.join(", ")}`);

    await git.exec(["config", "user.name", BOT_USER_NAME]);
    await git.exec(["config", "user.email", BOT_USER_EMAIL]);
    await git.exec(["add", "--all"]);

    const diff = await git.exec(["diff", "--staged", "--quiet"], {
      ignoreReturnCode: true,
    });
    if (diff.exitCode === 0) {
      core.info(`${options.publishBranch} is up to date; nothing to deploy`);
      return { status: "unchanged" };
    }
    if (diff.exitCode !== 1) {
      throw new GitCommandError(["diff"], diff);
    }

    const message = options.sourceSha
      ? `${options.message}\n\nSource: ${options.sourceSha}`
      : options.message;
    await git.exec(["commit", "-m", message]);
    const sha = (await git.exec(["rev-parse", "HEAD"])).stdout.trim();
    await git.exec(["push", "origin", options.publishBranch]);

    core.info(`Deployed ${options.publishBranch} at ${sha}`);
    return { status: "deployed", sha };
  } finally {
    await fs.rm(workDir, { recursive: true, force: true });
  }
}
