/**
 * Git command runner backed by @actions/exec.
 *
 * The commit and deploy steps only talk to this interface so they can be
 * exercised against an in-memory fake.
 */

import * as exec from "@actions/exec";

/**
 * Result of one git invocation
 */
export interface GitResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface GitExecOptions {
  /** Return non-zero exit codes instead of throwing */
  ignoreReturnCode?: boolean;
}

export interface GitRunner {
  /** Working directory the commands run in */
  readonly cwd: string;
  exec(args: string[], options?: GitExecOptions): Promise<GitResult>;
}

export class GitCommandError extends Error {
  readonly exitCode: number;
  readonly stderr: string;

  constructor(args: string[], result: GitResult) {
    super(
      `git ${args[0] ?? ""} failed with exit code ${result.exitCode}: ${result.stderr.trim()}`,
    );
    this.name = "GitCommandError";
    this.exitCode = result.exitCode;
    this.stderr = result.stderr;
  }
}

/**
 * Creates a runner executing `git` in `cwd`. Output is not echoed to the
 * job log; callers log what matters.
 */
export function createGitRunner(cwd: string): GitRunner {
  return {
    cwd,
    async exec(args, options = {}) {
      const result = await exec.getExecOutput("git", args, {
        cwd,
        silent: true,
        ignoreReturnCode: true,
      });
      if (result.exitCode !== 0 && !options.ignoreReturnCode) {
        throw new GitCommandError(args, result);
      }
      return result;
    },
  };
}
