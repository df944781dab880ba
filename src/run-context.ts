/**
 * Workflow run context and artifact fingerprint.
 *
 * The context identifies which commit and run produced a dashboard; it is
 * logged at start-up and referenced from the deploy commit. The content hash
 * lets callers compare two generated dashboards without diffing them.
 */

import * as crypto from 'crypto';
import * as github from '@actions/github';

/**
 * Context information of the current workflow run.
 */
export interface RunContext {
  owner: string;
  repo: string;
  sha: string;
  ref: string;
  workflow: string;
  job: string;
  runId: number;
  runAttempt: number;
  serverUrl: string;
}

/**
 * Gets the current run context.
 *
 * Owner and repo come from GITHUB_REPOSITORY; they are empty outside of a
 * workflow run instead of throwing like `context.repo` does.
 */
export function getRunContext(): RunContext {
  const context = github.context;
  const [owner = '', repo = ''] = (process.env.GITHUB_REPOSITORY ?? '').split('/');

  return {
    owner,
    repo,
    sha: context.sha,
    ref: context.ref,
    workflow: context.workflow,
    job: context.job,
    runId: context.runId,
    runAttempt: context.runAttempt,
    serverUrl: context.serverUrl,
  };
}

/**
 * Fingerprints generated content.
 *
 * The format is: sha256:<16-char-hex-prefix>
 */
export function contentHash(content: string): string {
  const hash = crypto
    .createHash('sha256')
    .update(content)
    .digest('hex')
    .substring(0, 16);

  return `sha256:${hash}`;
}
