/**
 * Fixed-delay retry for transient failures.
 */

import * as core from "@actions/core";

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Extra attempts after the first one */
  retries?: number;
  /** Delay between attempts in milliseconds */
  delayMs?: number;
  /** Decides whether an error is worth another attempt */
  isRetryable?: (error: unknown) => boolean;
}

const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  retries: 0,
  delayMs: 2000,
  isRetryable: () => true,
};

/**
 * Sleeps for the specified duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Formats a duration in milliseconds for display.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  return `${minutes}m ${remainingSeconds.toFixed(0)}s`;
}

/**
 * Runs `fn`, retrying retryable failures. The last error is rethrown.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = {},
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= cfg.retries || !cfg.isRetryable(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      core.warning(
        `${message}. Retrying in ${formatDuration(cfg.delayMs)} (${attempt + 1}/${cfg.retries})...`,
      );
      await sleep(cfg.delayMs);
    }
  }
}
