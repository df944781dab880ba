/**
 * Sheet Dashboard Action - Main Entry Point
 *
 * Regenerates a static HTML dashboard from a Google Sheet and publishes it.
 *
 * Flow:
 * 1. Fetch the sheet rows with an API key
 * 2. Aggregate them into summary counts, chart series and tables
 * 3. Render index.html and write it into the workspace
 * 4. Commit it back to the branch when it changed
 * 5. Publish the workspace to the static hosting branch
 * 6. Set outputs (rows, participants, content-hash, committed, commit-sha,
 *    deploy-status, duration-seconds)
 */

import * as core from "@actions/core";
import * as fs from "fs/promises";
import * as path from "path";
import { aggregateRows } from "./aggregate";
import { loadColumnMapping } from "./column-mapping";
import { commitArtifact, type CommitResult } from "./commit";
import { deployToBranch } from "./deploy";
import { createGitRunner } from "./git";
import { renderDashboard } from "./render";
import { contentHash, getRunContext, type RunContext } from "./run-context";
import { DEFAULT_SHEETS_API_URL, SheetsClient } from "./sheets-client";

/**
 * Action inputs from action.yml
 */
export interface ActionInputs {
  apiKey: string;
  spreadsheetId: string;
  sheetName: string;
  apiUrl: string;
  fetchRetries: number;
  columnMapping: string;
  outputFile: string;
  backgroundImage: string;
  title: string;
  subtitle: string;
  footer: string;
  commit: boolean;
  commitMessage: string;
  deploy: boolean;
  publishDir: string;
  publishBranch: string;
  deployCommitMessage: string;
  excludeAssets: string[];
  githubToken: string;
  dryRun: boolean;
  workspace: string;
}

export type DeployStatus = "deployed" | "unchanged" | "skipped";

/**
 * Reads a boolean input, falling back to `defaultValue` when it is unset.
 * `core.getBooleanInput` throws on an empty value.
 */
function getBooleanInput(name: string, defaultValue: boolean): boolean {
  if (core.getInput(name) === "") {
    return defaultValue;
  }
  return core.getBooleanInput(name);
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

/**
 * Parses and validates action inputs.
 */
export function getInputs(): ActionInputs {
  const apiKey = core.getInput("api-key") || process.env.GOOGLE_SHEET_API_KEY || "";
  const spreadsheetId =
    core.getInput("spreadsheet-id") || process.env.GOOGLE_SHEET_ID || "";
  const fetchRetriesInput = core.getInput("fetch-retries") || "0";
  const fetchRetries = /^\d+$/.test(fetchRetriesInput)
    ? parseInt(fetchRetriesInput, 10)
    : Number.NaN;
  const dryRun = getBooleanInput("dry-run", false);
  const deploy = getBooleanInput("deploy", true);
  const githubToken = core.getInput("github-token") || process.env.GITHUB_TOKEN || "";

  // Validate inputs
  if (!apiKey) {
    throw new Error("api-key is required (or set GOOGLE_SHEET_API_KEY)");
  }

  if (!spreadsheetId) {
    throw new Error("spreadsheet-id is required (or set GOOGLE_SHEET_ID)");
  }

  if (Number.isNaN(fetchRetries) || fetchRetries < 0 || fetchRetries > 5) {
    throw new Error("fetch-retries must be between 0 and 5");
  }

  if (deploy && !dryRun && !githubToken) {
    throw new Error("github-token is required when deploy is enabled");
  }

  return {
    apiKey,
    spreadsheetId,
    sheetName: core.getInput("sheet-name") || "dadus",
    apiUrl: core.getInput("api-url") || DEFAULT_SHEETS_API_URL,
    fetchRetries,
    columnMapping: core.getInput("column-mapping"),
    outputFile: core.getInput("output-file") || "index.html",
    backgroundImage: core.getInput("background-image"),
    title: core.getInput("title"),
    subtitle: core.getInput("subtitle"),
    footer: core.getInput("footer"),
    commit: getBooleanInput("commit", true),
    commitMessage: core.getInput("commit-message") || "Auto-generate dashboard",
    deploy,
    publishDir: core.getInput("publish-dir") || "./",
    publishBranch: core.getInput("publish-branch") || "gh-pages",
    deployCommitMessage:
      core.getInput("deploy-commit-message") ||
      "Deploy dashboard updates [skip ci]",
    excludeAssets: splitList(core.getInput("exclude-assets") || ".github"),
    githubToken,
    dryRun,
    workspace: process.env.GITHUB_WORKSPACE || process.cwd(),
  };
}

/**
 * Logs context information for debugging.
 */
function logContext(inputs: ActionInputs, context: RunContext): void {
  core.info("Sheet Dashboard Action");
  core.info("======================");
  core.info(`Spreadsheet: ${inputs.spreadsheetId}`);
  core.info(`Sheet: ${inputs.sheetName}`);
  core.info(`Output: ${inputs.outputFile}`);
  core.info(`Commit: ${inputs.commit}`);
  core.info(`Deploy: ${inputs.deploy} (${inputs.publishDir} -> ${inputs.publishBranch})`);
  core.info(`Dry run: ${inputs.dryRun}`);
  core.info("");
  core.info("GitHub Context:");
  core.info(`  Repository: ${context.owner}/${context.repo}`);
  core.info(`  Ref: ${context.ref}`);
  core.info(`  SHA: ${context.sha}`);
  core.info(`  Workflow: ${context.workflow}`);
  core.info(`  Run ID: ${context.runId}`);
  core.info(`  Run Attempt: ${context.runAttempt}`);
  core.info("");
}

async function writeSummary(rows: {
  participants: number;
  hash: string;
  committed: boolean;
  deployStatus: DeployStatus;
}): Promise<void> {
  await core.summary
    .addHeading("Dashboard update")
    .addTable([
      [
        { data: "Participants", header: true },
        { data: "Content hash", header: true },
        { data: "Committed", header: true },
        { data: "Deploy", header: true },
      ],
      [
        String(rows.participants),
        rows.hash,
        rows.committed ? "yes" : "no",
        rows.deployStatus,
      ],
    ])
    .write();
}

/**
 * Main action execution.
 */
export async function run(): Promise<void> {
  const startTime = Date.now();

  try {
    // Parse inputs
    const inputs = getInputs();
    core.setSecret(inputs.apiKey);
    if (inputs.githubToken) {
      core.setSecret(inputs.githubToken);
    }

    const context = getRunContext();
    logContext(inputs, context);

    const mapping = loadColumnMapping(inputs.columnMapping);
    const client = new SheetsClient(inputs.apiUrl, inputs.apiKey, {
      retries: inputs.fetchRetries,
    });

    const rows = await client.fetchRows(inputs.spreadsheetId, inputs.sheetName);
    const data = aggregateRows(rows, mapping);
    const html = renderDashboard(data, {
      title: inputs.title,
      subtitle: inputs.subtitle,
      footer: inputs.footer,
      backgroundImage: inputs.backgroundImage,
    });

    const outputPath = path.resolve(inputs.workspace, inputs.outputFile);
    await fs.writeFile(outputPath, html, "utf8");
    const hash = contentHash(html);
    core.info(`Dashboard written to ${outputPath} (${hash})`);

    core.setOutput("rows", rows.length);
    core.setOutput("participants", data.detailedRecords.length);
    core.setOutput("content-hash", hash);

    let commitResult: CommitResult = { committed: false };
    let deployStatus: DeployStatus = "skipped";

    if (inputs.dryRun) {
      core.info("Dry run mode enabled - skipping commit and deploy");
    } else {
      if (inputs.commit) {
        commitResult = await commitArtifact(createGitRunner(inputs.workspace), {
          files: [path.relative(inputs.workspace, outputPath)],
          message: inputs.commitMessage,
        });
      }

      if (inputs.deploy) {
        const result = await deployToBranch({
          publishDir: path.resolve(inputs.workspace, inputs.publishDir),
          publishBranch: inputs.publishBranch,
          exclude: inputs.excludeAssets,
          message: inputs.deployCommitMessage,
          sourceSha: commitResult.sha ?? context.sha,
          token: inputs.githubToken,
          owner: context.owner,
          repo: context.repo,
          serverUrl: context.serverUrl,
        });
        deployStatus = result.status;
      }
    }

    core.setOutput("committed", commitResult.committed);
    if (commitResult.sha) {
      core.setOutput("commit-sha", commitResult.sha);
    }
    core.setOutput("deploy-status", deployStatus);

    await writeSummary({
      participants: data.detailedRecords.length,
      hash,
      committed: commitResult.committed,
      deployStatus,
    });

    core.setOutput(
      "duration-seconds",
      Math.round((Date.now() - startTime) / 1000),
    );
  } catch (error) {
    // Handle errors
    const message = error instanceof Error ? error.message : String(error);
    core.setFailed(message);

    // Set duration even on failure
    core.setOutput(
      "duration-seconds",
      Math.round((Date.now() - startTime) / 1000),
    );
  }
}
