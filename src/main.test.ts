import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import * as core from "@actions/core";
import { commitArtifact } from "./commit";
import { deployToBranch } from "./deploy";
import { createGitRunner } from "./git";
import { getInputs, run } from "./main";

vi.mock("@actions/core", () => {
  const summary = {
    addHeading: vi.fn(),
    addTable: vi.fn(),
    write: vi.fn(),
  };
  summary.addHeading.mockReturnValue(summary);
  summary.addTable.mockReturnValue(summary);
  summary.write.mockResolvedValue(summary);
  return {
    getInput: vi.fn(),
    getBooleanInput: vi.fn(),
    setOutput: vi.fn(),
    setFailed: vi.fn(),
    setSecret: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
    summary,
  };
});

vi.mock("@actions/github", () => ({
  context: {
    sha: "abc123",
    ref: "refs/heads/main",
    workflow: "Auto-generate and Deploy Dashboard",
    job: "generate_and_deploy",
    runId: 42,
    runAttempt: 1,
    serverUrl: "https://github.com",
  },
}));

vi.mock("./commit");
vi.mock("./deploy");
vi.mock("./git");

const SHEET_VALUES = {
  range: "dadus!A1:J3",
  majorDimension: "ROWS",
  values: [
    ["Timestamp", "Email", "Munisípiu", "Nivel", "Eskola", "Dixiplina", "Tópiku", "Naran", "Seksu", "Idade"],
    ["2025-05-01", "a@example.com", "Dili", "Primária", "EBF Comoro", "Matemátika", "Robot", "Ana", "Feto", "12"],
    ["2025-05-02", "b@example.com", "Baucau", "Sekundária", "ESG Baucau", "Siénsia", "Solar", "Beto", "Mane", "15"],
  ],
};

describe("Sheet Dashboard Action", () => {
  let workspace: string;
  let inputs: Record<string, string>;
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.clearAllMocks();
    workspace = mkdtempSync(join(tmpdir(), "action-test-"));
    vi.stubEnv("GITHUB_WORKSPACE", workspace);
    vi.stubEnv("GITHUB_REPOSITORY", "octo/dash");
    vi.stubEnv("GITHUB_TOKEN", "");
    vi.stubEnv("GOOGLE_SHEET_API_KEY", "");
    vi.stubEnv("GOOGLE_SHEET_ID", "");

    inputs = { "api-key": "test-key", "spreadsheet-id": "sheet-123" };
    vi.mocked(core.getInput).mockImplementation((name) => inputs[name] ?? "");
    vi.mocked(core.getBooleanInput).mockImplementation(
      (name) => inputs[name] === "true",
    );

    fetchMock.mockReset();
    fetchMock.mockImplementation(async () => new Response(JSON.stringify(SHEET_VALUES)));
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
    rmSync(workspace, { recursive: true, force: true });
  });

  describe("getInputs", () => {
    it("applies defaults", () => {
      inputs["dry-run"] = "true";

      expect(getInputs()).toMatchObject({
        sheetName: "dadus",
        apiUrl: "https://sheets.googleapis.com",
        fetchRetries: 0,
        outputFile: "index.html",
        commit: true,
        commitMessage: "Auto-generate dashboard",
        deploy: true,
        publishDir: "./",
        publishBranch: "gh-pages",
        deployCommitMessage: "Deploy dashboard updates [skip ci]",
        excludeAssets: [".github"],
        workspace,
      });
    });

    it("falls back to the secret environment variables", () => {
      inputs = { "dry-run": "true" };
      vi.stubEnv("GOOGLE_SHEET_API_KEY", "env-key");
      vi.stubEnv("GOOGLE_SHEET_ID", "env-sheet");

      expect(getInputs()).toMatchObject({ apiKey: "env-key", spreadsheetId: "env-sheet" });
    });

    it("splits the excluded assets", () => {
      inputs["dry-run"] = "true";
      inputs["exclude-assets"] = " .github, src ,,dist";

      expect(getInputs().excludeAssets).toEqual([".github", "src", "dist"]);
    });

    it("rejects out-of-range retries", () => {
      inputs["dry-run"] = "true";
      inputs["fetch-retries"] = "9";

      expect(() => getInputs()).toThrow("fetch-retries must be between 0 and 5");
    });

    it.each(["2.5", "3abc", "-1", " "])("rejects a non-integer retry count %j", (value) => {
      inputs["dry-run"] = "true";
      inputs["fetch-retries"] = value;

      expect(() => getInputs()).toThrow("fetch-retries must be between 0 and 5");
    });

    it("accepts a whole retry count", () => {
      inputs["dry-run"] = "true";
      inputs["fetch-retries"] = "3";

      expect(getInputs().fetchRetries).toBe(3);
    });

    it("requires a token to deploy", () => {
      expect(() => getInputs()).toThrow("github-token is required when deploy is enabled");
    });
  });

  it("generates the dashboard without committing in dry-run mode", async () => {
    inputs["dry-run"] = "true";

    await run();

    expect(core.setFailed).not.toHaveBeenCalled();
    const html = readFileSync(join(workspace, "index.html"), "utf8");
    expect(html).toContain("const dashboardData = ");
    expect(core.setSecret).toHaveBeenCalledWith("test-key");
    expect(core.setOutput).toHaveBeenCalledWith("rows", 2);
    expect(core.setOutput).toHaveBeenCalledWith("participants", 2);
    expect(core.setOutput).toHaveBeenCalledWith("committed", false);
    expect(core.setOutput).toHaveBeenCalledWith("deploy-status", "skipped");
    expect(commitArtifact).not.toHaveBeenCalled();
    expect(deployToBranch).not.toHaveBeenCalled();
  });

  it("commits the dashboard and deploys the workspace", async () => {
    inputs["github-token"] = "test-token";
    vi.mocked(commitArtifact).mockResolvedValue({ committed: true, sha: "c0ffee" });
    vi.mocked(deployToBranch).mockResolvedValue({ status: "deployed", sha: "d00d" });

    await run();

    expect(core.setFailed).not.toHaveBeenCalled();
    expect(createGitRunner).toHaveBeenCalledWith(workspace);
    expect(commitArtifact).toHaveBeenCalledWith(undefined, {
      files: ["index.html"],
      message: "Auto-generate dashboard",
    });
    expect(deployToBranch).toHaveBeenCalledWith({
      publishDir: workspace,
      publishBranch: "gh-pages",
      exclude: [".github"],
      message: "Deploy dashboard updates [skip ci]",
      sourceSha: "c0ffee",
      token: "test-token",
      owner: "octo",
      repo: "dash",
      serverUrl: "https://github.com",
    });
    expect(core.setSecret).toHaveBeenCalledWith("test-token");
    expect(core.setOutput).toHaveBeenCalledWith("committed", true);
    expect(core.setOutput).toHaveBeenCalledWith("commit-sha", "c0ffee");
    expect(core.setOutput).toHaveBeenCalledWith("deploy-status", "deployed");
  });

  it("deploys the checked-out commit when the dashboard is unchanged", async () => {
    inputs["github-token"] = "test-token";
    vi.mocked(commitArtifact).mockResolvedValue({ committed: false });
    vi.mocked(deployToBranch).mockResolvedValue({ status: "unchanged" });

    await run();

    expect(deployToBranch).toHaveBeenCalledWith(
      expect.objectContaining({ sourceSha: "abc123" }),
    );
    expect(core.setOutput).toHaveBeenCalledWith("deploy-status", "unchanged");
    expect(core.setOutput).not.toHaveBeenCalledWith("commit-sha", expect.anything());
  });

  it("fails the run when the api key is missing", async () => {
    delete inputs["api-key"];

    await run();

    expect(core.setFailed).toHaveBeenCalledWith(
      "api-key is required (or set GOOGLE_SHEET_API_KEY)",
    );
    expect(core.setOutput).toHaveBeenCalledWith("duration-seconds", expect.any(Number));
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("fails the run when the sheet cannot be read", async () => {
    inputs["dry-run"] = "true";
    fetchMock.mockImplementation(
      async () =>
        new Response(JSON.stringify({ error: { code: 404, message: "Requested entity was not found." } }), {
          status: 404,
        }),
    );

    await run();

    expect(core.setFailed).toHaveBeenCalledWith(
      "Sheets API request failed: Requested entity was not found.",
    );
    expect(core.setOutput).not.toHaveBeenCalledWith("rows", expect.anything());
  });
});
