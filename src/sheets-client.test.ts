import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as core from "@actions/core";
import { SheetsApiError, SheetsClient } from "./sheets-client";

vi.mock("@actions/core");

const API_URL = "https://sheets.googleapis.com";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("SheetsClient", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.clearAllMocks();
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the rows below the header", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        range: "dadus!A1:C3",
        majorDimension: "ROWS",
        values: [["Timestamp", "Email"], ["t1", "a@example.com"], ["t2"]],
      }),
    );

    const client = new SheetsClient(`${API_URL}/`, "test-key");
    const rows = await client.fetchRows("sheet-123", "dadus");

    expect(rows).toEqual([["t1", "a@example.com"], ["t2"]]);
    expect(fetchMock).toHaveBeenCalledWith(
      "https://sheets.googleapis.com/v4/spreadsheets/sheet-123/values/dadus?key=test-key",
      { method: "GET", headers: { Accept: "application/json" } },
    );
  });

  it("encodes the range", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ range: "x", majorDimension: "ROWS" }));

    await new SheetsClient(API_URL, "test-key").fetchRows("sheet-123", "Form Responses 1");

    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      "https://sheets.googleapis.com/v4/spreadsheets/sheet-123/values/Form%20Responses%201?key=test-key",
    );
  });

  it("returns no rows for a header-only or empty sheet", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ range: "x", majorDimension: "ROWS", values: [["Timestamp"]] }))
      .mockResolvedValueOnce(jsonResponse({ range: "x", majorDimension: "ROWS" }));
    const client = new SheetsClient(API_URL, "test-key");

    expect(await client.fetchRows("sheet-123", "dadus")).toEqual([]);
    expect(await client.fetchRows("sheet-123", "dadus")).toEqual([]);
  });

  it("surfaces Google's error message and the sharing hint", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse(
        { error: { code: 403, message: "The caller does not have permission", status: "PERMISSION_DENIED" } },
        403,
      ),
    );

    const client = new SheetsClient(API_URL, "test-key", { retries: 2, retryDelayMs: 0 });

    await expect(client.fetchRows("sheet-123", "dadus")).rejects.toThrow(
      "Sheets API request failed: The caller does not have permission",
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(core.error).toHaveBeenCalledTimes(1);
  });

  it("falls back to the raw body for non-JSON errors", async () => {
    fetchMock.mockResolvedValueOnce(new Response("Bad Gateway", { status: 502 }));

    const error = await new SheetsClient(API_URL, "test-key")
      .fetchRows("sheet-123", "dadus")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SheetsApiError);
    expect(error).toMatchObject({
      message: "Sheets API request failed: HTTP 502: Bad Gateway",
      status: 502,
    });
  });

  it("retries transient failures", async () => {
    fetchMock
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(new Response("busy", { status: 503 }))
      .mockResolvedValueOnce(
        jsonResponse({ range: "x", majorDimension: "ROWS", values: [["h"], ["r1"]] }),
      );

    const client = new SheetsClient(API_URL, "test-key", { retries: 2, retryDelayMs: 0 });

    expect(await client.fetchRows("sheet-123", "dadus")).toEqual([["r1"]]);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(core.warning).toHaveBeenCalledTimes(2);
  });

  it("fails on the first error without retries", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(
      new SheetsClient(API_URL, "test-key").fetchRows("sheet-123", "dadus"),
    ).rejects.toThrow("Network or request error: fetch failed");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("rejects an invalid JSON body", async () => {
    fetchMock.mockResolvedValueOnce(new Response("<html>", { status: 200 }));

    await expect(
      new SheetsClient(API_URL, "test-key").fetchRows("sheet-123", "dadus"),
    ).rejects.toThrow("Sheets API returned invalid JSON response");
  });
});
