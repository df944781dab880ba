/**
 * Google Sheets API Client
 *
 * HTTP client for the read-only Sheets values endpoint:
 * - GET /v4/spreadsheets/:id/values/:range?key=... - Read a sheet range
 *
 * The spreadsheet must be shared as "Anyone with the link can view" since
 * requests are authenticated with an API key only.
 */

import * as core from "@actions/core";
import { withRetry } from "./retry";

/**
 * Values response from the Sheets API
 */
export interface ValueRange {
  range: string;
  majorDimension: "ROWS" | "COLUMNS";
  values?: string[][];
}

/**
 * Error body returned by Google APIs
 */
export interface GoogleApiError {
  error: {
    code: number;
    message: string;
    status?: string;
  };
}

/**
 * Client options
 */
export interface SheetsClientOptions {
  /** Extra attempts on transient failures */
  retries?: number;
  /** Delay between attempts in milliseconds */
  retryDelayMs?: number;
}

/**
 * Raised for any failed Sheets API call. `status` is undefined for network
 * failures that never produced a response.
 */
export class SheetsApiError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "SheetsApiError";
    this.status = status;
  }

  get transient(): boolean {
    return (
      this.status === undefined || this.status === 429 || this.status >= 500
    );
  }
}

export const DEFAULT_SHEETS_API_URL = "https://sheets.googleapis.com";

/**
 * Google Sheets API client
 */
export class SheetsClient {
  private readonly apiUrl: string;
  private readonly apiKey: string;
  private readonly retries: number;
  private readonly retryDelayMs: number;

  constructor(apiUrl: string, apiKey: string, options: SheetsClientOptions = {}) {
    // Normalize API URL (remove trailing slash)
    this.apiUrl = apiUrl.replace(/\/$/, "");
    this.apiKey = apiKey;
    this.retries = options.retries ?? 0;
    this.retryDelayMs = options.retryDelayMs ?? 2000;
  }

  /**
   * Makes a GET request to the Sheets API and parses the JSON body.
   */
  private async request<T>(path: string): Promise<T> {
    const url = `${this.apiUrl}${path}?key=${encodeURIComponent(this.apiKey)}`;
    core.debug(`GET ${this.apiUrl}${path}?key=***`);

    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers: { Accept: "application/json" },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SheetsApiError(`Network or request error: ${message}`);
    }

    const responseText = await response.text();

    if (!response.ok) {
      let errorMessage: string;
      try {
        const errorResponse = JSON.parse(responseText) as GoogleApiError;
        errorMessage = errorResponse.error.message;
      } catch {
        errorMessage = `HTTP ${response.status}: ${responseText}`;
      }

      throw new SheetsApiError(
        `Sheets API request failed: ${errorMessage}`,
        response.status,
      );
    }

    try {
      return JSON.parse(responseText) as T;
    } catch {
      throw new SheetsApiError(
        "Sheets API returned invalid JSON response",
        response.status,
      );
    }
  }

  /**
   * Reads a sheet range and returns the data rows, header row excluded.
   *
   * @param spreadsheetId - The spreadsheet ID from the sheet URL
   * @param range - Sheet name or A1 range
   * @returns Data rows; empty when the sheet holds no rows below the header
   */
  async fetchRows(spreadsheetId: string, range: string): Promise<string[][]> {
    core.info(`Fetching sheet "${range}" from spreadsheet ${spreadsheetId}`);

    const path = `/v4/spreadsheets/${encodeURIComponent(spreadsheetId)}/values/${encodeURIComponent(range)}`;

    let result: ValueRange;
    try {
      result = await withRetry(() => this.request<ValueRange>(path), {
        retries: this.retries,
        delayMs: this.retryDelayMs,
        isRetryable: (error) =>
          error instanceof SheetsApiError && error.transient,
      });
    } catch (error) {
      if (
        error instanceof SheetsApiError &&
        (error.status === 403 || error.status === 404)
      ) {
        core.error(
          "Check that the sheet is shared as 'Anyone with the link can view' " +
            "and that the Google Sheets API is enabled for the API key's project.",
        );
      }
      throw error;
    }

    const values = result.values ?? [];
    if (values.length <= 1) {
      core.info("No data or only headers found in the sheet");
      return [];
    }

    const rows = values.slice(1);
    core.info(`Fetched ${rows.length} rows`);
    return rows;
  }
}
