/**
 * GoogleSheetsClient: API client for Google Sheets
 *
 * Provides primitive read/write operations on one spreadsheet.
 * Authentication comes from a shared AccessTokenProvider; transport, retries
 * and timeouts come from the project HTTP client.
 */

import type { HttpRequestFn, HttpRequest } from "@/types";
import type {
  GoogleSheetsConfig,
  SheetAppendResult,
  SheetCellValue,
  SheetReadResult,
  SheetsWriter,
  SheetWriteResult,
} from "@/types/clients/googleSheets";
import type { AccessTokenProvider } from "@/types/clients/google";
import {
  GOOGLE_SHEETS_BASE_URL,
  GOOGLE_SHEETS_INSERT_DATA_OPTION_INSERT_ROWS,
  GOOGLE_SHEETS_URL_ID_PATTERN,
  GOOGLE_SHEETS_VALUE_INPUT_OPTION_RAW,
} from "@/constants/clients/googleSheets";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import * as logger from "@/logger";

/**
 * Google Sheets API error
 */
export class GoogleSheetsError extends Error {
  constructor(
    message: string,
    public readonly spreadsheetId: string,
    public readonly range: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "GoogleSheetsError";
  }
}

/**
 * Extract the spreadsheet ID from a sheet URL (a bare ID is returned as is)
 *
 * @throws Error when the value is neither a sheet URL nor an ID
 */
export function spreadsheetIdFromUrl(sheetUrl: string): string {
  const match = GOOGLE_SHEETS_URL_ID_PATTERN.exec(sheetUrl);
  if (match?.[1]) {
    return match[1];
  }
  if (/^[a-zA-Z0-9-_]+$/.test(sheetUrl)) {
    return sheetUrl;
  }
  throw new Error(`Cannot extract a spreadsheet ID from sheet_url: ${sheetUrl}`);
}

type ValuesResponse = {
  range?: string;
  values?: SheetCellValue[][];
};

type UpdateResponse = Partial<SheetWriteResult>;

type AppendResponse = {
  tableRange?: string;
  updates?: Partial<SheetWriteResult>;
};

function toWriteResult(data: Partial<SheetWriteResult> | undefined): SheetWriteResult {
  return {
    updatedRange: data?.updatedRange ?? "",
    updatedRows: data?.updatedRows ?? 0,
    updatedColumns: data?.updatedColumns ?? 0,
    updatedCells: data?.updatedCells ?? 0,
  };
}

/**
 * Google Sheets client implementation
 */
export class GoogleSheetsClient implements SheetsWriter {
  private readonly spreadsheetId: string;
  private readonly auth: AccessTokenProvider;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: GoogleSheetsConfig) {
    if (!config.spreadsheetId) {
      throw new Error("Google Sheets configuration missing: spreadsheetId is required");
    }
    this.spreadsheetId = config.spreadsheetId;
    this.auth = config.auth;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;

    logger.debug("GoogleSheetsClient initialized", {
      spreadsheetId: this.spreadsheetId,
    });
  }

  private valuesUrl(range: string, suffix = ""): string {
    return `${GOOGLE_SHEETS_BASE_URL}/spreadsheets/${this.spreadsheetId}/values/${encodeURIComponent(range)}${suffix}`;
  }

  /**
   * Make an authenticated API request, wrapping failures in GoogleSheetsError
   */
  private async apiRequest<T>(
    range: string,
    action: string,
    req: Omit<HttpRequest, "headers">,
  ): Promise<T> {
    const token = await this.auth.getAccessToken();
    try {
      return await this.httpRequest<T>({
        ...req,
        headers: { Authorization: `Bearer ${token}` },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to ${action} Google Sheets range`, {
        spreadsheetId: this.spreadsheetId,
        range,
        error: message,
      });
      throw new GoogleSheetsError(`Google Sheets ${action} failed: ${message}`, this.spreadsheetId, range, {
        cause: error,
      });
    }
  }

  /**
   * Read values from a range in the spreadsheet
   *
   * @param range - A1 notation range (e.g., "data!A1:D10")
   */
  async readRange(range: string): Promise<SheetReadResult> {
    logger.debug("Reading Google Sheets range", { spreadsheetId: this.spreadsheetId, range });

    const response = await this.apiRequest<ValuesResponse>(range, "read", {
      method: "GET",
      url: this.valuesUrl(range),
    });
    return { range: response.range ?? range, values: response.values ?? [] };
  }

  /**
   * Clear every value in a range
   */
  async clearRange(range: string): Promise<void> {
    logger.debug("Clearing Google Sheets range", { spreadsheetId: this.spreadsheetId, range });

    await this.apiRequest<unknown>(range, "clear", {
      method: "POST",
      url: this.valuesUrl(range, ":clear"),
      json: {},
    });
  }

  /**
   * Update values in a specific range (overwrites existing data)
   *
   * @param values - Rows of values to write
   * @param range - A1 notation range (e.g., "data!A1")
   */
  async updateRange(values: SheetCellValue[][], range: string): Promise<SheetWriteResult> {
    logger.debug("Updating Google Sheets range", {
      spreadsheetId: this.spreadsheetId,
      range,
      rowCount: values.length,
    });

    const response = await this.apiRequest<UpdateResponse>(range, "update", {
      method: "PUT",
      url: this.valuesUrl(range),
      query: { valueInputOption: GOOGLE_SHEETS_VALUE_INPUT_OPTION_RAW },
      json: { values },
    });
    return toWriteResult(response);
  }

  /**
   * Append rows after the last row of a range
   *
   * @param values - Rows of values to append
   * @param range - A1 notation range (e.g., "data!A1")
   */
  async appendRows(values: SheetCellValue[][], range: string): Promise<SheetAppendResult> {
    logger.debug("Appending rows to Google Sheets", {
      spreadsheetId: this.spreadsheetId,
      range,
      rowCount: values.length,
    });

    const response = await this.apiRequest<AppendResponse>(range, "append", {
      method: "POST",
      url: this.valuesUrl(range, ":append"),
      query: {
        valueInputOption: GOOGLE_SHEETS_VALUE_INPUT_OPTION_RAW,
        insertDataOption: GOOGLE_SHEETS_INSERT_DATA_OPTION_INSERT_ROWS,
      },
      json: { values },
    });
    return {
      tableRange: response.tableRange ?? range,
      updates: toWriteResult(response.updates),
    };
  }
}
