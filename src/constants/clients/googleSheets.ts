/**
 * Google Sheets API client constants
 */

/**
 * Google Sheets API base URL
 */
export const GOOGLE_SHEETS_BASE_URL = "https://sheets.googleapis.com/v4";

/**
 * Value input option for raw (unformatted) data
 */
export const GOOGLE_SHEETS_VALUE_INPUT_OPTION_RAW = "RAW";

/**
 * Insert data option: insert new rows
 */
export const GOOGLE_SHEETS_INSERT_DATA_OPTION_INSERT_ROWS = "INSERT_ROWS";

/**
 * Extracts the spreadsheet ID from a sheet URL
 */
export const GOOGLE_SHEETS_URL_ID_PATTERN = /\/spreadsheets\/d\/([a-zA-Z0-9-_]+)/;
