/**
 * CLI constants
 */

export const CLI_NAME = "report-query";

/**
 * Rows printed by human-mode table output
 */
export const HUMAN_TABLE_MAX_ROWS = 20;
