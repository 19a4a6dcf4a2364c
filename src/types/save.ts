/**
 * Save target type definitions
 */

import type { SaveMode, SaveTarget } from "./params";

export type SaveResult = {
  target: SaveTarget;
  mode: SaveMode;
  /** File path, sheet URL + tab, or fully qualified table */
  destination: string;
  rows_written: number;
};
