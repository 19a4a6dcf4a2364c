export {
  inferColumnType,
  columnValues,
  columnNames,
  hasColumn,
  getColumn,
  createTable,
  withRows,
  reinferColumns,
} from "./resultTable";
export {
  csvToTable,
  tableToCsv,
  readCsvFile,
  writeCsvFile,
  appendCsvFile,
  parseCell,
  parseTypedCell,
} from "./csv";
export { summarizeTable, quantile } from "./summary";
