/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/jobsRepo";
export * from "./repos/jobLogsRepo";
