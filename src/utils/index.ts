/**
 * Utils barrel exports
 */

export * from "./json";
export * from "./dbErrors";
export * from "./privateKey";
export * from "./time";
