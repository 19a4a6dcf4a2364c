export * from "./logger";
export * from "./params";
export * from "./dates";
export * from "./pipeline";
export * from "./jobs";
export * from "./errors";
export * from "./cli";
// Client constants are imported from "@/constants/clients/*" directly.
