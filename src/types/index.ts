export * from "./logger";
export * from "./table";
export * from "./params";
export * from "./pipeline";
export * from "./save";
export * from "./jobs";
export * from "./batch";
export * from "./errors";
export * from "./response";
export * from "./clients/http";
// Google API payload types are intentionally NOT exported from the global barrel.
// Import directly from "@/types/clients/google" within src/clients/ and src/save/ only.
