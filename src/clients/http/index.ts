/**
 * HTTP client public API (request shapes live in @/types)
 */

export { httpRequest } from "./httpClient";
export { HttpError } from "./httpError";
