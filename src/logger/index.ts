export { debug, info, warn, error, withContext, formatLine } from "./logger";
