export {
  resolveDate,
  resolveDateRange,
  currentDate,
  resolveTimeZone,
  DateTemplateError,
} from "./dateTemplate";
export type { ResolveDateOptions } from "./dateTemplate";
