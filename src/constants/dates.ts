/**
 * Date template constants
 */

/**
 * Time zone used to decide what "today" is when no reference date is given
 */
export const DEFAULT_DATE_TEMPLATE_TZ = "Asia/Tokyo";

export const MS_PER_DAY = 86_400_000;
