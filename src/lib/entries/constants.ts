export const INTENSITY_VALUES = ["MINIMUM", "LOW", "NORMAL", "HIGH", "MAXIMUM", "INTERVAL"] as const;
export const ENTRY_TYPE_VALUES = ["EXERCISE", "NOTE", "WEIGHT"] as const;
export const COMMENT_MATCH_MODE_VALUES = ["substring", "regex"] as const;
export const SPEED_MODE_VALUES = ["SPEED", "PACE"] as const;

/** Days covered by the default filter, counted back from today. */
export const DEFAULT_FILTER_RANGE_DAYS = 30;
