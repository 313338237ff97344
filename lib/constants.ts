export const DEFAULT_MODEL = "openai/gpt-4o-mini";

export const DEFAULT_OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";
export const DEFAULT_OPENCAGE_BASE_URL = "https://api.opencagedata.com/geocode/v1/json";
export const DEFAULT_METEOBLUE_BASE_URL = "https://my.meteoblue.com";

/** meteoblue's basic-day package covers today plus the next six days. */
export const FORECAST_WINDOW_DAYS = 7;

export const INTERPRET_TEMPERATURE = 0;
export const INTERPRET_MAX_TOKENS = 120;
export const REPORT_TEMPERATURE = 0.55;

export const APP_TITLE = "forecast-chat";
