export const CONFIG_FILE = "ping_config.ini";
export const CONFIG_SECTION = "DEFAULT";

export const MAX_RECENT_WINDOWS = 50;
export const MAX_LOG_LINES_BUFFER = 1000;
export const DEFAULT_DURATION_MINUTES = 30;

export const DEBUG = process.env.NODE_ENV === "development" || process.env.DEBUG === "true" || process.argv.includes("--debug") || process.argv.includes("-d");
