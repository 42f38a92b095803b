import "dotenv/config";
import pino from "pino";

/**
 * Picks the pino level: an explicit LOG_LEVEL wins, otherwise the level follows NODE_ENV.
 */
export const resolveLogLevel = (source: NodeJS.ProcessEnv): string => {
  if (source.LOG_LEVEL) {
    return source.LOG_LEVEL;
  }
  if (source.NODE_ENV === "production") {
    return "info";
  }

  return source.NODE_ENV === "test" ? "silent" : "debug";
};

export const logger = pino({
  name: "market-explorer",
  level: resolveLogLevel(process.env),
});
