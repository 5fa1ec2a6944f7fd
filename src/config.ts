import { createLogger, isLogLevel, type Logger, type LogLevel } from "./logging";

const logLevelVariable = "INTERVAL_ALGEBRA_LOG_LEVEL";
const defaultLogLevel: LogLevel = "WARN";

export interface Configuration {
  logLevel: LogLevel;
}

export function loadConfiguration(
  env: Record<string, string | undefined> = process.env,
): Configuration {
  const requested = env[logLevelVariable]?.trim().toUpperCase();
  if (requested === undefined || requested === "") {
    return { logLevel: defaultLogLevel };
  }
  if (!isLogLevel(requested)) {
    createLogger(defaultLogLevel).warn(
      `Invalid ${logLevelVariable} "${requested}"; falling back to ${defaultLogLevel}.`,
    );
    return { logLevel: defaultLogLevel };
  }
  return { logLevel: requested };
}

// Built on first use, so importing the library reads no environment.
let logger: Logger | undefined;

/** The logger the set operations report through. */
export function getLogger(): Logger {
  logger ??= createLogger(loadConfiguration().logLevel);
  return logger;
}

export function setLogLevel(level: LogLevel): void {
  logger = createLogger(level);
}
