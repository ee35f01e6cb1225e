export interface LogContext {
  userId?: string;
  phase?: string;
  timestamp?: string;
}

export type LogEvent =
  | "LOG.WEEKLY_PLAN_GENERATED"
  | "LOG.RECIPES_LOADED"
  | "LOG.RECIPE_SKIPPED"
  | "LOG.RECIPE_ROTATION"
  | "LOG.RECIPE_HISTORY_RECORDED"
  | "LOG.RECOMMENDATIONS_FALLBACK"
  | "LOG.HISTORY_UNAVAILABLE"
  | "LOG.EVENTS_REGISTERED";

type LogLevel = "INFO" | "WARN" | "ERROR";

const write = (level: LogLevel, event: LogEvent, payload: Record<string, unknown>, context: LogContext) => {
  const entry = JSON.stringify({
    level,
    event,
    ...context,
    timestamp: context.timestamp || new Date().toISOString(),
    payload,
  });

  if (level === "ERROR") {
    console.error(entry);
  } else if (level === "WARN") {
    console.warn(entry);
  } else {
    console.log(entry);
  }
};

export const logger = {
  info: (event: LogEvent, payload: Record<string, unknown>, context: LogContext = {}) =>
    write("INFO", event, payload, context),
  warn: (event: LogEvent, payload: Record<string, unknown>, context: LogContext = {}) =>
    write("WARN", event, payload, context),
  error: (event: LogEvent, payload: Record<string, unknown>, context: LogContext = {}) =>
    write("ERROR", event, payload, context),
};
