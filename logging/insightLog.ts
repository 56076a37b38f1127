/**
 * Structured logging for insight pipeline and server events.
 *
 * Emits one JSON line per event for log aggregation.
 */

export type InsightLogEvent =
  | "server.started"
  | "http.request"
  | "http.request.failed"
  | "insight.cache.hit"
  | "insight.cache.miss"
  | "insight.llm.failed"
  | "insight.fallback.used"
  | "translation.failed"
  | "cli.failed";

export type InsightLogData = {
  event: InsightLogEvent;
  sign?: string;
  language?: string;
  error_type?: string;
  error_message?: string;
  [key: string]: unknown;
};

const ERROR_EVENTS: ReadonlySet<InsightLogEvent> = new Set([
  "http.request.failed",
  "insight.llm.failed",
  "translation.failed",
  "cli.failed",
]);

export function insightLog(data: InsightLogData): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  const line = JSON.stringify(logEntry);
  if (ERROR_EVENTS.has(data.event)) {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
