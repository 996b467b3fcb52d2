/**
 * Structured logger for the design assistant
 *
 * Every log line carries:
 * - flow: which part of the assistant produced it
 * - requestId: one id per chat turn or HTTP request
 * - stage: the step inside the flow (e.g. "decide", "poll", "upload")
 * - sessionId / templateUid when known
 */

import { randomUUID } from "node:crypto";

type LogLevel = "info" | "warn" | "error" | "debug";

export type LogFlow = "chat" | "catalog" | "listing" | "mapping" | "render" | "upload" | "system";

export type LogContext = {
  flow: LogFlow;
  requestId: string;
  stage: string;
  sessionId?: string | null;
  templateUid?: string | null;
  [key: string]: unknown;
};

class StructuredLogger {
  private formatMessage(level: LogLevel, context: LogContext, message: string): string {
    const timestamp = new Date().toISOString();
    const contextStr = JSON.stringify(context);
    return `[${timestamp}] [${level.toUpperCase()}] ${message} | ${contextStr}`;
  }

  info(context: LogContext, message: string): void {
    console.log(this.formatMessage("info", context, message));
  }

  warn(context: LogContext, message: string, error?: unknown): void {
    console.warn(this.formatMessage("warn", withError(context, error), message));
  }

  error(context: LogContext, message: string, error?: unknown): void {
    console.error(this.formatMessage("error", withError(context, error), message));
  }

  debug(context: LogContext, message: string): void {
    if (process.env.LOG_LEVEL !== "debug") return;
    console.debug(this.formatMessage("debug", context, message));
  }
}

function withError(context: LogContext, error: unknown): LogContext {
  if (error instanceof Error) {
    return {
      ...context,
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack,
    };
  }
  if (error !== undefined && error !== null) {
    return { ...context, error: String(error) };
  }
  return context;
}

export const logger = new StructuredLogger();

export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Create a log context with defaults
 */
export function createLogContext(
  flow: LogFlow,
  requestId: string,
  stage: string,
  overrides?: Partial<LogContext>
): LogContext {
  return {
    flow,
    requestId,
    stage,
    sessionId: null,
    templateUid: null,
    ...overrides,
  };
}
