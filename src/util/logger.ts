// ===========================================================================
// to fix serialization of regexes for logging purposes

import type { Writable } from "node:stream";

// RegExp.prototype.toJSON = RegExp.prototype.toString;
Object.defineProperty(RegExp.prototype, "toJSON", {
  value: RegExp.prototype.toString,
});

export type LogDetails = Record<string, unknown>;

// ===========================================================================

export function formatErr(e: unknown): LogDetails {
  if (e instanceof Error) {
    return { type: "exception", message: e.message, stack: e.stack || "" };
  } else if (typeof e === "object") {
    return e ? { ...e } : {};
  } else {
    return { message: String(e) };
  }
}

// ===========================================================================
export const LOG_CONTEXT_TYPES = [
  "general",
  "crawl",
  "pagination",
  "links",
  "batch",
  "checkpoint",
  "redis",
  "mongo",
  "extractor",
  "session",
  "rateLimit",
  "geocoding",
  "notification",
  "job",
  "history",
  "config",
] as const;

export type LogContext = (typeof LOG_CONTEXT_TYPES)[number];

export const LOG_LEVELS = [
  "debug",
  "info",
  "warn",
  "error",
  "trace",
  "fatal",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_EXCLUDE_LOG_CONTEXTS: LogContext[] = ["rateLimit"];

type LogColor = "" | "green" | "red" | "yellow" | "pink";

const COLOR_CODES: Record<Exclude<LogColor, "">, string> = {
  green: "\x1b[32m%s\x1b[0m",
  red: "\x1b[31m%s\x1b[0m",
  yellow: "\x1b[33m%s\x1b[0m",
  pink: "\x1b[35m%s\x1b[0m",
};

// ===========================================================================
class Logger {
  logStream: Writable | null = null;
  debugLogging = false;
  colorOutput = process.env.LOG_COLOR !== "false";
  logLevels: LogLevel[] = [];
  contexts: LogContext[] = [];
  excludeContexts: LogContext[] = [];
  fatalExitCode = 17;

  setDefaultFatalExitCode(exitCode: number) {
    this.fatalExitCode = exitCode;
  }

  setExternalLogStream(logFH: Writable | null) {
    this.logStream = logFH;
  }

  setDebugLogging(debugLog: boolean) {
    this.debugLogging = debugLog;
  }

  setColor(colorOutput: boolean) {
    this.colorOutput = colorOutput;
  }

  setLogLevel(logLevels: LogLevel[]) {
    this.logLevels = logLevels;
  }

  setContext(contexts: LogContext[]) {
    this.contexts = contexts;
  }

  setExcludeContext(contexts: LogContext[]) {
    this.excludeContexts = contexts;
  }

  private isFiltered(context: LogContext, logLevel: LogLevel) {
    if (this.logLevels.length && this.logLevels.indexOf(logLevel) < 0) {
      return true;
    }

    if (this.contexts.length && this.contexts.indexOf(context) < 0) {
      return true;
    }

    if (
      this.excludeContexts.length &&
      this.excludeContexts.indexOf(context) >= 0
    ) {
      return true;
    }

    return false;
  }

  logAsJSON(
    message: string,
    dataUnknown: unknown,
    context: LogContext,
    logLevel: LogLevel = "info",
    color: LogColor = "",
  ) {
    if (this.isFiltered(context, logLevel)) {
      return;
    }

    const dataToLog = {
      timestamp: new Date().toISOString(),
      logLevel: logLevel,
      context: context,
      message: message,
      details: formatErr(dataUnknown),
    };
    const string = JSON.stringify(dataToLog);

    if (this.colorOutput && color) {
      console.log(COLOR_CODES[color], string);
    } else {
      console.log(string);
    }

    if (this.logStream) {
      this.logStream.write(string + "\n");
    }
  }

  info(
    message: string,
    data: unknown = {},
    context: LogContext = "general",
    color: LogColor = "",
  ) {
    this.logAsJSON(message, data, context, "info", color);
  }

  success(
    message: string,
    data: unknown = {},
    context: LogContext = "general",
    color: LogColor = "green",
  ) {
    this.logAsJSON(message, data, context, "info", color);
  }

  error(
    message: string,
    data: unknown = {},
    context: LogContext = "general",
    color: LogColor = "red",
  ) {
    this.logAsJSON(message, data, context, "error", color);
  }

  warn(
    message: string,
    data: unknown = {},
    context: LogContext = "general",
    color: LogColor = "yellow",
  ) {
    this.logAsJSON(message, data, context, "warn", color);
  }

  trace(
    message: string,
    data: unknown = {},
    context: LogContext = "general",
    color: LogColor = "pink",
  ) {
    this.logAsJSON(message, data, context, "trace", color);
  }

  debug(
    message: string,
    data: unknown = {},
    context: LogContext = "general",
    color: LogColor = "",
  ) {
    if (this.debugLogging) {
      this.logAsJSON(message, data, context, "debug", color);
    }
  }

  fatal(
    message: string,
    data: unknown = {},
    context: LogContext = "general",
    exitCode = 0,
  ): never {
    exitCode = exitCode || this.fatalExitCode;
    this.logAsJSON(`${message}. Quitting`, data, context, "fatal");
    process.exit(exitCode);
  }
}

export const logger = new Logger();
