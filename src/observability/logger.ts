import { LogFields, LogLevel, LogThreshold } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
  level?: LogThreshold;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function resolveLogThreshold(raw: string | undefined, fallback: LogThreshold = "info"): LogThreshold {
  const normalized = raw?.trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error" ||
    normalized === "silent"
  ) {
    return normalized;
  }
  return fallback;
}

export class Logger {
  private readonly context: Required<LoggerContext>;

  constructor(context: LoggerContext) {
    this.context = {
      component: context.component,
      runId: context.runId,
      level: context.level ?? resolveLogThreshold(process.env.LOG_LEVEL),
    };
  }

  get runId(): string {
    return this.context.runId;
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId, level: this.context.level });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.context.level]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    const line = JSON.stringify(payload);
    if (level === "error" || level === "warn") {
      console.error(line);
      return;
    }
    console.log(line);
  }
}
