import { LOG_LEVELS, type LogFields, type LogLevel, type LogWriter } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
  level?: LogLevel;
  writers: LogWriter[];
}

export class Logger {
  private readonly context: LoggerContext;

  constructor(context: LoggerContext) {
    this.context = context;
  }

  child(component: string): Logger {
    return new Logger({ ...this.context, component });
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
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.context.level ?? "info")) {
      return;
    }

    const record = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      fields: fields ?? {},
    };

    for (const writer of this.context.writers) {
      writer.write(record);
    }
  }
}
