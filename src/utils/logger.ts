/**
 * Structured console logger.
 *
 * JSON lines on stderr by default so stdout stays free for command output
 * (the dirty-partition list). `LOG_PRETTY=true` switches to one readable line
 * per event.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  readonly [key: string]: unknown;
}

interface LoggerConfig {
  readonly level: LogLevel;
  readonly pretty: boolean;
  readonly context: LogFields;
  readonly sink: (line: string) => void;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  /** A logger that stamps every event with the given fields. */
  child(fields: LogFields): Logger {
    return new Logger({ ...this.config, context: { ...this.config.context, ...fields } });
  }

  debug(event: string, fields?: LogFields): void {
    this.write("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.write("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.write("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.write("error", event, fields);
  }

  private write(level: LogLevel, event: string, fields?: LogFields): void {
    if (LEVELS[level] < LEVELS[this.config.level]) return;
    const timestamp = new Date().toISOString();
    const merged = { ...this.config.context, ...(fields ?? {}) };

    if (this.config.pretty) {
      const meta = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : "";
      this.config.sink(`[${timestamp}] ${level.toUpperCase()}: ${event}${meta}`);
      return;
    }
    this.config.sink(JSON.stringify({ timestamp, level, event, ...merged }));
  }
}

function levelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === "debug" || level === "info" || level === "warn" || level === "error") {
    return level;
  }
  return "info";
}

export function createLogger(module: string, sink: (line: string) => void = (line) => console.error(line)): Logger {
  return new Logger({
    level: levelFromEnv(),
    pretty: process.env.LOG_PRETTY === "true",
    context: { mod: module },
    sink
  });
}

/** Discards everything; handy for tests. */
export const silentLogger = new Logger({
  level: "error",
  pretty: false,
  context: {},
  sink: () => undefined
});
