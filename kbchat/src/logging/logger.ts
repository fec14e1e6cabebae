export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

type LogFields = Record<string, unknown>;

export type Logger = {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
};

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// One JSON object per line.
export function createLogger(params: {
  level: LogLevel;
  write?: (line: string) => void;
  now?: () => Date;
}): Logger {
  const write = params.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = params.now ?? (() => new Date());
  const threshold = SEVERITY[params.level];

  const emit = (level: Exclude<LogLevel, "silent">, event: string, fields?: LogFields): void => {
    if (SEVERITY[level] < threshold) return;
    write(JSON.stringify({ level, event, at: now().toISOString(), ...fields }));
  };

  return {
    debug: (event, fields) => emit("debug", event, fields),
    info: (event, fields) => emit("info", event, fields),
    warn: (event, fields) => emit("warn", event, fields),
    error: (event, fields) => emit("error", event, fields)
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
