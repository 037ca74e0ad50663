export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const RESET = "\x1b[0m";
const paint = (code: string) => (s: string) => `\x1b[${code}m${s}${RESET}`;

const COLOR = {
  gray: paint("90"),
  yellow: paint("33"),
  red: paint("31"),
};

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export interface LoggerOptions {
  level?: LogLevel;
  color?: boolean;
  scope?: string;
  /** Defaults to the console; tests pass a collector. */
  sink?: Pick<Console, "log" | "warn" | "error">;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const min = RANK[opts.level ?? "info"];
  const color = opts.color ?? true;
  const sink = opts.sink ?? console;
  const prefix = opts.scope ? `[${opts.scope}] ` : "";
  const tint = (fn: (s: string) => string, s: string) => (color ? fn(s) : s);

  return {
    debug(msg) {
      if (min <= RANK.debug) sink.log(tint(COLOR.gray, prefix + msg));
    },
    info(msg) {
      if (min <= RANK.info) sink.log(prefix + msg);
    },
    warn(msg) {
      if (min <= RANK.warn) sink.warn(tint(COLOR.yellow, `${prefix}[warn] ${msg}`));
    },
    error(msg) {
      if (min <= RANK.error) sink.error(tint(COLOR.red, `${prefix}[error] ${msg}`));
    },
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
