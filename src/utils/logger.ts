import chalk from "chalk";

const LEVELS = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
} as const;

export type LogLevel = keyof typeof LEVELS;

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const resolveLevel = (): LogLevel => {
  const level = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(level) ? level : "info";
};

const formatMeta = (meta: unknown[]): string[] =>
  meta.map((item) => {
    if (item instanceof Error) {
      return item.stack || item.message;
    }
    if (typeof item === "object" && item !== null) {
      return JSON.stringify(item);
    }
    return String(item);
  });

class Logger {
  private readonly level: LogLevel = resolveLevel();

  debug(message: string, ...meta: unknown[]): void {
    this.write("debug", chalk.gray("DEBUG"), message, meta);
  }

  info(message: string, ...meta: unknown[]): void {
    this.write("info", chalk.green("INFO "), message, meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    this.write("warn", chalk.yellow("WARN "), message, meta);
  }

  error(message: string, ...meta: unknown[]): void {
    this.write("error", chalk.red("ERROR"), message, meta);
  }

  private write(
    level: Exclude<LogLevel, "silent">,
    label: string,
    message: string,
    meta: unknown[]
  ): void {
    if (LEVELS[level] < LEVELS[this.level]) return;

    const line = [
      chalk.gray(`[${new Date().toISOString()}]`),
      label,
      message,
      ...formatMeta(meta),
    ].join(" ");

    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export const logger = new Logger();
