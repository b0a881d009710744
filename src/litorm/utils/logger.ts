// utils/logger.ts

const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  section: "\x1b[36m",
  success: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  sql: "\x1b[35m",
  subject: "\x1b[90m",
};

export type LogLevel = "debug" | "info" | "warn" | "silent";

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  silent: 100,
};

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "silent"];

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const wanted = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === wanted);
}

let current: LogLevel = parseLogLevel(process.env.LITORM_LOG_LEVEL) ?? "warn";

export function setLogLevel(level: LogLevel): void {
  current = level;
}

export function getLogLevel(): LogLevel {
  return current;
}

function enabled(level: LogLevel): boolean {
  return RANK[level] >= RANK[current];
}

function line(tone: string, section: string, action: string, subject: string) {
  return (
    `${colors.section}${colors.bold}${section}:${colors.reset}\n` +
    `  ${tone}${action}:${colors.reset} ${colors.subject}${subject}${colors.reset}`
  );
}

export const logger = {
  /** Every statement sent to the engine, with its bound parameters. */
  sql(sql: string, params: readonly unknown[]): void {
    if (!enabled("debug")) return;
    console.log(`${colors.sql}[SQL]${colors.reset}`, sql, params);
  },

  info(section: string, action: string, subject: string): void {
    if (!enabled("info")) return;
    console.log(line(colors.success, section, action, subject));
  },

  warn(section: string, action: string, subject: string): void {
    if (!enabled("warn")) return;
    console.warn(line(colors.warn, section, action, subject));
  },

  error(section: string, action: string, subject: string): void {
    if (current === "silent") return;
    console.error(line(colors.error, section, action, subject));
  },
};
