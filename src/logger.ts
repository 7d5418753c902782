import { existsSync, mkdirSync, appendFileSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";

const LOGS_DIR = fileURLToPath(new URL("../logs", import.meta.url));
const LOG_FILE = join(LOGS_DIR, "app.log");

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LOG_COLORS: Record<LogLevel, string> = {
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
  debug: "\x1b[90m", // gray
};

const RESET = "\x1b[0m";

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function resolveMinLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(raw) ? raw : "debug";
}

const minLevel = resolveMinLevel();
const fileEnabled = process.env.LOG_TO_FILE !== "false";
let fileBroken = false;

if (fileEnabled && !existsSync(LOGS_DIR)) {
  mkdirSync(LOGS_DIR, { recursive: true });
}

function getTimestamp(): string {
  return new Date().toLocaleString("en-CA", {
    timeZone: process.env.TZ ?? "UTC",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false,
  });
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.stack ?? arg.message;
  if (typeof arg === "object") return JSON.stringify(arg);
  return String(arg);
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  ...args: unknown[]
): string {
  const timestamp = getTimestamp();
  const extraArgs =
    args.length > 0 ? " " + args.map(formatArg).join(" ") : "";
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${extraArgs}`;
}

function writeToFile(entry: string): void {
  if (!fileEnabled || fileBroken) return;
  try {
    appendFileSync(LOG_FILE, entry + "\n", "utf-8");
  } catch (error) {
    // Console only from here on.
    fileBroken = true;
    console.warn(`Log file ${LOG_FILE} is not writable: ${formatArg(error)}`);
  }
}

function log(level: LogLevel, message: string, ...args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

  const entry = formatLogEntry(level, message, ...args);
  const color = LOG_COLORS[level];

  if (level === "error") {
    console.error(`${color}${entry}${RESET}`);
  } else if (level === "warn") {
    console.warn(`${color}${entry}${RESET}`);
  } else {
    console.log(`${color}${entry}${RESET}`);
  }

  writeToFile(entry);
}

export const logger = {
  info: (message: string, ...args: unknown[]) => log("info", message, ...args),
  warn: (message: string, ...args: unknown[]) => log("warn", message, ...args),
  error: (message: string, ...args: unknown[]) =>
    log("error", message, ...args),
  debug: (message: string, ...args: unknown[]) =>
    log("debug", message, ...args),
};

export type Logger = typeof logger;
