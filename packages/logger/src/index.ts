import { Logger } from "tslog";
import type { ILogObj, ILogObjMeta } from "tslog";
import {
  mkdirSync,
  appendFileSync,
  statSync,
  renameSync,
  existsSync,
  unlinkSync,
} from "node:fs";
import { join } from "node:path";
import { formatError, resolveLogDir, resolveLogLevel } from "@amie-usage/core/node";

export type { Logger, ILogObj };

export const LOG_DIR = resolveLogDir();

const LOG_FILENAME = "amie-usage.log";
const LOG_FILENAME_PREV = "amie-usage.log.1";
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MB per file

// --- Module state ---
let fileLoggingEnabled = false;
let logDir = LOG_DIR;
let maxFileSize = DEFAULT_MAX_FILE_SIZE;
const registeredLoggers: Logger<ILogObj>[] = [];
const attachedLoggers = new WeakSet<Logger<ILogObj>>();

export interface FileLoggingOptions {
  /** Max size per log file in bytes. Default: 5 MB. Total on disk ~ 2x this value. */
  maxFileSize?: number;
  /** Override log directory (for testing). Default: ~/.amie-usage/logs */
  logDir?: string;
}

/**
 * Enable file-based log persistence. Call once at startup.
 *
 * Writes to `{logDir}/amie-usage.log`. When the file exceeds `maxFileSize`,
 * it is rotated to `amie-usage.log.1` (one backup).
 *
 * Loggers created before AND after this call will write to disk.
 */
export function enableFileLogging(options?: FileLoggingOptions): void {
  if (options?.logDir) logDir = options.logDir;
  maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;

  mkdirSync(logDir, { recursive: true });
  rotateIfNeeded();
  fileLoggingEnabled = true;

  for (const logger of registeredLoggers) {
    attachFileTransport(logger);
  }
}

/** Whether log lines are currently written to disk. */
export function isFileLoggingEnabled(): boolean {
  return fileLoggingEnabled;
}

/**
 * Reset module state. Only for testing.
 * @internal
 */
export function _resetFileLogging(): void {
  fileLoggingEnabled = false;
  logDir = LOG_DIR;
  maxFileSize = DEFAULT_MAX_FILE_SIZE;
  registeredLoggers.length = 0;
}

function attachFileTransport(logger: Logger<ILogObj>): void {
  // The transport checks the flag on every line, so re-enabling after a
  // reset must not attach a second one.
  if (attachedLoggers.has(logger)) return;
  attachedLoggers.add(logger);

  logger.attachTransport((logObj) => {
    if (!fileLoggingEnabled) return;
    writeToFile(formatLogLine(logObj));
  });
}

export function getLogFilePath(): string {
  return join(logDir, LOG_FILENAME);
}

function rotateIfNeeded(): void {
  const logPath = getLogFilePath();
  if (!existsSync(logPath)) return;
  const { size } = statSync(logPath);
  if (size >= maxFileSize) {
    const prevPath = join(logDir, LOG_FILENAME_PREV);
    if (existsSync(prevPath)) unlinkSync(prevPath);
    renameSync(logPath, prevPath);
  }
}

function writeToFile(line: string): void {
  try {
    appendFileSync(getLogFilePath(), line + "\n", "utf-8");
    rotateIfNeeded();
  } catch (err) {
    // Logging must not take the caller down; stop writing and say so once.
    fileLoggingEnabled = false;
    process.emitWarning(`amie-usage file logging disabled: ${formatError(err)}`);
  }
}

export function formatLogLine(logObj: ILogObj & ILogObjMeta): string {
  const meta = logObj._meta;
  const ts = (meta?.date ?? new Date()).toISOString();
  const level = (meta?.logLevelName ?? "INFO").padEnd(5);
  const name = meta?.name ?? "";

  // tslog stores positional arguments as "0", "1", …
  const args: Record<string, unknown> = logObj;
  const parts: string[] = [];
  for (let i = 0; ; i++) {
    const val = args[String(i)];
    if (val === undefined) break;
    parts.push(typeof val === "string" ? val : JSON.stringify(val));
  }

  return `${ts} ${level} [${name}] ${parts.join(" ")}`;
}

export function createLogger(name: string): Logger<ILogObj> {
  const logger = new Logger<ILogObj>({
    name,
    type: "pretty",
    minLevel: resolveLogLevel(),
  });

  registeredLoggers.push(logger);

  if (fileLoggingEnabled) {
    attachFileTransport(logger);
  }

  return logger;
}
