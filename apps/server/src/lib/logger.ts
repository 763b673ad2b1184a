import { createConsola, type LogObject } from 'consola';
import fs from 'fs';
import path from 'path';
import os from 'os';

/**
 * Central logger module for the Switchboard server.
 *
 * Provides a singleton logger backed by consola. Before `initLogger()` is called,
 * the logger outputs to console only at info level. After `initLogger()`, it
 * appends structured NDJSON entries to `<logDir>/switchboard.log` with
 * rotation once the file exceeds 10MB.
 *
 * @module lib/logger
 */

export const DEFAULT_LOG_DIR = path.join(os.homedir(), '.switchboard', 'logs');
const LOG_FILE_NAME = 'switchboard.log';
const MAX_LOG_SIZE = 10 * 1024 * 1024; // 10MB
const MAX_LOG_FILES = 7;

/**
 * Create an NDJSON file reporter that appends structured log entries to disk.
 */
function createFileReporter(logFile: string) {
  return {
    log(logObj: LogObject) {
      const entry = JSON.stringify({
        level: logObj.type,
        time: logObj.date.toISOString(),
        msg: logObj.args.map(String).join(' '),
        tag: logObj.tag || undefined,
      });
      fs.appendFileSync(logFile, entry + '\n');
    },
  };
}

/** Rotate the log file if >10MB, keeping the last MAX_LOG_FILES rotated files. */
function rotateIfNeeded(logDir: string, logFile: string): void {
  let size: number;
  try {
    size = fs.statSync(logFile).size;
  } catch {
    return; // nothing logged yet
  }
  if (size <= MAX_LOG_SIZE) return;

  try {
    const date = new Date().toISOString().slice(0, 10);
    fs.renameSync(logFile, path.join(logDir, `switchboard-${date}-${Date.now()}.log`));

    const rotated = fs
      .readdirSync(logDir)
      .filter((f) => f.startsWith('switchboard-') && f.endsWith('.log'))
      .sort()
      .reverse();
    for (const old of rotated.slice(MAX_LOG_FILES)) {
      fs.unlinkSync(path.join(logDir, old));
    }
  } catch (err) {
    console.warn('[Logger] Log rotation failed:', err instanceof Error ? err.message : String(err));
  }
}

/** Default logger instance (console-only until initLogger is called). */
export let logger = createConsola({
  level: 3, // info
});

export interface LoggerOptions {
  /** Numeric log level (0=fatal … 5=trace). Defaults to 4 (debug) in dev, 3 (info) in production. */
  level?: number;
  /** Directory for the NDJSON log file. Default: ~/.switchboard/logs */
  logDir?: string;
}

/**
 * Initialize the logger with file persistence and configured log level.
 * Call once at server startup after env is loaded.
 */
export function initLogger(options: LoggerOptions = {}): void {
  const logDir = options.logDir ?? DEFAULT_LOG_DIR;
  const logFile = path.join(logDir, LOG_FILE_NAME);
  fs.mkdirSync(logDir, { recursive: true });
  rotateIfNeeded(logDir, logFile);

  const level = options.level ?? (process.env.NODE_ENV === 'production' ? 3 : 4);

  logger = createConsola({
    level,
    reporters: [],
  });

  logger.addReporter(createFileReporter(logFile));
}
