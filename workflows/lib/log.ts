// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

/**
 * Structured, level-filtered logging for the local pipeline runner.
 * @module
 */

export enum LogLevel {
  Debug = "debug",
  Info = "info",
  Warn = "warn",
  Error = "error",
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

// log lines go to stderr; stdout carries command output
const defaultHandler: LogHandler = (entry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
  process.stderr.write(line + "\n");
};

let handler: LogHandler = defaultHandler;
let minLevel: LogLevel = LogLevel.Info;

export function setLogHandler(h: LogHandler | null): void {
  handler = h ?? defaultHandler;
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function parseLogLevel(name: string): LogLevel {
  for (const level of Object.values(LogLevel)) {
    if (level == name.toLowerCase()) return level;
  }
  throw new Error(`unknown log level ${name}`);
}

function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
): void {
  if (PRIORITY[level] < PRIORITY[minLevel]) return;
  handler({ level, message, context, timestamp: new Date().toISOString() });
}

export function createLogger(base: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...base, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...base, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...base, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...base, ...ctx }),
    child: (ctx) => createLogger({ ...base, ...ctx }),
  };
}

export const logger = createLogger({ component: "docs-pipeline" });
