import fs from 'node:fs';
import chalk from 'chalk';
import { CONFIG, type LogLevel, type LogStyle } from '../config.js';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// syslog priorities, understood by journald when prefixed as <N>
const SYSTEMD_PRIORITY: Record<LogLevel, number> = { debug: 7, info: 6, warn: 4, error: 3 };

const LEVEL_COLORS: Record<LogLevel, (s: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface LogRecord {
  ts: string;
  level: LogLevel;
  component: string;
  message: string;
}

export type LogSink = (record: LogRecord, formatted: string) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

interface LoggingSettings {
  level: LogLevel;
  style: LogStyle;
  file: string;
}

let settings: LoggingSettings = {
  level: CONFIG.LOG_LEVEL,
  style: CONFIG.LOG_STYLE,
  file: CONFIG.LOG_FILE,
};

let sink: LogSink = consoleSink;

export function configureLogging(updates: Partial<LoggingSettings>): void {
  settings = { ...settings, ...updates };
}

/** Replace the output sink. Returns a function that restores the previous one. */
export function setLogSink(next: LogSink): () => void {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
}

function consoleSink(record: LogRecord, formatted: string): void {
  if (record.level === 'error' || record.level === 'warn') {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
}

function format(record: LogRecord): string {
  if (settings.style === 'systemd') {
    return `<${SYSTEMD_PRIORITY[record.level]}>${record.component}: ${record.message}`;
  }
  const level = LEVEL_COLORS[record.level](record.level.toUpperCase().padEnd(5));
  return `${chalk.dim(record.ts)} ${level} ${chalk.white(`[${record.component}]`)} ${record.message}`;
}

function appendToFile(record: LogRecord): void {
  if (!settings.file) return;
  const line = `[${record.ts}] [${record.level.toUpperCase().padEnd(5)}] [${record.component}] ${record.message}\n`;
  try {
    fs.appendFileSync(settings.file, line, 'utf-8');
  } catch (err) {
    // Disabled after the first failure.
    settings = { ...settings, file: '' };
    console.error(`Failed to write log file, disabling it: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function emit(level: LogLevel, component: string, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[settings.level]) return;
  const record: LogRecord = { ts: new Date().toISOString(), level, component, message };
  sink(record, format(record));
  appendToFile(record);
}

export function createLogger(component: string): Logger {
  return {
    debug: (message) => emit('debug', component, message),
    info: (message) => emit('info', component, message),
    warn: (message) => emit('warn', component, message),
    error: (message) => emit('error', component, message),
  };
}
