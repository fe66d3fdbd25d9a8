export interface LogEntry {
  timestamp: number;
  level: 'log' | 'warn' | 'error';
  tag: string;
  message: string;
}

export interface Logger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const MAX_ENTRIES = 200;
const buffer: LogEntry[] = [];
const listeners: Array<(entry: LogEntry) => void> = [];
let echo = true;

function stringify(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.message;
  return JSON.stringify(arg) ?? String(arg);
}

function push(level: LogEntry['level'], tag: string, args: unknown[]) {
  const message = args.map(stringify).join(' ');
  const entry: LogEntry = { timestamp: Date.now(), level, tag, message };
  buffer.push(entry);
  if (buffer.length > MAX_ENTRIES) buffer.shift();
  for (const cb of [...listeners]) cb(entry);
}

/**
 * Tagged console logger. Every line is prefixed with `[TAG]:` and also
 * kept in the in-memory history.
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag.toUpperCase()}]:`;
  return {
    log: (...args) => {
      if (echo) console.log(prefix, ...args);
      push('log', tag, args);
    },
    warn: (...args) => {
      if (echo) console.warn(prefix, ...args);
      push('warn', tag, args);
    },
    error: (...args) => {
      if (echo) console.error(prefix, ...args);
      push('error', tag, args);
    },
  };
}

/** Turn console output on or off; history is recorded either way */
export function setConsoleEcho(enabled: boolean): void {
  echo = enabled;
}

export function getLogHistory(): LogEntry[] {
  return [...buffer];
}

export function clearLogs() {
  buffer.length = 0;
}

export function onLog(callback: (entry: LogEntry) => void): () => void {
  listeners.push(callback);
  return () => {
    const idx = listeners.indexOf(callback);
    if (idx >= 0) listeners.splice(idx, 1);
  };
}
