export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  data?: unknown;
  /** Fix pass the entry belongs to; routes it to that task's log file */
  taskId?: string;
}

export type LogTransport = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, data?: unknown, taskId?: string): void;
  info(message: string, data?: unknown, taskId?: string): void;
  warn(message: string, data?: unknown, taskId?: string): void;
  error(message: string, data?: unknown, taskId?: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const transports = new Set<LogTransport>();
let minLevel: LogLevel = 'info';

/** Register a transport for every entry at or above the minimum level. Returns its remover. */
export function addLogTransport(transport: LogTransport): () => void {
  transports.add(transport);
  return () => {
    transports.delete(transport);
  };
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

/** `[Scope:taskId] message {"data":...}` */
export function formatLogLine(entry: LogEntry): string {
  const tag = entry.taskId ? `${entry.scope}:${entry.taskId}` : entry.scope;
  const data = entry.data === undefined ? '' : ` ${JSON.stringify(entry.data)}`;
  return `[${tag}] ${entry.message}${data}`;
}

/** Default transport: debug and info to stdout, warn and error to stderr */
export function consoleTransport(entry: LogEntry): void {
  const line = formatLogLine(entry);
  if (entry.level === 'warn' || entry.level === 'error') {
    process.stderr.write(`${entry.level.toUpperCase()} ${line}\n`);
  } else {
    process.stdout.write(`${line}\n`);
  }
}

/** Keep the first 10 characters after `sk-` of anything that looks like an API key */
export function redactSecrets(message: string): string {
  return message.replace(/\b(sk-[a-zA-Z0-9_-]{10})[a-zA-Z0-9_-]{20,}/g, '$1****');
}

function dispatch(entry: LogEntry): void {
  if (LEVEL_RANK[entry.level] < LEVEL_RANK[minLevel]) return;
  const redacted: LogEntry = { ...entry, message: redactSecrets(entry.message) };
  for (const transport of transports) {
    try {
      transport(redacted);
    } catch {
      // Logging must never fail the caller; there is nowhere left to report this
    }
  }
}

/**
 * Scoped logger, one per module:
 *   const log = createLogger('FixController');
 *   log.info('Baseline captured', { passed, failed }, taskId);
 */
export function createLogger(scope: string): Logger {
  const at = (level: LogLevel) => (message: string, data?: unknown, taskId?: string): void => {
    dispatch({ timestamp: new Date().toISOString(), level, scope, message, data, taskId });
  };
  return { debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') };
}

addLogTransport(consoleTransport);
