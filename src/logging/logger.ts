export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogData = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: string;
  timestamp: string;
  data?: LogData;
}

export type Transport = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  /** Fields merged into every entry's data. */
  bindings?: LogData;
}

export class Logger {
  private transports: Transport[] = [];
  private level: LogLevel;
  private context?: string;
  private bindings?: LogData;

  constructor(opts?: LoggerOptions) {
    this.level = opts?.level ?? 'info';
    this.context = opts?.context;
    this.bindings = opts?.bindings;
  }

  addTransport(transport: Transport): this {
    this.transports.push(transport);
    return this;
  }

  /** Child loggers share the parent's transports, so transports added later reach them too. */
  child(context: string, bindings?: LogData): Logger {
    const child = new Logger({
      level: this.level,
      context: this.context ? `${this.context}.${context}` : context,
      bindings: bindings ? { ...this.bindings, ...bindings } : this.bindings,
    });
    child.transports = this.transports;
    return child;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }

  debug(message: string, data?: LogData): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: LogData): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: LogData): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: LogData): void {
    if (!this.isLevelEnabled(level)) return;
    const merged = this.bindings || data ? { ...this.bindings, ...data } : undefined;
    const entry: LogEntry = {
      level,
      message,
      context: this.context,
      timestamp: new Date().toISOString(),
      data: merged,
    };
    for (const t of this.transports) {
      t(entry);
    }
  }
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === 'string') return /\s/.test(value) ? JSON.stringify(value) : value;
  return JSON.stringify(value) ?? String(value);
}

export function formatEntry(entry: LogEntry): string {
  const prefix = entry.context ? ` [${entry.context}]` : '';
  const fields = entry.data
    ? Object.entries(entry.data)
        .filter(([, v]) => v !== undefined)
        .map(([k, v]) => ` ${k}=${formatValue(v)}`)
        .join('')
    : '';
  return `${entry.timestamp} ${entry.level.toUpperCase()}${prefix} ${entry.message}${fields}`;
}

export function stderrTransport(entry: LogEntry): void {
  process.stderr.write(formatEntry(entry) + '\n');
}

export function createLogger(level: LogLevel = 'info', context = 'percolator'): Logger {
  return new Logger({ level, context }).addTransport(stderrTransport);
}
