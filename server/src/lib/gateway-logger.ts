import { EventEmitter } from 'events';
import crypto from 'crypto';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface GatewayLogData {
  raw?: string;
  parsed?: unknown;
  response?: string;
  duration?: number;
  error?: string;
}

export interface GatewayLogEntry {
  id: string;
  timestamp: string;
  email: string;
  level: LogLevel;
  command: string;
  data: GatewayLogData;
}

export type GatewayLogInput = Omit<GatewayLogEntry, 'id' | 'timestamp' | 'email'>;

export interface GatewayLoggerOptions {
  maxLogsPerAccount?: number;
  logLevel?: LogLevel;
  console?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const REDACTED = '****';

// Entries not tied to one account are stored under this key
export const GATEWAY_LOG_KEY = '*';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVELS;
}

export class GatewayLogger extends EventEmitter {
  private logs: Map<string, GatewayLogEntry[]> = new Map();
  private secrets: Set<string> = new Set();
  private maxLogsPerAccount: number;
  private logLevel: LogLevel;
  private consoleOutput: boolean;

  constructor(options: GatewayLoggerOptions = {}) {
    super();
    this.maxLogsPerAccount = options.maxLogsPerAccount || 1000;
    this.logLevel = options.logLevel || 'info';
    this.consoleOutput = options.console ?? false;
  }

  /**
   * Record a protocol or lifecycle event for one account
   */
  log(email: string, entry: GatewayLogInput): void {
    if (LOG_LEVELS[entry.level] < LOG_LEVELS[this.logLevel]) {
      return;
    }

    // Format timestamp without milliseconds: "2025-01-11T10:16:42Z"
    const timestamp = new Date().toISOString().replace(/\.\d{3}Z$/, 'Z');

    const logEntry = this.sanitizeLogEntry({
      ...entry,
      data: { ...entry.data },
      id: crypto.randomUUID(),
      timestamp,
      email
    });

    let accountLogs = this.logs.get(email);
    if (!accountLogs) {
      accountLogs = [];
      this.logs.set(email, accountLogs);
    }

    accountLogs.push(logEntry);

    // Circular buffer
    if (accountLogs.length > this.maxLogsPerAccount) {
      accountLogs.shift();
    }

    if (this.consoleOutput) {
      this.writeToConsole(logEntry);
    }

    this.emit('log', logEntry);
    this.emit(`log:${email}`, logEntry);
  }

  getLogs(email: string, limit?: number): GatewayLogEntry[] {
    const accountLogs = this.logs.get(email) || [];
    if (limit && limit > 0) {
      return accountLogs.slice(-limit);
    }
    return [...accountLogs];
  }

  clearLogs(email: string): void {
    this.logs.delete(email);
    this.emit('logs-cleared', { email });
  }

  getLogCount(email: string): number {
    return this.logs.get(email)?.length || 0;
  }

  /**
   * Secrets registered here are masked wherever they appear in an entry.
   */
  registerSecret(secret: string): void {
    if (secret.length > 0) {
      this.secrets.add(secret);
    }
  }

  forgetSecret(secret: string): void {
    this.secrets.delete(secret);
  }

  redact(text: string): string {
    let result = text;
    for (const secret of this.secrets) {
      result = result.split(secret).join(REDACTED);
    }
    return result;
  }

  private sanitizeLogEntry(entry: GatewayLogEntry): GatewayLogEntry {
    const data = entry.data;

    if (data.raw) {
      data.raw = this.sanitizeString(data.raw);
    }

    if (data.response) {
      data.response = this.sanitizeString(data.response);
    }

    if (data.error) {
      data.error = this.sanitizeString(data.error);
    }

    if (data.parsed !== undefined) {
      data.parsed = this.sanitizeValue(data.parsed);
    }

    return entry;
  }

  private sanitizeString(str: string): string {
    let sanitized = str.replace(
      /(\bLOGIN\s+[^\s]+\s+)([^\s]+)/gi,
      `$1${REDACTED}`
    );

    sanitized = sanitized.replace(
      /(\bAUTHENTICATE\s+[^\s]+\s+)([^\s]+)/gi,
      `$1${REDACTED}`
    );

    // base64 SASL payloads
    sanitized = sanitized.replace(
      /(\bAUTH[=\s]+)([A-Za-z0-9+/]+=*)/g,
      `$1${REDACTED}`
    );

    // Message content in FETCH responses
    sanitized = sanitized.replace(
      /(\* \d+ FETCH \(.*BODY\[.*\] \{[\d]+\})[\s\S]*?(\))/g,
      '$1\n[MESSAGE CONTENT REDACTED]\n$2'
    );

    return this.redact(sanitized);
  }

  private sanitizeValue(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.sanitizeString(value);
    }

    if (typeof value !== 'object' || value === null || value instanceof Date) {
      return value;
    }

    if (Array.isArray(value)) {
      return value.map(item => this.sanitizeValue(item));
    }

    const sanitized: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      const lowerKey = key.toLowerCase();
      if (lowerKey.includes('password') ||
          lowerKey.includes('passwd') ||
          lowerKey.includes('secret') ||
          lowerKey.includes('token') ||
          lowerKey.includes('auth')) {
        sanitized[key] = REDACTED;
      } else {
        sanitized[key] = this.sanitizeValue(item);
      }
    }

    return sanitized;
  }

  private writeToConsole(entry: GatewayLogEntry): void {
    const detail = entry.data.error || entry.data.response || entry.data.raw || '';
    const duration = entry.data.duration !== undefined ? chalk.gray(` (${entry.data.duration}ms)`) : '';
    const line = `${chalk.gray(entry.timestamp)} ${colorLevel(entry.level)} ${chalk.cyan(entry.email)} ${entry.command} ${detail}${duration}`;

    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

function colorLevel(level: LogLevel): string {
  const label = level.toUpperCase().padEnd(5);
  switch (level) {
    case 'debug':
      return chalk.gray(label);
    case 'info':
      return chalk.blue(label);
    case 'warn':
      return chalk.yellow(label);
    case 'error':
      return chalk.red(label);
  }
}

export const gatewayLogger = new GatewayLogger({
  maxLogsPerAccount: parseInt(process.env.GATEWAY_MAX_LOGS_PER_ACCOUNT || '1000'),
  logLevel: isLogLevel(process.env.GATEWAY_LOG_LEVEL) ? process.env.GATEWAY_LOG_LEVEL : 'info',
  console: process.env.GATEWAY_LOG_CONSOLE === 'true'
});
