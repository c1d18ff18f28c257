export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const ESC = '\x1b[';
const paint = (code: number, text: string) => `${ESC}${code}m${text}${ESC}0m`;

const LEVELS: Record<EmittingLevel, { rank: number; badge: string; hue: number }> = {
  debug: { rank: 10, badge: 'DBG', hue: 2 },
  info: { rank: 20, badge: 'INF', hue: 36 },
  warn: { rank: 30, badge: 'WRN', hue: 33 },
  error: { rank: 40, badge: 'ERR', hue: 31 },
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function isLogLevel(value: string): value is LogLevel {
  return value === 'silent' || Object.hasOwn(LEVELS, value);
}

function enabled(level: EmittingLevel): boolean {
  if (threshold === 'silent') return false;
  return LEVELS[level].rank >= LEVELS[threshold].rank;
}

function clock(now: Date): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;
}

function stringify(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

function fields(data: Record<string, unknown> | undefined): string {
  if (!data) return '';
  return Object.entries(data)
    .flatMap(([key, value]) => (value === undefined ? [] : [`${key}=${stringify(value)}`]))
    .join(' ');
}

export function formatLine(level: EmittingLevel, tag: string, msg: string, data?: Record<string, unknown>, now = new Date()): string {
  const { badge, hue } = LEVELS[level];
  const head = `${paint(2, clock(now))} ${paint(hue, badge)} ${paint(37, `[${tag}]`)} ${msg}`;
  const tail = fields(data);
  return tail ? `${head} ${paint(2, tail)}` : head;
}

function emit(level: EmittingLevel, tag: string, msg: string, data?: Record<string, unknown>) {
  if (!enabled(level)) return;
  const sink = level === 'error' ? console.error : console.log;
  sink(formatLine(level, tag, msg, data));
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

export function createLogger(tag: string): Logger {
  return {
    debug: (msg, data) => emit('debug', tag, msg, data),
    info: (msg, data) => emit('info', tag, msg, data),
    warn: (msg, data) => emit('warn', tag, msg, data),
    error: (msg, data) => emit('error', tag, msg, data),
  };
}
