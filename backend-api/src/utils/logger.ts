type LogMode = 'dev' | 'prod';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMeta = Record<string, unknown> | undefined;

type LogOpts = { critical?: boolean };

function getLogMode(): LogMode {
  const raw = String(process.env.CREDIT_LOG_MODE ?? '').trim().toLowerCase();
  if (raw === 'dev' || raw === 'development') return 'dev';
  if (raw === 'prod' || raw === 'production') return 'prod';
  return process.env.NODE_ENV === 'development' ? 'dev' : 'prod';
}

function shouldLog(level: LogLevel, critical: boolean): boolean {
  if (critical) return true;
  if (getLogMode() === 'dev') return true;
  return level === 'warn' || level === 'error';
}

function formatLine(level: LogLevel, scope: string | null, message: string, meta?: LogMeta): string {
  const ts = new Date().toISOString();
  const head = scope ? `[${ts}] [${level.toUpperCase()}] [${scope}] ${message}` : `[${ts}] [${level.toUpperCase()}] ${message}`;
  if (!meta || Object.keys(meta).length === 0) return head;
  return `${head} ${JSON.stringify(meta)}`;
}

function write(level: LogLevel, scope: string | null, message: string, meta: LogMeta, critical: boolean) {
  if (!shouldLog(level, critical)) return;
  const line = formatLine(level, scope, message, meta);
  // eslint-disable-next-line no-console
  if (level === 'error') console.error(line);
  // eslint-disable-next-line no-console
  else if (level === 'warn') console.warn(line);
  // eslint-disable-next-line no-console
  else console.log(line);
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function logInfo(message: string, meta?: LogMeta, opts?: LogOpts) {
  write('info', null, message, meta, opts?.critical === true);
}

export function logWarn(message: string, meta?: LogMeta, opts?: LogOpts) {
  write('warn', null, message, meta, opts?.critical === true);
}

export function logError(message: string, meta?: LogMeta) {
  write('error', null, message, meta, true);
}

export type ScopedLogger = {
  info: (message: string, meta?: LogMeta, opts?: LogOpts) => void;
  warn: (message: string, meta?: LogMeta, opts?: LogOpts) => void;
  error: (message: string, meta?: LogMeta) => void;
  debug: (message: string, meta?: LogMeta) => void;
};

export function createLogger(scope: string): ScopedLogger {
  return {
    info: (message, meta, opts) => write('info', scope, message, meta, opts?.critical === true),
    warn: (message, meta, opts) => write('warn', scope, message, meta, opts?.critical === true),
    error: (message, meta) => write('error', scope, message, meta, true),
    debug: (message, meta) => write('debug', scope, message, meta, false),
  };
}
