type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) return normalized;
  return 'info';
}

const threshold: LogLevel = resolveLevel(process.env.LOG_LEVEL);

function serializeMeta(meta: unknown): string {
  if (meta === undefined) return '';
  if (meta instanceof Error) {
    return meta.stack ?? `${meta.name}: ${meta.message}`;
  }
  if (typeof meta === 'string') return meta;
  return JSON.stringify(meta, (_key, value: unknown) => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    return value;
  });
}

function emit(level: Exclude<LogLevel, 'silent'>, message: string, meta?: unknown) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const suffix = serializeMeta(meta);
  const line = `[${new Date().toISOString()}] ${level.toUpperCase()} ${message}${suffix ? ` ${suffix}` : ''}`;
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
}

export const log = {
  debug: (message: string, meta?: unknown) => emit('debug', message, meta),
  info: (message: string, meta?: unknown) => emit('info', message, meta),
  warn: (message: string, meta?: unknown) => emit('warn', message, meta),
  error: (message: string, meta?: unknown) => emit('error', message, meta)
};
