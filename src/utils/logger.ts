import pino from 'pino';

let correlationId: string | undefined;

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

export function getCorrelationId(): string {
  if (!correlationId) {
    correlationId = generateCorrelationId();
  }
  return correlationId;
}

let baseLogger: pino.Logger | undefined;

// An unknown LOG_LEVEL is reported by loadConfig; logging must not fail first
function resolveLevel(): string {
  const level = process.env.LOG_LEVEL;
  if (!level) return 'info';
  return level === 'silent' || Object.prototype.hasOwnProperty.call(pino.levels.values, level)
    ? level
    : 'info';
}

// stdout belongs to command output, so every log line goes to stderr.
function getBaseLogger(): pino.Logger {
  if (baseLogger) {
    return baseLogger;
  }

  const level = resolveLevel();
  baseLogger =
    process.env.NODE_ENV === 'development'
      ? pino({
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
              destination: 2,
            },
          },
        })
      : pino({ level }, pino.destination(2));

  return baseLogger;
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return getBaseLogger().child({
    correlationId: getCorrelationId(),
    ...context,
  });
}
