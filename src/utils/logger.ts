import pino from 'pino';

let correlationId: string | undefined;

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

// stdout belongs to the operator console, so every log line goes to stderr.
export function createLogger(context?: Record<string, unknown>): pino.Logger {
  const level = process.env.LOG_LEVEL || 'info';
  const baseLogger =
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

  if (!correlationId) {
    correlationId = generateCorrelationId();
  }

  return baseLogger.child({
    correlationId,
    ...context,
  });
}
