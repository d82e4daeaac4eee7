import path from 'path';
import pino from 'pino';

export type Logger = pino.Logger;

let baseLogger: pino.Logger | null = null;

/** LOG_LEVEL wins; otherwise silent under NODE_ENV=test, info in production, debug elsewhere. */
export function resolveLogLevel(env: NodeJS.ProcessEnv): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function getBaseLogger(): pino.Logger {
  if (baseLogger) return baseLogger;
  // Lazy init so LOG_LEVEL/LOG_FILE are read after the entry point has run dotenv.config()
  const isProd = process.env.NODE_ENV === 'production';
  const logLevel = resolveLogLevel(process.env);
  if (logLevel === 'silent') {
    // No transport: keeps test runs free of worker threads and log files
    baseLogger = pino({ level: 'silent' });
    return baseLogger;
  }
  const logPath = process.env.LOG_FILE || path.join(process.cwd(), 'commission-sync.log');
  const targets: pino.TransportTargetOptions[] = [
    !isProd
      ? {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:standard', destination: 1 },
        }
      : { target: 'pino/file', options: { destination: 1 } },
    { target: 'pino/file', options: { destination: logPath, append: true, mkdir: true } },
  ];
  baseLogger = pino({ level: logLevel }, pino.transport({ targets }));
  return baseLogger;
}

/**
 * Create a child logger with a service name and optional tag (e.g. 'ghl' for GoHighLevel calls).
 */
export function createLogger(name: string, tag?: string): pino.Logger {
  const bindings: Record<string, string> = { service: name };
  if (tag) bindings.tag = tag;
  return getBaseLogger().child(bindings);
}
