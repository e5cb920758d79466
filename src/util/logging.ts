import pino from 'pino';
import { scrubMessage, scrubPaths } from './redact.js';

/**
 * Creates a pino logger that masks the home directory unless LOG_LEVEL=debug.
 */
export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): pino.Logger {
  const redactEnabled = level !== 'debug';

  return pino({
    level,
    hooks: {
      logMethod(args, method) {
        const scrubbed = args.map((a: unknown) =>
          typeof a === 'string' ? scrubMessage(a, redactEnabled) : scrubPaths(a, redactEnabled),
        );
        method.apply(this, scrubbed as Parameters<typeof method>);
      },
    },
  });
}
