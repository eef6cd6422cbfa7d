import pino from 'pino';
import type { Logger, TransportSingleOptions } from 'pino';

export type { Logger };

export type LogTarget = 'pino-pretty' | 'pino/file';

// Plain JSON to stdout until the CLI asks for a transport
export let logger: Logger = pino({
  level: process.env['DTN_LOG_LEVEL'] ?? 'info',
});

export const defaultLogFile = (now: Date = new Date()): string =>
  `logs/dtn-relay-${now.toISOString().replace(/[:.]/g, '-')}.log`;

export const transportFor = (target: LogTarget, file?: string): TransportSingleOptions =>
  target === 'pino/file'
    ? { target, options: { destination: file ?? defaultLogFile(), mkdir: true } }
    : {
        target,
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      };

export const makeLogger = (level: string, target?: LogTarget, file?: string): Logger => {
  logger = pino({
    level, // trace, debug, info, warn, error, fatal
    transport: transportFor(target ?? 'pino-pretty', file),
  });
  return logger;
};

export const silentLogger = (): Logger => pino({ level: 'silent' });
