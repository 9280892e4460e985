import { pino } from 'pino';
import type { Logger, LevelWithSilent, TransportSingleOptions } from 'pino';

export type { Logger, LevelWithSilent };

export interface LoggerOptions {
    level?: LevelWithSilent;
    pretty?: boolean;
    name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const transport: TransportSingleOptions | undefined = options.pretty
        ? {
              target: 'pino-pretty',
              options: { colorize: true, ignore: 'pid,hostname', translateTime: 'SYS:HH:MM:ss.l' },
          }
        : undefined;

    return pino({ name: options.name ?? 'sipua', level: options.level ?? 'info', transport });
}

export const silentLogger: Logger = pino({ level: 'silent' });
