import pino, { type DestinationStream, type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

const REDACT_PATHS = [
  'headers["x-aob-signature"]',
  'headers.Authorization',
  'headers.authorization',
  'headers["x-aob-access-token"]',
  'keys.privateKey',
  'keys.sm4Key',
  'keys.sm4Iv',
  '*.privateKey',
  '*.sm4Key',
  '*.sm4Iv',
];

export interface CreateLoggerOptions {
  name?: string;
  /** Defaults to LOG_LEVEL, then `info` */
  level?: LevelWithSilent;
  /** Output stream; stdout when omitted */
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const config = {
    name: options.name ?? 'bankgw',
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return options.destination ? pino(config, options.destination) : pino(config);
}
