import pino from 'pino';

const STREAM_LEVELS: readonly pino.Level[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
];

let rootLogger: pino.Logger | null = null;

const streamLevel = (value: string): pino.Level =>
  STREAM_LEVELS.find((level) => level === value) ?? 'info';

/**
 * Process-wide pino logger. Credentials and tokens are redacted from every
 * record.
 */
export const logger = (): pino.Logger => {
  if (rootLogger) return rootLogger;

  const logLevel = process.env.LOG_LEVEL || 'info';

  const streams: pino.StreamEntry[] = [
    {
      level: streamLevel(logLevel),
      stream: process.stdout,
    },
  ];

  rootLogger = pino(
    {
      level: logLevel,
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
      redact: {
        paths: [
          'password',
          '*.password',
          'new_password',
          '*.new_password',
          'token',
          '*.token',
          'access_token',
          'refresh_token',
          'headers.authorization',
          '*.headers.authorization',
        ],
        censor: '[redacted]',
      },
    },
    pino.multistream(streams),
  );

  return rootLogger;
};
