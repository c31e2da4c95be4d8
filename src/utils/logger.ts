import pino from 'pino';

function createLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL || 'info';
  const env = process.env.NODE_ENV;

  if (env === 'test') {
    return pino({ level });
  }

  // Logs go to stderr in every other mode: stdout carries the analysis JSON
  // written by the CLI.
  if (env === 'production') {
    return pino({ level }, pino.destination(2));
  }

  // In development, use pino-pretty transport for readable console output.
  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
        destination: 2,
      },
    },
  });
}

export const logger = createLogger();

export function createChildLogger(name: string): pino.Logger {
  return logger.child({ module: name });
}
