import winston from 'winston';

export interface LoggerOptions {
  level: string;
  /** Also write JSON lines to this file */
  file?: string;
  silent?: boolean;
}

/**
 * Create the process logger. Every console level goes to stderr because
 * stdout carries the MCP protocol.
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ];

  if (options.file) {
    transports.push(
      new winston.transports.File({
        filename: options.file,
        format: winston.format.json(),
      }),
    );
  }

  return winston.createLogger({
    level: options.level,
    silent: options.silent,
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports,
  });
}
