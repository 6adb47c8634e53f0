import winston from 'winston';

export interface LoggerOptions {
  level?: string;
  /** Write JSON lines to `filePath` in addition to the console */
  enableFile?: boolean;
  filePath?: string;
}

/**
 * Create the process-wide winston logger.
 *
 * Console output goes to stderr for every level so that stdout stays free for the
 * MCP stdio transport.
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ];

  if (options.enableFile) {
    transports.push(
      new winston.transports.File({
        filename: options.filePath || 'cluster-rag-agent.log',
        format: winston.format.json(),
      }),
    );
  }

  return winston.createLogger({
    level: options.level || 'info',
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports,
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
