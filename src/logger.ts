import pino from 'pino';

export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: string;
}

/**
 * Diagnostic logger. Writes JSON lines to stderr: stdout belongs to the host
 * protocol, and stderr output on a block is what the host shows the agent.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.TOOL_GUARD_LOG_LEVEL ?? 'warn';
  return pino(
    { name: 'tool-guard', level },
    pino.destination({ fd: 2, sync: true })
  );
}
