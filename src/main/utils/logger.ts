/**
 * stderr logger shared by the pipeline, the CLI and the MCP server.
 *
 * stdout is reserved for CLI results and MCP JSON-RPC traffic, so all
 * diagnostic output goes to stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

const envLevel = process.env.SOPGEN_LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Create a logger whose lines are prefixed with the component name, e.g.
 * `[FrameExtractor 2026-01-01T00:00:00.000Z] WARN ffmpeg not found`.
 */
export function createLogger(component: string): Logger {
  const write = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
    const timestamp = new Date().toISOString();
    process.stderr.write(`[${component} ${timestamp}] ${level.toUpperCase()} ${message}\n`);
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}
