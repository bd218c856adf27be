// ---------------------------------------------------------------------------
// Logger port
// Services log through this interface; the default implementation writes to
// the console with the structured context as a second argument.
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogContext = Readonly<Record<string, unknown>>

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

/**
 * Console-backed logger. Messages below `level` are dropped; `scope` is
 * prefixed to every line, e.g. `[pickup-scheduler] Pickup scheduled`.
 */
export function createConsoleLogger(level: LogLevel = 'info', scope?: string): Logger {
  const enabled = (at: LogLevel): boolean => LEVEL_RANK[at] >= LEVEL_RANK[level]
  const format = (message: string): string => (scope !== undefined ? `[${scope}] ${message}` : message)
  const write =
    (at: Exclude<LogLevel, 'silent'>, sink: (...args: unknown[]) => void) =>
    (message: string, context?: LogContext): void => {
      if (!enabled(at)) return
      if (context === undefined) sink(format(message))
      else sink(format(message), context)
    }

  return {
    debug: write('debug', console.debug),
    info: write('info', console.info),
    warn: write('warn', console.warn),
    error: write('error', console.error),
  }
}

export const silentLogger: Logger = createConsoleLogger('silent')

/** Extracts a loggable shape from anything thrown. */
export function errorToLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { type: error.name, message: error.message }
  }
  return { type: typeof error, message: String(error) }
}
