/**
 * Run logging
 *
 * The engine only talks to the Logger interface. The CLI passes a stderr
 * logger so stdout stays clean for the summary (and for --json).
 * Never hand a password to a logger.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

/** Logger that drops everything (library default) */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
}

export interface StderrLoggerOptions {
  /** Show debug messages */
  verbose?: boolean
  /** Only show warnings and errors */
  quiet?: boolean
  /** Line sink, defaults to process.stderr */
  write?: (line: string) => void
}

/**
 * Resolve the lowest level that is printed
 */
export function resolveLogLevel(options: { verbose?: boolean; quiet?: boolean }): LogLevel {
  if (options.quiet) return 'warn'
  if (options.verbose) return 'debug'
  return 'info'
}

/**
 * Logger writing prefixed lines to stderr
 *
 * @example
 * const logger = createStderrLogger({ verbose: true })
 * logger.debug('Using existing group: example.com')
 * // [keyring2kdbx] debug: Using existing group: example.com
 */
export function createStderrLogger(options: StderrLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[resolveLogLevel(options)]
  const write = options.write ?? ((line: string) => { process.stderr.write(line + '\n') })

  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) return
    const label = level === 'info' ? '' : `${level}: `
    write(`[keyring2kdbx] ${label}${message}`)
  }

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message)
  }
}
