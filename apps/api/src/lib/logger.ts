export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

type LogThreshold = LogLevel | 'silent'

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export type Logger = {
  [level in LogLevel]: (message: string, context?: Record<string, unknown>) => void
}

function isThreshold(value: string): value is LogThreshold {
  return Object.hasOwn(LEVEL_RANK, value)
}

/** Reads LOG_LEVEL on every call so tests and scripts can change it at runtime. */
export function currentLogThreshold(): LogThreshold {
  const raw = (process.env.LOG_LEVEL ?? '').trim().toLowerCase()
  return isThreshold(raw) ? raw : 'info'
}

export function formatLogLine(
  level: LogLevel,
  scope: string,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date(),
): string {
  const timestamp = now.toISOString().split('T')[1].split('.')[0]
  const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : ''
  return `[${timestamp}] ${level.toUpperCase()} [${scope}] ${message}${suffix}`
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, context?: Record<string, unknown>) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[currentLogThreshold()]) {
      return
    }
    const line = formatLogLine(level, scope, message, context)
    if (level === 'error') {
      console.error(line)
    } else if (level === 'warn') {
      console.warn(line)
    } else {
      console.log(line)
    }
  }

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  }
}
