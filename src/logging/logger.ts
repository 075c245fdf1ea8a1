import { Logger } from 'tslog'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'
export type LogFormat = 'json' | 'pretty'

export type SlidesLogger = Logger<Record<string, unknown>>

export type SlidesLoggerOptions = {
  level?: LogLevel
  format?: LogFormat
  name?: string
  stream?: NodeJS.WritableStream
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

const DEFAULT_LOG_LEVEL: LogLevel = 'info'
const DEFAULT_LOG_FORMAT: LogFormat = 'pretty'

const LOG_LEVEL_MAP: Record<Exclude<LogLevel, 'silent'>, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
}

export function safeJsonStringify(value: unknown): string {
  const seen = new WeakSet<object>()
  return JSON.stringify(value, (_key, val) => {
    if (typeof val === 'bigint') return val.toString(16)
    if (val instanceof Error) {
      return {
        name: val.name,
        message: val.message,
        stack: val.stack,
        cause: val.cause,
      }
    }
    if (typeof val === 'object' && val !== null) {
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
    }
    return val
  })
}

export function formatPrettyLine({
  metaMarkup,
  args,
  errors,
}: {
  metaMarkup: string
  args: unknown[]
  errors: string[]
}): string {
  const parts: string[] = []
  const meta = metaMarkup.trim()
  if (meta) parts.push(meta)
  if (args.length > 0) {
    parts.push(
      args
        .map((arg) => (typeof arg === 'string' ? arg : safeJsonStringify(arg)))
        .join(' ')
    )
  }
  const base = parts.join(' ')
  if (errors.length === 0) return base
  const errorBlock = errors.join('\n')
  return base ? `${base}\n${errorBlock}` : errorBlock
}

export function createSlidesLogger({
  level = DEFAULT_LOG_LEVEL,
  format = DEFAULT_LOG_FORMAT,
  name = 'slidesift',
  stream = process.stderr,
}: SlidesLoggerOptions = {}): SlidesLogger {
  const writeLine = (line: string) => {
    stream.write(line.endsWith('\n') ? line : `${line}\n`)
  }

  if (level === 'silent') {
    return new Logger<Record<string, unknown>>({ name, type: 'hidden' })
  }

  const baseSettings = {
    name,
    minLevel: LOG_LEVEL_MAP[level],
    hideLogPositionForProduction: true,
    metaProperty: '_meta',
  }

  if (format === 'json') {
    return new Logger<Record<string, unknown>>({
      ...baseSettings,
      type: 'json',
      overwrite: {
        transportJSON: (json) => {
          writeLine(safeJsonStringify(json))
        },
      },
    })
  }

  return new Logger<Record<string, unknown>>({
    ...baseSettings,
    type: 'pretty',
    prettyLogTemplate: '{{logLevelName}}\t[{{name}}]\t',
    stylePrettyLogs: false,
    overwrite: {
      transportFormatted: (metaMarkup, args, errors) => {
        writeLine(formatPrettyLine({ metaMarkup, args, errors }))
      },
    },
  })
}

/** Elapsed-time helper for phase logging. */
export function logTiming(logger: SlidesLogger | null, label: string, startedAt: number): number {
  const elapsedMs = Date.now() - startedAt
  logger?.debug(`${label} elapsedMs=${elapsedMs}`)
  return elapsedMs
}
