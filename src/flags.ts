import { LOG_LEVELS, type LogFormat, type LogLevel } from './logging/logger.js'

const DURATION_PATTERN = /^(?<value>\d+(?:\.\d+)?)(?<unit>ms|s|m|h)?$/i

export function parseDurationMs(raw: string): number {
  const normalized = raw.trim()
  const match = DURATION_PATTERN.exec(normalized)
  if (!match?.groups) {
    throw new Error(`Unsupported --timeout: ${raw}`)
  }

  const numeric = Number(match.groups.value)
  if (!Number.isFinite(numeric) || numeric <= 0) {
    throw new Error(`Unsupported --timeout: ${raw}`)
  }

  const unit = match.groups.unit?.toLowerCase() ?? 's'
  const multiplier = unit === 'ms' ? 1 : unit === 's' ? 1000 : unit === 'm' ? 60_000 : 3_600_000
  return Math.floor(numeric * multiplier)
}

export function parseLogLevel(raw: string): LogLevel {
  const normalized = raw.trim().toLowerCase()
  const match = LOG_LEVELS.find((level) => level === normalized)
  if (match) return match
  throw new Error(`Unsupported --log-level: ${raw}`)
}

export function parseLogFormat(raw: string): LogFormat {
  const normalized = raw.trim().toLowerCase()
  if (normalized === 'json' || normalized === 'pretty') return normalized
  throw new Error(`Unsupported --log-format: ${raw}`)
}

/** Env value as a trimmed string, or undefined when unset or blank. */
export function readEnvValue(
  env: Record<string, string | undefined>,
  ...keys: string[]
): string | undefined {
  for (const key of keys) {
    const value = env[key]?.trim()
    if (value) return value
  }
  return undefined
}
