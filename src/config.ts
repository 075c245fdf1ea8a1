import { readFileSync } from 'node:fs'
import { join } from 'node:path'

import JSON5 from 'json5'

import type { LogFormat, LogLevel } from './logging/logger.js'

export type SlidesConfig = {
  /** ffmpeg scene-change score above which a frame starts a new candidate (0.05-0.7). */
  sceneThreshold?: number
  /**
   * Duplicate removal strictness (0-1). Higher keeps more frames.
   *
   * Default: 0.92.
   */
  similarityThreshold?: number
  /** Fingerprinting workers (1-16). */
  workers?: number
}

export type FfmpegConfig = {
  /** Absolute path to an ffmpeg binary; overrides the PATH lookup. */
  path?: string
}

export type LoggingConfig = {
  level?: LogLevel
  format?: LogFormat
}

export type SlidesiftConfig = {
  slides?: SlidesConfig
  ffmpeg?: FfmpegConfig
  logging?: LoggingConfig
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function resolveConfigPath(env: Record<string, string | undefined>): string | null {
  const explicit = env.SLIDESIFT_CONFIG?.trim()
  if (explicit) return explicit
  const home = env.HOME?.trim() || env.USERPROFILE?.trim() || null
  if (!home) return null
  return join(home, '.slidesift', 'config.json')
}

export function loadSlidesiftConfig({ env }: { env: Record<string, string | undefined> }): {
  config: SlidesiftConfig | null
  path: string | null
} {
  const path = resolveConfigPath(env)
  if (!path) return { config: null, path: null }

  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch {
    return { config: null, path }
  }

  let parsed: unknown
  try {
    parsed = JSON5.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid JSON in config file ${path}: ${message}`)
  }

  if (!isRecord(parsed)) {
    throw new Error(`Invalid config file ${path}: expected an object at the top level`)
  }
  const root = parsed

  const readNumber = (
    section: Record<string, unknown>,
    key: string,
    label: string,
    { min, max, integer = false }: { min: number; max: number; integer?: boolean }
  ): number | undefined => {
    const value = section[key]
    if (typeof value === 'undefined') return undefined
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new Error(`Invalid config file ${path}: "${label}" must be a number.`)
    }
    if (integer && !Number.isInteger(value)) {
      throw new Error(`Invalid config file ${path}: "${label}" must be an integer.`)
    }
    if (value < min || value > max) {
      throw new Error(`Invalid config file ${path}: "${label}" must be between ${min} and ${max}.`)
    }
    return value
  }

  const readSection = (key: string): Record<string, unknown> | undefined => {
    const value = root[key]
    if (typeof value === 'undefined') return undefined
    if (!isRecord(value)) {
      throw new Error(`Invalid config file ${path}: "${key}" must be an object.`)
    }
    return value
  }

  const config: SlidesiftConfig = {}

  const slidesRaw = readSection('slides')
  if (slidesRaw) {
    const slides: SlidesConfig = {}
    const sceneThreshold = readNumber(slidesRaw, 'sceneThreshold', 'slides.sceneThreshold', {
      min: 0.05,
      max: 0.7,
    })
    if (sceneThreshold !== undefined) slides.sceneThreshold = sceneThreshold
    const similarityThreshold = readNumber(
      slidesRaw,
      'similarityThreshold',
      'slides.similarityThreshold',
      { min: 0, max: 1 }
    )
    if (similarityThreshold !== undefined) slides.similarityThreshold = similarityThreshold
    const workers = readNumber(slidesRaw, 'workers', 'slides.workers', {
      min: 1,
      max: 16,
      integer: true,
    })
    if (workers !== undefined) slides.workers = workers
    config.slides = slides
  }

  const ffmpegRaw = readSection('ffmpeg')
  if (ffmpegRaw) {
    const ffmpeg: FfmpegConfig = {}
    const binary = ffmpegRaw.path
    if (typeof binary !== 'undefined') {
      if (typeof binary !== 'string' || !binary.trim()) {
        throw new Error(`Invalid config file ${path}: "ffmpeg.path" must be a non-empty string.`)
      }
      ffmpeg.path = binary.trim()
    }
    config.ffmpeg = ffmpeg
  }

  const loggingRaw = readSection('logging')
  if (loggingRaw) {
    const logging: LoggingConfig = {}
    const level = loggingRaw.level
    if (typeof level !== 'undefined') {
      if (
        level !== 'debug' &&
        level !== 'info' &&
        level !== 'warn' &&
        level !== 'error' &&
        level !== 'silent'
      ) {
        throw new Error(
          `Invalid config file ${path}: "logging.level" must be one of debug, info, warn, error, silent.`
        )
      }
      logging.level = level
    }
    const format = loggingRaw.format
    if (typeof format !== 'undefined') {
      if (format !== 'json' && format !== 'pretty') {
        throw new Error(`Invalid config file ${path}: "logging.format" must be "json" or "pretty".`)
      }
      logging.format = format
    }
    config.logging = logging
  }

  return { config, path }
}
