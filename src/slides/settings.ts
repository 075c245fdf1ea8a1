import path from 'node:path'

import { DEFAULT_DEDUPE_WORKERS, DEFAULT_SIMILARITY_THRESHOLD } from './dedupe.js'
import { InvalidConfigurationError } from './errors.js'
import { FFMPEG_TIMEOUT_FALLBACK_MS } from './extract.js'
import { DEFAULT_GRID_SIZE } from './fingerprint.js'

export type SlideSettings = {
  videoPath: string
  sceneThreshold: number
  similarityThreshold: number
  gridSize: number
  workers: number
  timeoutMs: number
  outputDir: string
  pdfPath: string | null
  exportImages: boolean
  keepWorkDir: boolean
}

export type SlideSettingsInput = {
  videoPath: string
  sceneThreshold?: unknown
  similarityThreshold?: unknown
  workers?: unknown
  timeoutMs?: number | null
  outputDir?: unknown
  pdf?: unknown
  exportImages?: boolean
  keepWorkDir?: boolean
  cwd: string
}

export const DEFAULT_SCENE_THRESHOLD = 0.25
export const SCENE_THRESHOLD_RANGE = { min: 0.05, max: 0.7 } as const
export const SIMILARITY_THRESHOLD_RANGE = { min: 0, max: 1 } as const

const parsePositiveInt = (raw: unknown, label: string, { min, max }: { min: number; max: number }) => {
  if (raw == null) return null
  const value = typeof raw === 'string' ? raw.trim() : raw
  const numeric = typeof value === 'number' ? value : Number(value)
  if (!Number.isFinite(numeric) || !Number.isInteger(numeric)) {
    throw new InvalidConfigurationError(`Unsupported ${label}: ${String(raw)}`)
  }
  if (numeric < min || numeric > max) {
    throw new InvalidConfigurationError(`Unsupported ${label}: ${String(raw)} (range ${min}-${max})`)
  }
  return numeric
}

const parseNumberInRange = (
  raw: unknown,
  label: string,
  { min, max }: { min: number; max: number }
): number | null => {
  if (raw == null) return null
  const value = typeof raw === 'string' ? raw.trim() : raw
  if (value === '') throw new InvalidConfigurationError(`Unsupported ${label}: (empty)`)
  const numeric = typeof value === 'number' ? value : Number(value)
  if (!Number.isFinite(numeric)) {
    throw new InvalidConfigurationError(`Unsupported ${label}: ${String(raw)}`)
  }
  if (numeric < min || numeric > max) {
    throw new InvalidConfigurationError(`Unsupported ${label}: ${String(raw)} (range ${min}-${max})`)
  }
  return numeric
}

function videoStem(videoPath: string): string {
  return path.basename(videoPath, path.extname(videoPath)) || 'video'
}

export function defaultOutputDir(videoPath: string): string {
  return path.join(path.dirname(videoPath), `${videoStem(videoPath)}_extracted-slides`)
}

export function defaultPdfPath(videoPath: string): string {
  return path.join(path.dirname(videoPath), `${videoStem(videoPath)}_extracted-slides.pdf`)
}

export function resolveSlideSettings(input: SlideSettingsInput): SlideSettings {
  const videoPath = path.resolve(input.cwd, input.videoPath)

  const sceneThreshold =
    parseNumberInRange(input.sceneThreshold, '--scene-threshold', SCENE_THRESHOLD_RANGE) ??
    DEFAULT_SCENE_THRESHOLD
  const similarityThreshold =
    parseNumberInRange(input.similarityThreshold, '--similarity', SIMILARITY_THRESHOLD_RANGE) ??
    DEFAULT_SIMILARITY_THRESHOLD
  const workers =
    parsePositiveInt(input.workers, '--workers', { min: 1, max: 16 }) ?? DEFAULT_DEDUPE_WORKERS

  const dirRaw = typeof input.outputDir === 'string' ? input.outputDir.trim() : ''
  const outputDir = dirRaw ? path.resolve(input.cwd, dirRaw) : defaultOutputDir(videoPath)

  // `--pdf` alone means "next to the video"; a string names the file.
  let pdfPath: string | null = null
  if (input.pdf === true) {
    pdfPath = defaultPdfPath(videoPath)
  } else if (typeof input.pdf === 'string' && input.pdf.trim()) {
    pdfPath = path.resolve(input.cwd, input.pdf.trim())
  }

  const timeoutMs =
    typeof input.timeoutMs === 'number' && input.timeoutMs > 0
      ? input.timeoutMs
      : FFMPEG_TIMEOUT_FALLBACK_MS

  return {
    videoPath,
    sceneThreshold,
    similarityThreshold,
    gridSize: DEFAULT_GRID_SIZE,
    workers,
    timeoutMs,
    outputDir,
    pdfPath,
    exportImages: input.exportImages ?? true,
    keepWorkDir: input.keepWorkDir ?? false,
  }
}

export function describeSceneThreshold(value: number): string {
  const label =
    value < 0.15 ? 'very sensitive' : value < 0.3 ? 'sensitive' : value < 0.45 ? 'balanced' : 'conservative'
  return `${value.toFixed(2)} (${label})`
}

export function describeSimilarityThreshold(value: number): string {
  const label =
    value < 0.8 ? 'aggressive' : value < 0.88 ? 'strict' : value < 0.95 ? 'balanced' : 'lenient'
  return `${value.toFixed(2)} (${label})`
}
