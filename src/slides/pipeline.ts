import { promises as fs } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'

import { logTiming, type SlidesLogger } from '../logging/logger.js'
import { deduplicateSlideFiles, resolveMaxDistance } from './dedupe.js'
import { extractSceneFrames } from './extract.js'
import type { SlideSettings } from './settings.js'
import type { DedupeProgressEvent, SlideExtractionResult } from './types.js'

export type ExtractFramesFn = (args: {
  inputPath: string
  outputDir: string
  sceneThreshold: number
  timeoutMs: number
}) => Promise<string[]>

export type ExtractSlidesHooks = {
  onProgress?: ((text: string) => void) | null
  onDedupeProgress?: ((event: DedupeProgressEvent<string>) => void) | null
}

export type ExtractSlidesArgs = {
  videoPath: string
  settings: Pick<
    SlideSettings,
    'sceneThreshold' | 'similarityThreshold' | 'gridSize' | 'workers' | 'timeoutMs' | 'keepWorkDir'
  >
  ffmpegPath?: string | null
  logger?: SlidesLogger | null
  hooks?: ExtractSlidesHooks | null
  /** Replaces the ffmpeg scene pass. */
  extractFrames?: ExtractFramesFn | null
  workDirParent?: string
}

export const NO_FRAMES_WARNING =
  'ffmpeg produced no frames. Try lowering the scene detection threshold.'

async function assertVideoFile(videoPath: string): Promise<void> {
  const stat = await fs.stat(videoPath).catch(() => null)
  if (!stat?.isFile()) {
    throw new Error(`Video file not found: ${videoPath}`)
  }
}

/**
 * Pass 1 runs the scene-change extraction into a run-scoped work dir; pass 2 collapses
 * near-duplicate frames. The returned `cleanup` removes the work dir unless it was asked
 * to be kept.
 */
export async function extractSlides({
  videoPath,
  settings,
  ffmpegPath = null,
  logger = null,
  hooks = null,
  extractFrames = null,
  workDirParent = tmpdir(),
}: ExtractSlidesArgs): Promise<SlideExtractionResult> {
  const maxDistance = resolveMaxDistance(settings.similarityThreshold, settings.gridSize)
  await assertVideoFile(videoPath)
  if (!extractFrames && !ffmpegPath) {
    throw new Error('Missing ffmpeg (install ffmpeg or add it to PATH).')
  }

  const workDir = await fs.mkdtemp(path.join(workDirParent, 'slidesift-'))
  const cleanup = async () => {
    if (settings.keepWorkDir) return
    await fs.rm(workDir, { recursive: true, force: true })
  }
  const report = (text: string) => {
    hooks?.onProgress?.(text)
  }

  const extractLogger = logger?.getSubLogger({ name: 'extract' }) ?? null
  const dedupeLogger = logger?.getSubLogger({ name: 'dedupe' }) ?? null
  const warnings: string[] = []

  let candidates: string[]
  try {
    report('Pass 1/2: running ffmpeg scene detection')
    const startedAt = Date.now()
    const frameArgs = {
      inputPath: videoPath,
      outputDir: workDir,
      sceneThreshold: settings.sceneThreshold,
      timeoutMs: settings.timeoutMs,
    }
    candidates = extractFrames
      ? await extractFrames(frameArgs)
      : await extractSceneFrames({
          ...frameArgs,
          ffmpegPath: ffmpegPath ?? 'ffmpeg',
          logger: extractLogger,
        })
    logTiming(extractLogger, 'scene detection', startedAt)
  } catch (error) {
    await cleanup()
    throw error
  }

  const base = {
    videoPath,
    workDir,
    sceneThreshold: settings.sceneThreshold,
    similarityThreshold: settings.similarityThreshold,
    candidates,
    warnings,
    cleanup,
  }

  if (candidates.length === 0) {
    warnings.push(NO_FRAMES_WARNING)
    report('No frames produced')
    return { ...base, maxDistance, slides: [], skipped: [] }
  }

  report(`Pass 2/2: deduplicating ${candidates.length} frames`)
  const dedupeStartedAt = Date.now()
  let dedupe: Awaited<ReturnType<typeof deduplicateSlideFiles>>
  try {
    dedupe = await deduplicateSlideFiles(candidates, {
      similarityThreshold: settings.similarityThreshold,
      gridSize: settings.gridSize,
      workers: settings.workers,
      logger: dedupeLogger,
      onProgress: hooks?.onDedupeProgress ?? null,
    })
  } catch (error) {
    await cleanup()
    throw error
  }
  logTiming(dedupeLogger, 'deduplication', dedupeStartedAt)

  if (dedupe.skipped.length > 0) {
    warnings.push(`Skipped ${dedupe.skipped.length} unreadable frame(s).`)
  }
  report(`Done: ${dedupe.kept.length} unique slide(s) detected`)

  return {
    ...base,
    maxDistance: dedupe.maxDistance,
    slides: dedupe.kept,
    skipped: dedupe.skipped,
  }
}
