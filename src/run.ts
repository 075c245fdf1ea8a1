import { readFileSync } from 'node:fs'

import { CommanderError } from 'commander'

import { loadSlidesiftConfig } from './config.js'
import { parseDurationMs, parseLogFormat, parseLogLevel, readEnvValue } from './flags.js'
import { createSlidesLogger, type LogLevel } from './logging/logger.js'
import { resolveToolPath } from './run/env.js'
import { buildProgram } from './run/help.js'
import { buildSlidesPdf, exportSlideImages } from './slides/export.js'
import { type ExtractFramesFn, extractSlides } from './slides/pipeline.js'
import {
  describeSceneThreshold,
  describeSimilarityThreshold,
  resolveSlideSettings,
} from './slides/settings.js'

export type RunEnv = {
  env: Record<string, string | undefined>
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  cwd?: string
  /** Replaces the ffmpeg scene pass. */
  extractFrames?: ExtractFramesFn | null
}

export const EMPTY_RESULT_MESSAGE = 'No slides detected. Try lowering the thresholds.'

function resolvePackageVersion(): string {
  try {
    const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf8')
    const parsed: unknown = JSON.parse(raw)
    if (parsed && typeof parsed === 'object' && 'version' in parsed) {
      const version = parsed.version
      if (typeof version === 'string' && version.trim()) return version.trim()
    }
  } catch {
    // fall through
  }
  return '0.0.0'
}

const readStringOpt = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim() ? value.trim() : undefined

export async function runCli(
  argv: string[],
  { env, stdout, stderr, cwd = process.cwd(), extractFrames = null }: RunEnv
): Promise<void> {
  const normalizedArgv = argv.filter((arg) => arg !== '--')
  const program = buildProgram()
  program.configureOutput({
    writeOut(str) {
      stdout.write(str)
    },
    writeErr(str) {
      stderr.write(str)
    },
  })
  program.exitOverride()

  try {
    program.parse(normalizedArgv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError && error.code === 'commander.helpDisplayed') {
      return
    }
    throw error
  }

  const opts = program.opts()
  if (opts.version === true) {
    stdout.write(`${resolvePackageVersion()}\n`)
    return
  }

  const rawInput = program.args[0]
  if (!rawInput) {
    throw new Error('Usage: slidesift <video> [--similarity 0.92] [--scene-threshold 0.25] [--pdf]')
  }

  const { config } = loadSlidesiftConfig({ env })
  const json = opts.json === true

  const logLevelRaw = readStringOpt(opts.logLevel) ?? readEnvValue(env, 'SLIDESIFT_LOG_LEVEL')
  const logLevel: LogLevel = logLevelRaw
    ? parseLogLevel(logLevelRaw)
    : (config?.logging?.level ?? (json ? 'warn' : 'info'))
  const logFormatRaw = readStringOpt(opts.logFormat) ?? readEnvValue(env, 'SLIDESIFT_LOG_FORMAT')
  const logFormat = logFormatRaw ? parseLogFormat(logFormatRaw) : (config?.logging?.format ?? 'pretty')
  const logger = createSlidesLogger({ level: logLevel, format: logFormat, stream: stderr })

  const timeoutRaw = readStringOpt(opts.timeout)
  const settings = resolveSlideSettings({
    videoPath: rawInput,
    sceneThreshold:
      readStringOpt(opts.sceneThreshold) ??
      readEnvValue(env, 'SLIDESIFT_SCENE_THRESHOLD') ??
      config?.slides?.sceneThreshold,
    similarityThreshold:
      readStringOpt(opts.similarity) ??
      readEnvValue(env, 'SLIDESIFT_SIMILARITY') ??
      config?.slides?.similarityThreshold,
    workers:
      readStringOpt(opts.workers) ?? readEnvValue(env, 'SLIDESIFT_WORKERS') ?? config?.slides?.workers,
    timeoutMs: timeoutRaw ? parseDurationMs(timeoutRaw) : null,
    outputDir: readStringOpt(opts.out),
    pdf: opts.pdf === true ? true : readStringOpt(opts.pdf),
    exportImages: opts.images !== false,
    keepWorkDir: opts.keepTemp === true,
    cwd,
  })
  if (!settings.exportImages && !settings.pdfPath && !settings.keepWorkDir) {
    throw new Error('Nothing to export: --no-images needs --pdf or --keep-temp.')
  }

  const ffmpegPath = extractFrames
    ? null
    : resolveToolPath({
        binary: 'ffmpeg',
        env,
        candidates: [readStringOpt(opts.ffmpeg), readEnvValue(env, 'FFMPEG_PATH'), config?.ffmpeg?.path],
      })
  if (!extractFrames && !ffmpegPath) {
    throw new Error('Missing ffmpeg (install ffmpeg or add it to PATH).')
  }

  logger.info(
    `scene sensitivity ${describeSceneThreshold(settings.sceneThreshold)} | duplicate removal ${describeSimilarityThreshold(settings.similarityThreshold)}`
  )
  const videoPath = settings.videoPath
  const result = await extractSlides({
    videoPath,
    settings,
    ffmpegPath,
    logger,
    extractFrames,
    hooks: { onProgress: (text) => logger.info(text) },
  })

  try {
    for (const warning of result.warnings) logger.warn(warning)
    const exportLogger = logger.getSubLogger({ name: 'export' })

    let images: string[] = []
    let pdfPath: string | null = null
    if (result.slides.length > 0) {
      if (settings.exportImages) {
        images = await exportSlideImages(result.slides, settings.outputDir, { logger: exportLogger })
      }
      if (settings.pdfPath) {
        pdfPath = await buildSlidesPdf(result.slides, settings.pdfPath, { logger: exportLogger })
      }
    }

    // Work-dir frames only outlive the run with --keep-temp.
    const listed = settings.exportImages ? images : settings.keepWorkDir ? result.slides : []
    if (json) {
      const payload = {
        video: videoPath,
        sceneThreshold: result.sceneThreshold,
        similarityThreshold: result.similarityThreshold,
        maxDistance: result.maxDistance,
        candidateCount: result.candidates.length,
        slideCount: result.slides.length,
        skipped: result.skipped,
        slides: listed,
        pdf: pdfPath,
        workDir: settings.keepWorkDir ? result.workDir : null,
        warnings: result.warnings,
      }
      stdout.write(`${JSON.stringify(payload, null, 2)}\n`)
      return
    }

    if (result.slides.length === 0) {
      stdout.write(`${EMPTY_RESULT_MESSAGE}\n`)
      return
    }
    for (const file of listed) stdout.write(`${file}\n`)
    if (pdfPath) stdout.write(`PDF: ${pdfPath}\n`)
    const skippedSuffix =
      result.skipped.length > 0 ? `, ${result.skipped.length} unreadable skipped` : ''
    stdout.write(
      `${result.slides.length} unique slide(s) from ${result.candidates.length} frames${skippedSuffix}\n`
    )
  } finally {
    await result.cleanup()
  }
}
