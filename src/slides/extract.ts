import { spawn } from 'node:child_process'
import { promises as fs } from 'node:fs'
import path from 'node:path'

import type { SlidesLogger } from '../logging/logger.js'

export const FFMPEG_TIMEOUT_FALLBACK_MS = 30 * 60_000
const STDERR_TAIL_CHARS = 2000
const FRAME_FILE_PATTERN = /^frame_\d{6}\.png$/

export type ProcessRunner = (options: {
  command: string
  args: string[]
  timeoutMs: number
  errorLabel: string
  onStderrLine?: (line: string) => void
}) => Promise<void>

export type ExtractSceneFramesArgs = {
  ffmpegPath: string
  inputPath: string
  outputDir: string
  sceneThreshold: number
  timeoutMs?: number
  logger?: SlidesLogger | null
  runProcess?: ProcessRunner
}

/**
 * Keeps frame 0 plus every frame whose scene score exceeds the threshold, and renumbers
 * timestamps so the image2 muxer writes one file per selected frame.
 */
export function buildSceneFilter(sceneThreshold: number): string {
  return `select=eq(n\\,0)+gt(scene\\,${sceneThreshold}),setpts=N/FRAME_RATE/TB`
}

export function buildSceneExtractArgs({
  inputPath,
  outputDir,
  sceneThreshold,
}: {
  inputPath: string
  outputDir: string
  sceneThreshold: number
}): string[] {
  return [
    '-hide_banner',
    '-nostdin',
    '-y',
    '-i',
    inputPath,
    '-vf',
    buildSceneFilter(sceneThreshold),
    '-fps_mode',
    'vfr',
    '-an',
    '-sn',
    '-q:v',
    '2',
    path.join(outputDir, 'frame_%06d.png'),
  ]
}

/** Numbered frames in playback order; zero padding makes name order numeric order. */
export async function listExtractedFrames(outputDir: string): Promise<string[]> {
  const entries = await fs.readdir(outputDir)
  return entries
    .filter((entry) => FRAME_FILE_PATTERN.test(entry))
    .sort()
    .map((entry) => path.join(outputDir, entry))
}

export async function extractSceneFrames({
  ffmpegPath,
  inputPath,
  outputDir,
  sceneThreshold,
  timeoutMs = FFMPEG_TIMEOUT_FALLBACK_MS,
  logger = null,
  runProcess: runProcessImpl = runProcess,
}: ExtractSceneFramesArgs): Promise<string[]> {
  await fs.mkdir(outputDir, { recursive: true })
  const args = buildSceneExtractArgs({ inputPath, outputDir, sceneThreshold })
  logger?.info(`Video: ${inputPath} | scene_threshold=${sceneThreshold.toFixed(2)}`)
  logger?.debug(`ffmpeg ${args.join(' ')}`)
  await runProcessImpl({
    command: ffmpegPath,
    args,
    timeoutMs,
    errorLabel: 'ffmpeg',
    onStderrLine: (line) => logger?.debug(`ffmpeg: ${line}`),
  })
  const frames = await listExtractedFrames(outputDir)
  logger?.info(`ffmpeg produced ${frames.length} raw frames`)
  return frames
}

export async function runProcess({
  command,
  args,
  timeoutMs,
  errorLabel,
  onStderrLine,
}: {
  command: string
  args: string[]
  timeoutMs: number
  errorLabel: string
  onStderrLine?: (line: string) => void
}): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['ignore', 'ignore', 'pipe'], windowsHide: true })
    let stderrTail = ''
    let stderrBuffer = ''

    const flushLine = (line: string) => {
      onStderrLine?.(line)
      stderrTail = `${stderrTail}${line}\n`.slice(-STDERR_TAIL_CHARS)
    }

    if (proc.stderr) {
      proc.stderr.setEncoding('utf8')
      proc.stderr.on('data', (chunk: string) => {
        stderrBuffer += chunk
        const lines = stderrBuffer.split(/\r?\n/)
        stderrBuffer = lines.pop() ?? ''
        for (const line of lines) {
          if (line) flushLine(line)
        }
      })
    }

    const timeout = setTimeout(() => {
      proc.kill('SIGKILL')
      reject(new Error(`${errorLabel} timed out`))
    }, timeoutMs)

    proc.on('error', (error) => {
      clearTimeout(timeout)
      reject(error)
    })

    proc.on('close', (code) => {
      clearTimeout(timeout)
      if (stderrBuffer.trim().length > 0) {
        flushLine(stderrBuffer.trim())
      }
      if (code === 0) {
        resolve()
        return
      }
      const suffix = stderrTail.trim() ? `: ${stderrTail.trim()}` : ''
      reject(new Error(`${errorLabel} exited with code ${code}${suffix}`))
    })
  })
}
