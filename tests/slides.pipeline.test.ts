import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { InvalidConfigurationError } from '../src/slides/errors.js'
import { type ExtractFramesFn, extractSlides, NO_FRAMES_WARNING } from '../src/slides/pipeline.js'
import type { RawImage } from '../src/slides/types.js'
import { darkeningImage, solidImage, stripedImage, writePng } from './helpers/images.js'

const settings = {
  sceneThreshold: 0.25,
  similarityThreshold: 0.92,
  gridSize: 16,
  workers: 2,
  timeoutMs: 60_000,
  keepWorkDir: false,
}

const framesFrom =
  (images: Array<RawImage | 'broken'>): ExtractFramesFn =>
  async ({ outputDir }) => {
    const written: string[] = []
    for (const [i, image] of images.entries()) {
      const file = path.join(outputDir, `frame_${String(i + 1).padStart(6, '0')}.png`)
      if (image === 'broken') await writeFile(file, 'truncated')
      else await writePng(image, file)
      written.push(file)
    }
    return written
  }

describe('extractSlides', () => {
  let root = ''
  let workParent = ''
  let videoPath = ''

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'slidesift-pipeline-'))
    workParent = path.join(root, 'work')
    await mkdir(workParent)
    videoPath = path.join(root, 'lecture.mp4')
    await writeFile(videoPath, 'placeholder video')
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('keeps one frame per distinct slide and reports progress', async () => {
    const flat = solidImage(34, 16, 128)
    const progress: string[] = []
    const result = await extractSlides({
      videoPath,
      settings,
      workDirParent: workParent,
      extractFrames: framesFrom([flat, flat, stripedImage(), 'broken', stripedImage(), darkeningImage()]),
      hooks: { onProgress: (text) => progress.push(text) },
    })

    expect(result.candidates).toHaveLength(6)
    expect(result.slides).toEqual([0, 2, 5].map((i) => result.candidates[i]))
    expect(result.skipped.map((entry) => entry.id)).toEqual([result.candidates[3]])
    expect(result.maxDistance).toBe(20)
    expect(result.warnings).toEqual(['Skipped 1 unreadable frame(s).'])
    expect(progress).toEqual([
      'Pass 1/2: running ffmpeg scene detection',
      'Pass 2/2: deduplicating 6 frames',
      'Done: 3 unique slide(s) detected',
    ])
    expect(path.dirname(result.workDir)).toBe(workParent)

    await result.cleanup()
    expect(await readdir(workParent)).toEqual([])
  })

  it('warns when the scene pass produces nothing', async () => {
    const progress: string[] = []
    const result = await extractSlides({
      videoPath,
      settings,
      workDirParent: workParent,
      extractFrames: async () => [],
      hooks: { onProgress: (text) => progress.push(text) },
    })
    expect(result.slides).toEqual([])
    expect(result.warnings).toEqual([NO_FRAMES_WARNING])
    expect(progress).toEqual(['Pass 1/2: running ffmpeg scene detection', 'No frames produced'])
    await result.cleanup()
  })

  it('keeps the work dir when asked', async () => {
    const result = await extractSlides({
      videoPath,
      settings: { ...settings, keepWorkDir: true },
      workDirParent: workParent,
      extractFrames: framesFrom([stripedImage()]),
    })
    await result.cleanup()
    expect(await readdir(result.workDir)).toEqual(['frame_000001.png'])
  })

  it('removes the work dir when frame extraction fails', async () => {
    await expect(
      extractSlides({
        videoPath,
        settings,
        workDirParent: workParent,
        extractFrames: async () => {
          throw new Error('ffmpeg timed out')
        },
      })
    ).rejects.toThrow('ffmpeg timed out')
    expect(await readdir(workParent)).toEqual([])
  })

  it('validates before doing any work', async () => {
    const extractFrames = vi.fn<ExtractFramesFn>(async () => [])
    await expect(
      extractSlides({
        videoPath,
        settings: { ...settings, similarityThreshold: 1.5 },
        workDirParent: workParent,
        extractFrames,
      })
    ).rejects.toBeInstanceOf(InvalidConfigurationError)
    await expect(
      extractSlides({
        videoPath: path.join(root, 'missing.mp4'),
        settings,
        workDirParent: workParent,
        extractFrames,
      })
    ).rejects.toThrow(`Video file not found: ${path.join(root, 'missing.mp4')}`)
    await expect(
      extractSlides({ videoPath, settings, workDirParent: workParent })
    ).rejects.toThrow('Missing ffmpeg (install ffmpeg or add it to PATH).')
    expect(extractFrames).not.toHaveBeenCalled()
    expect(await readdir(workParent)).toEqual([])
  })
})
