import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { createSlidesLogger } from '../src/logging/logger.js'
import {
  buildSceneExtractArgs,
  buildSceneFilter,
  extractSceneFrames,
  listExtractedFrames,
  type ProcessRunner,
} from '../src/slides/extract.js'
import { captureStream } from './helpers/images.js'

describe('ffmpeg scene arguments', () => {
  it('selects the first frame plus every scene change', () => {
    expect(buildSceneFilter(0.25)).toBe(
      'select=eq(n\\,0)+gt(scene\\,0.25),setpts=N/FRAME_RATE/TB'
    )
  })

  it('writes numbered PNG frames into the output dir', () => {
    expect(
      buildSceneExtractArgs({ inputPath: '/v/talk.mp4', outputDir: '/tmp/work', sceneThreshold: 0.4 })
    ).toEqual([
      '-hide_banner',
      '-nostdin',
      '-y',
      '-i',
      '/v/talk.mp4',
      '-vf',
      'select=eq(n\\,0)+gt(scene\\,0.4),setpts=N/FRAME_RATE/TB',
      '-fps_mode',
      'vfr',
      '-an',
      '-sn',
      '-q:v',
      '2',
      path.join('/tmp/work', 'frame_%06d.png'),
    ])
  })
})

describe('extractSceneFrames', () => {
  let root = ''

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'slidesift-extract-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('lists only numbered frames, in frame order', async () => {
    for (const name of ['frame_000010.png', 'frame_000002.png', 'notes.txt', 'frame_1.png']) {
      await writeFile(path.join(root, name), '')
    }
    await mkdir(path.join(root, 'frame_000003.png.d'))
    expect(await listExtractedFrames(root)).toEqual([
      path.join(root, 'frame_000002.png'),
      path.join(root, 'frame_000010.png'),
    ])
  })

  it('runs ffmpeg and returns the frames it wrote', async () => {
    const outputDir = path.join(root, 'frames')
    const runProcess = vi.fn<ProcessRunner>(async ({ args }) => {
      const pattern = args[args.length - 1]
      for (const n of [1, 2, 3]) {
        await writeFile(pattern.replace('%06d', String(n).padStart(6, '0')), '')
      }
    })

    const frames = await extractSceneFrames({
      ffmpegPath: '/usr/bin/ffmpeg',
      inputPath: '/v/talk.mp4',
      outputDir,
      sceneThreshold: 0.3,
      timeoutMs: 5000,
      runProcess,
    })

    expect(frames).toEqual([1, 2, 3].map((n) => path.join(outputDir, `frame_00000${n}.png`)))
    expect(runProcess).toHaveBeenCalledTimes(1)
    expect(runProcess.mock.calls[0][0]).toMatchObject({
      command: '/usr/bin/ffmpeg',
      timeoutMs: 5000,
      errorLabel: 'ffmpeg',
    })
  })

  it('forwards ffmpeg stderr to the debug log', async () => {
    const capture = captureStream()
    await extractSceneFrames({
      ffmpegPath: 'ffmpeg',
      inputPath: '/v/talk.mp4',
      outputDir: root,
      sceneThreshold: 0.3,
      logger: createSlidesLogger({ level: 'debug', stream: capture.stream }),
      runProcess: async ({ onStderrLine }) => {
        onStderrLine?.('frame=   12 fps=0.0 q=-0.0 size=N/A')
      },
    })
    expect(capture.text()).toContain('ffmpeg: frame=   12 fps=0.0 q=-0.0 size=N/A')
  })

  it('passes ffmpeg failures through', async () => {
    await expect(
      extractSceneFrames({
        ffmpegPath: 'ffmpeg',
        inputPath: '/v/missing.mp4',
        outputDir: root,
        sceneThreshold: 0.3,
        runProcess: async () => {
          throw new Error('ffmpeg exited with code 1: No such file or directory')
        },
      })
    ).rejects.toThrow('ffmpeg exited with code 1')
  })
})
