import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { decodeImage, fingerprintImageFile } from '../src/slides/decode.js'
import { DecodeError } from '../src/slides/errors.js'
import { computeFingerprint } from '../src/slides/fingerprint.js'
import { solidImage, STRIPED_FINGERPRINT, stripedImage, writePng } from './helpers/images.js'

describe('decodeImage', () => {
  let root = ''

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'slidesift-decode-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('decodes a PNG into interleaved pixels', async () => {
    const file = await writePng(solidImage(20, 10, 90), path.join(root, 'flat.png'))
    const image = await decodeImage(file)
    expect(image.width).toBe(20)
    expect(image.height).toBe(10)
    expect(image.data.length).toBe(20 * 10 * image.channels)
    expect(computeFingerprint(image)).toBe(0n)
  })

  it('fingerprints a file the same way as the pixels it was written from', async () => {
    const file = await writePng(stripedImage(), path.join(root, 'stripes.png'))
    await expect(fingerprintImageFile(file)).resolves.toBe(STRIPED_FINGERPRINT)
  })

  it('reports a corrupt file as DecodeError with its path', async () => {
    const file = path.join(root, 'broken.png')
    await writeFile(file, 'not an image')
    const error = await decodeImage(file).catch((caught: unknown) => caught)
    expect(error).toBeInstanceOf(DecodeError)
    expect(error).toMatchObject({ name: 'DecodeError', path: file })
  })

  it('reports a missing file as DecodeError', async () => {
    await expect(decodeImage(path.join(root, 'missing.png'))).rejects.toBeInstanceOf(DecodeError)
  })

  it('attaches the path when the decoded image is too small to fingerprint', async () => {
    const file = await writePng(solidImage(1, 1, 0), path.join(root, 'dot.png'))
    await expect(fingerprintImageFile(file)).rejects.toMatchObject({
      path: file,
      detail: 'image too small (1x1)',
      message: `Unreadable frame ${file}: image too small (1x1)`,
    })
  })
})
