import sharp from 'sharp'

import { DecodeError, describeError } from './errors.js'
import { computeFingerprint } from './fingerprint.js'
import type { Fingerprint, RawImage, RawImageChannels } from './types.js'

function toChannels(value: number, imagePath: string): RawImageChannels {
  if (value === 1 || value === 2 || value === 3 || value === 4) return value
  throw new DecodeError(`unsupported channel count ${value}`, { path: imagePath })
}

export async function decodeImage(imagePath: string): Promise<RawImage> {
  let decoded: { data: Buffer; info: sharp.OutputInfo }
  try {
    decoded = await sharp(imagePath, { failOn: 'error' })
      .toColourspace('srgb')
      .raw({ depth: 'uchar' })
      .toBuffer({ resolveWithObject: true })
  } catch (error) {
    throw new DecodeError(describeError(error), { path: imagePath, cause: error })
  }
  const { data, info } = decoded
  return {
    width: info.width,
    height: info.height,
    channels: toChannels(info.channels, imagePath),
    data: new Uint8Array(data.buffer, data.byteOffset, data.length),
  }
}

export async function fingerprintImageFile(
  imagePath: string,
  options: { gridSize?: number } = {}
): Promise<Fingerprint> {
  const image = await decodeImage(imagePath)
  try {
    return computeFingerprint(image, options)
  } catch (error) {
    if (error instanceof DecodeError && !error.path) throw error.withPath(imagePath)
    throw error
  }
}
