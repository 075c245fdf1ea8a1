import { DecodeError, InvalidConfigurationError } from './errors.js'
import type { Fingerprint, RawImage } from './types.js'

export const DEFAULT_GRID_SIZE = 16

// ITU-R BT.601 weights, the usual 8-bit grayscale conversion.
const LUMA_R = 0.299
const LUMA_G = 0.587
const LUMA_B = 0.114

type AxisWeights = Array<Array<{ index: number; weight: number }>>

export function assertGridSize(gridSize: number): number {
  if (!Number.isInteger(gridSize) || gridSize < 2) {
    throw new InvalidConfigurationError(`Unsupported grid size: ${String(gridSize)} (minimum 2)`)
  }
  return gridSize
}

export function fingerprintBitLength(gridSize = DEFAULT_GRID_SIZE): number {
  return assertGridSize(gridSize) ** 2
}

function assertRawImage(image: RawImage): void {
  const { width, height, channels, data } = image
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new DecodeError(`invalid dimensions ${String(width)}x${String(height)}`)
  }
  if (width * height < 2) {
    throw new DecodeError(`image too small (${width}x${height})`)
  }
  if (channels !== 1 && channels !== 2 && channels !== 3 && channels !== 4) {
    throw new DecodeError(`unsupported channel count ${String(channels)}`)
  }
  const expected = width * height * channels
  if (data.length < expected) {
    throw new DecodeError(`pixel buffer too short (${data.length} < ${expected})`)
  }
}

/** Single-channel luminance, one sample per pixel. Alpha is ignored. */
export function toLuminance(image: RawImage): Float64Array {
  assertRawImage(image)
  const { width, height, channels, data } = image
  const pixels = width * height
  const luma = new Float64Array(pixels)
  if (channels <= 2) {
    for (let i = 0; i < pixels; i += 1) luma[i] = data[i * channels]
    return luma
  }
  for (let i = 0; i < pixels; i += 1) {
    const offset = i * channels
    luma[i] = LUMA_R * data[offset] + LUMA_G * data[offset + 1] + LUMA_B * data[offset + 2]
  }
  return luma
}

function buildAxisWeights(sourceSize: number, targetSize: number): AxisWeights {
  const scale = sourceSize / targetSize
  const weights: AxisWeights = []
  for (let t = 0; t < targetSize; t += 1) {
    const start = t * scale
    const end = start + scale
    const taps: Array<{ index: number; weight: number }> = []
    const last = Math.min(sourceSize, Math.ceil(end))
    for (let s = Math.floor(start); s < last; s += 1) {
      const overlap = Math.min(end, s + 1) - Math.max(start, s)
      if (overlap > 0) taps.push({ index: s, weight: overlap / scale })
    }
    weights.push(taps)
  }
  return weights
}

/**
 * Area-averaging resample. Each target cell is the coverage-weighted mean of the source
 * samples under it, rounded to 8 bits so flat regions stay exactly flat.
 */
export function resampleBox(
  luma: Float64Array,
  width: number,
  height: number,
  targetWidth: number,
  targetHeight: number
): Uint8Array {
  if (luma.length < width * height) {
    throw new DecodeError(`luminance buffer too short (${luma.length} < ${width * height})`)
  }
  const columns = buildAxisWeights(width, targetWidth)
  const rows = buildAxisWeights(height, targetHeight)

  const horizontal = new Float64Array(targetWidth * height)
  for (let y = 0; y < height; y += 1) {
    const rowOffset = y * width
    for (let x = 0; x < targetWidth; x += 1) {
      let sum = 0
      for (const tap of columns[x]) sum += luma[rowOffset + tap.index] * tap.weight
      horizontal[y * targetWidth + x] = sum
    }
  }

  const out = new Uint8Array(targetWidth * targetHeight)
  for (let y = 0; y < targetHeight; y += 1) {
    for (let x = 0; x < targetWidth; x += 1) {
      let sum = 0
      for (const tap of rows[y]) sum += horizontal[tap.index * targetWidth + x] * tap.weight
      out[y * targetWidth + x] = Math.min(255, Math.max(0, Math.round(sum)))
    }
  }
  return out
}

/**
 * Difference fingerprint: resample to (S+1)×S luminance cells and set one bit per
 * horizontally adjacent pair, 1 when the left cell is brighter.
 */
export function computeFingerprint(
  image: RawImage,
  { gridSize = DEFAULT_GRID_SIZE }: { gridSize?: number } = {}
): Fingerprint {
  const size = assertGridSize(gridSize)
  const luma = toLuminance(image)
  const columns = size + 1
  const cells = resampleBox(luma, image.width, image.height, columns, size)
  let bits = 0n
  for (let row = 0; row < size; row += 1) {
    for (let col = 0; col < size; col += 1) {
      const idx = row * columns + col
      bits = (bits << 1n) | (cells[idx] > cells[idx + 1] ? 1n : 0n)
    }
  }
  return bits
}

export function hammingDistance(a: Fingerprint, b: Fingerprint): number {
  let diff = a ^ b
  let count = 0
  while (diff > 0n) {
    diff &= diff - 1n
    count += 1
  }
  return count
}

export function fingerprintToHex(fingerprint: Fingerprint, gridSize = DEFAULT_GRID_SIZE): string {
  const digits = Math.ceil(fingerprintBitLength(gridSize) / 4)
  return fingerprint.toString(16).padStart(digits, '0')
}
