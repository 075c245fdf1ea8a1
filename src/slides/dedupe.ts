import type { SlidesLogger } from '../logging/logger.js'
import { decodeImage } from './decode.js'
import { DecodeError, InvalidConfigurationError } from './errors.js'
import {
  computeFingerprint,
  DEFAULT_GRID_SIZE,
  fingerprintBitLength,
  fingerprintToHex,
  hammingDistance,
} from './fingerprint.js'
import type {
  CandidateFrame,
  DedupeDecision,
  DedupeProgressEvent,
  DedupeResult,
  Fingerprint,
  RawImage,
  SkippedFrame,
} from './types.js'

export const DEFAULT_SIMILARITY_THRESHOLD = 0.92
export const DEFAULT_DEDUPE_WORKERS = 4

export type DedupeOptions<Id> = {
  similarityThreshold: number
  gridSize?: number
  logger?: SlidesLogger | null
  onProgress?: ((event: DedupeProgressEvent<Id>) => void) | null
}

export type FrameLoaderOptions<Id> = DedupeOptions<Id> & {
  loadImage: (id: Id) => Promise<RawImage>
  workers?: number
}

type FingerprintOutcome = { ok: true; fingerprint: Fingerprint } | { ok: false; error: unknown }

/**
 * Converts a similarity threshold into the largest Hamming distance still treated as a
 * duplicate. Truncates toward zero: 0.9 over 256 bits gives 25, not 26.
 */
export function resolveMaxDistance(
  similarityThreshold: number,
  gridSize: number = DEFAULT_GRID_SIZE
): number {
  if (
    typeof similarityThreshold !== 'number' ||
    !Number.isFinite(similarityThreshold) ||
    similarityThreshold < 0 ||
    similarityThreshold > 1
  ) {
    throw new InvalidConfigurationError(
      `Unsupported similarity threshold: ${String(similarityThreshold)} (range 0-1)`
    )
  }
  return Math.trunc((1 - similarityThreshold) * fingerprintBitLength(gridSize))
}

/**
 * Single-pass reducer. Only the fingerprint of the last kept frame is remembered, so a
 * slow drift across many similar frames still produces a new slide once it exceeds the
 * cutoff relative to that frame.
 */
export class SlideDeduplicator<Id> {
  readonly maxDistance: number
  private lastKept: Fingerprint | null = null
  private readonly kept: Id[] = []
  private readonly skipped: SkippedFrame<Id>[] = []
  private seen = 0

  constructor({ maxDistance }: { maxDistance: number }) {
    if (!Number.isInteger(maxDistance) || maxDistance < 0) {
      throw new InvalidConfigurationError(`Unsupported max distance: ${String(maxDistance)}`)
    }
    this.maxDistance = maxDistance
  }

  static fromThreshold<Id>(
    similarityThreshold: number,
    gridSize: number = DEFAULT_GRID_SIZE
  ): SlideDeduplicator<Id> {
    return new SlideDeduplicator<Id>({
      maxDistance: resolveMaxDistance(similarityThreshold, gridSize),
    })
  }

  get candidateCount(): number {
    return this.seen
  }

  offer(
    id: Id,
    fingerprint: Fingerprint
  ): { decision: Exclude<DedupeDecision, 'skipped'>; distance: number | null } {
    this.seen += 1
    if (this.lastKept === null) {
      this.keep(id, fingerprint)
      return { decision: 'kept', distance: null }
    }
    const distance = hammingDistance(fingerprint, this.lastKept)
    // distance == maxDistance counts as a duplicate.
    if (distance > this.maxDistance) {
      this.keep(id, fingerprint)
      return { decision: 'kept', distance }
    }
    return { decision: 'duplicate', distance }
  }

  skip(id: Id, reason: string): void {
    this.seen += 1
    this.skipped.push({ id, reason })
  }

  result(): DedupeResult<Id> {
    return {
      kept: [...this.kept],
      skipped: [...this.skipped],
      candidateCount: this.seen,
      maxDistance: this.maxDistance,
    }
  }

  private keep(id: Id, fingerprint: Fingerprint): void {
    this.kept.push(id)
    this.lastKept = fingerprint
  }
}

function formatId(id: unknown): string {
  if (typeof id === 'string') return id
  if (typeof id === 'object' && id !== null) return JSON.stringify(id) ?? '[frame]'
  return String(id)
}

function createDedupeRun<Id>(candidateCount: number, options: DedupeOptions<Id>) {
  const gridSize = options.gridSize ?? DEFAULT_GRID_SIZE
  const reducer = SlideDeduplicator.fromThreshold<Id>(options.similarityThreshold, gridSize)
  const logger = options.logger ?? null
  const onProgress = options.onProgress ?? null

  logger?.info(
    `Deduplication: ${candidateCount} frames in | hamming cutoff=${reducer.maxDistance} (similarity=${options.similarityThreshold.toFixed(2)})`
  )
  onProgress?.({ kind: 'started', candidateCount, maxDistance: reducer.maxDistance })

  const record = (index: number, id: Id, outcome: FingerprintOutcome) => {
    if (!outcome.ok) {
      if (!(outcome.error instanceof DecodeError)) throw outcome.error
      const reason = outcome.error.detail
      reducer.skip(id, reason)
      logger?.warn(`Skipping unreadable frame ${formatId(id)}: ${reason}`)
      onProgress?.({ kind: 'frame', index, id, decision: 'skipped', distance: null })
      return
    }
    const { decision, distance } = reducer.offer(id, outcome.fingerprint)
    logger?.debug(
      `frame ${index + 1}/${candidateCount} ${formatId(id)} ${decision}${distance === null ? '' : ` distance=${distance}`} fingerprint=${fingerprintToHex(outcome.fingerprint, gridSize)}`
    )
    onProgress?.({ kind: 'frame', index, id, decision, distance })
  }

  const finish = (): DedupeResult<Id> => {
    const result = reducer.result()
    logger?.info(
      `Deduplication: ${result.kept.length} unique slides kept (${result.skipped.length} unreadable skipped)`
    )
    onProgress?.({
      kind: 'finished',
      keptCount: result.kept.length,
      skippedCount: result.skipped.length,
    })
    return result
  }

  return { gridSize, record, finish }
}

function fingerprintOutcome(image: RawImage, gridSize: number): FingerprintOutcome {
  try {
    return { ok: true, fingerprint: computeFingerprint(image, { gridSize }) }
  } catch (error) {
    return { ok: false, error }
  }
}

/** Synchronous pass over frames that are already decoded. */
export function deduplicateImages<Id>(
  candidates: Iterable<CandidateFrame<Id>>,
  options: DedupeOptions<Id>
): DedupeResult<Id> {
  const frames = Array.from(candidates)
  const run = createDedupeRun(frames.length, options)
  frames.forEach((frame, index) => {
    run.record(index, frame.id, fingerprintOutcome(frame.image, run.gridSize))
  })
  return run.finish()
}

/**
 * Loads and fingerprints frames on a bounded pool of workers while decisions are made
 * strictly in input order, as soon as the next frame in sequence is ready.
 */
export async function deduplicateFrames<Id>(
  ids: readonly Id[],
  { loadImage, workers = DEFAULT_DEDUPE_WORKERS, ...options }: FrameLoaderOptions<Id>
): Promise<DedupeResult<Id>> {
  if (typeof workers !== 'number' || !Number.isFinite(workers) || workers < 1) {
    throw new InvalidConfigurationError(`Unsupported workers: ${String(workers)} (minimum 1)`)
  }
  const concurrency = Math.min(16, Math.floor(workers))
  const run = createDedupeRun(ids.length, options)
  if (ids.length === 0) return run.finish()

  const pending = new Map<number, FingerprintOutcome>()
  let nextTask = 0
  let nextDecision = 0
  let failed = false

  const drain = () => {
    while (nextDecision < ids.length) {
      const outcome = pending.get(nextDecision)
      if (!outcome) return
      pending.delete(nextDecision)
      run.record(nextDecision, ids[nextDecision], outcome)
      nextDecision += 1
    }
  }

  const fingerprintAt = async (index: number): Promise<FingerprintOutcome> => {
    const id = ids[index]
    try {
      const image = await loadImage(id)
      return { ok: true, fingerprint: computeFingerprint(image, { gridSize: run.gridSize }) }
    } catch (error) {
      if (error instanceof DecodeError && !error.path && typeof id === 'string') {
        return { ok: false, error: error.withPath(id) }
      }
      return { ok: false, error }
    }
  }

  const worker = async () => {
    while (!failed) {
      const current = nextTask
      if (current >= ids.length) return
      nextTask += 1
      pending.set(current, await fingerprintAt(current))
      try {
        drain()
      } catch (error) {
        failed = true
        throw error
      }
    }
  }

  const runners = Array.from({ length: Math.min(concurrency, ids.length) }, () => worker())
  await Promise.all(runners)
  return run.finish()
}

/** Deduplicates image files on disk, in the order given. */
export async function deduplicateSlideFiles(
  paths: readonly string[],
  options: Omit<FrameLoaderOptions<string>, 'loadImage'>
): Promise<DedupeResult<string>> {
  return deduplicateFrames(paths, { ...options, loadImage: decodeImage })
}
