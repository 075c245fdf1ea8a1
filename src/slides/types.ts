export type RawImageChannels = 1 | 2 | 3 | 4

/** Decoded, interleaved 8-bit pixels. */
export type RawImage = {
  width: number
  height: number
  channels: RawImageChannels
  data: Uint8Array
}

/** S×S difference bits, most significant bit first in row-major order. */
export type Fingerprint = bigint

export type CandidateFrame<Id> = {
  id: Id
  image: RawImage
}

export type SkippedFrame<Id> = {
  id: Id
  reason: string
}

export type DedupeDecision = 'kept' | 'duplicate' | 'skipped'

export type DedupeResult<Id> = {
  kept: Id[]
  skipped: SkippedFrame<Id>[]
  candidateCount: number
  maxDistance: number
}

export type DedupeProgressEvent<Id> =
  | { kind: 'started'; candidateCount: number; maxDistance: number }
  | {
      kind: 'frame'
      index: number
      id: Id
      decision: DedupeDecision
      distance: number | null
    }
  | { kind: 'finished'; keptCount: number; skippedCount: number }

export type SlideExtractionResult = {
  videoPath: string
  workDir: string
  sceneThreshold: number
  similarityThreshold: number
  maxDistance: number
  candidates: string[]
  slides: string[]
  skipped: SkippedFrame<string>[]
  warnings: string[]
  cleanup: () => Promise<void>
}
