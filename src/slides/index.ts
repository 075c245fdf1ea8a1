export { decodeImage, fingerprintImageFile } from './decode.js'
export {
  DEFAULT_DEDUPE_WORKERS,
  DEFAULT_SIMILARITY_THRESHOLD,
  deduplicateFrames,
  deduplicateImages,
  deduplicateSlideFiles,
  resolveMaxDistance,
  SlideDeduplicator,
} from './dedupe.js'
export type { DedupeOptions, FrameLoaderOptions } from './dedupe.js'
export { DecodeError, InvalidConfigurationError } from './errors.js'
export { buildSlidesPdf, exportSlideImages, resolvePageLayout } from './export.js'
export type { PageLayout } from './export.js'
export {
  buildSceneExtractArgs,
  buildSceneFilter,
  extractSceneFrames,
  FFMPEG_TIMEOUT_FALLBACK_MS,
  listExtractedFrames,
} from './extract.js'
export {
  computeFingerprint,
  DEFAULT_GRID_SIZE,
  fingerprintToHex,
  hammingDistance,
  resampleBox,
  toLuminance,
} from './fingerprint.js'
export { extractSlides } from './pipeline.js'
export type { ExtractFramesFn, ExtractSlidesArgs, ExtractSlidesHooks } from './pipeline.js'
export {
  DEFAULT_SCENE_THRESHOLD,
  describeSceneThreshold,
  describeSimilarityThreshold,
  resolveSlideSettings,
} from './settings.js'
export type { SlideSettings, SlideSettingsInput } from './settings.js'
export type {
  CandidateFrame,
  DedupeDecision,
  DedupeProgressEvent,
  DedupeResult,
  Fingerprint,
  RawImage,
  RawImageChannels,
  SkippedFrame,
  SlideExtractionResult,
} from './types.js'
