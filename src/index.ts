// Library surface: run a batch programmatically, or use the building blocks.
export { runMix, planJobs, summarize, createEmitter } from './L6-pipeline/mixRun.js'
export type { MixRunOptions } from './L6-pipeline/mixRun.js'
export { runMixJob } from './L6-pipeline/mixJob.js'
export { runScheduled } from './L6-pipeline/jobScheduler.js'

export { buildMixSettings, findSettingsProblems, DEFAULT_SETTINGS, outputPathFor } from './L1-infra/config/mixSettings.js'
export type { MixOptions, MixSettings } from './L1-infra/config/mixSettings.js'
export { initConfig, getConfig } from './L1-infra/config/environment.js'

export { createCommandRunner, ensureToolsAvailable } from './L2-clients/ffmpeg/ffmpeg.js'
export type { CommandRunner, CommandOutcome, ToolName } from './L2-clients/ffmpeg/ffmpeg.js'
export { createMediaProber } from './L2-clients/ffmpeg/probe.js'
export type { MediaProber } from './L2-clients/ffmpeg/probe.js'

export { AssetCatalog } from './L3-services/assetCatalog/assetCatalog.js'
export { ClipCache, DEFAULT_PURGE_GRACE_MS } from './L3-services/clipCache/clipCache.js'
export type { ClipCacheOptions } from './L3-services/clipCache/clipCache.js'
export { EncodingProfileResolver } from './L3-services/encoding/encodingProfileResolver.js'

export * from './L0-pure/errors/errors.js'
export type * from './L0-pure/types/index.js'
