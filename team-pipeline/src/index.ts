export * from './types/Member.js';
export type { Logger } from './types/Logger.js';
export * from './utils/errors.js';
export { deriveIdentity, normalizeDisplayName } from './utils/identity.js';
export { createFieldMapper, LOGICAL_FIELDS } from './mapping/fieldMapper.js';
export type { FieldMapper, FieldMapping, LogicalField, MappedRow } from './mapping/fieldMapper.js';
export { validateRows, validateRow, normalizeUrl } from './mapping/recordValidator.js';
export { ImageCache, ImageResolver, imageFilename, toDownloadUrl } from './images/imageResolver.js';
export type { Fetcher, ImageOutcome, ImageResolution, ResolvedImage } from './images/imageResolver.js';
export { mergeCollection, orderCollection, parseCollection, serializeCollection } from './state/stateMerger.js';
export { GitWorkingCopy } from './publish/gitRepository.js';
export type { Repository } from './publish/gitRepository.js';
export { GitHubClient } from './github/client.js';
export type { PullRequestApi, PullRequestRef } from './github/client.js';
export { Publisher } from './publish/publisher.js';
export { RetryPolicy } from './publish/retryPolicy.js';
export { CsvFileSource, parseRosterCsv } from './sources/csvFile.js';
export { GoogleSheetSource } from './sources/googleSheet.js';
export type { RowSource } from './sources/rowSource.js';
export { loadPipelineConfig, parsePipelineConfig } from './config/pipelineConfig.js';
export type { PipelineConfig } from './config/pipelineConfig.js';
export { createDefaultDependencies, runTeamPageSync } from './pipeline/runPipeline.js';
export type { RunMode, RunReport } from './pipeline/runPipeline.js';
