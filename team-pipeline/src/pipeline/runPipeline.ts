/**
 * Team page sync pipeline
 *
 *   sheet rows → field mapper → record validator → image resolver
 *     → state merger (previous team.json) → publisher (commit, push, PR)
 *
 * Row-level problems are collected into the change summary. Only broken
 * configuration, unreadable previous state, a dirty working copy or a publish
 * that keeps failing stop the run.
 */

import { join } from 'path';
import { createFieldMapper } from '../mapping/fieldMapper.js';
import { validateRows } from '../mapping/recordValidator.js';
import { ImageCache, ImageResolver, imageWarnings, type Fetcher, type ResolvedImage } from '../images/imageResolver.js';
import { mergeCollection, parseCollection } from '../state/stateMerger.js';
import { GitWorkingCopy, type GitRunner, type Repository } from '../publish/gitRepository.js';
import { GitHubClient } from '../github/client.js';
import { Publisher, isTransient, type PublishResult } from '../publish/publisher.js';
import { RetryPolicy } from '../publish/retryPolicy.js';
import { workingCopyPath, type EnvironmentConfig, type PipelineConfig } from '../config/pipelineConfig.js';
import type { ValidationError } from '../utils/errors.js';
import type { RowSource } from '../sources/rowSource.js';
import type { ChangeSummary, MemberCollection } from '../types/Member.js';
import type { Logger } from '../types/Logger.js';

export type RunMode = 'full' | 'local' | 'dry-run';

export interface PipelineDeps {
  config: PipelineConfig;
  source: RowSource;
  repository: Repository;
  publisher: Publisher;
  /** Builds the resolver once the working copy location is known. */
  createImageResolver: (imageDir: string) => ImageResolver;
  log?: Logger;
}

export interface RunReport {
  outcome: 'published' | 'unchanged' | 'local' | 'dry-run';
  summary: ChangeSummary;
  collection: MemberCollection;
  images: ResolvedImage[];
  validationErrors: ValidationError[];
  skippedRows: number[];
  publish?: PublishResult;
}

export async function runTeamPageSync(deps: PipelineDeps, mode: RunMode = 'full'): Promise<RunReport> {
  const { config, source, repository, publisher, log } = deps;
  const collectionPath = config.repository.collection_path;

  log?.log('\n📥 Step 1: Preparing working copy');
  await repository.prepare();

  log?.log(`\n📋 Step 2: Reading roster from ${source.description}`);
  const batch = await source.readRows();
  const mapper = createFieldMapper(config.column_mapping, batch.headers);
  const rows = batch.rows.map((row) => mapper.map(row));
  log?.log(`   Found ${rows.length} rows`);

  log?.log('\n🔍 Step 3: Validating rows');
  const validation = validateRows(rows, { mappedFields: mapper.mappedFields });
  for (const err of validation.errors) log?.warn(`   ⚠️  ${err.message}`);
  for (const dup of validation.duplicates) log?.warn(`   ⚠️  ${dup.message}`);
  log?.log(
    `   ${validation.members.length} valid, ${validation.errors.length} rejected, ${validation.skipped.length} without consent`,
  );

  log?.log(`\n📂 Step 4: Loading previous state from ${collectionPath}`);
  const stored = await repository.readFile(collectionPath);
  const previous = parseCollection(stored?.toString('utf-8'), collectionPath);
  log?.log(`   ${previous.length} published members`);

  log?.log('\n🖼️  Step 5: Resolving images');
  const resolver = deps.createImageResolver(join(repository.root, config.repository.image_dir));
  const resolutions = await resolver.resolveAll(validation.members);
  const images = resolutions.flatMap((r) => (r.image ? [r.image] : []));

  log?.log('\n🔀 Step 6: Merging');
  const { collection, summary } = mergeCollection(
    previous,
    resolutions.map((r) => r.member.record),
    {
      sortKey: config.sort_key,
      committeeOrder: config.committee_order,
      allowDelete: config.allow_delete,
    },
  );
  summary.duplicates = [...new Set(validation.duplicates.map((d) => d.identity))];
  summary.invalid = validation.errors.map((e) => e.rowNumber);
  summary.warnings = [...validation.warnings, ...imageWarnings(resolutions)];

  const report: RunReport = {
    outcome: 'dry-run',
    summary,
    collection,
    images,
    validationErrors: validation.errors,
    skippedRows: validation.skipped,
  };

  if (mode === 'dry-run') return report;

  if (mode === 'local') {
    log?.log('\n📁 Step 7: Writing files (local mode)');
    await publisher.writeFiles(collection, images);
    return { ...report, outcome: 'local' };
  }

  log?.log('\n🚀 Step 7: Publishing');
  const result = await publisher.publish(collection, images, summary);
  return { ...report, outcome: result.outcome, publish: result };
}

export interface DefaultDependencyOptions {
  source: RowSource;
  log?: Logger;
  fetcher?: Fetcher;
  gitRunner?: GitRunner;
}

/**
 * Wire the production collaborators from config and environment.
 */
export function createDefaultDependencies(
  config: PipelineConfig,
  env: EnvironmentConfig,
  options: DefaultDependencyOptions,
): PipelineDeps {
  const { log } = options;
  const repo = config.repository;

  const repository = new GitWorkingCopy({
    path: workingCopyPath(config),
    remoteUrl: repo.url,
    token: env.repositoryToken,
    baseBranch: repo.base_branch,
    branch: repo.branch,
    author: config.commit_author,
    timeoutMs: config.timeout_ms,
    ownedPaths: [repo.collection_path, repo.image_dir],
    runner: options.gitRunner,
    log,
  });

  const pullRequests = env.repositoryToken
    ? new GitHubClient({
        owner: repo.owner,
        repo: repo.name,
        token: env.repositoryToken,
        baseBranch: repo.base_branch,
        timeoutMs: config.timeout_ms,
        fetcher: options.fetcher,
      })
    : undefined;

  const publisher = new Publisher({
    repository,
    pullRequests,
    retryPolicy: new RetryPolicy({
      maxAttempts: config.retry_count,
      baseDelayMs: config.retry_base_delay_ms,
      isRetriable: isTransient,
      log,
    }),
    branch: repo.branch,
    collectionPath: repo.collection_path,
    imageDir: repo.image_dir,
    log,
  });

  const cache = new ImageCache();
  return {
    config,
    source: options.source,
    repository,
    publisher,
    createImageResolver: (imageDir) =>
      new ImageResolver({
        imageDir,
        maxBytes: config.image_max_bytes,
        allowedContentTypes: config.image_content_types,
        timeoutMs: config.timeout_ms,
        concurrency: config.image_concurrency,
        cache,
        fetcher: options.fetcher,
        log,
      }),
    log,
  };
}
