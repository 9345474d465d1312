/**
 * Publisher
 *
 * Writes the merged collection and changed images into the working copy,
 * commits exactly those files and proposes them as a pull request.
 * Push and pull request calls go through the retry policy; when it gives up
 * the error carries how far publishing got.
 */

import { posix } from 'path';
import { serializeCollection } from '../state/stateMerger.js';
import {
  ConfigurationError,
  GitCommandError,
  GitHubApiError,
  PublishTransportError,
  type PublishProgress,
} from '../utils/errors.js';
import { RetryExhaustedError, type RetryPolicy } from './retryPolicy.js';
import { PULL_REQUEST_TITLE, commitMessage, pullRequestBody } from './messages.js';
import type { Repository } from './gitRepository.js';
import type { PullRequestApi, PullRequestRef } from '../github/client.js';
import type { ResolvedImage } from '../images/imageResolver.js';
import type { ChangeSummary, MemberCollection } from '../types/Member.js';
import type { Logger } from '../types/Logger.js';

export interface PublisherOptions {
  repository: Repository;
  /** Required for full publishing; local runs never open pull requests. */
  pullRequests?: PullRequestApi;
  retryPolicy: RetryPolicy;
  branch: string;
  collectionPath: string;
  imageDir: string;
  log?: Logger;
}

export type PublishOutcome = 'published' | 'unchanged';

export interface PublishResult {
  outcome: PublishOutcome;
  progress: PublishProgress;
  pullRequest?: PullRequestRef;
}

/** Network hiccups, timeouts, rate limits and server errors. */
export function isTransient(err: unknown): boolean {
  if (err instanceof GitCommandError || err instanceof GitHubApiError) return err.retriable;
  return false;
}

export class Publisher {
  constructor(private readonly options: PublisherOptions) {}

  /** Images the run actually has to write. */
  static changedImages(images: ResolvedImage[]): ResolvedImage[] {
    return images.filter((img) => img.outcome !== 'unchanged');
  }

  /**
   * Write the collection file and new/updated images. Returns repository-relative paths.
   */
  async writeFiles(collection: MemberCollection, images: ResolvedImage[]): Promise<string[]> {
    const { repository, collectionPath, imageDir, log } = this.options;
    const written: string[] = [];

    await repository.writeFile(collectionPath, serializeCollection(collection));
    written.push(collectionPath);

    for (const image of Publisher.changedImages(images)) {
      const path = posix.join(imageDir, image.filename);
      await repository.writeFile(path, image.content);
      written.push(path);
      log?.log(`[publish] 🖼️  ${image.outcome === 'new' ? 'Added' : 'Replaced'} ${path}`);
    }

    log?.log(`[publish] 📁 Wrote ${written.length} file(s) to the working copy`);
    return written;
  }

  private async withRetry<T>(step: string, progress: PublishProgress, task: () => Promise<T>): Promise<T> {
    try {
      return await this.options.retryPolicy.execute(step, task);
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new PublishTransportError(step, err.attempts, { ...progress }, { cause: err.lastError });
      }
      throw err;
    }
  }

  async publish(collection: MemberCollection, images: ResolvedImage[], summary: ChangeSummary): Promise<PublishResult> {
    const { repository, pullRequests, branch, log } = this.options;
    if (!pullRequests) {
      throw new ConfigurationError('Publishing needs a pull request API (is WEBSITE_REPOSITORY_TOKEN set?)');
    }

    const progress: PublishProgress = { filesWritten: [], branchPushed: false };
    progress.filesWritten = await this.writeFiles(collection, images);

    await repository.stage(progress.filesWritten);
    if (!(await repository.hasStagedChanges())) {
      log?.log('[publish] ✅ Working copy already matches; nothing to commit');
      return { outcome: 'unchanged', progress };
    }

    const changedImages = Publisher.changedImages(images).length;
    progress.commitSha = await repository.commit(commitMessage(summary, changedImages));
    log?.log(`[publish] 📝 Committed ${progress.commitSha.slice(0, 7)}`);

    await this.withRetry('push', progress, () => repository.push(branch));
    progress.branchPushed = true;
    log?.log(`[publish] 🚀 Pushed ${branch}`);

    const pullRequest = await this.withRetry('pull request', progress, () =>
      pullRequests.openOrUpdatePullRequest(branch, PULL_REQUEST_TITLE, pullRequestBody(summary, changedImages)),
    );
    progress.pullRequest = { number: pullRequest.number, url: pullRequest.url };
    log?.log(`[publish] 🔗 ${pullRequest.created ? 'Opened' : 'Updated'} pull request #${pullRequest.number}: ${pullRequest.url}`);

    return { outcome: 'published', progress, pullRequest };
  }
}
