import { describe, it, expect } from 'vitest';
import { createDefaultDependencies, runTeamPageSync, type PipelineDeps } from '../runPipeline.js';
import { parsePipelineConfig } from '../../config/pipelineConfig.js';
import { parseRosterCsv } from '../../sources/csvFile.js';
import { ImageCache, ImageResolver } from '../../images/imageResolver.js';
import { Publisher, isTransient } from '../../publish/publisher.js';
import { RetryPolicy } from '../../publish/retryPolicy.js';
import { GitWorkingCopy } from '../../publish/gitRepository.js';
import {
  ConfigurationError,
  RepositoryStateError,
  StateCorruptionError,
} from '../../utils/errors.js';
import {
  FakePullRequests,
  FakeRepository,
  imageResponse,
  quietLog,
  routeFetcher,
  tempDir,
} from '../../__tests__/helpers.js';
import { emptySummary } from '../../types/Member.js';
import type { RowSource } from '../../sources/rowSource.js';

const PHOTO = 'https://img.example.org/a.png';
const COLLECTION = 'databags/team.json';

const config = parsePipelineConfig({
  column_mapping: { display_name: 'Full Name', committee: 'Committee', image_url: 'Photo' },
  repository: { url: 'https://github.com/example-org/community-website.git', owner: 'example-org', name: 'community-website' },
});

function csvSource(csv: string): RowSource & { reads: number } {
  return {
    description: 'test roster',
    reads: 0,
    async readRows() {
      this.reads++;
      return parseRosterCsv(csv);
    },
  };
}

function setup(csv: string) {
  const repository = new FakeRepository();
  const pullRequests = new FakePullRequests();
  const fetcher = routeFetcher({ [PHOTO]: () => imageResponse(Buffer.from('a-photo')) });
  const source = csvSource(csv);
  const publisher = new Publisher({
    repository,
    pullRequests,
    retryPolicy: new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0, isRetriable: isTransient, sleep: async () => {} }),
    branch: config.repository.branch,
    collectionPath: COLLECTION,
    imageDir: config.repository.image_dir,
  });
  const deps: PipelineDeps = {
    config,
    source,
    repository,
    publisher,
    createImageResolver: (imageDir) =>
      new ImageResolver({
        imageDir,
        maxBytes: config.image_max_bytes,
        allowedContentTypes: config.image_content_types,
        timeoutMs: config.timeout_ms,
        concurrency: config.image_concurrency,
        cache: new ImageCache(),
        fetcher,
      }),
    log: quietLog(),
  };
  return { deps, repository, pullRequests, fetcher, source };
}

async function storedCollection(repository: FakeRepository): Promise<unknown> {
  const content = await repository.readFile(COLLECTION);
  return content === undefined ? undefined : JSON.parse(content.toString());
}

const ROSTER = ['Full Name,Committee,Photo', `A Lee,Board,${PHOTO}`, 'B Kim,Program,'].join('\n');

describe('runTeamPageSync', () => {
  it('publishes new members with their images', async () => {
    const { deps, repository, pullRequests } = setup(ROSTER);
    const report = await runTeamPageSync(deps);

    expect(report.outcome).toBe('published');
    expect(report.summary.added).toEqual(['a_lee', 'b_kim']);
    expect(await storedCollection(repository)).toEqual([
      { identity: 'a_lee', display_name: 'A Lee', committee: 'Board', image_filename: 'a_lee.png' },
      { identity: 'b_kim', display_name: 'B Kim', committee: 'Program' },
    ]);
    expect((await repository.readFile('static/images/team/a_lee.png'))?.toString()).toBe('a-photo');
    expect(repository.commits).toEqual(['Update team page: 2 added, 0 updated, 0 unchanged, 0 stale, 1 image']);
    expect(pullRequests.calls).toHaveLength(1);
    expect(report.publish?.pullRequest?.url).toBe('https://github.com/example-org/site/pull/7');
  });

  it('changes nothing on a second run while the pull request is still open', async () => {
    const { deps, repository, pullRequests } = setup(ROSTER);
    await runTeamPageSync(deps);
    const second = await runTeamPageSync(deps);

    expect(second.outcome).toBe('unchanged');
    expect(second.summary.unchanged).toEqual(['a_lee', 'b_kim']);
    expect(second.images.map((i) => i.outcome)).toEqual(['unchanged']);
    expect(repository.commits).toHaveLength(1);
    expect(pullRequests.calls).toHaveLength(1);
  });

  it('changes nothing on a run after the pull request was merged', async () => {
    const { deps, repository, pullRequests } = setup(ROSTER);
    await runTeamPageSync(deps);
    repository.mergePullRequest();
    const second = await runTeamPageSync(deps);

    expect(second.outcome).toBe('unchanged');
    expect(second.summary.added).toEqual([]);
    expect(repository.commits).toHaveLength(1);
    expect(pullRequests.calls).toHaveLength(1);
  });

  it('keeps edits made on the open update branch', async () => {
    const { deps, repository } = setup(ROSTER);
    await runTeamPageSync(deps);
    repository.remoteBranch?.set(
      COLLECTION,
      Buffer.from(
        JSON.stringify([
          { identity: 'a_lee', display_name: 'A Lee', committee: 'Board', image_filename: 'a_lee.png', pronouns: 'they/them' },
          { identity: 'b_kim', display_name: 'B Kim', committee: 'Program' },
        ]),
      ),
    );

    const second = await runTeamPageSync(deps);

    expect(second.summary.unchanged).toEqual(['a_lee', 'b_kim']);
    expect(second.collection[0]).toEqual({
      identity: 'a_lee',
      display_name: 'A Lee',
      committee: 'Board',
      image_filename: 'a_lee.png',
      pronouns: 'they/them',
    });
  });

  it('keeps members missing from the sheet and flags them as stale', async () => {
    const { deps, repository } = setup(ROSTER);
    repository.seed(COLLECTION, JSON.stringify([{ identity: 'c_old', display_name: 'C Old', pronouns: 'she/her' }]));

    const report = await runTeamPageSync(deps);

    expect(report.summary.stale).toEqual(['c_old']);
    expect(report.summary.removed).toEqual([]);
    expect(report.collection.map((m) => m.identity)).toEqual(['a_lee', 'b_kim', 'c_old']);
    expect(report.collection[2]).toEqual({ identity: 'c_old', display_name: 'C Old', pronouns: 'she/her' });
  });

  it('rejects a row without a name and publishes the rest', async () => {
    const { deps, repository } = setup(['Full Name,Committee,Photo', ',Board,', 'B Kim,Program,'].join('\n'));
    const report = await runTeamPageSync(deps);

    expect(report.outcome).toBe('published');
    expect(report.summary.invalid).toEqual([2]);
    expect(report.validationErrors[0].message).toBe('Row 2: display_name: display name is required');
    expect(await storedCollection(repository)).toEqual([
      { identity: 'b_kim', display_name: 'B Kim', committee: 'Program' },
    ]);
  });

  it('publishes a member without an image when the photo cannot be fetched', async () => {
    const missing = 'https://img.example.org/missing.png';
    const { deps } = setup(['Full Name,Committee,Photo', `A Lee,Board,${missing}`].join('\n'));
    const report = await runTeamPageSync(deps);

    expect(report.collection).toEqual([{ identity: 'a_lee', display_name: 'A Lee', committee: 'Board' }]);
    expect(report.images).toEqual([]);
    expect(report.summary.warnings).toEqual([{ identity: 'a_lee', message: 'Image not published: HTTP 404' }]);
  });

  it('reports duplicate identities and keeps the later row', async () => {
    const { deps } = setup(['Full Name,Committee,Photo', 'A Lee,Board,', 'a lee,Program,'].join('\n'));
    const report = await runTeamPageSync(deps);

    expect(report.summary.duplicates).toEqual(['a_lee']);
    expect(report.collection).toEqual([{ identity: 'a_lee', display_name: 'A Lee', committee: 'Program' }]);
  });

  it('stops before fetching or committing when the previous state is corrupt', async () => {
    const { deps, repository, fetcher } = setup(ROSTER);
    repository.seed(COLLECTION, '[{"identity": "a_lee",');

    await expect(runTeamPageSync(deps)).rejects.toThrow(StateCorruptionError);
    expect(fetcher).not.toHaveBeenCalled();
    expect(repository.commits).toEqual([]);
  });

  it('stops before validating when the column mapping does not match the sheet', async () => {
    const { deps, fetcher } = setup(['Full Name,Committee', 'A Lee,Board'].join('\n'));

    await expect(runTeamPageSync(deps)).rejects.toThrow(ConfigurationError);
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('refuses to run on a dirty working copy', async () => {
    const { deps, repository, source } = setup(ROSTER);
    repository.dirty = true;

    await expect(runTeamPageSync(deps)).rejects.toThrow(RepositoryStateError);
    expect(source.reads).toBe(0);
  });

  it('writes nothing on a dry run', async () => {
    const { deps, repository } = setup(ROSTER);
    const report = await runTeamPageSync(deps, 'dry-run');

    expect(report.outcome).toBe('dry-run');
    expect(report.summary.added).toEqual(['a_lee', 'b_kim']);
    expect(await repository.readFile(COLLECTION)).toBeUndefined();
  });

  it('writes the working copy without committing in local mode', async () => {
    const { deps, repository, pullRequests } = setup(ROSTER);
    const report = await runTeamPageSync(deps, 'local');

    expect(report.outcome).toBe('local');
    expect(await storedCollection(repository)).toHaveLength(2);
    expect(repository.commits).toEqual([]);
    expect(pullRequests.calls).toEqual([]);
  });

  it('publishes normally after a local run', async () => {
    const { deps, repository, pullRequests } = setup(ROSTER);
    await runTeamPageSync(deps, 'local');
    const report = await runTeamPageSync(deps);

    expect(report.outcome).toBe('published');
    expect(report.summary.added).toEqual(['a_lee', 'b_kim']);
    expect(repository.commits).toHaveLength(1);
    expect(pullRequests.calls).toHaveLength(1);
  });
});

describe('createDefaultDependencies', () => {
  it('wires a git working copy at the configured path', () => {
    const localPath = tempDir();
    const cfg = parsePipelineConfig({
      column_mapping: { display_name: 'Full Name' },
      repository: {
        url: 'https://github.com/example-org/community-website.git',
        owner: 'example-org',
        name: 'community-website',
        local_path: localPath,
      },
    });
    const deps = createDefaultDependencies(cfg, { repositoryToken: 'test-secret' }, { source: csvSource('') });

    expect(deps.repository).toBeInstanceOf(GitWorkingCopy);
    expect(deps.repository.root).toBe(localPath);
  });

  it('fails a full publish when no repository token is configured', async () => {
    const cfg = parsePipelineConfig({
      column_mapping: { display_name: 'Full Name' },
      repository: {
        url: 'https://github.com/example-org/community-website.git',
        owner: 'example-org',
        name: 'community-website',
        local_path: tempDir(),
      },
    });
    const deps = createDefaultDependencies(cfg, {}, { source: csvSource('') });

    await expect(deps.publisher.publish([], [], emptySummary())).rejects.toThrow(ConfigurationError);
  });
});
