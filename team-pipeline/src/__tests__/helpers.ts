import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { Response, type RequestInit } from 'node-fetch';
import { vi } from 'vitest';
import { GitCommandError, RepositoryStateError } from '../utils/errors.js';
import type { Repository } from '../publish/gitRepository.js';
import type { PullRequestApi, PullRequestRef } from '../github/client.js';
import type { Logger } from '../types/Logger.js';

export function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'team-sync-'));
}

export function quietLog(): Logger {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function imageResponse(bytes: Buffer, contentType = 'image/png'): Response {
  return new Response(bytes, { status: 200, headers: { 'content-type': contentType } });
}

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: { 'content-type': 'application/json' } });
}

/**
 * Fetcher answering from a route table; unknown URLs get a 404.
 */
export function routeFetcher(routes: Record<string, () => Response>) {
  return vi.fn(async (url: string, _init?: RequestInit) => {
    const route = routes[url];
    return route ? route() : new Response('not found', { status: 404 });
  });
}

type Tree = Map<string, Buffer>;

const toBuffer = (content: string | Buffer) => (typeof content === 'string' ? Buffer.from(content) : content);

/**
 * Working copy on disk with git replaced by bookkeeping. It keeps a base
 * branch and the pushed update branch; prepare() checks out the update
 * branch while it is open and unmerged, else base, and discards whatever
 * the last run left on disk. Pushes can be made to fail.
 */
export class FakeRepository implements Repository {
  prepareCalls = 0;
  dirty = false;
  pushFailures = 0;
  readonly commits: string[] = [];
  readonly pushes: string[] = [];
  readonly base: Tree = new Map();
  remoteBranch: Tree | undefined;
  private branchMerged = false;
  private head: Tree = new Map();
  private readonly staged = new Set<string>();

  constructor(readonly root: string = tempDir()) {}

  /** Put a file in place as if it were already on the base branch. */
  seed(path: string, content: string | Buffer): void {
    const bytes = toBuffer(content);
    this.base.set(path, bytes);
    this.head.set(path, bytes);
    this.writeToDisk(path, bytes);
  }

  /** Merge the pushed update branch into base, as a reviewer would. */
  mergePullRequest(): void {
    if (!this.remoteBranch) return;
    for (const [path, bytes] of this.remoteBranch) this.base.set(path, bytes);
    this.branchMerged = true;
  }

  async prepare(): Promise<void> {
    if (this.dirty) throw new RepositoryStateError('Working copy has uncommitted changes: notes.txt');
    this.prepareCalls++;
    const start = this.remoteBranch && !this.branchMerged ? this.remoteBranch : this.base;
    rmSync(this.root, { recursive: true, force: true });
    mkdirSync(this.root, { recursive: true });
    for (const [path, bytes] of start) this.writeToDisk(path, bytes);
    this.head = new Map(start);
    this.staged.clear();
  }

  async readFile(path: string): Promise<Buffer | undefined> {
    const full = join(this.root, path);
    return existsSync(full) ? readFileSync(full) : undefined;
  }

  async writeFile(path: string, content: Buffer | string): Promise<void> {
    this.writeToDisk(path, toBuffer(content));
  }

  async stage(paths: string[]): Promise<void> {
    for (const p of paths) this.staged.add(p);
  }

  async hasStagedChanges(): Promise<boolean> {
    return [...this.staged].some((p) => {
      const committed = this.head.get(p);
      return committed === undefined || !committed.equals(readFileSync(join(this.root, p)));
    });
  }

  async commit(message: string): Promise<string> {
    for (const p of this.staged) this.head.set(p, readFileSync(join(this.root, p)));
    this.staged.clear();
    this.commits.push(message);
    return `abc123${this.commits.length}`;
  }

  async push(branch: string): Promise<void> {
    if (this.pushFailures > 0) {
      this.pushFailures--;
      throw new GitCommandError(['push'], 'Could not resolve host: github.com', true);
    }
    this.pushes.push(branch);
    this.remoteBranch = new Map(this.head);
    this.branchMerged = false;
  }

  private writeToDisk(path: string, bytes: Buffer): void {
    const full = join(this.root, path);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, bytes);
  }
}

export class FakePullRequests implements PullRequestApi {
  readonly calls: { branch: string; title: string; body: string }[] = [];
  readonly failures: unknown[] = [];
  private opened = false;

  async openOrUpdatePullRequest(branch: string, title: string, body: string): Promise<PullRequestRef> {
    const failure = this.failures.shift();
    if (failure !== undefined) throw failure;
    this.calls.push({ branch, title, body });
    const created = !this.opened;
    this.opened = true;
    return { number: 7, url: 'https://github.com/example-org/site/pull/7', created };
  }
}
