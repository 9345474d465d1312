/**
 * Working copy of the website repository, driven through the git CLI.
 */

import { execFile } from 'child_process';
import { existsSync, readdirSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, join, relative, resolve, isAbsolute } from 'path';
import { GitCommandError, RepositoryStateError, describeError, maskSecret } from '../utils/errors.js';
import type { Logger } from '../types/Logger.js';

export interface Repository {
  /** Absolute path of the working copy. */
  readonly root: string;
  prepare(): Promise<void>;
  readFile(path: string): Promise<Buffer | undefined>;
  writeFile(path: string, content: Buffer | string): Promise<void>;
  stage(paths: string[]): Promise<void>;
  hasStagedChanges(): Promise<boolean>;
  /** Returns the new commit SHA. */
  commit(message: string): Promise<string>;
  push(branch: string): Promise<void>;
}

export interface GitResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export type GitRunner = (args: string[], options: { cwd: string; timeoutMs: number }) => Promise<GitResult>;

export const runGit: GitRunner = (args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      'git',
      args,
      { cwd: options.cwd, timeout: options.timeoutMs, maxBuffer: 16 * 1024 * 1024, encoding: 'utf8' },
      (error, stdout, stderr) => {
        if (!error) return resolve({ exitCode: 0, stdout, stderr, timedOut: false });
        if (error.killed) return resolve({ exitCode: -1, stdout, stderr, timedOut: true });
        if (typeof error.code === 'number') return resolve({ exitCode: error.code, stdout, stderr, timedOut: false });
        reject(error);
      },
    );
  });

export interface GitWorkingCopyOptions {
  path: string;
  remoteUrl: string;
  token?: string;
  baseBranch: string;
  branch: string;
  author: { name: string; email: string };
  timeoutMs: number;
  /** Paths the pipeline writes; leftovers there from an earlier run are discarded in prepare(). */
  ownedPaths?: string[];
  runner?: GitRunner;
  log?: Logger;
}

/** Drop credentials and trailing `.git` / `/` so URLs compare equal. */
export function normalizeRemote(url: string): string {
  try {
    const u = new URL(url);
    u.username = '';
    u.password = '';
    return u.toString().replace(/\/$/, '').replace(/\.git$/, '').toLowerCase();
  } catch {
    return url.replace(/\/$/, '').replace(/\.git$/, '').toLowerCase();
  }
}

export function authenticatedUrl(url: string, token: string | undefined): string {
  if (!token) return url;
  const u = new URL(url);
  u.username = 'x-access-token';
  u.password = token;
  return u.toString();
}

/** Path of a `status --porcelain` line; renames report the new path. */
function statusPath(line: string): string {
  const path = line.slice(3);
  const arrow = path.indexOf(' -> ');
  return arrow === -1 ? path : path.slice(arrow + 4);
}

function isUnder(path: string, dir: string): boolean {
  const base = dir.replace(/\/+$/, '');
  return path === base || path.startsWith(`${base}/`);
}

/** Lease failures and non-fast-forward rejections will not go away on retry. */
function isPushRejection(stderr: string): boolean {
  return /stale info|\[rejected\]|\[remote rejected\]/.test(stderr);
}

export class GitWorkingCopy implements Repository {
  readonly root: string;
  private readonly runner: GitRunner;
  /** Tip of origin/<branch> seen in prepare(); empty when the branch did not exist. */
  private leaseSha = '';

  constructor(private readonly options: GitWorkingCopyOptions) {
    this.root = resolve(options.path);
    this.runner = options.runner ?? runGit;
  }

  private async git(args: string[], cwd = this.root, allowExitCodes: number[] = [0]): Promise<GitResult> {
    const { token, timeoutMs } = this.options;
    const masked = args.map((a) => maskSecret(a, token));

    let result: GitResult;
    try {
      result = await this.runner(args, { cwd, timeoutMs });
    } catch (err) {
      throw new GitCommandError(masked, maskSecret(describeError(err), token), true, { cause: err });
    }
    if (result.timedOut) {
      throw new GitCommandError(masked, `timed out after ${timeoutMs}ms`, true);
    }
    if (!allowExitCodes.includes(result.exitCode)) {
      throw new GitCommandError(masked, maskSecret(result.stderr || result.stdout, token), true);
    }
    return result;
  }

  private resolveInside(path: string): string {
    const full = resolve(this.root, path);
    const rel = relative(this.root, full);
    if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
      throw new RepositoryStateError(`Refusing to touch ${path}: outside the working copy`);
    }
    return full;
  }

  /**
   * Bring the working copy to the state the next commit should build on: the
   * open update branch when it carries unmerged work, otherwise the base branch.
   */
  async prepare(): Promise<void> {
    const { remoteUrl, token, baseBranch, branch, author, ownedPaths = [] } = this.options;
    const log = this.options.log;

    try {
      if (!existsSync(join(this.root, '.git'))) {
        if (existsSync(this.root) && readdirSync(this.root).length > 0) {
          throw new RepositoryStateError(`${this.root} exists but is not a git working copy`);
        }
        log?.log(`[git] 📥 Cloning ${remoteUrl}...`);
        await mkdir(dirname(this.root), { recursive: true });
        await this.git(['clone', '--no-tags', authenticatedUrl(remoteUrl, token), this.root], dirname(this.root));
      } else {
        const origin = (await this.git(['remote', 'get-url', 'origin'])).stdout.trim();
        if (normalizeRemote(origin) !== normalizeRemote(remoteUrl)) {
          throw new RepositoryStateError(
            `Working copy ${this.root} tracks ${normalizeRemote(origin)}, expected ${normalizeRemote(remoteUrl)}`,
          );
        }
        await this.git(['remote', 'set-url', 'origin', authenticatedUrl(remoteUrl, token)]);
      }

      const status = (await this.git(['status', '--porcelain', '--untracked-files=all'])).stdout
        .split('\n')
        .filter((line) => line.trim() !== '');
      const foreign = status.filter((line) => !ownedPaths.some((dir) => isUnder(statusPath(line), dir)));
      if (foreign.length > 0) {
        const files = foreign.slice(0, 5).map((l) => l.trim());
        throw new RepositoryStateError(`Working copy has uncommitted changes: ${files.join(', ')}`);
      }
      if (status.length > 0) {
        log?.log(`[git] 🧹 Discarding ${status.length} leftover file(s) from an earlier run`);
        await this.git(['clean', '-f', '-d', '--', ...ownedPaths]);
      }

      const remoteBranch = (await this.git(['ls-remote', '--heads', 'origin', `refs/heads/${branch}`])).stdout.trim();
      await this.git(remoteBranch ? ['fetch', 'origin', baseBranch, branch] : ['fetch', 'origin', baseBranch]);

      let startPoint = `origin/${baseBranch}`;
      this.leaseSha = '';
      if (remoteBranch) {
        this.leaseSha = (await this.git(['rev-parse', `refs/remotes/origin/${branch}`])).stdout.trim();
        // exit code 0: the branch is already contained in base (merged PR)
        const merged = await this.git(
          ['merge-base', '--is-ancestor', `origin/${branch}`, `origin/${baseBranch}`],
          this.root,
          [0, 1],
        );
        if (merged.exitCode === 1) startPoint = `origin/${branch}`;
      }

      await this.git(['checkout', '-f', '-B', branch, startPoint]);
      await this.git(['config', 'user.name', author.name]);
      await this.git(['config', 'user.email', author.email]);
      log?.log(`[git] 🌿 Checked out ${branch} from ${startPoint}`);
    } catch (err) {
      if (err instanceof GitCommandError) {
        throw new RepositoryStateError(`Could not prepare working copy: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }

  async readFile(path: string): Promise<Buffer | undefined> {
    const full = this.resolveInside(path);
    if (!existsSync(full)) return undefined;
    return readFile(full);
  }

  async writeFile(path: string, content: Buffer | string): Promise<void> {
    const full = this.resolveInside(path);
    await mkdir(dirname(full), { recursive: true });
    await writeFile(full, content);
  }

  async stage(paths: string[]): Promise<void> {
    if (paths.length === 0) return;
    await this.git(['add', '--', ...paths.map((p) => relative(this.root, this.resolveInside(p)))]);
  }

  async hasStagedChanges(): Promise<boolean> {
    // exit code 1 means "there are differences"
    const result = await this.git(['diff', '--cached', '--quiet'], this.root, [0, 1]);
    return result.exitCode === 1;
  }

  async commit(message: string): Promise<string> {
    await this.git(['commit', '-m', message]);
    return (await this.git(['rev-parse', 'HEAD'])).stdout.trim();
  }

  async push(branch: string): Promise<void> {
    // The lease refuses to overwrite commits pushed to the branch since prepare().
    const args = ['push', `--force-with-lease=refs/heads/${branch}:${this.leaseSha}`, 'origin', `HEAD:refs/heads/${branch}`];
    try {
      await this.git(args);
    } catch (err) {
      if (err instanceof GitCommandError && isPushRejection(err.stderr)) {
        throw new GitCommandError(err.args, err.stderr, false, { cause: err });
      }
      throw err;
    }
    this.leaseSha = (await this.git(['rev-parse', 'HEAD'])).stdout.trim();
  }
}
