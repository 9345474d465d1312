import fetch, { type Response } from 'node-fetch';
import { z } from 'zod';
import { GitHubApiError, describeError, maskSecret } from '../utils/errors.js';
import type { Fetcher } from '../images/imageResolver.js';

export interface PullRequestRef {
  number: number;
  url: string;
  /** False when an already open pull request was updated. */
  created: boolean;
}

export interface PullRequestApi {
  openOrUpdatePullRequest(branch: string, title: string, body: string): Promise<PullRequestRef>;
}

export interface GitHubClientOptions {
  owner: string;
  repo: string;
  token: string;
  baseBranch: string;
  timeoutMs: number;
  apiUrl?: string;
  fetcher?: Fetcher;
}

const pullRequestSchema = z.object({
  number: z.number().int(),
  html_url: z.string(),
});

const DEFAULT_API_URL = 'https://api.github.com';

export class GitHubClient implements PullRequestApi {
  private readonly fetcher: Fetcher;
  private readonly apiUrl: string;

  constructor(private readonly options: GitHubClientOptions) {
    this.fetcher = options.fetcher ?? fetch;
    this.apiUrl = (options.apiUrl ?? DEFAULT_API_URL).replace(/\/$/, '');
  }

  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    const { token, timeoutMs } = this.options;
    const url = `${this.apiUrl}${path}`;

    let res: Response;
    try {
      res = await this.fetcher(url, {
        method,
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: 'application/vnd.github+json',
          'X-GitHub-Api-Version': '2022-11-28',
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new GitHubApiError(undefined, `[github] ${method} ${path} failed: ${maskSecret(describeError(err), token)}`, {
        cause: err,
      });
    }

    if (!res.ok) {
      const text = await res.text();
      throw new GitHubApiError(res.status, `[github] ${method} ${path} → HTTP ${res.status} - ${maskSecret(text, token)}`);
    }
    return res.json();
  }

  async openOrUpdatePullRequest(branch: string, title: string, body: string): Promise<PullRequestRef> {
    const { owner, repo, baseBranch } = this.options;
    const base = `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/pulls`;
    const head = `${owner}:${branch}`;

    const open = z
      .array(pullRequestSchema)
      .parse(await this.request('GET', `${base}?state=open&head=${encodeURIComponent(head)}&base=${encodeURIComponent(baseBranch)}`));

    const existing = open[0];
    if (existing) {
      const updated = pullRequestSchema.parse(await this.request('PATCH', `${base}/${existing.number}`, { title, body }));
      return { number: updated.number, url: updated.html_url, created: false };
    }

    const created = pullRequestSchema.parse(
      await this.request('POST', base, { title, head: branch, base: baseBranch, body }),
    );
    return { number: created.number, url: created.html_url, created: true };
  }
}
