/**
 * Image Resolver
 *
 * Downloads member photos, names them after the member identity and compares
 * them with the copy already in the website repository:
 *   - new        no stored file yet, write it
 *   - updated    stored file differs, overwrite it
 *   - unchanged  SHA-1 matches, skip the write
 *
 * A failed download never drops the member; the record just goes out without
 * an image and the failure becomes a warning.
 */

import { createHash } from 'crypto';
import { readFile } from 'fs/promises';
import { extname, join } from 'path';
import fetch, { FetchError, type RequestInit, type Response } from 'node-fetch';
import pLimit from 'p-limit';
import { ImageFetchError, describeError } from '../utils/errors.js';
import type { Logger } from '../types/Logger.js';
import type { SourcedMember, SummaryWarning } from '../types/Member.js';

export type Fetcher = (url: string, init?: RequestInit) => Promise<Response>;

export type ImageOutcome = 'new' | 'updated' | 'unchanged';

export interface ResolvedImage {
  filename: string;
  outcome: ImageOutcome;
  sha1: string;
  content: Buffer;
}

export interface ImageResolution {
  member: SourcedMember;
  image?: ResolvedImage;
  error?: ImageFetchError;
}

export interface ImageResolverOptions {
  /** Directory holding the already-published images. */
  imageDir: string;
  maxBytes: number;
  allowedContentTypes: string[];
  timeoutMs: number;
  concurrency: number;
  cache: ImageCache;
  fetcher?: Fetcher;
  log?: Logger;
}

interface FetchedImage {
  content: Buffer;
  contentType: string;
}

type CachedFetch = { ok: true; image: FetchedImage } | { ok: false; error: ImageFetchError };

/**
 * Per-run download cache keyed by URL. Two members sharing a photo URL
 * cause one request.
 */
export class ImageCache {
  private readonly entries = new Map<string, Promise<CachedFetch>>();

  get size(): number {
    return this.entries.size;
  }

  getOrFetch(url: string, load: () => Promise<CachedFetch>): Promise<CachedFetch> {
    let entry = this.entries.get(url);
    if (!entry) {
      entry = load();
      this.entries.set(url, entry);
    }
    return entry;
  }
}

const EXTENSION_BY_TYPE: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/png': 'png',
  'image/webp': 'webp',
  'image/gif': 'gif',
  'image/svg+xml': 'svg',
  'image/avif': 'avif',
};

const KNOWN_EXTENSIONS = new Set(['jpg', 'jpeg', 'png', 'webp', 'gif', 'svg', 'avif']);

/**
 * Rewrite Google Drive share links to their direct download form.
 */
export function toDownloadUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  if (parsed.hostname !== 'drive.google.com') return url;

  const fileMatch = parsed.pathname.match(/^\/file\/d\/([^/]+)/);
  const id = fileMatch?.[1] ?? parsed.searchParams.get('id');
  if (!id) return url;
  return `https://drive.google.com/uc?export=download&id=${encodeURIComponent(id)}`;
}

/**
 * Pick the stored file name: identity plus the URL's extension, falling back
 * to the extension implied by the content type.
 */
export function imageFilename(identity: string, url: string, contentType: string): string {
  let ext = '';
  try {
    ext = extname(new URL(url).pathname).slice(1).toLowerCase();
  } catch {
    ext = '';
  }
  if (!KNOWN_EXTENSIONS.has(ext)) {
    ext = EXTENSION_BY_TYPE[contentType] ?? contentType.split('/')[1] ?? 'img';
  }
  return `${identity}.${ext}`;
}

export function sha1(content: Buffer): string {
  return createHash('sha1').update(content).digest('hex');
}

async function readStored(path: string): Promise<Buffer | undefined> {
  try {
    return await readFile(path);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }
}

export class ImageResolver {
  private readonly fetcher: Fetcher;
  private readonly log?: Logger;

  constructor(private readonly options: ImageResolverOptions) {
    this.fetcher = options.fetcher ?? fetch;
    this.log = options.log;
  }

  private async download(url: string): Promise<CachedFetch> {
    const target = toDownloadUrl(url);
    const { maxBytes, allowedContentTypes, timeoutMs } = this.options;
    const fail = (reason: string, cause?: unknown): CachedFetch => ({
      ok: false,
      error: new ImageFetchError(url, reason, { cause }),
    });

    let res: Response;
    try {
      // `size` makes node-fetch abort the body read once it passes the limit.
      res = await this.fetcher(target, { redirect: 'follow', size: maxBytes, signal: AbortSignal.timeout(timeoutMs) });
    } catch (err) {
      const timedOut = err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
      return fail(timedOut ? `timed out after ${timeoutMs}ms` : describeError(err), err);
    }

    if (!res.ok) {
      return fail(`HTTP ${res.status}`);
    }

    const contentType = (res.headers.get('content-type') ?? '').split(';')[0].trim().toLowerCase();
    if (!allowedContentTypes.includes(contentType)) {
      return fail(`content type "${contentType || 'missing'}" is not an allowed image type`);
    }

    const declared = Number(res.headers.get('content-length') ?? NaN);
    if (Number.isFinite(declared) && declared > maxBytes) {
      return fail(`image is ${declared} bytes, limit is ${maxBytes}`);
    }

    let content: Buffer;
    try {
      content = Buffer.from(await res.arrayBuffer());
    } catch (err) {
      if (err instanceof FetchError && err.type === 'max-size') {
        return fail(`image is larger than the ${maxBytes} byte limit`, err);
      }
      return fail(describeError(err), err);
    }
    if (content.length > maxBytes) {
      return fail(`image is ${content.length} bytes, limit is ${maxBytes}`);
    }

    return { ok: true, image: { content, contentType } };
  }

  /**
   * Resolve one member's image. Members without an image URL pass through.
   */
  async resolve(member: SourcedMember): Promise<ImageResolution> {
    const { image_filename: _previous, ...record } = member.record;
    const bare: SourcedMember = { ...member, record };
    if (!member.imageUrl) return { member: bare };

    const url = member.imageUrl;
    const fetched = await this.options.cache.getOrFetch(url, () => this.download(url));
    if (!fetched.ok) {
      this.log?.warn(`[images] ⚠️  ${record.identity}: ${fetched.error.reason}`);
      return { member: bare, error: fetched.error };
    }

    const { content, contentType } = fetched.image;
    const filename = imageFilename(record.identity, url, contentType);
    const digest = sha1(content);
    const stored = await readStored(join(this.options.imageDir, filename));

    let outcome: ImageOutcome = 'new';
    if (stored) outcome = sha1(stored) === digest ? 'unchanged' : 'updated';

    return {
      member: { ...member, record: { ...record, image_filename: filename } },
      image: { filename, outcome, sha1: digest, content },
    };
  }

  /**
   * Resolve a batch in a bounded pool. Results keep input order.
   */
  async resolveAll(members: SourcedMember[]): Promise<ImageResolution[]> {
    const limit = pLimit(this.options.concurrency);
    return Promise.all(members.map((m) => limit(() => this.resolve(m))));
  }
}

/** Turn fetch failures into change summary warnings. */
export function imageWarnings(resolutions: ImageResolution[]): SummaryWarning[] {
  return resolutions.flatMap((r) =>
    r.error ? [{ identity: r.member.record.identity, message: `Image not published: ${r.error.reason}` }] : [],
  );
}
