/**
 * State Merger
 *
 * Folds this run's records into the last published collection by identity.
 * Members missing from the sheet are kept and reported as stale: a row that
 * vanished from the sheet is a human decision, not something to publish.
 */

import { z } from 'zod';
import { StateCorruptionError } from '../utils/errors.js';
import { MANAGED_FIELDS, emptySummary } from '../types/Member.js';
import type {
  ChangeSummary,
  ManagedField,
  MemberCollection,
  MemberRecord,
  StoredMember,
} from '../types/Member.js';

const storedMemberSchema = z
  .object({
    identity: z.string().min(1),
    display_name: z.string().min(1),
    role: z.string().optional(),
    committee: z.string().optional(),
    bio: z.string().optional(),
    links: z.record(z.string()).optional(),
    image_filename: z.string().optional(),
  })
  .passthrough();

const collectionSchema = z.array(storedMemberSchema);

export interface MergeOptions {
  sortKey: ManagedField | null;
  committeeOrder?: string[];
  allowDelete?: boolean;
}

export interface MergeResult {
  collection: MemberCollection;
  summary: ChangeSummary;
}

/**
 * Parse the stored JSON text. Undefined text means there is no previous state.
 */
export function parseCollection(text: string | undefined, path: string): MemberCollection {
  if (text === undefined) return [];

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new StateCorruptionError(path, 'file is not valid JSON', { cause: err });
  }

  const parsed = collectionSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` at [${issue.path.join('.')}]` : '';
    throw new StateCorruptionError(path, `unexpected shape${where}: ${issue?.message ?? 'unknown'}`);
  }

  const seen = new Set<string>();
  for (const member of parsed.data) {
    if (seen.has(member.identity)) {
      throw new StateCorruptionError(path, `identity "${member.identity}" appears more than once`);
    }
    seen.add(member.identity);
  }
  return parsed.data;
}

function canonical(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (value === null || typeof value !== 'object') return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map(canonical).join(',')}]`;
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonical(v)}`).join(',')}}`;
}

/** Compare only the pipeline-owned fields; curated extras never count as a change. */
export function sameManagedFields(stored: StoredMember, next: MemberRecord): boolean {
  return MANAGED_FIELDS.every((field) => canonical(stored[field]) === canonical(next[field]));
}

function extensionFields(stored: StoredMember): Record<string, unknown> {
  const managed: ReadonlySet<string> = new Set(MANAGED_FIELDS);
  return Object.fromEntries(Object.entries(stored).filter(([key]) => !managed.has(key)));
}

function sortValue(member: StoredMember, key: ManagedField): string {
  const value = member[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Stable ordering by committee rank, then sort key. Array.prototype.sort is
 * stable, so ties keep the base order.
 */
export function orderCollection(members: MemberCollection, options: MergeOptions): MemberCollection {
  const order = options.committeeOrder ?? [];
  const rank = (m: StoredMember) => {
    const idx = m.committee === undefined ? -1 : order.indexOf(m.committee);
    return idx === -1 ? order.length : idx;
  };
  const key = options.sortKey;

  return [...members].sort((a, b) => {
    if (order.length > 0) {
      const diff = rank(a) - rank(b);
      if (diff !== 0) return diff;
    }
    if (key) return sortValue(a, key).localeCompare(sortValue(b, key), 'en');
    return 0;
  });
}

/**
 * Merge new records into the previous collection and summarize what changed.
 */
export function mergeCollection(
  previous: MemberCollection,
  records: MemberRecord[],
  options: MergeOptions,
): MergeResult {
  const summary = emptySummary();
  const previousById = new Map(previous.map((m) => [m.identity, m]));
  const incoming = new Set<string>();
  const base: MemberCollection = [];

  for (const record of records) {
    incoming.add(record.identity);
    const stored = previousById.get(record.identity);

    if (!stored) {
      summary.added.push(record.identity);
      base.push({ ...record });
    } else if (sameManagedFields(stored, record)) {
      summary.unchanged.push(record.identity);
      base.push(stored);
    } else {
      summary.updated.push(record.identity);
      base.push({ ...extensionFields(stored), ...record });
    }
  }

  for (const stored of previous) {
    if (incoming.has(stored.identity)) continue;
    if (options.allowDelete) {
      summary.removed.push(stored.identity);
    } else {
      summary.stale.push(stored.identity);
      base.push(stored);
    }
  }

  return { collection: orderCollection(base, options), summary };
}

/**
 * Serialize with managed keys first in a fixed order, then curated keys,
 * two-space indent and a trailing newline.
 */
export function serializeCollection(collection: MemberCollection): string {
  const ordered = collection.map((member) => {
    const out: Record<string, unknown> = {};
    for (const field of MANAGED_FIELDS) {
      if (member[field] !== undefined) out[field] = member[field];
    }
    return { ...out, ...extensionFields(member) };
  });
  return `${JSON.stringify(ordered, null, 2)}\n`;
}
