/**
 * Record Validator
 *
 * Turns mapped rows into member records. Bad rows are collected, never thrown:
 * a batch with some broken rows still publishes the good ones.
 */

import { z } from 'zod';
import { DuplicateIdentityError, ValidationError } from '../utils/errors.js';
import { collapseWhitespace, deriveIdentity, normalizeDisplayName } from '../utils/identity.js';
import { LINK_KINDS } from '../types/Member.js';
import type { LogicalField, MappedRow } from './fieldMapper.js';
import type { MemberLinks, MemberRecord, SourcedMember, SummaryWarning } from '../types/Member.js';

const optionalText = z
  .string()
  .transform(collapseWhitespace)
  .transform((s) => (s === '' ? undefined : s));

const memberRowSchema = z.object({
  display_name: z
    .string()
    .transform(normalizeDisplayName)
    .pipe(z.string().min(1, 'display name is required')),
  role: optionalText,
  committee: optionalText,
  bio: z
    .string()
    .transform((s) => s.trim())
    .transform((s) => (s === '' ? undefined : s)),
  chair: z.string().transform((s) => isYes(s)),
});

export interface ValidationOutcome {
  members: SourcedMember[];
  errors: ValidationError[];
  duplicates: DuplicateIdentityError[];
  /** Rows left out because the member did not consent to publication. */
  skipped: number[];
  warnings: SummaryWarning[];
}

export interface ValidateOptions {
  /** Fields backed by a real column; the consent filter only applies when `publish` is mapped. */
  mappedFields: ReadonlySet<LogicalField>;
}

export function isYes(value: string): boolean {
  return value.trim().toLowerCase() === 'yes';
}

/**
 * Accept an absolute http(s) URL, adding https:// when the scheme is missing.
 * Returns undefined when the value is not a usable URL.
 */
export function normalizeUrl(raw: string): string | undefined {
  const value = raw.trim();
  if (!value) return undefined;
  const candidate = /^[a-z][a-z0-9+.-]*:/i.test(value) ? value : `https://${value}`;
  try {
    const url = new URL(candidate);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return undefined;
    if (!url.hostname.includes('.')) return undefined;
    return url.href;
  } catch {
    return undefined;
  }
}

/**
 * Validate a single mapped row.
 */
export function validateRow(
  row: MappedRow,
): { member: SourcedMember; warnings: SummaryWarning[] } | { error: ValidationError } {
  const parsed = memberRowSchema.safeParse(row);
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((i) => String(i.path[0] ?? 'row')))];
    const problems = parsed.error.issues.map((i) => `${i.path.join('.') || 'row'}: ${i.message}`);
    return { error: new ValidationError(row.rowNumber, fields, problems) };
  }

  const data = parsed.data;
  const identity = deriveIdentity(data.display_name);
  if (!identity) {
    return {
      error: new ValidationError(row.rowNumber, ['display_name'], [
        `display_name: "${data.display_name}" has no letters or digits to build an identity from`,
      ]),
    };
  }

  const warnings: SummaryWarning[] = [];
  const dropped = (field: string, value: string) =>
    warnings.push({ identity, message: `Dropped malformed ${field} URL "${value.trim()}" (row ${row.rowNumber})` });

  const links: MemberLinks = {};
  for (const kind of LINK_KINDS) {
    const value = row[kind];
    if (!value.trim()) continue;
    const url = normalizeUrl(value);
    if (url) links[kind] = url;
    else dropped(kind, value);
  }

  let imageUrl: string | undefined;
  if (row.image_url.trim()) {
    imageUrl = normalizeUrl(row.image_url);
    if (!imageUrl) dropped('image', row.image_url);
  }

  const role = data.chair ? 'Chair' : data.role;
  const record: MemberRecord = { identity, display_name: data.display_name };
  if (role) record.role = role;
  if (data.committee) record.committee = data.committee;
  if (data.bio) record.bio = data.bio;
  if (Object.keys(links).length > 0) record.links = links;

  return { member: { record, sourceRow: row.rowNumber, imageUrl }, warnings };
}

/**
 * Validate a whole batch. Duplicate identities are reported and the later row wins.
 */
export function validateRows(rows: MappedRow[], options: ValidateOptions): ValidationOutcome {
  const consentRequired = options.mappedFields.has('publish');
  const byIdentity = new Map<string, SourcedMember>();
  const warningsByIdentity = new Map<string, SummaryWarning[]>();
  const outcome: ValidationOutcome = { members: [], errors: [], duplicates: [], skipped: [], warnings: [] };

  for (const row of rows) {
    if (consentRequired && !isYes(row.publish)) {
      outcome.skipped.push(row.rowNumber);
      continue;
    }

    const result = validateRow(row);
    if ('error' in result) {
      outcome.errors.push(result.error);
      continue;
    }

    const { member, warnings } = result;

    const earlier = byIdentity.get(member.record.identity);
    if (earlier) {
      outcome.duplicates.push(new DuplicateIdentityError(member.record.identity, earlier.sourceRow, member.sourceRow));
      byIdentity.delete(member.record.identity);
    }
    byIdentity.set(member.record.identity, member);
    // A losing duplicate's warnings describe a row that is not published.
    warningsByIdentity.set(member.record.identity, warnings);
  }

  outcome.members = [...byIdentity.values()];
  outcome.warnings = outcome.members.flatMap((m) => warningsByIdentity.get(m.record.identity) ?? []);
  return outcome;
}
