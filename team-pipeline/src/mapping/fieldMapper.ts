/**
 * Field Mapper
 *
 * Checks the configured column mapping against the sheet's header row once,
 * then hands out typed rows. A renamed or deleted column upstream becomes a
 * single ConfigurationError before any row is touched.
 */

import Fuse from 'fuse.js';
import { ConfigurationError } from '../utils/errors.js';
import type { RawRow } from '../types/Member.js';

export const LOGICAL_FIELDS = [
  'display_name',
  'role',
  'committee',
  'bio',
  'chair',
  'publish',
  'image_url',
  'github',
  'linkedin',
  'website',
  'twitter',
  'bluesky',
  'mastodon',
] as const;

export type LogicalField = (typeof LOGICAL_FIELDS)[number];

/** Header text or 0-based column ordinal. */
export type ColumnRef = string | number;

export type FieldMapping = Partial<Record<LogicalField, ColumnRef>>;

export type MappedRow = Record<LogicalField, string> & { rowNumber: number };

export interface FieldMapper {
  /** Logical fields backed by a real column. */
  readonly mappedFields: ReadonlySet<LogicalField>;
  map(row: RawRow): MappedRow;
}

function suggestHeader(missing: string, headers: string[]): string | undefined {
  const fuse = new Fuse(headers, { threshold: 0.4, ignoreLocation: true });
  return fuse.search(missing)[0]?.item;
}

/**
 * Resolve every configured column to a header, or throw ConfigurationError.
 */
export function createFieldMapper(mapping: FieldMapping, headers: string[]): FieldMapper {
  const trimmed = headers.map((h) => h.trim());
  const occurrences = new Map<string, number>();
  for (const h of trimmed) occurrences.set(h, (occurrences.get(h) ?? 0) + 1);
  // Rows are keyed by header text, so a repeated header keeps only its last cell.
  const repeated = (header: string) => {
    const count = occurrences.get(header) ?? 0;
    return count > 1 ? count : undefined;
  };
  const resolved = new Map<LogicalField, string>();
  const problems: string[] = [];

  if (mapping.display_name === undefined) {
    problems.push('display_name is not mapped to any column');
  }

  for (const field of LOGICAL_FIELDS) {
    const ref = mapping[field];
    if (ref === undefined) continue;

    if (typeof ref === 'number') {
      const header = trimmed[ref];
      if (header === undefined) {
        problems.push(`${field} → column #${ref} is out of range (sheet has ${trimmed.length} columns)`);
        continue;
      }
      const count = repeated(header);
      if (count !== undefined) {
        problems.push(`${field} → column #${ref} is headed "${header}", which appears ${count} times in the header row`);
        continue;
      }
      resolved.set(field, header);
      continue;
    }

    const wanted = ref.trim();
    if (!trimmed.includes(wanted)) {
      const hint = suggestHeader(wanted, trimmed);
      problems.push(`${field} → column "${wanted}" is missing${hint ? ` (did you mean "${hint}"?)` : ''}`);
      continue;
    }
    const count = repeated(wanted);
    if (count !== undefined) {
      problems.push(`${field} → column "${wanted}" appears ${count} times in the header row`);
      continue;
    }
    resolved.set(field, wanted);
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Column mapping does not match the sheet: ${problems.join('; ')}`);
  }

  return {
    mappedFields: new Set(resolved.keys()),
    map(row: RawRow): MappedRow {
      const cells = new Map(Object.entries(row.cells).map(([k, v]) => [k.trim(), v]));
      const read = (field: LogicalField): string => {
        const header = resolved.get(field);
        return header === undefined ? '' : (cells.get(header) ?? '');
      };
      return {
        rowNumber: row.rowNumber,
        display_name: read('display_name'),
        role: read('role'),
        committee: read('committee'),
        bio: read('bio'),
        chair: read('chair'),
        publish: read('publish'),
        image_url: read('image_url'),
        github: read('github'),
        linkedin: read('linkedin'),
        website: read('website'),
        twitter: read('twitter'),
        bluesky: read('bluesky'),
        mastodon: read('mastodon'),
      };
    },
  };
}
