export const LINK_KINDS = ['github', 'linkedin', 'website', 'twitter', 'bluesky', 'mastodon'] as const;

export type LinkKind = (typeof LINK_KINDS)[number];

export type MemberLinks = Partial<Record<LinkKind, string>>;

/**
 * One person's published profile, as stored in the team JSON file.
 * Optional fields are absent rather than empty.
 */
export interface MemberRecord {
  identity: string;
  display_name: string;
  role?: string;
  committee?: string;
  bio?: string;
  links?: MemberLinks;
  image_filename?: string;
}

/** Keys the pipeline owns; anything else on a stored record was curated by hand. */
export const MANAGED_FIELDS = [
  'identity',
  'display_name',
  'role',
  'committee',
  'bio',
  'links',
  'image_filename',
] as const satisfies readonly (keyof MemberRecord)[];

export type ManagedField = (typeof MANAGED_FIELDS)[number];

/** A stored record, possibly carrying extra curated keys. */
export type StoredMember = MemberRecord & { [extra: string]: unknown };

export type MemberCollection = StoredMember[];

/** A validated record plus the in-memory data that is never persisted. */
export interface SourcedMember {
  record: MemberRecord;
  sourceRow: number;
  imageUrl?: string;
}

export interface RawRow {
  /** Spreadsheet row number; the header is row 1. */
  rowNumber: number;
  cells: Record<string, string>;
}

export interface RowBatch {
  headers: string[];
  rows: RawRow[];
}

export interface SummaryWarning {
  identity: string;
  message: string;
}

export interface ChangeSummary {
  added: string[];
  updated: string[];
  unchanged: string[];
  stale: string[];
  removed: string[];
  duplicates: string[];
  invalid: number[];
  warnings: SummaryWarning[];
}

export function emptySummary(): ChangeSummary {
  return {
    added: [],
    updated: [],
    unchanged: [],
    stale: [],
    removed: [],
    duplicates: [],
    invalid: [],
    warnings: [],
  };
}

/** True when the run changes the published collection. */
export function hasCollectionChanges(summary: ChangeSummary): boolean {
  return summary.added.length > 0 || summary.updated.length > 0 || summary.removed.length > 0;
}
