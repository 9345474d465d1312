import type { ChangeSummary } from '../types/Member.js';

export const PULL_REQUEST_TITLE = 'Team page auto-update';

/**
 * One-line commit subject carrying the summary counts. Same summary, same message.
 */
export function commitMessage(summary: ChangeSummary, changedImages: number): string {
  const parts = [
    `${summary.added.length} added`,
    `${summary.updated.length} updated`,
    `${summary.unchanged.length} unchanged`,
    `${summary.stale.length} stale`,
  ];
  if (summary.removed.length > 0) parts.push(`${summary.removed.length} removed`);
  if (changedImages > 0) parts.push(`${changedImages} image${changedImages === 1 ? '' : 's'}`);
  return `Update team page: ${parts.join(', ')}`;
}

function section(heading: string, items: string[]): string[] {
  if (items.length === 0) return [];
  return ['', `### ${heading}`, ...items.map((item) => `- ${item}`)];
}

const code = (identity: string) => `\`${identity}\``;

export function pullRequestBody(summary: ChangeSummary, changedImages: number): string {
  const lines = [
    'Automated update of the team page from the roster sheet.',
    '',
    '| Change | Count |',
    '| --- | --- |',
    `| Added | ${summary.added.length} |`,
    `| Updated | ${summary.updated.length} |`,
    `| Unchanged | ${summary.unchanged.length} |`,
    `| Stale | ${summary.stale.length} |`,
    `| Removed | ${summary.removed.length} |`,
    `| Images written | ${changedImages} |`,
    ...section('Added', summary.added.map(code)),
    ...section('Updated', summary.updated.map(code)),
    ...section('Stale (missing from the sheet, kept for review)', summary.stale.map(code)),
    ...section('Removed', summary.removed.map(code)),
    ...section('Duplicate identities (later row kept)', summary.duplicates.map(code)),
    ...section('Rejected rows', summary.invalid.map((row) => `row ${row}`)),
    ...section('Warnings', summary.warnings.map((w) => `${code(w.identity)}: ${w.message}`)),
  ];
  return `${lines.join('\n')}\n`;
}
