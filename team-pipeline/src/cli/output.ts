/**
 * Console text for the team page CLI.
 */

import type { RunReport } from '../pipeline/runPipeline.js';

function list(label: string, items: readonly (string | number)[]): string {
  return `   ${label}: ${items.length}${items.length ? ` (${items.join(', ')})` : ''}`;
}

export function summaryLines(report: RunReport): string[] {
  const { summary } = report;
  const lines = ['\n📊 Change Summary:', list('Added', summary.added), list('Updated', summary.updated)];
  lines.push(`   Unchanged: ${summary.unchanged.length}`, list('Stale', summary.stale));
  if (summary.removed.length) lines.push(list('Removed', summary.removed));
  if (summary.duplicates.length) lines.push(list('Duplicates', summary.duplicates));
  if (summary.invalid.length) lines.push(list('Rejected rows', summary.invalid));
  lines.push(`   Images to write: ${report.images.filter((i) => i.outcome !== 'unchanged').length}`);

  if (summary.warnings.length) {
    lines.push('\n⚠️  Warnings:');
    for (const w of summary.warnings) lines.push(`   - ${w.identity}: ${w.message}`);
  }
  return lines;
}

export function outcomeMessage(report: RunReport): string {
  switch (report.outcome) {
    case 'published':
      return `\n✅ Pull request ready: ${report.publish?.pullRequest?.url ?? '(unknown)'}`;
    case 'unchanged':
      return '\n✅ Team page already up to date. No pull request needed.';
    case 'local':
      return '\n✅ Local update completed. Changes are left uncommitted in the working copy.';
    case 'dry-run':
      // prepare() still clones or refreshes the working copy to read the previous state.
      return '\n  [DRY RUN] Working copy refreshed from the remote; no roster changes written or published. Drop --dry-run to apply.';
  }
}
