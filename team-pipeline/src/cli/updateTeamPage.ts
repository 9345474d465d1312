/**
 * Team Page Updater
 *
 * Syncs the self-service roster sheet into the website's team.json and
 * proposes the result as a pull request.
 *
 * Usage:
 *   npx tsx src/cli/updateTeamPage.ts                      # Full run: commit, push, open/update PR
 *   npx tsx src/cli/updateTeamPage.ts --mode=local         # Write the working copy only
 *   npx tsx src/cli/updateTeamPage.ts --dry-run            # Refresh the working copy, stop after the merge
 *   npx tsx src/cli/updateTeamPage.ts --csv=roster.csv     # Read a sheet export instead of Google Sheets
 */

import { resolve } from 'path';
import { loadEnvironment, loadPipelineConfig } from '../config/pipelineConfig.js';
import { createDefaultDependencies, runTeamPageSync, type RunMode } from '../pipeline/runPipeline.js';
import { CsvFileSource } from '../sources/csvFile.js';
import { GoogleSheetSource } from '../sources/googleSheet.js';
import { ConfigurationError, PublishTransportError, TeamSyncError } from '../utils/errors.js';
import { outcomeMessage, summaryLines } from './output.js';
import type { RowSource } from '../sources/rowSource.js';

// ─────────────────────────────────────────────────────────────────────────────
// CLI Arguments
// ─────────────────────────────────────────────────────────────────────────────

const args = process.argv.slice(2);

function argValue(name: string): string | undefined {
  return args.find((a) => a.startsWith(`--${name}=`))?.split('=').slice(1).join('=');
}

function parseMode(): RunMode {
  if (args.includes('--dry-run')) return 'dry-run';
  const mode = argValue('mode') ?? 'full';
  if (mode !== 'full' && mode !== 'local') {
    throw new ConfigurationError(`Unknown --mode "${mode}" (expected "full" or "local")`);
  }
  return mode;
}

// ─────────────────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────────────────

function printBanner(mode: RunMode): void {
  console.log('╔══════════════════════════════════════════════════════════════════╗');
  console.log('║                     TEAM PAGE ROSTER SYNC                        ║');
  console.log('╚══════════════════════════════════════════════════════════════════╝');
  console.log(`   Mode: ${mode}`);
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

async function main() {
  const mode = parseMode();
  printBanner(mode);

  const config = loadPipelineConfig();
  const env = loadEnvironment();
  const csvPath = argValue('csv');

  const source: RowSource = csvPath
    ? new CsvFileSource(resolve(process.cwd(), csvPath))
    : new GoogleSheetSource({
        sheetId: env.sheetId,
        worksheetName: env.worksheetName,
        credentialsPath: env.googleCredentialsPath,
        timeoutMs: config.timeout_ms,
      });

  const deps = createDefaultDependencies(config, env, { source, log: console });
  const report = await runTeamPageSync(deps, mode);
  for (const line of summaryLines(report)) console.log(line);
  console.log(outcomeMessage(report));
}

main().catch((err) => {
  if (err instanceof PublishTransportError) {
    const p = err.progress;
    console.error(`❌ Publish stopped at "${err.step}": ${err.message}`);
    console.error(`   Files written: ${p.filesWritten.join(', ') || 'none'}`);
    console.error(`   Commit: ${p.commitSha ?? 'none'}`);
    console.error(`   Branch pushed: ${p.branchPushed ? 'yes' : 'no'}`);
    console.error(`   Pull request: ${p.pullRequest?.url ?? 'not created'}`);
  } else if (err instanceof TeamSyncError) {
    console.error(`❌ ${err.name}: ${err.message}`);
  } else {
    console.error('❌ Team page sync failed:', err);
  }
  process.exit(1);
});
