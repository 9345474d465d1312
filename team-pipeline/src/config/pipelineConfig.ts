/**
 * Pipeline configuration
 *
 * Declarative options live in config/team-page.json (or the file named by
 * TEAM_PAGE_CONFIG). Secrets and sheet coordinates come from .env.
 */

import { config as loadDotenv } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { resolve, dirname, isAbsolute } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { LOGICAL_FIELDS } from '../mapping/fieldMapper.js';
import { MANAGED_FIELDS } from '../types/Member.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
export const PACKAGE_ROOT = resolve(__dirname, '../..');
const DEFAULT_CONFIG_PATH = resolve(PACKAGE_ROOT, 'config/team-page.json');

const columnRef = z.union([z.string().trim().min(1), z.number().int().nonnegative()]);

const columnMappingSchema = z
  .record(z.enum(LOGICAL_FIELDS), columnRef)
  .refine((mapping) => mapping.display_name !== undefined, {
    message: 'display_name must be mapped to a column',
  });

const repositorySchema = z.object({
  url: z.string().url(),
  owner: z.string().min(1),
  name: z.string().min(1),
  base_branch: z.string().min(1).default('main'),
  branch: z.string().min(1).default('team-page-update'),
  local_path: z.string().min(1).default('website'),
  collection_path: z.string().min(1).default('databags/team.json'),
  image_dir: z.string().min(1).default('static/images/team'),
});

export const pipelineConfigSchema = z.object({
  column_mapping: columnMappingSchema,
  sort_key: z.enum(MANAGED_FIELDS).nullable().default('display_name'),
  committee_order: z.array(z.string()).default([]),
  allow_delete: z.boolean().default(false),
  image_max_bytes: z.number().int().positive().default(5 * 1024 * 1024),
  image_content_types: z
    .array(z.string().min(1))
    .default(['image/jpeg', 'image/png', 'image/webp', 'image/gif', 'image/svg+xml']),
  image_concurrency: z.number().int().positive().default(4),
  retry_count: z.number().int().positive().default(3),
  retry_base_delay_ms: z.number().int().nonnegative().default(1000),
  timeout_ms: z.number().int().positive().default(15000),
  repository: repositorySchema,
  commit_author: z
    .object({ name: z.string().min(1), email: z.string().email() })
    .default({ name: 'Team Page Bot', email: 'team-page-bot@users.noreply.github.com' }),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type ColumnMapping = PipelineConfig['column_mapping'];

export interface EnvironmentConfig {
  sheetId?: string;
  worksheetName?: string;
  repositoryToken?: string;
  googleCredentialsPath?: string;
}

/**
 * Validate a parsed config document, turning zod issues into one ConfigurationError.
 */
export function parsePipelineConfig(raw: unknown, source = 'config'): PipelineConfig {
  const result = pipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`Invalid ${source}: ${problems.join('; ')}`);
  }
  return result.data;
}

export function loadPipelineConfig(path = process.env.TEAM_PAGE_CONFIG || DEFAULT_CONFIG_PATH): PipelineConfig {
  const configPath = isAbsolute(path) ? path : resolve(PACKAGE_ROOT, path);
  if (!existsSync(configPath)) {
    throw new ConfigurationError(`Config file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Config file ${configPath} is not valid JSON`, { cause: err });
  }
  return parsePipelineConfig(raw, configPath);
}

export function loadEnvironment(): EnvironmentConfig {
  loadDotenv({ path: resolve(PACKAGE_ROOT, '.env') });
  return {
    sheetId: process.env.TEAM_SHEET_ID,
    worksheetName: process.env.TEAM_WORKSHEET_NAME,
    repositoryToken: process.env.WEBSITE_REPOSITORY_TOKEN,
    googleCredentialsPath: process.env.GOOGLE_APPLICATION_CREDENTIALS,
  };
}

/** Working copy location, resolved against the package root. */
export function workingCopyPath(cfg: PipelineConfig): string {
  const local = cfg.repository.local_path;
  return isAbsolute(local) ? local : resolve(PACKAGE_ROOT, local);
}
