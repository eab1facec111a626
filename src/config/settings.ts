import { existsSync, readFileSync } from 'fs';
import YAML from 'yaml';
import { z, ZodError } from 'zod';
import { ConfigurationError, errorMessage } from '../errors.js';
import { logger } from '../observability/logger.js';

export const DEFAULT_CONFIG_PATH = '.patchwatch.yml';

const AnalysisConfigSchema = z.object({
  max_files_full_analysis: z.number().int().min(1).default(50),
  max_diff_size_per_file: z.number().int().min(100).default(1000),
  enable_security_check: z.boolean().default(true),
  enable_performance_check: z.boolean().default(true),
  enable_breaking_change_check: z.boolean().default(true),
  enable_test_coverage_check: z.boolean().default(true),
});

const CommentConfigSchema = z.object({
  include_summary: z.boolean().default(true),
  include_key_files: z.boolean().default(true),
  include_risks: z.boolean().default(true),
  collapse_file_list: z.boolean().default(true),
  max_key_files: z.number().int().min(1).default(10),
});

const AIConfigSchema = z.object({
  model: z.string().min(1).default('claude-sonnet-4-20250514'),
  max_tokens: z.number().int().min(100).max(8192).default(4096),
  temperature: z.number().min(0).max(1).default(0.3),
});

const FileConfigSchema = z.object({
  analysis: AnalysisConfigSchema.default({}),
  comment: CommentConfigSchema.default({}),
  ai: AIConfigSchema.default({}),
});

type FileConfig = z.infer<typeof FileConfigSchema>;

export interface AnalysisConfig {
  maxFilesFullAnalysis: number;
  maxDiffLinesPerFile: number;
  enableSecurityCheck: boolean;
  enablePerformanceCheck: boolean;
  enableBreakingChangeCheck: boolean;
  enableTestCoverageCheck: boolean;
}

export interface CommentConfig {
  includeSummary: boolean;
  includeKeyFiles: boolean;
  includeRisks: boolean;
  collapseFileList: boolean;
  maxKeyFiles: number;
}

export interface AIConfig {
  model: string;
  maxTokens: number;
  temperature: number;
}

export interface Settings {
  analysis: AnalysisConfig;
  comment: CommentConfig;
  ai: AIConfig;
  githubToken: string;
  anthropicApiKey: string;
  repository: string;
  prNumber: number;
}

export interface ActionContext {
  owner: string;
  repo: string;
  pullNumber: number;
  token: string;
}

type Env = Record<string, string | undefined>;

function formatZodError(error: ZodError): string {
  return error.errors
    .map(e => `${e.path.join('.')}: ${e.message}`)
    .join(', ');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the YAML config file. A missing or unreadable file is not an error:
 * the defaults apply.
 */
export function loadYamlConfig(configPath: string = DEFAULT_CONFIG_PATH): Record<string, unknown> {
  if (!existsSync(configPath)) {
    logger.info('config', 'Config file not found, using defaults', { configPath });
    return {};
  }

  try {
    const parsed: unknown = YAML.parse(readFileSync(configPath, 'utf-8'));
    if (!isRecord(parsed)) {
      logger.info('config', 'Config file is empty, using defaults', { configPath });
      return {};
    }
    logger.info('config', 'Loaded configuration file', { configPath });
    return parsed;
  } catch (error) {
    logger.warn('config', 'Failed to load config file, using defaults', {
      configPath,
      error: errorMessage(error),
    });
    return {};
  }
}

function parseIntEnv(raw: string | undefined): number | undefined {
  if (raw === undefined || !/^\s*-?\d+\s*$/.test(raw)) {
    return undefined;
  }
  return parseInt(raw, 10);
}

function parseBoolEnv(raw: string | undefined): boolean | undefined {
  if (raw === undefined) {
    return undefined;
  }
  return raw.toLowerCase() === 'true';
}

function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const analysis: Record<string, unknown> = isRecord(raw.analysis) ? { ...raw.analysis } : {};

  const overrides: Array<[string, number | boolean | undefined]> = [
    ['max_files_full_analysis', parseIntEnv(env.PATCHWATCH_MAX_FILES)],
    ['max_diff_size_per_file', parseIntEnv(env.PATCHWATCH_MAX_DIFF_LINES)],
    ['enable_security_check', parseBoolEnv(env.PATCHWATCH_ENABLE_SECURITY)],
    ['enable_performance_check', parseBoolEnv(env.PATCHWATCH_ENABLE_PERFORMANCE)],
    ['enable_breaking_change_check', parseBoolEnv(env.PATCHWATCH_ENABLE_BREAKING)],
    ['enable_test_coverage_check', parseBoolEnv(env.PATCHWATCH_ENABLE_TEST_COVERAGE)],
  ];

  for (const [key, value] of overrides) {
    if (value !== undefined) {
      analysis[key] = value;
    }
  }

  return { ...raw, analysis };
}

function toSettings(file: FileConfig, env: Env): Settings {
  const prNumber = parseIntEnv(env.GITHUB_EVENT_NUMBER) ?? 0;

  return {
    analysis: {
      maxFilesFullAnalysis: file.analysis.max_files_full_analysis,
      maxDiffLinesPerFile: file.analysis.max_diff_size_per_file,
      enableSecurityCheck: file.analysis.enable_security_check,
      enablePerformanceCheck: file.analysis.enable_performance_check,
      enableBreakingChangeCheck: file.analysis.enable_breaking_change_check,
      enableTestCoverageCheck: file.analysis.enable_test_coverage_check,
    },
    comment: {
      includeSummary: file.comment.include_summary,
      includeKeyFiles: file.comment.include_key_files,
      includeRisks: file.comment.include_risks,
      collapseFileList: file.comment.collapse_file_list,
      maxKeyFiles: file.comment.max_key_files,
    },
    ai: {
      model: file.ai.model,
      maxTokens: file.ai.max_tokens,
      temperature: file.ai.temperature,
    },
    githubToken: env.GITHUB_TOKEN || '',
    anthropicApiKey: env.ANTHROPIC_API_KEY || '',
    repository: env.GITHUB_REPOSITORY || '',
    prNumber,
  };
}

/**
 * Build settings from a raw config object (as read from YAML) plus the
 * environment. Environment variables win over file values.
 */
export function buildSettings(raw: Record<string, unknown>, env: Env = process.env): Settings {
  const result = FileConfigSchema.safeParse(applyEnvOverrides(raw, env));

  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatZodError(result.error)}`);
  }

  const settings = toSettings(result.data, env);

  if (!settings.anthropicApiKey) {
    logger.warn('config', 'ANTHROPIC_API_KEY not set, AI features will be disabled');
  }

  return settings;
}

export function loadSettings(configPath: string = DEFAULT_CONFIG_PATH, env: Env = process.env): Settings {
  return buildSettings(loadYamlConfig(configPath), env);
}

/**
 * Check the values a one-shot CI run needs and split the repository slug.
 */
export function requireActionContext(settings: Settings): ActionContext {
  if (!settings.githubToken) {
    throw new ConfigurationError('GITHUB_TOKEN environment variable is required');
  }

  if (!settings.repository) {
    throw new ConfigurationError('GITHUB_REPOSITORY environment variable is required');
  }

  const [owner, repo, ...rest] = settings.repository.split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new ConfigurationError(`GITHUB_REPOSITORY must look like "owner/repo", got "${settings.repository}"`);
  }

  if (settings.prNumber <= 0) {
    throw new ConfigurationError('GITHUB_EVENT_NUMBER must be a valid PR number');
  }

  return { owner, repo, pullNumber: settings.prNumber, token: settings.githubToken };
}
