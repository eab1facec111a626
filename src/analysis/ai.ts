import { z } from 'zod';
import type { PullRequestMetadata, RiskCategory, RiskFinding, RiskSeverity } from '../types.js';
import type {
  AIValidationError,
  CompletionClient,
  ReviewNarrator,
  ReviewRequest,
  RiskEnricher,
} from './ai-types.js';
import { AIResponseValidationError } from './ai-types.js';
import { buildFocusPrompt, buildRiskPrompt, buildSummaryPrompt } from './prompts/review-prompt.js';
import { cleanFocusAreas, focusAreasFromText, validateSummaryQuality } from './review-quality.js';
import { summarizeFindings } from './risk-analyzer.js';
import { AIError, errorMessage } from '../errors.js';
import { logger } from '../observability/logger.js';
import { metrics } from '../metrics/metrics.js';

const CATEGORY_MAP: Record<string, RiskCategory> = {
  Security: 'security',
  Performance: 'performance',
  Logic: 'other',
  Maintainability: 'other',
  Data: 'other',
};

const SEVERITY_MAP: Record<string, RiskSeverity> = {
  HIGH: 'high',
  MEDIUM: 'medium',
  LOW: 'low',
};

const LARGE_CHANGESET_FILES = 20;

/**
 * Models like to wrap JSON in a Markdown fence; drop the first and last line
 * when they do.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }

  const lines = trimmed.split('\n');
  return lines.length > 2 ? lines.slice(1, -1).join('\n') : trimmed;
}

const AIRiskItemSchema = z.object({
  category: z.string().optional(),
  severity: z.string().optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  file_path: z.string().optional(),
  suggestion: z.string().optional(),
});

function lookup<T>(map: Record<string, T>, key: string | undefined): T | undefined {
  return key !== undefined && Object.hasOwn(map, key) ? map[key] : undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.length > 0 ? value : undefined;
}

function toFinding(item: unknown, index: number): RiskFinding | AIValidationError {
  const result = AIRiskItemSchema.safeParse(item);
  if (!result.success) {
    const issue = result.error.issues[0];
    return {
      field: `[${index}]${issue && issue.path.length > 0 ? `.${issue.path.join('.')}` : ''}`,
      reason: issue?.message ?? 'Invalid risk item',
    };
  }

  const r = result.data;

  return {
    category: lookup(CATEGORY_MAP, r.category) ?? 'other',
    severity: lookup(SEVERITY_MAP, r.severity) ?? 'medium',
    title: nonEmpty(r.title) ?? 'AI-identified risk',
    description: r.description ?? '',
    filePath: nonEmpty(r.file_path),
    suggestion: nonEmpty(r.suggestion),
  };
}

function isValidationError(value: RiskFinding | AIValidationError): value is AIValidationError {
  return 'reason' in value;
}

/**
 * Parse the model's JSON array of risks. Items that cannot be read are
 * logged and skipped; anything other than an array is rejected.
 */
export function parseRiskResponse(text: string): RiskFinding[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(text));
  } catch (parseError) {
    logger.warn('ai_validation', 'Failed to parse risk response as JSON', {
      error: errorMessage(parseError),
      responsePreview: text.slice(0, 200),
    });
    throw new AIError('Claude returned invalid JSON');
  }

  if (!Array.isArray(parsed)) {
    throw new AIResponseValidationError([{ field: 'root', reason: 'Response is not an array' }]);
  }

  const findings: RiskFinding[] = [];
  parsed.forEach((item, index) => {
    const result = toFinding(item, index);
    if (isValidationError(result)) {
      logger.warn('ai_validation', 'Skipping malformed risk item', { ...result });
    } else {
      findings.push(result);
    }
  });

  return findings;
}

export function parseFocusAreasResponse(text: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(text));
  } catch {
    logger.warn('ai_validation', 'Focus areas were not JSON, reading them line by line');
    return focusAreasFromText(text);
  }

  if (!Array.isArray(parsed)) {
    return [];
  }

  return cleanFocusAreas(parsed.filter((item): item is string => typeof item === 'string'));
}

/**
 * Model-backed reviewer. Supplies extra findings, a summary and a checklist.
 */
export class ClaudeReviewer implements RiskEnricher, ReviewNarrator {
  constructor(private readonly client: CompletionClient) {}

  async supplement(existing: readonly RiskFinding[], request: ReviewRequest): Promise<RiskFinding[]> {
    logger.info('ai_risks', 'Analyzing risks with AI', {
      fileCount: request.files.length,
      existingRisks: existing.length,
    });

    try {
      const response = await this.client.complete(buildRiskPrompt(request, existing));
      const risks = parseRiskResponse(response);

      logger.info('ai_risks', 'AI risk analysis accepted', { additionalRisks: risks.length });
      return risks;
    } catch (error) {
      metrics.recordAIFailure();
      throw error instanceof AIError ? error : new AIError(`Unexpected AI error: ${errorMessage(error)}`);
    }
  }

  async summarize(request: ReviewRequest): Promise<string | null> {
    try {
      const summary = (await this.client.complete(buildSummaryPrompt(request))).trim();

      const qualityCheck = validateSummaryQuality(summary);
      if (!qualityCheck.passed) {
        logger.warn('review_quality', 'AI summary rejected due to quality check', {
          reason: qualityCheck.reason,
        });
        return null;
      }

      return summary;
    } catch (error) {
      metrics.recordAIFailure();
      logger.warn('ai_summary', 'AI summary failed', { error: errorMessage(error) });
      return null;
    }
  }

  async focusAreas(request: ReviewRequest, risks: readonly RiskFinding[]): Promise<string[]> {
    try {
      const response = await this.client.complete(buildFocusPrompt(request, risks));
      const areas = parseFocusAreasResponse(response);

      logger.info('ai_focus_areas', 'Generated review focus areas', { count: areas.length });
      return areas;
    } catch (error) {
      metrics.recordAIFailure();
      logger.warn('ai_focus_areas', 'AI focus areas generation failed', { error: errorMessage(error) });
      return [];
    }
  }
}

export function createFallbackSummary(metadata: PullRequestMetadata, fileCount: number): string {
  const { additions, deletions } = metadata;

  let changeType: string;
  if (additions > deletions * 3) {
    changeType = 'primarily adds new code';
  } else if (deletions > additions * 3) {
    changeType = 'primarily removes code';
  } else {
    changeType = 'modifies existing code';
  }

  let summary = `This PR ${changeType}, affecting ${fileCount} files with +${additions}/-${deletions} lines changed.`;

  if (metadata.title) {
    summary += ` ${metadata.title}`;
  }

  return summary;
}

export function createFallbackFocusAreas(fileCount: number, risks: readonly RiskFinding[]): string[] {
  const stats = summarizeFindings(risks);
  const areas: string[] = [];

  const high = stats.bySeverity.high;
  if (high > 0) {
    areas.push(`Address ${high} high-priority ${high === 1 ? 'risk' : 'risks'}`);
  }

  if (stats.byCategory.security > 0) {
    areas.push('Review security-related changes carefully');
  }

  if (stats.byCategory.breaking_change > 0) {
    areas.push('Verify backward compatibility and update documentation');
  }

  if (stats.byCategory.test_coverage > 0) {
    areas.push('Add tests for modified code');
  }

  if (fileCount > LARGE_CHANGESET_FILES) {
    areas.push('Large changeset - consider breaking into smaller PRs');
  }

  if (areas.length === 0) {
    areas.push('Verify code correctness and test coverage');
    areas.push('Check for edge cases and error handling');
  }

  return areas;
}
