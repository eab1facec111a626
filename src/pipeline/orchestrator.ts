import type { Octokit } from '@octokit/rest';
import type { AnalysisResult, FileChange, PRContext, PullRequestData, RiskFinding } from '../types.js';
import type { Settings } from '../config/settings.js';
import type { ReviewNarrator, ReviewRequest, RiskEnricher } from '../analysis/ai-types.js';
import { filterAndNormalize } from '../filters/deterministic.js';
import { selectKeyFiles } from '../analysis/diff-intelligence/file-prioritizer.js';
import { aggregateFindings, runDetectors, summarizeFindings } from '../analysis/risk-analyzer.js';
import { ClaudeReviewer, createFallbackFocusAreas, createFallbackSummary } from '../analysis/ai.js';
import { createClaudeClient } from '../analysis/claude-client.js';
import { fetchPullRequest } from '../diff/extractor.js';
import { formatComment } from '../output/formatter.js';
import { publishComment } from '../output/publisher.js';
import { errorMessage } from '../errors.js';
import { generateReviewId, logger } from '../observability/logger.js';
import { metrics } from '../metrics/metrics.js';

export interface ReviewCollaborators {
  enricher?: RiskEnricher | null;
  narrator?: ReviewNarrator | null;
}

/**
 * Wire the model-backed reviewer when an API key is configured. A reviewer
 * that cannot be built leaves the review pattern-only.
 */
export function createReviewCollaborators(settings: Pick<Settings, 'anthropicApiKey' | 'ai'>): ReviewCollaborators {
  if (!settings.anthropicApiKey) {
    logger.info('ai_gating', 'AI analysis disabled (no API key)');
    return {};
  }

  try {
    const reviewer = new ClaudeReviewer(createClaudeClient(settings.anthropicApiKey, settings.ai));
    logger.info('ai_gating', 'AI analysis enabled', { model: settings.ai.model });
    return { enricher: reviewer, narrator: reviewer };
  } catch (error) {
    logger.warn('ai_gating', 'Failed to initialize AI client', { error: errorMessage(error) });
    return {};
  }
}

function emptyResult(pr: PullRequestData, aiEnabled: boolean): AnalysisResult {
  return {
    keyFiles: [],
    totalFiles: pr.files.length,
    risks: [],
    reviewFocusAreas: [],
    errors: [],
    partial: false,
    aiEnabled,
  };
}

async function resolveSummary(
  narrator: ReviewNarrator | null,
  request: ReviewRequest,
  errors: string[]
): Promise<string> {
  if (narrator) {
    try {
      const summary = await narrator.summarize(request);
      if (summary) {
        return summary;
      }
      errors.push('AI summary generation failed, using basic summary');
    } catch (error) {
      logger.warn('ai_summary', 'Narrator failed, using basic summary', { error: errorMessage(error) });
      errors.push(`AI summary failed: ${errorMessage(error)}`);
    }
  }
  return createFallbackSummary(request.metadata, request.files.length);
}

async function resolveFocusAreas(
  narrator: ReviewNarrator | null,
  request: ReviewRequest,
  risks: readonly RiskFinding[],
  errors: string[]
): Promise<string[]> {
  if (narrator) {
    try {
      const areas = await narrator.focusAreas(request, risks);
      if (areas.length > 0) {
        return areas;
      }
    } catch (error) {
      logger.warn('ai_focus_areas', 'Narrator failed, using basic focus areas', { error: errorMessage(error) });
      errors.push(`AI review focus generation failed: ${errorMessage(error)}`);
    }
  }
  return createFallbackFocusAreas(request.files.length, risks);
}

/**
 * Filter, rank, scan and (optionally) enrich one change-set. Never throws:
 * every failure lands in `errors` and marks the result partial.
 */
export async function analyzePullRequest(
  pr: PullRequestData,
  settings: Pick<Settings, 'analysis'>,
  collaborators: ReviewCollaborators = {}
): Promise<AnalysisResult> {
  const enricher = collaborators.enricher ?? null;
  const narrator = collaborators.narrator ?? null;
  const result = emptyResult(pr, enricher !== null || narrator !== null);
  const errors: string[] = [];

  try {
    const { maxFilesFullAnalysis, maxDiffLinesPerFile } = settings.analysis;

    const processed = filterAndNormalize(pr.files, maxDiffLinesPerFile);

    let keyFiles: FileChange[] = processed;
    if (processed.length > maxFilesFullAnalysis) {
      logger.warn('analysis', 'Large PR detected, prioritizing files', {
        processedFiles: processed.length,
        cap: maxFilesFullAnalysis,
      });
      metrics.recordLargePR();
      keyFiles = selectKeyFiles(processed, maxFilesFullAnalysis);
      errors.push(
        `⚠️ Large PR: Analysis focused on top ${maxFilesFullAnalysis} of ${pr.files.length} files ` +
        '(based on security/business logic priority)'
      );
    }
    result.keyFiles = keyFiles;

    const detection = runDetectors(keyFiles, settings.analysis);
    for (const failure of detection.failures) {
      errors.push(`Pattern-based analysis partially failed: ${failure.category}: ${failure.message}`);
    }

    const request: ReviewRequest = { metadata: pr.metadata, files: keyFiles };

    result.summary = await resolveSummary(narrator, request, errors);

    const aggregated = await aggregateFindings(detection.findings, enricher, request);
    if (aggregated.error) {
      errors.push(`AI risk analysis failed: ${aggregated.error}`);
    }
    result.risks = aggregated.findings;

    result.reviewFocusAreas = await resolveFocusAreas(narrator, request, result.risks, errors);
  } catch (error) {
    logger.error('analysis', 'Analysis failed critically', { error: errorMessage(error) });
    errors.push(`Critical analysis error: ${errorMessage(error)}`);
  }

  result.errors = errors;
  result.partial = errors.length > 0;

  metrics.recordFindings(result.risks);
  logger.info('analysis', 'Analysis complete', {
    keyFiles: result.keyFiles.length,
    errors: errors.length,
    partial: result.partial,
    ...summarizeFindings(result.risks),
  });

  return result;
}

/**
 * Fetch, analyze, render and publish. Host failures propagate to the caller.
 */
export async function reviewPullRequest(
  octokit: Octokit,
  context: PRContext,
  settings: Pick<Settings, 'analysis' | 'comment'>,
  collaborators: ReviewCollaborators = {}
): Promise<AnalysisResult> {
  logger.setContext({
    reviewId: generateReviewId(),
    owner: context.owner,
    repo: context.repo,
    pullNumber: context.pull_number,
  });
  metrics.incrementReviewStarted();

  const startTime = Date.now();

  try {
    const pr = await fetchPullRequest(octokit, context);
    const result = await analyzePullRequest(pr, settings, collaborators);

    await publishComment(octokit, context, formatComment(result, settings.comment));

    metrics.recordReviewOutcome(result.partial ? 'partial' : 'completed');
    logger.info('pipeline_complete', 'Review published', {
      durationMs: Date.now() - startTime,
      partial: result.partial,
    });

    return result;
  } catch (error) {
    metrics.recordReviewOutcome('failed');
    logger.error('pipeline_failed', 'Review failed', {
      durationMs: Date.now() - startTime,
      error: errorMessage(error),
    });
    throw error;
  } finally {
    logger.clearContext();
  }
}
