import type { FileChange, RiskCategory, RiskFinding, RiskSeverity } from '../types.js';
import { SEVERITY_ORDER } from '../types.js';
import type { AnalysisConfig } from '../config/settings.js';
import type { ReviewRequest, RiskEnricher } from './ai-types.js';
import {
  detectBreakingChanges,
  detectPerformanceIssues,
  detectSecurityRisks,
  detectTestCoverageGaps,
} from './detectors.js';
import { errorMessage } from '../errors.js';
import { logger } from '../observability/logger.js';
import { metrics } from '../metrics/metrics.js';

type Detector = (files: readonly FileChange[], config: AnalysisConfig) => RiskFinding[];

export interface DetectorFailure {
  category: RiskCategory;
  message: string;
}

export interface DetectionReport {
  findings: RiskFinding[];
  failures: DetectorFailure[];
}

export interface AggregationResult {
  findings: RiskFinding[];
  error?: string;
}

export interface FindingStats {
  total: number;
  bySeverity: Record<RiskSeverity, number>;
  byCategory: Record<RiskCategory, number>;
}

/**
 * Order is part of the output contract: findings are concatenated in this
 * order.
 */
function detectorPipeline(): ReadonlyArray<readonly [RiskCategory, Detector]> {
  return [
    ['security', detectSecurityRisks],
    ['breaking_change', detectBreakingChanges],
    ['performance', detectPerformanceIssues],
    ['test_coverage', detectTestCoverageGaps],
  ];
}

export function runDetectors(files: readonly FileChange[], config: AnalysisConfig): DetectionReport {
  const findings: RiskFinding[] = [];
  const failures: DetectorFailure[] = [];

  for (const [category, detect] of detectorPipeline()) {
    try {
      findings.push(...detect(files, config));
    } catch (error) {
      const message = errorMessage(error);
      logger.error('risk_detection', 'Detector failed', { detector: category, error: message });
      metrics.recordDetectorFailure();
      failures.push({ category, message });
    }
  }

  logger.info('risk_detection', 'Pattern detection complete', {
    fileCount: files.length,
    ...summarizeFindings(findings),
    failedDetectors: failures.map(f => f.category),
  });

  return { findings, failures };
}

export function detectAllRisks(files: readonly FileChange[], config: AnalysisConfig): RiskFinding[] {
  return runDetectors(files, config).findings;
}

/**
 * Append enricher findings to the pattern findings. The enricher is optional
 * and untrusted: whatever it throws is logged and reported, never rethrown.
 */
export async function aggregateFindings(
  patternFindings: readonly RiskFinding[],
  enricher: RiskEnricher | null,
  request: ReviewRequest
): Promise<AggregationResult> {
  if (!enricher) {
    return { findings: [...patternFindings] };
  }

  try {
    const extra = await enricher.supplement(patternFindings, request);
    logger.info('risk_aggregation', 'Merged enricher findings', {
      patternFindings: patternFindings.length,
      enricherFindings: extra.length,
    });
    return { findings: [...patternFindings, ...extra] };
  } catch (error) {
    const message = errorMessage(error);
    logger.warn('risk_aggregation', 'Enricher failed, keeping pattern findings only', {
      error: message,
    });
    return { findings: [...patternFindings], error: message };
  }
}

export function summarizeFindings(findings: readonly RiskFinding[]): FindingStats {
  const bySeverity: Record<RiskSeverity, number> = { high: 0, medium: 0, low: 0, info: 0 };
  const byCategory: Record<RiskCategory, number> = {
    security: 0,
    breaking_change: 0,
    performance: 0,
    test_coverage: 0,
    other: 0,
  };

  for (const finding of findings) {
    bySeverity[finding.severity]++;
    byCategory[finding.category]++;
  }

  return { total: findings.length, bySeverity, byCategory };
}

export function sortFindingsForDisplay(findings: readonly RiskFinding[]): RiskFinding[] {
  return [...findings].sort((a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity]);
}
