import type { FileChange, RiskCategory, RiskFinding, Signature } from '../types.js';
import type { AnalysisConfig } from '../config/settings.js';
import { BREAKING_CHANGE_SIGNATURES, PERFORMANCE_SIGNATURES, SECURITY_SIGNATURES } from './signatures.js';
import { extractAddedLines, locateLine } from './line-locator.js';
import { logger } from '../observability/logger.js';

const MAX_SNIPPET_LENGTH = 100;
const MIN_CHANGES_FOR_TEST_CHECK = 10;

const TEST_PATH_MARKERS = ['test', 'spec', '__test__'];
const NON_SOURCE_MARKERS = ['.md', '.yml', '.yaml', '.json', '.txt'];
const SOURCE_EXTENSIONS = /\.(?:py|js|ts|jsx|tsx|mjs|cjs)$/;

type ScanScope = 'added' | 'full';

interface ScanOptions {
  category: RiskCategory;
  scope: ScanScope;
  describe: (file: FileChange, snippet: string) => string;
}

function scanSignatures(
  files: readonly FileChange[],
  signatures: readonly Signature[],
  options: ScanOptions
): RiskFinding[] {
  const findings: RiskFinding[] = [];

  for (const file of files) {
    if (!file.patch) {
      continue;
    }

    const content = options.scope === 'added'
      ? extractAddedLines(file.patch).join('\n')
      : file.patch;

    for (const { pattern, severity, title, suggestion } of signatures) {
      for (const match of content.matchAll(pattern)) {
        // Cap by code point so a surrogate pair is never split.
        const snippet = Array.from(match[0]).slice(0, MAX_SNIPPET_LENGTH).join('');

        findings.push({
          category: options.category,
          severity,
          title,
          description: options.describe(file, snippet),
          filePath: file.path,
          lineNumber: locateLine(file.patch, match.index ?? 0),
          suggestion,
          snippet,
        });
      }
    }
  }

  return findings;
}

export function detectSecurityRisks(files: readonly FileChange[], config: AnalysisConfig): RiskFinding[] {
  if (!config.enableSecurityCheck) {
    return [];
  }

  const risks = scanSignatures(files, SECURITY_SIGNATURES, {
    category: 'security',
    scope: 'added',
    describe: (_file, snippet) => `Found pattern: ${snippet}`,
  });

  logger.info('security_check', 'Security scan complete', { findings: risks.length });
  return risks;
}

export function detectBreakingChanges(files: readonly FileChange[], config: AnalysisConfig): RiskFinding[] {
  if (!config.enableBreakingChangeCheck) {
    return [];
  }

  const risks = scanSignatures(files, BREAKING_CHANGE_SIGNATURES, {
    category: 'breaking_change',
    scope: 'full',
    describe: file => `Breaking change in ${file.path}`,
  });

  logger.info('breaking_change_check', 'Breaking-change scan complete', { findings: risks.length });
  return risks;
}

export function detectPerformanceIssues(files: readonly FileChange[], config: AnalysisConfig): RiskFinding[] {
  if (!config.enablePerformanceCheck) {
    return [];
  }

  const risks = scanSignatures(files, PERFORMANCE_SIGNATURES, {
    category: 'performance',
    scope: 'added',
    describe: file => `Performance concern in ${file.path}`,
  });

  logger.info('performance_check', 'Performance scan complete', { findings: risks.length });
  return risks;
}

export function baseName(path: string): string {
  const segments = path.split('/');
  return segments[segments.length - 1].replace(SOURCE_EXTENSIONS, '');
}

/**
 * Flag significant source changes that arrive without any test file whose
 * path mentions the source file's base name. A proxy for "tests were touched
 * alongside", not a coverage measurement.
 */
export function detectTestCoverageGaps(files: readonly FileChange[], config: AnalysisConfig): RiskFinding[] {
  if (!config.enableTestCoverageCheck) {
    return [];
  }

  const sourceFiles: FileChange[] = [];
  const testPaths: string[] = [];

  for (const file of files) {
    const lower = file.path.toLowerCase();
    if (TEST_PATH_MARKERS.some(marker => lower.includes(marker))) {
      testPaths.push(file.path);
    } else if (!NON_SOURCE_MARKERS.some(marker => lower.includes(marker))) {
      sourceFiles.push(file);
    }
  }

  const risks: RiskFinding[] = [];

  for (const file of sourceFiles) {
    if (file.changes < MIN_CHANGES_FOR_TEST_CHECK) {
      continue;
    }

    const base = baseName(file.path);
    const hasTest = testPaths.some(testPath => testPath.includes(base));

    if (!hasTest) {
      risks.push({
        category: 'test_coverage',
        severity: 'medium',
        title: 'No test updates for changed file',
        description: `${file.path} was modified significantly without test updates`,
        filePath: file.path,
        suggestion: 'Add or update tests to cover the changes',
      });
    }
  }

  logger.info('test_coverage_check', 'Test-coverage check complete', {
    sourceFiles: sourceFiles.length,
    testFiles: testPaths.length,
    findings: risks.length,
  });
  return risks;
}
