import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../../src/analysis/detectors.js', async importOriginal => {
  const actual = await importOriginal<typeof import('../../../src/analysis/detectors.js')>();
  return {
    ...actual,
    detectBreakingChanges: vi.fn(actual.detectBreakingChanges),
  };
});

import { detectBreakingChanges } from '../../../src/analysis/detectors.js';
import {
  aggregateFindings,
  detectAllRisks,
  runDetectors,
  sortFindingsForDisplay,
  summarizeFindings,
} from '../../../src/analysis/risk-analyzer.js';
import type { RiskEnricher } from '../../../src/analysis/ai-types.js';
import type { RiskFinding } from '../../../src/types.js';
import { metrics } from '../../../src/metrics/metrics.js';
import { analysisConfig, makeFile, makeMetadata } from '../../helpers/fixtures.js';

// One file that trips every detector once.
const MIXED_PATCH = '@@ -1,3 +1,3 @@\n-def old_handler(request):\n+password = "hunter2"\n+while True:';

function mixedFiles() {
  return [makeFile({ path: 'src/handler.py', patch: MIXED_PATCH, changes: 20 })];
}

function finding(overrides: Partial<RiskFinding> & Pick<RiskFinding, 'title'>): RiskFinding {
  return { category: 'other', severity: 'medium', ...overrides };
}

describe('analysis/risk-analyzer', () => {
  beforeEach(() => {
    vi.mocked(detectBreakingChanges).mockClear();
  });

  describe('runDetectors', () => {
    it('should emit findings in fixed category order', () => {
      const { findings, failures } = runDetectors(mixedFiles(), analysisConfig());

      expect(failures).toEqual([]);
      expect(findings.map(f => [f.category, f.title])).toEqual([
        ['security', 'Hardcoded password detected'],
        ['breaking_change', 'Public method removed'],
        ['performance', 'Infinite loop detected'],
        ['test_coverage', 'No test updates for changed file'],
      ]);
    });

    it('should return no performance findings when that detector is disabled', () => {
      const findings = detectAllRisks(mixedFiles(), analysisConfig({ enablePerformanceCheck: false }));

      expect(findings.filter(f => f.category === 'performance')).toEqual([]);
      expect(findings.map(f => f.category)).toEqual(['security', 'breaking_change', 'test_coverage']);
    });

    it('should isolate a failing detector', () => {
      vi.mocked(detectBreakingChanges).mockImplementationOnce(() => {
        throw new Error('pattern table corrupted');
      });
      const failuresBefore = metrics.snapshot().findings.detectorFailures;

      const { findings, failures } = runDetectors(mixedFiles(), analysisConfig());

      expect(failures).toEqual([{ category: 'breaking_change', message: 'pattern table corrupted' }]);
      expect(findings.map(f => f.category)).toEqual(['security', 'performance', 'test_coverage']);
      expect(metrics.snapshot().findings.detectorFailures).toBe(failuresBefore + 1);
    });

    it('should pass the configuration to every detector', () => {
      const config = analysisConfig({ enableSecurityCheck: false });

      runDetectors(mixedFiles(), config);

      expect(detectBreakingChanges).toHaveBeenCalledWith(mixedFiles(), config);
    });
  });

  describe('aggregateFindings', () => {
    const request = { metadata: makeMetadata(), files: mixedFiles() };
    const pattern = [finding({ category: 'security', severity: 'high', title: 'Hardcoded password detected' })];

    it('should return the pattern findings without an enricher', async () => {
      const result = await aggregateFindings(pattern, null, request);

      expect(result).toEqual({ findings: pattern });
      expect(result.findings).not.toBe(pattern);
    });

    it('should append enricher findings after the pattern findings', async () => {
      const extra = finding({ title: 'Race on session refresh' });
      const enricher: RiskEnricher = { supplement: vi.fn().mockResolvedValue([extra]) };

      const result = await aggregateFindings(pattern, enricher, request);

      expect(result.findings).toEqual([...pattern, extra]);
      expect(result.error).toBeUndefined();
      expect(enricher.supplement).toHaveBeenCalledWith(pattern, request);
    });

    it('should keep the pattern findings when the enricher fails', async () => {
      const enricher: RiskEnricher = { supplement: vi.fn().mockRejectedValue(new Error('model unavailable')) };

      const result = await aggregateFindings(pattern, enricher, request);

      expect(result).toEqual({ findings: pattern, error: 'model unavailable' });
    });
  });

  describe('summarizeFindings', () => {
    it('should count by severity and category', () => {
      const stats = summarizeFindings(runDetectors(mixedFiles(), analysisConfig()).findings);

      expect(stats.total).toBe(4);
      expect(stats.bySeverity).toEqual({ high: 1, medium: 2, low: 1, info: 0 });
      expect(stats.byCategory).toEqual({
        security: 1,
        breaking_change: 1,
        performance: 1,
        test_coverage: 1,
        other: 0,
      });
    });
  });

  describe('sortFindingsForDisplay', () => {
    it('should order by severity and keep ties in input order', () => {
      const input = [
        finding({ severity: 'low', title: 'A' }),
        finding({ severity: 'high', title: 'B' }),
        finding({ severity: 'info', title: 'C' }),
        finding({ severity: 'low', title: 'D' }),
        finding({ severity: 'high', title: 'E' }),
      ];

      const sorted = sortFindingsForDisplay(input);

      expect(sorted.map(f => f.title)).toEqual(['B', 'E', 'A', 'D', 'C']);
      expect(input.map(f => f.title)).toEqual(['A', 'B', 'C', 'D', 'E']);
    });
  });
});
