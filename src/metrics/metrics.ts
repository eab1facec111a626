import type { RiskCategory, RiskFinding } from '../types.js';

export interface MetricsSnapshot {
  processStartTime: string;
  uptimeSeconds: number;
  reviews: {
    total: number;
    completed: number;
    partial: number;
    failed: number;
    largePRs: number;
  };
  findings: {
    total: number;
    byCategory: Record<RiskCategory, number>;
    detectorFailures: number;
  };
  ai: {
    invocationCount: number;
    failureCount: number;
    failureRate: number;
  };
  tokens: {
    totalInput: number;
    totalOutput: number;
    totalCombined: number;
  };
}

function emptyCategoryCounts(): Record<RiskCategory, number> {
  return {
    security: 0,
    breaking_change: 0,
    performance: 0,
    test_coverage: 0,
    other: 0,
  };
}

export class Metrics {
  private startTime: Date = new Date();

  private counters = {
    reviewsTotal: 0,
    reviewsCompleted: 0,
    reviewsPartial: 0,
    reviewsFailed: 0,
    largePRs: 0,
    detectorFailures: 0,
    aiInvocationCount: 0,
    aiFailureCount: 0,
    tokensInput: 0,
    tokensOutput: 0,
  };

  private findingsByCategory = emptyCategoryCounts();

  incrementReviewStarted(): void {
    this.counters.reviewsTotal++;
  }

  recordReviewOutcome(outcome: 'completed' | 'partial' | 'failed'): void {
    switch (outcome) {
      case 'completed':
        this.counters.reviewsCompleted++;
        break;
      case 'partial':
        this.counters.reviewsPartial++;
        break;
      case 'failed':
        this.counters.reviewsFailed++;
        break;
    }
  }

  recordLargePR(): void {
    this.counters.largePRs++;
  }

  recordFindings(findings: readonly RiskFinding[]): void {
    for (const finding of findings) {
      this.findingsByCategory[finding.category]++;
    }
  }

  recordDetectorFailure(): void {
    this.counters.detectorFailures++;
  }

  recordAIInvocation(): void {
    this.counters.aiInvocationCount++;
  }

  recordAIFailure(): void {
    this.counters.aiFailureCount++;
  }

  recordTokenUsage(inputTokens: number, outputTokens: number): void {
    this.counters.tokensInput += inputTokens;
    this.counters.tokensOutput += outputTokens;
  }

  snapshot(): MetricsSnapshot {
    const uptimeMs = Date.now() - this.startTime.getTime();

    const failureRate = this.counters.aiInvocationCount > 0
      ? this.counters.aiFailureCount / this.counters.aiInvocationCount
      : 0;

    const byCategory = { ...this.findingsByCategory };
    const total = Object.values(byCategory).reduce((sum, n) => sum + n, 0);

    return {
      processStartTime: this.startTime.toISOString(),
      uptimeSeconds: Math.floor(uptimeMs / 1000),
      reviews: {
        total: this.counters.reviewsTotal,
        completed: this.counters.reviewsCompleted,
        partial: this.counters.reviewsPartial,
        failed: this.counters.reviewsFailed,
        largePRs: this.counters.largePRs,
      },
      findings: {
        total,
        byCategory,
        detectorFailures: this.counters.detectorFailures,
      },
      ai: {
        invocationCount: this.counters.aiInvocationCount,
        failureCount: this.counters.aiFailureCount,
        failureRate: parseFloat(failureRate.toFixed(4)),
      },
      tokens: {
        totalInput: this.counters.tokensInput,
        totalOutput: this.counters.tokensOutput,
        totalCombined: this.counters.tokensInput + this.counters.tokensOutput,
      },
    };
  }
}

export const metrics = new Metrics();
