import type { FileChange, PullRequestMetadata, RiskFinding } from '../types.js';
import { AIError } from '../errors.js';

/**
 * What a collaborator gets to see of the change-set: metadata plus the
 * already filtered and prioritized files.
 */
export interface ReviewRequest {
  metadata: PullRequestMetadata;
  files: readonly FileChange[];
}

/**
 * Adds findings the pattern engine cannot see. Implementations may fail;
 * the aggregator contains the failure.
 */
export interface RiskEnricher {
  supplement(existing: readonly RiskFinding[], request: ReviewRequest): Promise<RiskFinding[]>;
}

/**
 * Prose around the findings. `null` / `[]` means "nothing usable", and the
 * caller falls back to the deterministic versions.
 */
export interface ReviewNarrator {
  summarize(request: ReviewRequest): Promise<string | null>;
  focusAreas(request: ReviewRequest, risks: readonly RiskFinding[]): Promise<string[]>;
}

export interface CompletionClient {
  complete(prompt: string): Promise<string>;
}

export interface ClaudeAPIResponse {
  content: Array<{
    type: string;
    text?: string;
  }>;
  stop_reason: string | null;
  usage?: {
    input_tokens: number;
    output_tokens: number;
  };
}

export interface AIValidationError {
  field: string;
  reason: string;
}

export class AIResponseValidationError extends AIError {
  constructor(public errors: AIValidationError[]) {
    super(`AI response validation failed: ${errors.map(e => e.field).join(', ')}`);
    this.name = 'AIResponseValidationError';
  }
}
