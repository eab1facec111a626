export interface PRContext {
  owner: string;
  repo: string;
  pull_number: number;
  installation_id?: number;
}

export type FileStatus = 'added' | 'removed' | 'modified' | 'renamed';

export interface FileChange {
  path: string;
  status: FileStatus;
  additions: number;
  deletions: number;
  changes: number;
  patch?: string;
  previousPath?: string;
}

export interface PullRequestMetadata {
  number: number;
  title: string;
  description: string;
  author: string;
  labels: string[];
  baseBranch: string;
  headBranch: string;
  headSha: string;
  createdAt: string;
  updatedAt: string;
  additions: number;
  deletions: number;
  changedFiles: number;
}

export interface PullRequestData {
  metadata: PullRequestMetadata;
  files: FileChange[];
}

export type RiskCategory = 'security' | 'breaking_change' | 'performance' | 'test_coverage' | 'other';

export type RiskSeverity = 'high' | 'medium' | 'low' | 'info';

export const SEVERITY_ORDER: Record<RiskSeverity, number> = {
  high: 0,
  medium: 1,
  low: 2,
  info: 3,
};

export const CATEGORY_ORDER: readonly RiskCategory[] = [
  'security',
  'breaking_change',
  'performance',
  'test_coverage',
  'other',
];

export interface RiskFinding {
  readonly category: RiskCategory;
  readonly severity: RiskSeverity;
  readonly title: string;
  readonly description?: string;
  readonly filePath?: string;
  /** Best-effort 1-based line in the new file version. */
  readonly lineNumber?: number;
  readonly suggestion?: string;
  readonly snippet?: string;
}

export interface Signature {
  pattern: RegExp;
  severity: RiskSeverity;
  title: string;
  suggestion: string;
}

export interface AnalysisResult {
  summary?: string;
  keyFiles: FileChange[];
  totalFiles: number;
  risks: RiskFinding[];
  reviewFocusAreas: string[];
  errors: string[];
  partial: boolean;
  aiEnabled: boolean;
}
