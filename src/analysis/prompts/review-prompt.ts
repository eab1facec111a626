import type { RiskFinding } from '../../types.js';
import type { ReviewRequest } from '../ai-types.js';

const SUMMARY_FILE_LIMIT = 20;
const SUMMARY_PATCH_FILES = 5;
const SUMMARY_PATCH_LINES = 20;
const RISK_FILE_LIMIT = 10;
const RISK_PATCH_LINES = 30;
const EXISTING_RISK_LIMIT = 10;
const FOCUS_FILE_LIMIT = 15;

function headLines(patch: string, count: number): string {
  return patch.split('\n').slice(0, count).join('\n');
}

function describeOrDefault(description: string, fallback: string): string {
  return description.trim().length > 0 ? description : fallback;
}

function fileLine(file: ReviewRequest['files'][number]): string {
  return `- ${file.path} (+${file.additions}/-${file.deletions})`;
}

export function buildSummaryPrompt(request: ReviewRequest): string {
  const { metadata, files } = request;

  const fileList = files.slice(0, SUMMARY_FILE_LIMIT).map(fileLine).join('\n');

  const keyChanges = files
    .slice(0, SUMMARY_PATCH_FILES)
    .filter(f => f.patch)
    .map(f => `\n${f.path}:\n${headLines(f.patch ?? '', SUMMARY_PATCH_LINES)}`);

  return `You are summarizing a GitHub pull request for its reviewers. In 2-3 sentences, say what this PR does and why.

PR Title: ${metadata.title}
PR Description: ${describeOrDefault(metadata.description, 'No description provided')}
Base Branch: ${metadata.baseBranch}
Head Branch: ${metadata.headBranch}

Files Changed (${files.length} files):
${fileList}

Key Changes:
${keyChanges.length > 0 ? keyChanges.join('\n') : 'See file list above'}

Cover:
1. What functionality is added, changed, or removed
2. The main technical approach
3. Notable architectural decisions

Be concise and technical. Respond with the summary text only.`;
}

export function buildRiskPrompt(request: ReviewRequest, existing: readonly RiskFinding[]): string {
  const { metadata, files } = request;

  const fileChanges = files
    .slice(0, RISK_FILE_LIMIT)
    .filter(f => f.patch)
    .map(f => `\nFile: ${f.path}\nChanges: +${f.additions}/-${f.deletions}\nPreview:\n${headLines(f.patch ?? '', RISK_PATCH_LINES)}\n`)
    .join('\n---\n');

  const existingRisks = existing.length > 0
    ? existing.slice(0, EXISTING_RISK_LIMIT).map(r => `- ${r.category}: ${r.title} (${r.severity})`).join('\n')
    : 'None detected by patterns';

  return `You are a senior engineer reviewing a pull request. Pattern matching has already run; find the risks it cannot see.

PR Context:
Title: ${metadata.title}
Description: ${describeOrDefault(metadata.description, 'No description')}

File Changes:
${fileChanges}

Pattern-Based Risks Already Detected:
${existingRisks}

Look for:
1. Logic errors: race conditions, edge cases, wrong business rules
2. Security issues specific to this code
3. Performance: algorithmic complexity, leaks, inefficient queries
4. Maintainability: tight coupling, broken abstractions
5. Data integrity: migrations, schema changes, data loss

Skip style nits. Respond ONLY with a JSON array:
[
  {
    "category": "Security|Performance|Logic|Maintainability|Data",
    "severity": "HIGH|MEDIUM|LOW",
    "title": "Brief title",
    "description": "What can go wrong",
    "file_path": "path/to/file",
    "suggestion": "Specific fix"
  }
]

Return [] if there is nothing substantive to add.`;
}

export function buildFocusPrompt(request: ReviewRequest, risks: readonly RiskFinding[]): string {
  const { metadata, files } = request;

  const keyFiles = files.slice(0, FOCUS_FILE_LIMIT).map(fileLine).join('\n');

  const riskList = risks.length > 0
    ? risks.slice(0, EXISTING_RISK_LIMIT).map(r => `- ${r.category} (${r.severity}): ${r.title}`).join('\n')
    : 'No significant risks detected';

  return `You are helping a reviewer plan their review of a pull request. Produce a checklist of 3-7 concrete things to verify.

PR Context:
Title: ${metadata.title}
Description: ${describeOrDefault(metadata.description, 'No description')}

Files Changed: ${files.length}
Lines Added: ${metadata.additions}
Lines Deleted: ${metadata.deletions}

Key Files:
${keyFiles}

Detected Risks:
${riskList}

Each item must be specific to these changes and phrased as a task, e.g. "Verify token expiry is checked in the session middleware".

Respond ONLY with a JSON array of strings, highest priority first.`;
}
