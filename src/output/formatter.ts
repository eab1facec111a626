import type { AnalysisResult, FileChange, FileStatus, RiskCategory, RiskFinding, RiskSeverity } from '../types.js';
import { CATEGORY_ORDER } from '../types.js';
import type { CommentConfig } from '../config/settings.js';
import { sortFindingsForDisplay } from '../analysis/risk-analyzer.js';

const COLLAPSE_THRESHOLD = 10;

const CATEGORY_HEADINGS: Record<RiskCategory, string> = {
  security: '🔒 Security',
  breaking_change: '⚠️ Breaking Change',
  performance: '⚡ Performance',
  test_coverage: '🧪 Test Coverage',
  other: '📌 Other',
};

const STATUS_EMOJI: Record<FileStatus, string> = {
  added: '✨',
  removed: '🗑️',
  modified: '📝',
  renamed: '🔄',
};

const SEVERITY_LABELS: Record<RiskSeverity, string> = {
  high: '**HIGH**',
  medium: '**MEDIUM**',
  low: '**LOW**',
  info: '**INFO**',
};

export function formatTimestamp(now: Date): string {
  return `${now.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

function impactOf(file: FileChange): string {
  if (file.changes > 100) return 'High';
  if (file.changes > 50) return 'Medium';
  return 'Low';
}

export function formatFileTable(files: readonly FileChange[], maxKeyFiles: number): string {
  if (files.length === 0) {
    return '*No files to display*';
  }

  const lines = [
    '| File | Changes | Impact |',
    '|------|---------|--------|',
  ];

  for (const file of files.slice(0, maxKeyFiles)) {
    lines.push(`| ${STATUS_EMOJI[file.status]} \`${file.path}\` | +${file.additions}, -${file.deletions} | ${impactOf(file)} |`);
  }

  return lines.join('\n');
}

export function formatRiskSection(category: RiskCategory, risks: readonly RiskFinding[]): string {
  const lines = [`#### ${CATEGORY_HEADINGS[category]}\n`];

  for (const risk of sortFindingsForDisplay(risks)) {
    lines.push(`- ${SEVERITY_LABELS[risk.severity]}: ${risk.title}`);

    if (risk.filePath) {
      lines.push(`  - File: \`${risk.filePath}\`${risk.lineNumber ? `:${risk.lineNumber}` : ''}`);
    }

    if (risk.description && risk.description !== risk.title) {
      lines.push(`  - ${risk.description}`);
    }

    if (risk.suggestion) {
      lines.push(`  - Suggestion: ${risk.suggestion}`);
    }

    lines.push('');
  }

  return lines.join('\n');
}

export function formatComment(result: AnalysisResult, config: CommentConfig, now: Date = new Date()): string {
  const sections: string[] = [];

  sections.push('## 🤖 PR Analysis\n');

  if (result.partial) {
    sections.push('⚠️ **Partial Analysis**: Some components failed during analysis.\n');
  }

  if (result.errors.length > 0) {
    sections.push('### Errors\n');
    result.errors.forEach(error => sections.push(`- ${error}`));
    sections.push('');
  }

  if (config.includeSummary && result.summary) {
    sections.push('### Summary\n');
    sections.push(`${result.summary}\n`);
  }

  if (config.includeKeyFiles && result.keyFiles.length > 0) {
    sections.push('### Key Files Changed\n');

    const table = formatFileTable(result.keyFiles, config.maxKeyFiles);
    if (config.collapseFileList && result.keyFiles.length > COLLAPSE_THRESHOLD) {
      sections.push(`<details>\n<summary>📁 ${result.totalFiles} files modified</summary>\n`);
      sections.push(table);
      sections.push('\n</details>\n');
    } else {
      sections.push(table);
      sections.push('');
    }
  }

  if (config.includeRisks) {
    sections.push('### Risk Analysis\n');

    if (result.risks.length === 0) {
      sections.push('✅ No significant risks detected.\n');
    }

    for (const category of CATEGORY_ORDER) {
      const inCategory = result.risks.filter(r => r.category === category);
      if (inCategory.length > 0) {
        sections.push(formatRiskSection(category, inCategory));
      }
    }
  }

  if (result.reviewFocusAreas.length > 0) {
    sections.push('### Review Focus Areas\n');
    result.reviewFocusAreas.forEach(area => sections.push(`- [ ] ${area}`));
    sections.push('');
  }

  sections.push('---');
  sections.push(`*Analysis generated on ${formatTimestamp(now)} | ${result.aiEnabled ? 'Powered by Claude AI' : 'Pattern-based analysis'}*`);

  return sections.join('\n');
}

export function formatErrorComment(message: string, now: Date = new Date()): string {
  return [
    '## 🤖 PR Analysis',
    '',
    '### Error',
    '',
    `❌ Analysis failed: ${message}`,
    '',
    'Please check the workflow logs for more details.',
    '',
    '---',
    `*Analysis attempted on ${formatTimestamp(now)}*`,
    '',
  ].join('\n');
}
