export interface QualityCheckResult {
  passed: boolean;
  reason?: string;
}

const BOILERPLATE_PHRASES = [
  'looks good',
  'lgtm',
  'no issues found',
  'code is fine',
  'seems okay',
  'appears correct',
  'looks fine to me',
];

const MIN_SUMMARY_LENGTH = 20;
const MIN_FOCUS_AREA_LENGTH = 10;
export const MAX_FOCUS_AREAS = 7;

export function validateSummaryQuality(summary: string): QualityCheckResult {
  const summaryLower = summary.toLowerCase();

  for (const phrase of BOILERPLATE_PHRASES) {
    if (summaryLower.includes(phrase)) {
      return {
        passed: false,
        reason: `Boilerplate phrase detected: "${phrase}"`,
      };
    }
  }

  if (summary.length < MIN_SUMMARY_LENGTH) {
    return {
      passed: false,
      reason: `Summary too short: ${summary.length} chars (min ${MIN_SUMMARY_LENGTH})`,
    };
  }

  return { passed: true };
}

/**
 * Trim, drop empties, cap the list.
 */
export function cleanFocusAreas(items: readonly string[]): string[] {
  return items
    .map(item => item.trim())
    .filter(item => item.length > 0)
    .slice(0, MAX_FOCUS_AREAS);
}

/**
 * Recover a checklist from a reply that was not valid JSON: one item per
 * line, bullets stripped, short lines dropped.
 */
export function focusAreasFromText(text: string): string[] {
  return text
    .split('\n')
    .map(line => line.replace(/^[-\s]+|[-\s]+$/g, ''))
    .filter(line => line.length > MIN_FOCUS_AREA_LENGTH)
    .slice(0, MAX_FOCUS_AREAS);
}
