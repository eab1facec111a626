import type { FileChange } from '../types.js';
import { logger } from '../observability/logger.js';

// Compared against the lower-cased path.
const IGNORED_SUFFIXES = [
  // images and documents
  '.png', '.jpg', '.jpeg', '.gif', '.bmp', '.ico', '.svg', '.pdf',
  // archives
  '.zip', '.tar', '.gz', '.bz2', '.7z',
  // audio / video
  '.mp3', '.mp4', '.avi', '.mov', '.wmv',
  // compiled output
  '.pyc', '.pyo', '.so', '.dll', '.exe', '.class', '.jar',
  '.min.js', '.min.css', '.map',
  // lock files
  '.lock', 'package-lock.json', 'yarn.lock', 'poetry.lock', 'pipfile.lock',
];

// Case-sensitive, anchored at the start of the path.
const IGNORED_PATTERNS = [
  /^.*\.min\..*/,
  /^.*-lock\..*/,
  /^(?:.*\/)?dist\/.*/,
  /^(?:.*\/)?build\/.*/,
  /^(?:.*\/)?node_modules\/.*/,
  /^(?:.*\/)?__pycache__\/.*/,
];

const TRUNCATION_MARKER = /^\.\.\. \(truncated \d+ lines\)$/;

export function shouldSkipFile(path: string): boolean {
  const lower = path.toLowerCase();

  if (IGNORED_SUFFIXES.some(suffix => lower.endsWith(suffix))) {
    return true;
  }

  return IGNORED_PATTERNS.some(pattern => pattern.test(path));
}

/**
 * Bound a patch to `maxDiffLines` lines. Longer patches keep their head and
 * gain one marker line with the omitted count; anything else is returned
 * as given, including patches this function already truncated.
 */
export function normalizePatch(patch: string | undefined, maxDiffLines: number): string {
  if (!patch) {
    return '';
  }

  const lines = patch.split('\n');

  if (lines.length <= maxDiffLines) {
    return patch;
  }

  if (lines.length === maxDiffLines + 1 && TRUNCATION_MARKER.test(lines[maxDiffLines])) {
    return patch;
  }

  const omitted = lines.length - maxDiffLines;
  return [...lines.slice(0, maxDiffLines), `... (truncated ${omitted} lines)`].join('\n');
}

export function filterAndNormalize(files: readonly FileChange[], maxDiffLines: number): FileChange[] {
  const processed: FileChange[] = [];

  for (const file of files) {
    if (shouldSkipFile(file.path)) {
      logger.debug('file_filtering', 'Skipping file', { path: file.path });
      continue;
    }

    const patch = normalizePatch(file.patch, maxDiffLines);
    processed.push(patch === file.patch ? file : { ...file, patch });
  }

  logger.info('file_filtering', 'Files filtered and normalized', {
    kept: processed.length,
    skipped: files.length - processed.length,
  });

  return processed;
}
