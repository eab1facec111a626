import type { FileChange } from '../../types.js';
import { logger } from '../../observability/logger.js';

export type FilePriority = 1 | 2 | 3;

const HIGH_PRIORITY_KEYWORDS = [
  // auth & crypto
  'auth', 'security', 'crypto', 'password', 'token',
  // API surface
  'api', 'endpoint', 'route', 'controller',
  // persistence
  'sql', 'database', 'query', 'model',
  // money
  'payment', 'billing', 'transaction',
];

const LOW_PRIORITY_KEYWORDS = [
  'test', 'spec', 'mock',
  'readme', 'doc', '.md',
  'config', 'setting', '.yml', '.yaml', '.json',
  'migration', 'fixture',
];

/**
 * 3 = security / API / persistence / billing code,
 * 1 = tests, docs, config, migrations,
 * 2 = everything else.
 *
 * The high-priority check runs first, so `src/auth/config.ts` is 3.
 */
export function getFilePriority(path: string): FilePriority {
  const lower = path.toLowerCase();

  if (HIGH_PRIORITY_KEYWORDS.some(keyword => lower.includes(keyword))) {
    return 3;
  }

  if (LOW_PRIORITY_KEYWORDS.some(keyword => lower.includes(keyword))) {
    return 1;
  }

  return 2;
}

function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Reorder files by descending priority, then by path. Never drops or
 * duplicates a file, and the order is the same on every call.
 */
export function prioritizeFiles(files: readonly FileChange[]): FileChange[] {
  const ranked = files.map(file => ({ file, priority: getFilePriority(file.path) }));

  ranked.sort((a, b) => {
    const priorityDiff = b.priority - a.priority;
    if (priorityDiff !== 0) return priorityDiff;

    return comparePaths(a.file.path, b.file.path);
  });

  logger.info('file_prioritization', 'Prioritized files for analysis', {
    total: ranked.length,
    high: ranked.filter(r => r.priority === 3).length,
    medium: ranked.filter(r => r.priority === 2).length,
    low: ranked.filter(r => r.priority === 1).length,
  });

  return ranked.map(r => r.file);
}

/**
 * Keep the `cap` most review-worthy files when a change-set is too large
 * to analyse in full. Smaller change-sets are returned in their original order.
 */
export function selectKeyFiles(files: readonly FileChange[], cap: number): FileChange[] {
  if (files.length <= cap) {
    return [...files];
  }

  const selected = prioritizeFiles(files).slice(0, cap);

  logger.info('file_truncation', 'Applied file cap after prioritization', {
    total: files.length,
    kept: selected.length,
    dropped: files.length - selected.length,
  });

  return selected;
}
