const HUNK_NEW_START = /\+(\d+)/;

/**
 * Lines that add content, without the `+++` file header.
 */
export function extractAddedLines(patch: string): string[] {
  return patch.split('\n').filter(line => line.startsWith('+') && !line.startsWith('+++'));
}

function countNewlines(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) count++;
  }
  return count;
}

/**
 * Approximate the new-file line number for a match at `offset`.
 *
 * Walks the patch up to the line containing `offset`, restarting the counter
 * at each hunk header's `+start` and bumping it for every `+` line. Context
 * lines are not counted, so the result drifts inside hunks that mix context
 * and additions. When no header or addition precedes the match, falls back
 * to the raw line index (1-based).
 *
 * Best effort only. Callers that scanned the added-lines text pass an offset
 * into that text, which is applied to the raw patch as-is.
 */
export function locateLine(patch: string, offset: number): number {
  const linesBefore = countNewlines(patch.slice(0, offset));
  const lines = patch.split('\n').slice(0, linesBefore + 1);

  let currentLine = 0;

  for (const line of lines) {
    if (line.startsWith('@@')) {
      const match = HUNK_NEW_START.exec(line);
      if (match) {
        currentLine = parseInt(match[1], 10);
      }
    } else if (line.startsWith('+')) {
      currentLine++;
    }
  }

  return currentLine > 0 ? currentLine : linesBefore + 1;
}
