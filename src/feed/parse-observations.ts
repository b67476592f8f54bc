// Latest-observations text feed parser

import type { Row } from '../types.js';

const COMMENT_MARKER = '#';

/**
 * Parse the whitespace-delimited observations feed. Lines starting with `#` (the column header and
 * units lines) and blank lines are dropped; every other line becomes one row of its tokens.
 */
export function parseObservations(body: string): Row[] {
  const rows: Row[] = [];

  for (const rawLine of body.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.startsWith(COMMENT_MARKER)) continue;

    const fields = line.trim().split(/\s+/);
    if (fields.length === 1 && fields[0] === '') continue;

    rows.push(fields);
  }

  return rows;
}
