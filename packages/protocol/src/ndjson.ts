// NDJSON (Newline Delimited JSON) helpers
// Used for append-only local logs such as the escalation fallback log.

/**
 * Parse an NDJSON string into an array of values.
 * Blank lines are skipped. Callers validate the shape of each value.
 */
export function parseNdjson(content: string): unknown[] {
  if (!content.trim()) {
    return [];
  }

  const lines = content.split('\n');
  const results: unknown[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    try {
      results.push(JSON.parse(line));
    } catch (error) {
      throw new Error(
        `Failed to parse NDJSON at line ${i + 1}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  return results;
}

/**
 * Stringify a single item as an NDJSON line (for appending)
 */
export function stringifyNdjsonLine(item: unknown): string {
  return JSON.stringify(item) + '\n';
}
