const WORD_PATTERN = /[a-zA-Z0-9]+/g;

/** Splits a team name into its ASCII alphanumeric runs, left to right. */
export function extractWords(raw: string): string[] {
  return raw.match(WORD_PATTERN) ?? [];
}

export function splitRosterLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  const match = trimmed.match(/^(\S+)\s+(\S[\s\S]*)$/);
  if (!match) return null;
  return [match[1], match[2]];
}
