import { readFile } from 'node:fs/promises';
import { findDuplicateTags, resolveConflicts } from './shortNames.js';
import type { RosterEntry, TeamSlot } from './types.js';
import { splitRosterLine } from './utils/normalizer.js';

const LOG_PREFIX = '[roster]';

/** Parses `Slots.txt`: one `<number>. <name>` per line, blank lines ignored. */
export function parseRoster(text: string): RosterEntry[] {
  const entries: RosterEntry[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const parts = splitRosterLine(line);
    if (!parts) {
      console.warn(`${LOG_PREFIX} Skipping invalid line`, { line });
      continue;
    }

    const [rawNumber, teamName] = parts;
    entries.push({ teamNumber: rawNumber.replace(/^\.+|\.+$/g, ''), teamName });
  }

  return entries;
}

export async function loadRoster(path: string): Promise<RosterEntry[]> {
  const text = await readFile(path, 'utf8');
  return parseRoster(text);
}

/**
 * Resolves tags over every roster line, repeats included, and returns one slot
 * per team name. A name listed twice keeps its first position and its last number.
 */
export function assignTeamTags(entries: RosterEntry[]): TeamSlot[] {
  const shortNames = resolveConflicts(entries.map((entry) => entry.teamName));

  const duplicates = findDuplicateTags(shortNames);
  if (duplicates.size) {
    console.warn(`${LOG_PREFIX} Duplicate short names`, Object.fromEntries(duplicates));
  }

  const numbers = new Map<string, string>();
  for (const entry of entries) {
    numbers.set(entry.teamName, entry.teamNumber);
  }

  return [...numbers].map(([teamName, teamNumber]) => {
    const shortName = shortNames.get(teamName);
    if (shortName === undefined) {
      throw new Error(`No short name resolved for team: ${teamName}`);
    }
    return { teamNumber, teamName, shortName, imageFileName: `${teamNumber}.png` };
  });
}
