import { extractWords } from './utils/normalizer.js';

export const FALLBACK_TAG = 'XXXX';
const MAX_TAG_LENGTH = 4;
const GENERATED_CHARS = '123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ';

type TeamWords = {
  name: string;
  words: string[];
};

type Strategy = (words: string[]) => string | null;

function toTag(value: string): string {
  return value.toUpperCase().slice(0, MAX_TAG_LENGTH);
}

function firstWord(words: string[]): string {
  return words[0] ?? '';
}

/**
 * Short tag for a single team, before any conflict handling.
 * "Eagles" -> "EAGL", "X" -> "X", "Team-Alpha" -> "TEAM", "" -> "XXXX".
 */
export function deriveBaseTag(teamName: string): string {
  const words = extractWords(teamName);
  if (!words.length) {
    return FALLBACK_TAG;
  }
  return toTag(firstWord(words));
}

// 3 chars of the first word + 1 of the second.
const threePlusOne: Strategy = (words) => {
  const second = words[1];
  if (words.length < 2 || !second) return null;
  return toTag(firstWord(words).slice(0, 3) + second[0]);
};

// 2 chars of the first word + 2 of the second.
const twoPlusTwo: Strategy = (words) => {
  const second = words[1];
  if (words.length < 2 || !second || second.length < 2) return null;
  return toTag(firstWord(words).slice(0, 2) + second.slice(0, 2));
};

/**
 * Applies one formula to the whole group. Succeeds only when every team gets a
 * candidate, the candidates are pairwise distinct and none is already taken.
 */
function resolveGroupWide(
  group: TeamWords[],
  strategy: Strategy,
  usedTags: ReadonlySet<string>,
): Map<string, string> | null {
  const results = new Map<string, string>();
  const seen = new Set<string>();
  for (const team of group) {
    const candidate = strategy(team.words);
    if (candidate === null || usedTags.has(candidate) || seen.has(candidate)) {
      return null;
    }
    seen.add(candidate);
    results.set(team.name, candidate);
  }
  return results;
}

function pickDisambiguated(prefix: string, words: string[], isFree: (tag: string) => boolean): string | null {
  const pools = [words[1] ?? '', words[2] ?? '', GENERATED_CHARS];
  for (const pool of pools) {
    for (const char of pool) {
      const candidate = toTag(prefix + char);
      if (isFree(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

function resolveIndividually(group: TeamWords[], usedTags: Set<string>): Map<string, string> {
  const results = new Map<string, string>();
  const isFree = (tag: string) => !usedTags.has(tag);

  for (const team of group) {
    const prefix = firstWord(team.words).slice(0, 3);
    let tag: string | null = null;

    for (const strategy of [threePlusOne, twoPlusTwo]) {
      const candidate = strategy(team.words);
      if (candidate !== null && isFree(candidate)) {
        tag = candidate;
        break;
      }
    }

    tag ??= pickDisambiguated(prefix, team.words, isFree);

    if (tag === null) {
      // Every generated character is taken; this tag may duplicate another one.
      results.set(team.name, toTag(prefix + 'X'));
      continue;
    }

    results.set(team.name, tag);
    usedTags.add(tag);
  }

  return results;
}

function resolveGroup(group: TeamWords[], usedTags: Set<string>): Map<string, string> {
  for (const strategy of [threePlusOne, twoPlusTwo]) {
    const resolved = resolveGroupWide(group, strategy, usedTags);
    if (resolved) {
      for (const tag of resolved.values()) {
        usedTags.add(tag);
      }
      return resolved;
    }
  }
  return resolveIndividually(group, usedTags);
}

/**
 * Maps every distinct team name to a unique tag of at most four characters.
 *
 * Teams whose base tag is unique keep it. Teams that share a base tag, or a
 * name listed more than once, form a group and are tried, in order, with 3+1
 * characters for the whole group, 2+2 characters for the whole group, and
 * finally a per-team fallback that ends with a disambiguating character. Groups are handled in the order their
 * base tag first appears, each seeing the tags taken before it.
 */
export function resolveConflicts(teamNames: Iterable<string>): Map<string, string> {
  // A repeated name counts as a collision even though it adds no new member.
  const groups = new Map<string, { members: TeamWords[]; occurrences: number }>();
  const seenNames = new Set<string>();

  for (const name of teamNames) {
    const baseTag = deriveBaseTag(name);
    const group = groups.get(baseTag) ?? { members: [], occurrences: 0 };
    groups.set(baseTag, group);
    group.occurrences += 1;

    if (seenNames.has(name)) continue;
    seenNames.add(name);
    group.members.push({ name, words: extractWords(name) });
  }

  const result = new Map<string, string>();
  const usedTags = new Set<string>();

  for (const [baseTag, group] of groups) {
    if (group.occurrences === 1) {
      result.set(group.members[0].name, baseTag);
      usedTags.add(baseTag);
    }
  }

  for (const group of groups.values()) {
    if (group.occurrences < 2) continue;
    for (const [name, tag] of resolveGroup(group.members, usedTags)) {
      result.set(name, tag);
    }
  }

  return result;
}

/** Tags held by more than one team. Empty unless the last-resort fallback fired. */
export function findDuplicateTags(mapping: ReadonlyMap<string, string>): Map<string, string[]> {
  const owners = new Map<string, string[]>();
  for (const [name, tag] of mapping) {
    const list = owners.get(tag) ?? [];
    list.push(name);
    owners.set(tag, list);
  }
  for (const [tag, names] of owners) {
    if (names.length < 2) {
      owners.delete(tag);
    }
  }
  return owners;
}
