import { describe, it, expect } from 'vitest';
import { deriveBaseTag, findDuplicateTags, resolveConflicts } from './shortNames.js';

const TAG_PATTERN = /^[A-Z0-9]{1,4}$/;

function expectValidTags(result: Map<string, string>) {
  for (const tag of result.values()) {
    expect(tag).toMatch(TAG_PATTERN);
  }
}

describe('deriveBaseTag', () => {
  it('uses four characters of a long first word', () => {
    expect(deriveBaseTag('Eagles')).toBe('EAGL');
    expect(deriveBaseTag('Squad 99')).toBe('SQUA');
    expect(deriveBaseTag('Blue Dragons')).toBe('BLUE');
  });

  it('uses the whole first word when it is shorter than four', () => {
    expect(deriveBaseTag('ABC')).toBe('ABC');
    expect(deriveBaseTag('X')).toBe('X');
    expect(deriveBaseTag('abc Hitters')).toBe('ABC');
  });

  it('treats punctuation as a word separator', () => {
    expect(deriveBaseTag('Team-Alpha')).toBe('TEAM');
    expect(deriveBaseTag('Team_Beta')).toBe('TEAM');
    expect(deriveBaseTag('Team & Co')).toBe('TEAM');
    expect(deriveBaseTag('  #1 Pick')).toBe('1');
  });

  it('falls back to XXXX without any word', () => {
    expect(deriveBaseTag('')).toBe('XXXX');
    expect(deriveBaseTag('   ')).toBe('XXXX');
    expect(deriveBaseTag('!@#$')).toBe('XXXX');
  });
});

describe('resolveConflicts', () => {
  it('keeps base tags when nothing collides', () => {
    const result = resolveConflicts(['Eagles', 'Bears', 'Lions']);
    expect(Object.fromEntries(result)).toEqual({ Eagles: 'EAGL', Bears: 'BEAR', Lions: 'LION' });
  });

  it('resolves a whole group with 3+1 characters', () => {
    const result = resolveConflicts(['Team 1', 'Team 2', 'Team 3']);
    expect(Object.fromEntries(result)).toEqual({ 'Team 1': 'TEA1', 'Team 2': 'TEA2', 'Team 3': 'TEA3' });
  });

  it('moves to 2+2 characters when 3+1 collides inside the group', () => {
    const result = resolveConflicts(['Fancy Guys', 'Fancy Girls']);
    expect(Object.fromEntries(result)).toEqual({ 'Fancy Guys': 'FAGU', 'Fancy Girls': 'FAGI' });
  });

  it('resolves several groups next to unique teams', () => {
    const result = resolveConflicts(['ABC Hitters', 'Team 1', 'Team 2', 'Fancy Guys', 'Fancy Girls']);
    expect(Object.fromEntries(result)).toEqual({
      'ABC Hitters': 'ABC',
      'Team 1': 'TEA1',
      'Team 2': 'TEA2',
      'Fancy Guys': 'FAGU',
      'Fancy Girls': 'FAGI',
    });
    expect(new Set(result.values()).size).toBe(5);
  });

  it('gives every team of a mixed roster a distinct tag', () => {
    const names = ['Eagles', 'Team 1', 'Blue Dragons', 'Fancy Guys', 'Alpha Squad'];
    const result = resolveConflicts(names);
    expect(result.size).toBe(names.length);
    expect(new Set(result.values()).size).toBe(names.length);
    expectValidTags(result);
  });

  it('appends a generated character for single-word teams in a group', () => {
    const result = resolveConflicts(['Squad', 'Squad Goals']);
    expect(Object.fromEntries(result)).toEqual({ Squad: 'SQU1', 'Squad Goals': 'SQUG' });
  });

  it('avoids tags already held by teams outside the group', () => {
    const result = resolveConflicts(['TEA1', 'Team 1', 'Team 2']);
    expect(Object.fromEntries(result)).toEqual({ TEA1: 'TEA1', 'Team 1': 'TEA2', 'Team 2': 'TEA3' });
  });

  it('draws disambiguating characters from the second word, then the third', () => {
    const result = resolveConflicts(['Red Ox Den', 'Red Ox Elk', 'Red Ox Fin', 'Red Ox Gym']);
    expect(Object.fromEntries(result)).toEqual({
      'Red Ox Den': 'REDO',
      'Red Ox Elk': 'REOX',
      'Red Ox Fin': 'REDX',
      'Red Ox Gym': 'REDG',
    });
  });

  it('skips taken characters of a short second word', () => {
    const result = resolveConflicts(['Team 1', 'Team 1!']);
    expect(Object.fromEntries(result)).toEqual({ 'Team 1': 'TEA1', 'Team 1!': 'TEA2' });
  });

  it('resolves names without any word to generated tags', () => {
    const result = resolveConflicts(['!!!', '???']);
    expect(Object.fromEntries(result)).toEqual({ '!!!': '1', '???': '2' });
  });

  it('returns one entry per distinct name and treats a repeated name as a conflict', () => {
    const result = resolveConflicts(['Team A', 'Team A', 'Bears']);
    expect(Object.fromEntries(result)).toEqual({ Bears: 'BEAR', 'Team A': 'TEAA' });
  });

  it('gives a repeated single-word name a generated character', () => {
    expect(Object.fromEntries(resolveConflicts(['Eagles', 'Eagles']))).toEqual({ Eagles: 'EAG1' });
  });

  it('groups a repeated name with other teams sharing its base tag', () => {
    const result = resolveConflicts(['Team 1', 'Team 2', 'Team 1']);
    expect(Object.fromEntries(result)).toEqual({ 'Team 1': 'TEA1', 'Team 2': 'TEA2' });
  });

  it('returns an empty mapping for an empty roster', () => {
    expect(resolveConflicts([]).size).toBe(0);
  });

  it('is deterministic across calls', () => {
    const names = ['Fancy Guys', 'Fancy Girls', 'Fancy Gals', 'Squad', 'Squad Goals'];
    expect([...resolveConflicts(names)]).toEqual([...resolveConflicts(names)]);
  });

  it('emits a duplicate only once the generated characters run out', () => {
    const names = Array.from({ length: 36 }, (_, i) => `Abcd${i + 1}`);
    const result = resolveConflicts(names);

    expect(result.get('Abcd1')).toBe('ABC1');
    expect(result.get('Abcd10')).toBe('ABCA');
    expect(result.get('Abcd35')).toBe('ABCZ');
    expect(result.get('Abcd36')).toBe('ABCX');
    expectValidTags(result);

    const duplicates = findDuplicateTags(result);
    expect(Object.fromEntries(duplicates)).toEqual({ ABCX: ['Abcd33', 'Abcd36'] });
  });
});

describe('findDuplicateTags', () => {
  it('is empty when every tag is unique', () => {
    expect(findDuplicateTags(resolveConflicts(['Team 1', 'Team 2'])).size).toBe(0);
  });
});
