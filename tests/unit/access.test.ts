import { describe, it, expect } from 'vitest';
import { loadCheatsheet } from '../../src/content/load';
import { entriesByVersion, findEntry, findGroup, listEntries } from '../../src/lib/access';

describe('read access over the bundled cheatsheet', () => {
  const doc = loadCheatsheet();

  it('lists every entry with its group, ordinal and position', () => {
    const all = listEntries(doc);
    expect(all).toHaveLength(38);
    expect(all[0]).toMatchObject({ group: 'Variables & Functions', ordinal: 1, position: 1 });
    expect(all[0].entry.id).toBe('let-and-const');
    expect(all[all.length - 1].entry.id).toBe('optional-catch-binding');
  });

  it('finds an entry by id or by case-insensitive title', () => {
    const byId = findEntry(doc, 'nullish-coalescing');
    expect(byId).toMatchObject({ group: 'Safe Access & Operators', ordinal: 6, position: 2 });
    expect(findEntry(doc, '  nullish COALESCING ')?.entry.id).toBe('nullish-coalescing');
    expect(findEntry(doc, 'pipeline-operator')).toBeUndefined();
  });

  it('finds a group by ordinal, name or slug', () => {
    expect(findGroup(doc, '2')?.name).toBe('Numbers & Strings');
    expect(findGroup(doc, 'arrays & objects')?.ordinal).toBe(3);
    expect(findGroup(doc, 'numbers-strings')?.ordinal).toBe(2);
    expect(findGroup(doc, 'safe-access--operators')?.ordinal).toBe(6);
    expect(findGroup(doc, '9')).toBeUndefined();
    expect(findGroup(doc, 'regular expressions')).toBeUndefined();
  });

  it('buckets entries by edition in edition order', () => {
    const buckets = entriesByVersion(doc);
    expect(buckets.map((b) => b.version)).toEqual([
      'ES6',
      'ES2016',
      'ES2017',
      'ES2018',
      'ES2019',
      'ES2020',
      'ES2021',
    ]);
    const es2021 = buckets.find((b) => b.version === 'ES2021');
    expect(es2021?.entries.map((l) => l.entry.title)).toEqual([
      'Numeric Separators',
      'replaceAll',
      'Promise.any',
      'Logical Assignment',
    ]);
    expect(buckets.reduce((n, b) => n + b.entries.length, 0)).toBe(38);
  });
});
