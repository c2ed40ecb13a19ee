import type { CheatsheetDocument, Entry, Group } from '../types/entry';
import { SUPPORTED_VERSIONS, type VersionTag } from './constants';
import { slugify } from './text';

export type LocatedEntry = {
  entry: Entry;
  group: string;
  ordinal: number; // group ordinal
  position: number; // 1-based within the group
};

export function listEntries(doc: CheatsheetDocument): LocatedEntry[] {
  return doc.groups.flatMap((g) =>
    g.entries.map((entry, i) => ({ entry, group: g.name, ordinal: g.ordinal, position: i + 1 })),
  );
}

/** Lookup by exact id, then by case-insensitive title. */
export function findEntry(doc: CheatsheetDocument, query: string): LocatedEntry | undefined {
  const all = listEntries(doc);
  const q = query.trim();
  const byId = all.find((l) => l.entry.id === q);
  if (byId) return byId;
  const lower = q.toLowerCase();
  return all.find((l) => l.entry.title.trim().toLowerCase() === lower);
}

function looseSlug(s: string): string {
  return slugify(s).replace(/-+/g, '-');
}

/** Lookup by ordinal ("3"), case-insensitive name, or slug ("numbers-strings"). */
export function findGroup(doc: CheatsheetDocument, query: string): Group | undefined {
  const q = query.trim();
  if (/^\d+$/.test(q)) {
    const n = Number(q);
    return doc.groups.find((g) => g.ordinal === n);
  }
  const lower = q.toLowerCase();
  return (
    doc.groups.find((g) => g.name.toLowerCase() === lower) ??
    doc.groups.find((g) => looseSlug(g.name) === looseSlug(q))
  );
}

/** Authored entries bucketed by edition, oldest first; editions with no entries are left out. */
export function entriesByVersion(
  doc: CheatsheetDocument,
): Array<{ version: VersionTag; entries: LocatedEntry[] }> {
  const all = listEntries(doc);
  return SUPPORTED_VERSIONS.map((version) => ({
    version,
    entries: all.filter((l) => l.entry.version === version),
  })).filter((b) => b.entries.length > 0);
}
