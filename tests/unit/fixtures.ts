import type { z } from 'zod';
import { parseCheatsheet } from '../../src/content/load';
import type { DocumentInput, entrySchema } from '../../src/content/schema';
import type { CheatsheetDocument, FeatureTable } from '../../src/types/entry';

export type EntryInput = z.input<typeof entrySchema>;

export const GROUP_NAMES = ['Alpha', 'Beta', 'Gamma', 'Delta', 'Epsilon', 'Zeta'];

export const features: FeatureTable = {
  'template-literals': { label: 'Template literals', since: 'ES6' },
  'nullish-coalescing': { label: 'Nullish coalescing (??)', since: 'ES2020' },
};

export function makeEntry(id: string, over: Partial<EntryInput> = {}): EntryInput {
  return {
    id,
    title: id,
    version: 'ES6',
    feature: 'template-literals',
    explanation: 'Explains the feature.',
    examples: [{ code: 'const x = 1;' }],
    useCase: 'Shows where it helps.',
    ...over,
  };
}

/** One entry per group, ids entry-1..entry-n, contents matching the group names. */
export function makeInput(groupCount = 6): DocumentInput {
  const names = GROUP_NAMES.slice(0, groupCount);
  return {
    title: 'Test Sheet',
    contents: [...names],
    groups: names.map((name, i) => ({ name, entries: [makeEntry(`entry-${i + 1}`)] })),
  };
}

export function makeDoc(input: DocumentInput = makeInput()): CheatsheetDocument {
  return parseCheatsheet(input);
}
