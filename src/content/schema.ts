import { z } from 'zod';
import { SUPPORTED_VERSIONS, VERSION_ALIASES } from '../lib/constants';

export const versionTag = z.preprocess((val) => {
  if (typeof val !== 'string') return val;
  const upper = val.trim().toUpperCase();
  return VERSION_ALIASES[upper] ?? upper;
}, z.enum(SUPPORTED_VERSIONS));

export const exampleSchema = z.object({
  code: z.string(), // literal text, kept verbatim
  caption: z.string().optional(),
});

export const entrySchema = z.object({
  id: z.string().regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, 'id must be a kebab-case slug'),
  title: z.string().min(1),
  version: versionTag,
  feature: z.string().min(1),
  // Blank explanations and missing examples are reported by validateDocument, not here.
  explanation: z.string(),
  examples: z.array(exampleSchema),
  useCase: z.string(),
});

export const groupSchema = z.object({
  name: z.string().min(1),
  entries: z.array(entrySchema),
});

export const combinedExampleSchema = z.object({
  heading: z.string().min(1),
  code: z.string(),
  note: z.string().optional(),
});

export const documentSchema = z.object({
  title: z.string().min(1),
  notes: z.array(z.string()).default([]),
  contents: z.array(z.string()),
  groups: z
    .array(groupSchema)
    .transform((groups) => groups.map((g, i) => ({ ...g, ordinal: i + 1 }))),
  combinedExamples: z.array(combinedExampleSchema).default([]),
  talkingPoints: z.array(z.string()).default([]),
  endnotes: z.array(z.string()).default([]),
});

export const featureTableSchema = z.record(
  z.object({
    label: z.string().min(1),
    since: versionTag,
  }),
);

export type DocumentInput = z.input<typeof documentSchema>;
