import fs from 'node:fs';
import { z } from 'zod';
import { ContentError } from '../lib/errors';
import type { CheatsheetDocument, FeatureTable } from '../types/entry';
import { documentSchema, featureTableSchema } from './schema';
import CHEATSHEET from '../../data/cheatsheet.json';
import FEATURES from '../../data/feature-versions.json';

export const BUNDLED_SOURCE = 'data/cheatsheet.json';
const FEATURES_SOURCE = 'data/feature-versions.json';

function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown, source: string): z.output<S> {
  const res = schema.safeParse(raw);
  if (!res.success) throw ContentError.fromZod(source, res.error);
  return res.data;
}

export function parseCheatsheet(raw: unknown, source = '(inline)'): CheatsheetDocument {
  return parseWith(documentSchema, raw, source);
}

/** The cheatsheet shipped with the package. */
export function loadCheatsheet(): CheatsheetDocument {
  return parseCheatsheet(CHEATSHEET, BUNDLED_SOURCE);
}

export function loadCheatsheetFile(filePath: string): CheatsheetDocument {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? String(err.code) : '';
    throw new ContentError(filePath, [code === 'ENOENT' ? 'file not found' : String(err)]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ContentError(filePath, [`invalid JSON: ${msg}`]);
  }
  return parseCheatsheet(raw, filePath);
}

export function loadFeatureTable(): FeatureTable {
  return parseWith(featureTableSchema, FEATURES, FEATURES_SOURCE);
}
