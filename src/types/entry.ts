import type { VersionTag } from '../lib/constants';

export interface Example {
  readonly code: string; // literal snippet, never executed
  readonly caption?: string;
}

export interface Entry {
  readonly id: string; // slug, unique across the document
  readonly title: string; // e.g., "Nullish Coalescing"
  readonly version: VersionTag;
  readonly feature: string; // key into feature-versions.json
  readonly explanation: string;
  readonly examples: readonly Example[];
  readonly useCase: string;
}

export interface Group {
  readonly name: string; // e.g., "Numbers & Strings"
  readonly ordinal: number; // 1-based, authoring order
  readonly entries: readonly Entry[];
}

export interface CombinedExample {
  readonly heading: string;
  readonly code: string;
  readonly note?: string;
}

export interface CheatsheetDocument {
  readonly title: string;
  readonly notes: readonly string[];
  readonly contents: readonly string[]; // table of contents, group names in order
  readonly groups: readonly Group[];
  readonly combinedExamples: readonly CombinedExample[];
  readonly talkingPoints: readonly string[];
  readonly endnotes: readonly string[];
}

export interface FeatureInfo {
  readonly label: string;
  readonly since: VersionTag;
}

export type FeatureTable = Readonly<Record<string, FeatureInfo>>;
