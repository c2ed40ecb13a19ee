/**
 * Editorial checks over a parsed cheatsheet.
 * Every rule reports an issue instead of throwing.
 */
import type { CheatsheetDocument, FeatureTable } from '../types/entry';
import { EXPECTED_GROUP_COUNT } from './constants';
import { compareVersions } from './versions';

export type IssueLevel = 'error' | 'warning';

export type IssueCode =
  | 'group-count'
  | 'toc-mismatch'
  | 'empty-group'
  | 'empty-explanation'
  | 'missing-example'
  | 'duplicate-id'
  | 'unknown-feature'
  | 'version-predates-feature'
  | 'version-later-than-feature'
  | 'duplicate-title';

export interface Issue {
  level: IssueLevel;
  code: IssueCode;
  path: string; // e.g. "groups[2].entries[0]"
  message: string;
}

export interface ValidateOptions {
  expectedGroups?: number;
}

export function validateDocument(
  doc: CheatsheetDocument,
  features: FeatureTable,
  options: ValidateOptions = {},
): Issue[] {
  const issues: Issue[] = [];
  const expectedGroups = options.expectedGroups ?? EXPECTED_GROUP_COUNT;
  const push = (level: IssueLevel, code: IssueCode, path: string, message: string) =>
    issues.push({ level, code, path, message });

  if (doc.groups.length !== expectedGroups) {
    push(
      'error',
      'group-count',
      'groups',
      `expected ${expectedGroups} groups, found ${doc.groups.length}`,
    );
  }

  const names = doc.groups.map((g) => g.name);
  const tocLength = Math.max(names.length, doc.contents.length);
  for (let i = 0; i < tocLength; i++) {
    const listed = doc.contents[i];
    const actual = names[i];
    if (listed === actual) continue;
    if (actual === undefined) {
      push('error', 'toc-mismatch', `contents[${i}]`, `"${listed}" is listed but has no group`);
    } else if (listed === undefined) {
      push('error', 'toc-mismatch', `groups[${i}]`, `group "${actual}" is missing from contents`);
    } else {
      push(
        'error',
        'toc-mismatch',
        `contents[${i}]`,
        `contents lists "${listed}" but group ${i + 1} is "${actual}"`,
      );
    }
  }

  const seenIds = new Map<string, string>();
  doc.groups.forEach((group, gi) => {
    const groupPath = `groups[${gi}]`;
    if (!group.entries.length) {
      push('error', 'empty-group', groupPath, `group "${group.name}" has no entries`);
    }

    const seenTitles = new Set<string>();
    group.entries.forEach((entry, ei) => {
      const path = `${groupPath}.entries[${ei}]`;

      if (!entry.explanation.trim()) {
        push('error', 'empty-explanation', path, `"${entry.title}" has no explanation`);
      }
      if (!entry.examples.some((ex) => ex.code.trim().length > 0)) {
        push('error', 'missing-example', path, `"${entry.title}" has no code example`);
      }

      const firstAt = seenIds.get(entry.id);
      if (firstAt) {
        push('error', 'duplicate-id', path, `id "${entry.id}" already used at ${firstAt}`);
      } else {
        seenIds.set(entry.id, path);
      }

      const titleKey = entry.title.trim().toLowerCase();
      if (seenTitles.has(titleKey)) {
        push('warning', 'duplicate-title', path, `"${entry.title}" appears twice in "${group.name}"`);
      }
      seenTitles.add(titleKey);

      const feature = Object.prototype.hasOwnProperty.call(features, entry.feature)
        ? features[entry.feature]
        : undefined;
      if (!feature) {
        push('error', 'unknown-feature', path, `unknown feature "${entry.feature}"`);
        return;
      }
      const cmp = compareVersions(entry.version, feature.since);
      if (cmp < 0) {
        push(
          'error',
          'version-predates-feature',
          path,
          `"${entry.title}" is tagged ${entry.version} but ${feature.label} arrived in ${feature.since}`,
        );
      } else if (cmp > 0) {
        push(
          'warning',
          'version-later-than-feature',
          path,
          `"${entry.title}" is tagged ${entry.version}; ${feature.label} was already available in ${feature.since}`,
        );
      }
    });
  });

  return issues;
}

export function hasErrors(issues: readonly Issue[]): boolean {
  return issues.some((i) => i.level === 'error');
}

export function formatIssue(issue: Issue): string {
  return `${issue.level} ${issue.code} at ${issue.path}: ${issue.message}`;
}
