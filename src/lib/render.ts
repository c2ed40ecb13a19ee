import type { CheatsheetDocument, CombinedExample, Entry, Example } from '../types/entry';
import { CODE_LANGUAGE } from './constants';
import { fenceFor, sanitizeLine, slugify } from './text';

function codeBlock(code: string): string {
  const body = code.replace(/\s+$/, '');
  const fence = fenceFor(body);
  return `${fence}${CODE_LANGUAGE}\n${body}\n${fence}`;
}

function renderExample(ex: Example): string {
  const caption = ex.caption ? sanitizeLine(ex.caption) : '';
  return caption ? `_${caption}_\n${codeBlock(ex.code)}` : codeBlock(ex.code);
}

export function groupHeading(ordinal: number, name: string): string {
  return `${ordinal}. ${sanitizeLine(name)}`;
}

export function renderEntry(entry: Entry): string {
  const blocks = [`### ${sanitizeLine(entry.title)} (${entry.version})`];
  const explanation = sanitizeLine(entry.explanation);
  if (explanation) blocks.push(explanation);
  for (const ex of entry.examples) blocks.push(renderExample(ex));
  const useCase = sanitizeLine(entry.useCase);
  if (useCase) blocks.push(`**Use case:** ${useCase}`);
  return blocks.join('\n\n');
}

function renderCombined(ex: CombinedExample): string {
  const blocks = [`### ${sanitizeLine(ex.heading)}`, codeBlock(ex.code)];
  const note = ex.note ? sanitizeLine(ex.note) : '';
  if (note) blocks.push(note);
  return blocks.join('\n\n');
}

function bullets(items: readonly string[]): string {
  return items.map((s) => `- ${sanitizeLine(s)}`).join('\n');
}

export function renderMarkdown(doc: CheatsheetDocument): string {
  const blocks: string[] = [`# ${sanitizeLine(doc.title)}`];

  for (const note of doc.notes) {
    const line = sanitizeLine(note);
    if (line) blocks.push(line);
  }

  if (doc.groups.length) {
    blocks.push('## Contents');
    blocks.push(
      doc.groups
        .map((g) => {
          const heading = groupHeading(g.ordinal, g.name);
          return `${g.ordinal}. [${sanitizeLine(g.name)}](#${slugify(heading)})`;
        })
        .join('\n'),
    );
  }

  for (const g of doc.groups) {
    blocks.push(`## ${groupHeading(g.ordinal, g.name)}`);
    for (const entry of g.entries) blocks.push(renderEntry(entry));
  }

  if (doc.combinedExamples.length) {
    blocks.push('## Combined Examples');
    for (const ex of doc.combinedExamples) blocks.push(renderCombined(ex));
  }
  if (doc.talkingPoints.length) {
    blocks.push('## Talking Points', bullets(doc.talkingPoints));
  }
  if (doc.endnotes.length) {
    blocks.push('## Notes', bullets(doc.endnotes));
  }

  return blocks.join('\n\n') + '\n';
}

/** Compact outline for terminals: groups, then entries with their edition. */
export function renderText(doc: CheatsheetDocument): string {
  const lines = [sanitizeLine(doc.title)];
  for (const g of doc.groups) {
    lines.push(groupHeading(g.ordinal, g.name));
    for (const e of g.entries) lines.push(`   - ${sanitizeLine(e.title)} [${e.version}]`);
  }
  return lines.join('\n') + '\n';
}
