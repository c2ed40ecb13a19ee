import { describe, it, expect } from 'vitest';
import { parseCheatsheet } from '../../src/content/load';
import { renderEntry, renderMarkdown, renderText } from '../../src/lib/render';
import { makeEntry } from './fixtures';

const mini = parseCheatsheet({
  title: 'Mini Sheet',
  notes: ['First  note\nwraps.'],
  contents: ['Numbers & Strings'],
  groups: [
    {
      name: 'Numbers & Strings',
      entries: [
        {
          id: 'template-literals',
          title: 'Template Literals',
          version: 'ES2015',
          feature: 'template-literals',
          explanation: 'Backtick strings.',
          examples: [{ code: 'const s = `hi ${name}`;\n', caption: 'interpolation' }],
          useCase: 'Messages.',
        },
      ],
    },
  ],
  talkingPoints: ['Prefer const.'],
  endnotes: ['ES6 is ES2015.'],
});

describe('renderMarkdown', () => {
  it('lays out title, notes, contents, groups and trailing sections', () => {
    expect(renderMarkdown(mini)).toBe(
      [
        '# Mini Sheet',
        '',
        'First note wraps.',
        '',
        '## Contents',
        '',
        '1. [Numbers & Strings](#1-numbers--strings)',
        '',
        '## 1. Numbers & Strings',
        '',
        '### Template Literals (ES6)',
        '',
        'Backtick strings.',
        '',
        '_interpolation_',
        '```js',
        'const s = `hi ${name}`;',
        '```',
        '',
        '**Use case:** Messages.',
        '',
        '## Talking Points',
        '',
        '- Prefer const.',
        '',
        '## Notes',
        '',
        '- ES6 is ES2015.',
        '',
      ].join('\n'),
    );
  });

  it('renders combined examples with their notes', () => {
    const doc = parseCheatsheet({
      title: 'Combined',
      contents: [],
      groups: [],
      combinedExamples: [{ heading: 'Putting it together', code: 'a ?? b', note: 'Two features.' }],
    });
    expect(renderMarkdown(doc)).toBe(
      [
        '# Combined',
        '',
        '## Combined Examples',
        '',
        '### Putting it together',
        '',
        '```js',
        'a ?? b',
        '```',
        '',
        'Two features.',
        '',
      ].join('\n'),
    );
  });
});

describe('renderEntry', () => {
  it('lengthens the fence past backtick runs inside the code', () => {
    const entry = parseCheatsheet({
      title: 't',
      contents: ['G'],
      groups: [{ name: 'G', entries: [makeEntry('fences', { examples: [{ code: 'md`\n```\n`' }] })] }],
    }).groups[0].entries[0];
    expect(renderEntry(entry)).toBe(
      [
        '### fences (ES6)',
        '',
        'Explains the feature.',
        '',
        '````js',
        'md`',
        '```',
        '`',
        '````',
        '',
        '**Use case:** Shows where it helps.',
      ].join('\n'),
    );
  });

  it('omits a blank use case and keeps code indentation verbatim', () => {
    const entry = parseCheatsheet({
      title: 't',
      contents: ['G'],
      groups: [
        {
          name: 'G',
          entries: [
            makeEntry('indent', {
              useCase: ' ',
              examples: [{ code: 'if (a) {\n  b();\n}' }],
            }),
          ],
        },
      ],
    }).groups[0].entries[0];
    expect(renderEntry(entry)).toBe(
      ['### indent (ES6)', '', 'Explains the feature.', '', '```js', 'if (a) {', '  b();', '}', '```'].join(
        '\n',
      ),
    );
  });
});

describe('renderText', () => {
  it('prints a compact outline', () => {
    expect(renderText(mini)).toBe('Mini Sheet\n1. Numbers & Strings\n   - Template Literals [ES6]\n');
  });
});
