import { Command, Option } from 'commander';
import { renderMarkdown, renderText } from '../lib/render';
import type { CheatsheetDocument } from '../types/entry';
import { resolveDocument, runAction, type CliContext } from './context';

export const FORMATS = ['md', 'text', 'json'] as const;
export type Format = (typeof FORMATS)[number];

type RenderOptions = {
  format: Format;
  out?: string;
  data?: string;
};

export function formatDocument(doc: CheatsheetDocument, format: Format): string {
  switch (format) {
    case 'md':
      return renderMarkdown(doc);
    case 'text':
      return renderText(doc);
    case 'json':
      return JSON.stringify(doc, null, 2) + '\n';
  }
}

export function renderCommand(ctx: CliContext): Command {
  return new Command('render')
    .description('Print the cheatsheet as Markdown, a plain-text outline, or JSON')
    .addOption(new Option('-f, --format <format>', 'output format').choices(FORMATS).default('md'))
    .option('-o, --out <file>', 'write to a file instead of stdout')
    .option('-d, --data <file>', 'content file to render')
    .action((opts: RenderOptions) =>
      runAction(ctx, () => {
        const text = formatDocument(resolveDocument(ctx, opts.data), opts.format);
        if (opts.out) {
          ctx.writeFile(opts.out, text);
          ctx.log.info(`wrote ${opts.out}`);
        } else {
          ctx.out(text);
        }
      }),
    );
}
