import { Command } from 'commander';
import { findEntry } from '../lib/access';
import { NotFoundError } from '../lib/errors';
import { renderEntry } from '../lib/render';
import { resolveDocument, runAction, type CliContext } from './context';

export function showCommand(ctx: CliContext): Command {
  return new Command('show')
    .description('Print a single entry, by id or title')
    .argument('<query>', 'entry id (e.g. nullish-coalescing) or title')
    .option('-d, --data <file>', 'content file to read')
    .action((query: string, opts: { data?: string }) =>
      runAction(ctx, () => {
        const found = findEntry(resolveDocument(ctx, opts.data), query);
        if (!found) throw new NotFoundError('entry', query);
        ctx.out(`${renderEntry(found.entry)}\n`);
      }),
    );
}
