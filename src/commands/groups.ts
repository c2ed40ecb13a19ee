import { Command } from 'commander';
import { entriesByVersion, findGroup } from '../lib/access';
import { NotFoundError } from '../lib/errors';
import { groupHeading } from '../lib/render';
import { resolveDocument, runAction, type CliContext } from './context';

export function groupsCommand(ctx: CliContext): Command {
  return new Command('groups')
    .description('List the groups, or the entries of one group')
    .argument('[group]', 'ordinal, name or slug of a group')
    .option('-d, --data <file>', 'content file to read')
    .action((query: string | undefined, opts: { data?: string }) =>
      runAction(ctx, () => {
        const doc = resolveDocument(ctx, opts.data);
        if (query === undefined) {
          const lines = doc.groups.map(
            (g) => `${groupHeading(g.ordinal, g.name)} (${g.entries.length} entries)`,
          );
          ctx.out(lines.join('\n') + '\n');
          return;
        }
        const group = findGroup(doc, query);
        if (!group) throw new NotFoundError('group', query);
        const lines = group.entries.map((e) => `${e.id}\t${e.version}\t${e.title}`);
        ctx.out(lines.join('\n') + '\n');
      }),
    );
}

export function versionsCommand(ctx: CliContext): Command {
  return new Command('versions')
    .description('List entries by the edition that introduced them')
    .option('-d, --data <file>', 'content file to read')
    .action((opts: { data?: string }) =>
      runAction(ctx, () => {
        const buckets = entriesByVersion(resolveDocument(ctx, opts.data));
        const lines: string[] = [];
        for (const b of buckets) {
          lines.push(b.version);
          for (const l of b.entries) lines.push(`   - ${l.entry.title} (${l.group})`);
        }
        ctx.out(lines.join('\n') + '\n');
      }),
    );
}
