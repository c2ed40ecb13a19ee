import { Command } from 'commander';
import { loadFeatureTable } from '../content/load';
import { formatIssue, validateDocument } from '../lib/validate';
import { resolveDocument, runAction, type CliContext } from './context';

type CheckOptions = {
  data?: string;
  strict?: boolean;
};

export function checkCommand(ctx: CliContext): Command {
  return new Command('check')
    .description('Check the editorial structure of the cheatsheet')
    .option('-d, --data <file>', 'content file to check')
    .option('--strict', 'fail on warnings too')
    .option('--no-strict', 'pass with warnings even when CHEATSHEET_STRICT is set')
    .action((opts: CheckOptions) =>
      runAction(ctx, () => {
        const doc = resolveDocument(ctx, opts.data);
        const issues = validateDocument(doc, loadFeatureTable());
        const errors = issues.filter((i) => i.level === 'error').length;
        const warnings = issues.length - errors;

        for (const issue of issues) {
          if (issue.level === 'error') ctx.log.error(formatIssue(issue));
          else ctx.log.warn(formatIssue(issue));
        }

        const entries = doc.groups.reduce((n, g) => n + g.entries.length, 0);
        ctx.log.info(
          `${doc.groups.length} groups, ${entries} entries: ${errors} error(s), ${warnings} warning(s)`,
        );

        // neither flag given leaves opts.strict undefined, so the environment decides
        const strict = opts.strict ?? ctx.config.strict;
        if (errors > 0 || (strict && warnings > 0)) ctx.setExitCode(1);
      }),
    );
}
