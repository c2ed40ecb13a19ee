import { Command, CommanderError, type OutputConfiguration } from 'commander';
import { checkCommand } from './commands/check';
import { defaultWriteFile, type CliContext } from './commands/context';
import { groupsCommand, versionsCommand } from './commands/groups';
import { renderCommand } from './commands/render';
import { showCommand } from './commands/show';
import { loadConfig, type Config } from './lib/config';
import { createLogger } from './lib/log';

/**
 * Every command, root and subcommands alike, writes through the context and throws
 * CommanderError instead of exiting; runCli turns that into an exit code.
 */
export function createProgram(ctx: CliContext): Command {
  const output: OutputConfiguration = {
    writeOut: (str) => ctx.out(str),
    writeErr: (str) => ctx.log.error(str.trimEnd()),
  };

  const program = new Command('es-cheatsheet')
    .description('ES6 through ES2021 language features, grouped for teaching')
    .version('0.1.0')
    .configureOutput(output)
    .exitOverride();

  const commands = [
    renderCommand(ctx),
    checkCommand(ctx),
    showCommand(ctx),
    groupsCommand(ctx),
    versionsCommand(ctx),
  ];
  for (const cmd of commands) {
    cmd.configureOutput(output).exitOverride();
    program.addCommand(cmd, { isDefault: cmd.name() === 'render' });
  }
  return program;
}

export async function runCli(
  ctx: CliContext,
  args: string[],
  from: 'node' | 'user' = 'node',
): Promise<void> {
  try {
    await createProgram(ctx).parseAsync(args, { from });
  } catch (err) {
    // usage errors are already logged through writeErr; help and version exit 0
    if (err instanceof CommanderError) {
      ctx.setExitCode(err.exitCode);
      return;
    }
    throw err;
  }
}

export type ContextOverrides = Partial<Pick<CliContext, 'out' | 'log' | 'writeFile'>>;

/** Entry point for the binary: resolves the exit code instead of touching process.exitCode. */
export async function main(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  overrides: ContextOverrides = {},
): Promise<number> {
  const log = overrides.log ?? createLogger();
  const fail = (err: unknown) => {
    log.error(err instanceof Error ? err.message : String(err));
    return 1;
  };

  let config: Config;
  try {
    config = loadConfig(env);
  } catch (err) {
    return fail(err);
  }

  let exitCode = 0;
  const ctx: CliContext = {
    out: overrides.out ?? ((text) => process.stdout.write(text)),
    log,
    config,
    setExitCode: (code) => {
      exitCode = code;
    },
    writeFile: overrides.writeFile ?? defaultWriteFile,
  };

  try {
    await runCli(ctx, argv);
  } catch (err) {
    return fail(err);
  }
  return exitCode;
}
