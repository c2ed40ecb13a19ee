import fs from 'node:fs';
import { loadCheatsheet, loadCheatsheetFile } from '../content/load';
import type { Config } from '../lib/config';
import { ContentError, NotFoundError } from '../lib/errors';
import type { Logger, Sink } from '../lib/log';
import type { CheatsheetDocument } from '../types/entry';

export interface CliContext {
  out: Sink; // rendered content (stdout)
  log: Logger; // diagnostics (stderr)
  config: Config;
  setExitCode(code: number): void;
  writeFile(filePath: string, text: string): void;
}

export const defaultWriteFile = (filePath: string, text: string) =>
  fs.writeFileSync(filePath, text, 'utf8');

/** `--data` wins over CHEATSHEET_DATA; with neither, the bundled cheatsheet. */
export function resolveDocument(ctx: CliContext, dataPath?: string): CheatsheetDocument {
  const p = dataPath ?? ctx.config.dataPath;
  return p ? loadCheatsheetFile(p) : loadCheatsheet();
}

/**
 * Run a command body, turning content and lookup failures into logged errors and exit code 1.
 * Anything else propagates to commander.
 */
export function runAction(ctx: CliContext, body: () => void): void {
  try {
    body();
  } catch (err) {
    if (err instanceof ContentError) {
      ctx.log.error(`cannot load ${err.source}`);
      for (const issue of err.issues) ctx.log.error(`  ${issue}`);
      ctx.setExitCode(1);
      return;
    }
    if (err instanceof NotFoundError) {
      ctx.log.error(err.message);
      ctx.setExitCode(1);
      return;
    }
    throw err;
  }
}
