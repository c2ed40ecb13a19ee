import pc from 'picocolors';

export type Sink = (line: string) => void;

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export type LoggerOptions = {
  sink?: Sink;
  tag?: string;
  color?: boolean;
};

/** Tagged diagnostics on stderr; rendered content never goes through here. */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const sink = opts.sink ?? ((line: string) => console.error(line));
  const tag = opts.tag ?? 'cheatsheet';
  const c = pc.createColors(opts.color ?? pc.isColorSupported);
  return {
    info: (msg) => sink(`${c.dim(`[${tag}]`)} ${msg}`),
    warn: (msg) => sink(`${c.yellow(`[${tag}:warn]`)} ${msg}`),
    error: (msg) => sink(`${c.red(`[${tag}:error]`)} ${msg}`),
  };
}
