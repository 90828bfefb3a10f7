// src/s6/log.ts

export type WarnFn = (msg: string) => void;

export const silent: WarnFn = () => {};

export type ImportLogger = Readonly<{
  warn: WarnFn;
  verbose: WarnFn;
}>;

export function makeLogger(opts: { warn?: WarnFn; verbose?: WarnFn } = {}): ImportLogger {
  return { warn: opts.warn ?? silent, verbose: opts.verbose ?? silent };
}
