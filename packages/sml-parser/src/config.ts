import type { ParseOptions } from './types';

export type ResolvedParseOptions = {
  debug: boolean;
  log: (msg: string) => void;
  signal?: AbortSignal;
};

export function envDebug(): boolean {
  const v = (process.env.SML_DEBUG ?? '').toString().trim().toLowerCase();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export function resolveParseOptions(opts: ParseOptions, scope: string): ResolvedParseOptions {
  return {
    debug: opts.debug ?? envDebug(),
    log: opts.logger ?? ((msg: string) => console.log(`[sml:${scope}] ${msg}`)),
    signal: opts.signal,
  };
}
