import pc from 'picocolors';
import type { ParserLogger } from './core/index.js';

export interface LoggerOptions {
  verbose?: boolean;
  /** Defaults to stderr so that stdout stays parseable */
  write?: (line: string) => void;
}

function formatMeta(meta: Record<string, unknown>): string {
  const parts = Object.entries(meta).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

/**
 * Logger for parser diagnostics. Silent unless verbose.
 */
export function createLogger(options: LoggerOptions = {}): ParserLogger {
  if (!options.verbose) {
    return { debug: () => undefined };
  }

  /* istanbul ignore next - default writer */
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  return {
    debug(message, meta) {
      write(pc.dim(`[debug] ${message}${meta ? formatMeta(meta) : ''}`));
    },
  };
}
