/**
 * Console logger with level prefixes and optional JSON metadata.
 */

let verbose = Boolean(process.env.DEBUG);

export function setVerbose(value: boolean): void {
  verbose = value;
}

const format = (meta?: Record<string, unknown>): string => (meta ? JSON.stringify(meta) : '');

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => {
    if (verbose) {
      console.log(`[DEBUG] ${msg}`, format(meta));
    }
  },

  info: (msg: string, meta?: Record<string, unknown>) => {
    console.log(`[INFO] ${msg}`, format(meta));
  },

  warn: (msg: string, meta?: Record<string, unknown>) => {
    console.warn(`[WARN] ${msg}`, format(meta));
  },

  error: (msg: string, error?: unknown) => {
    console.error(`[ERROR] ${msg}`, error instanceof Error ? error.message : error ?? '');
  },
};
