/**
 * Diagnostic output for the compressor.
 */

/** Per-phase summaries. */
export const DEBUG_LOW = 1;

/** Per-symbol detail, including every code-table entry. */
export const DEBUG_HIGH = 4;

export type Logger = Pick<Console, 'debug' | 'warn'>;

/**
 * A logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};
