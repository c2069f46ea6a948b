/**
 * Extraction logging
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module services/extraction/logger
 */

export interface ExtractionLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

/** Debug output is opt-in via BOUNDARY_EXTRACTOR_DEBUG */
function debugEnabled(): boolean {
  const value = process.env.BOUNDARY_EXTRACTOR_DEBUG;
  return value === '1' || value === 'true';
}

/**
 * Logger writing to stderr with an `[Extraction]` tag
 */
export function createConsoleLogger(tag = 'Extraction'): ExtractionLogger {
  return {
    debug(message: string): void {
      if (debugEnabled()) {
        console.error(`[DEBUG] [${tag}] ${message}`);
      }
    },
    info(message: string): void {
      console.error(`[${tag}] ${message}`);
    },
    warn(message: string): void {
      console.error(`[WARN] [${tag}] ${message}`);
    },
  };
}

/** Discards everything */
export const silentLogger: ExtractionLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};
