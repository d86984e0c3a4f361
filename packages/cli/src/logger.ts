// ============================================================================
// bluefind — Logger
// Diagnostics go to stderr
// ============================================================================
import type { Palette } from './presentation/palette.js';

export interface Logger {
  debug(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose: boolean;
  palette: Palette;
  write: (line: string) => void;
}

export function createLogger({ verbose, palette, write }: LoggerOptions): Logger {
  return {
    debug(message) {
      if (verbose) write(palette.dim(`[debug] ${message}`));
    },
    error(message) {
      write(palette.error(`Error: ${message}`));
    },
  };
}
