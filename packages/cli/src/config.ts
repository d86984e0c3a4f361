// ============================================================================
// Configuration
// ============================================================================
import { InvalidArgumentError } from 'commander';
import { DEFAULT_THRESHOLD } from './resolver/resolve.js';

export interface CliConfig {
  blueutilPath: string;
  audioToolPath: string;
  fuzzyThreshold: number;
  color: boolean;
  verbose: boolean;
}

export const DEFAULT_CONFIG: CliConfig = {
  blueutilPath: 'blueutil',
  audioToolPath: 'SwitchAudioSource',
  fuzzyThreshold: DEFAULT_THRESHOLD,
  color: true,
  verbose: false,
};

export type GlobalOptions = {
  blueutil?: string;
  audioTool?: string;
  threshold?: number;
  color?: boolean;
  verbose?: boolean;
};

export function resolveConfig(opts: GlobalOptions): CliConfig {
  return {
    blueutilPath: opts.blueutil || DEFAULT_CONFIG.blueutilPath,
    audioToolPath: opts.audioTool || DEFAULT_CONFIG.audioToolPath,
    fuzzyThreshold: opts.threshold ?? DEFAULT_CONFIG.fuzzyThreshold,
    color: opts.color ?? DEFAULT_CONFIG.color,
    verbose: opts.verbose ?? DEFAULT_CONFIG.verbose,
  };
}

/** commander option parser for `--threshold`. */
export function parseThreshold(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n <= 0 || n > 1) {
    throw new InvalidArgumentError('must be a number greater than 0 and at most 1');
  }
  return n;
}
