// ============================================================================
// bluefind — Device Name Resolver
// Substring matches take precedence; fuzzy scoring only runs when there are none
// ============================================================================
import type { Device, MatchResult } from '@bluefind/shared';
import { similarity } from './fuzzy.js';

export const DEFAULT_THRESHOLD = 0.5;

export type Scorer = (query: string, name: string) => number;

export interface ResolveOptions {
  threshold?: number;
  scorer?: Scorer;
}

/**
 * Resolve a user query against the paired device list.
 *
 * An empty query is a substring of every name, so it matches every device.
 * Fuzzy results keep scores at or above the threshold, best first; equal
 * scores keep their list order.
 */
export function resolve(query: string, devices: Device[], opts: ResolveOptions = {}): MatchResult {
  const { threshold = DEFAULT_THRESHOLD, scorer = similarity } = opts;
  const q = query.toLowerCase();

  const contained = devices.filter(d => d.name.toLowerCase().includes(q));
  if (contained.length > 0) return { strategy: 'substring', devices: contained };

  const scored = devices
    .map((device, index) => ({ device, index, score: scorer(q, device.name.toLowerCase()) }))
    .filter(s => s.score >= threshold)
    .sort((a, b) => b.score - a.score || a.index - b.index);

  return { strategy: 'fuzzy', devices: scored.map(s => s.device) };
}
