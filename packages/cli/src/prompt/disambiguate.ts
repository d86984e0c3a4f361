// ============================================================================
// bluefind — Disambiguation Prompt
// One question, no re-prompt: a bad answer aborts with InvalidSelectionError
// ============================================================================
import type { Device } from '@bluefind/shared';
import { InvalidSelectionError } from '../errors.js';
import { formatChoices } from '../presentation/format.js';
import type { Palette } from '../presentation/palette.js';
import type { Prompter } from './prompter.js';

export function parseSelection(input: string, count: number): number {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) throw new InvalidSelectionError(input, count);
  const choice = parseInt(trimmed, 10);
  if (choice < 1 || choice > count) throw new InvalidSelectionError(input, count);
  return choice - 1;
}

export async function disambiguate(matches: Device[], prompter: Prompter, palette: Palette): Promise<Device> {
  prompter.print(palette.warn('Multiple devices match. Choose one:'));
  for (const line of formatChoices(matches, palette)) prompter.print(line);

  const answer = await prompter.ask(`Select [1-${matches.length}]: `);
  return matches[parseSelection(answer, matches.length)];
}
