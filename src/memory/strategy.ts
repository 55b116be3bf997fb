import type { SummaryTier } from '../records/types.js';
import type { SummaryLength, SummaryStyle } from './types.js';

export interface Thresholds {
  tiny: number;
  small: number;
}

export type SummaryStrategy =
  | { tier: 'direct_tiny' }
  | { tier: Exclude<SummaryTier, 'direct_tiny'>; style: SummaryStyle; length: SummaryLength };

/**
 * Pick the summary tier for content of `size` characters.
 *
 * Below `tiny` the content is its own summary and no generator call is made;
 * up to `small` a short extractive summary; anything larger gets a medium
 * abstractive one.
 */
export function selectStrategy(size: number, thresholds: Thresholds): SummaryStrategy {
  if (size < thresholds.tiny) return { tier: 'direct_tiny' };
  if (size < thresholds.small) return { tier: 'extractive_short', style: 'extractive', length: 'short' };
  return { tier: 'abstractive_medium', style: 'abstractive', length: 'medium' };
}
