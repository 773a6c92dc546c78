/**
 * Dump key normalization
 *
 * Dump entries are keyed white first. When the normalized key lists
 * black's pieces first, the entry's colour-keyed data is swapped with it,
 * so stored colours always follow the normalized key.
 */

import { swapColors } from '@tbx/chess';
import { buildMaterialKey, normalizeMaterial, parseMaterial } from '@tbx/core';
import type { RawEndgameStats, RawLongestEntry } from '@tbx/types';

import { StatsFormatError } from '../errors.js';

/**
 * Colour-swap an EPD, keeping its number of fields
 */
function swapEpd(epd: string): string {
  const fieldCount = Math.max(epd.trim().split(/\s+/).length, 2);
  return swapColors(epd).split(' ').slice(0, fieldCount).join(' ');
}

/**
 * The same statistics seen with colours swapped
 *
 * Per side to move tables keep their values: WDL and DTZ are relative
 * to the side to move, which only changes colour.
 */
export function swapStatsColors(stats: RawEndgameStats): RawEndgameStats {
  const swapped: RawEndgameStats = {
    ...stats,
    longest: stats.longest.map(
      (entry): RawLongestEntry => ({ ...entry, epd: swapEpd(entry.epd) }),
    ),
  };
  if (stats.histogram) {
    swapped.histogram = { white: stats.histogram.black, black: stats.histogram.white };
  }
  return swapped;
}

/**
 * Whether normalizing a white-first key puts black's pieces first
 */
export function normalizationSwapsSides(key: string): boolean {
  const sides = parseMaterial(key.toUpperCase().replace('V', 'v'));
  if (!sides) {
    return false;
  }
  return normalizeMaterial(key) !== buildMaterialKey(sides.first, sides.second);
}

/**
 * Re-key a dump under normalized keys
 *
 * @throws StatsFormatError if two keys name the same endgame
 */
export function normalizeDump(
  dump: Readonly<Record<string, RawEndgameStats>>,
): Map<string, RawEndgameStats> {
  const entries = new Map<string, RawEndgameStats>();
  const sources = new Map<string, string>();

  for (const [key, stats] of Object.entries(dump)) {
    const material = normalizeMaterial(key);
    const previous = sources.get(material);
    if (previous !== undefined) {
      throw new StatsFormatError(
        `Duplicate statistics for ${material}`,
        material,
        [`${previous} and ${key} name the same endgame`],
      );
    }
    sources.set(material, key);
    entries.set(material, normalizationSwapsSides(key) ? swapStatsColors(stats) : stats);
  }
  return entries;
}
