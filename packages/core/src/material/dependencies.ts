/**
 * Table dependency closure
 *
 * Probing an endgame requires the tables of every endgame reachable by
 * captures and promotions.
 */

import { normalizeMaterial, parseMaterial, pieceCount, PIECE_ORDER } from './material-key.js';

/**
 * Endgames reachable by exactly one capture or one promotion
 */
export function directDependencies(key: string): string[] {
  const sides = parseMaterial(normalizeMaterial(key));
  if (!sides) {
    return [];
  }

  const { first, second } = sides;
  const result = new Set<string>();

  for (const piece of PIECE_ORDER) {
    if (piece === 'K') {
      continue;
    }

    // Promotions
    if (piece !== 'P' && first.includes('P')) {
      result.add(normalizeMaterial(`${first.replace('P', piece)}v${second}`));
    }
    if (piece !== 'P' && second.includes('P')) {
      result.add(normalizeMaterial(`${first}v${second.replace('P', piece)}`));
    }

    // Captures
    if (first.includes(piece)) {
      result.add(normalizeMaterial(`${first.replace(piece, '')}v${second}`));
    }
    if (second.includes(piece)) {
      result.add(normalizeMaterial(`${first}v${second.replace(piece, '')}`));
    }
  }

  return [...result];
}

/**
 * Transitive dependencies of an endgame, excluding itself and KvK
 *
 * @returns Normalized keys, most pieces first, then by character code
 */
export function tableDependencies(key: string): string[] {
  const target = normalizeMaterial(key);
  const closed = new Set<string>(['KvK', target]);
  const open = directDependencies(target);
  const result: string[] = [];

  while (open.length > 0) {
    const next = open.pop();
    if (next === undefined || closed.has(next)) {
      continue;
    }
    closed.add(next);
    result.push(next);
    open.push(...directDependencies(next));
  }

  return result.sort((a, b) => pieceCount(b) - pieceCount(a) || (a < b ? -1 : a > b ? 1 : 0));
}
