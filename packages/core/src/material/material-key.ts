/**
 * Material Key Normalization
 *
 * A material key lists the pieces of each side, independent of squares,
 * e.g. "KRNvKNN". Every key produced or compared anywhere goes through
 * normalizeMaterial() so that grouping and lookups agree.
 */

import type { RulesCapability } from '../types/capabilities.js';

/**
 * Piece letters in descending value order (king first)
 */
export const PIECE_ORDER = 'KQRBNP';

/**
 * Maximum number of pieces covered by the tables
 */
export const MAX_TABLE_PIECES = 7;

const MATERIAL_PATTERN = /^([KQRBNP]*)v([KQRBNP]*)$/;

/**
 * The two halves of a material key
 */
export interface MaterialSides {
  /** Pieces listed before the "v" */
  first: string;
  /** Pieces listed after the "v" */
  second: string;
}

function pieceIndex(piece: string): number {
  return PIECE_ORDER.indexOf(piece);
}

/**
 * Sort the pieces of one side in K, Q, R, B, N, P order
 */
export function sortPieces(pieces: string): string {
  return [...pieces].sort((a, b) => pieceIndex(a) - pieceIndex(b)).join('');
}

/**
 * Build a raw (unnormalized) key from the pieces of each side
 *
 * @param white - Piece letters of white, any order, any case
 * @param black - Piece letters of black, any order, any case
 * @returns Key with white first, e.g. "KNNvKRN"
 */
export function buildMaterialKey(white: string, black: string): string {
  return `${sortPieces(white.toUpperCase())}v${sortPieces(black.toUpperCase())}`;
}

/**
 * Split a key into its sides
 *
 * @returns Sides, or null if the key contains anything but piece letters and one "v"
 */
export function parseMaterial(key: string): MaterialSides | null {
  const match = MATERIAL_PATTERN.exec(key);
  if (!match) {
    return null;
  }
  return { first: match[1] ?? '', second: match[2] ?? '' };
}

/**
 * Whether the second side should be listed first
 *
 * More pieces first; on equal counts the side whose sorted pieces
 * are stronger (smaller indices, compared piece by piece) goes first.
 */
function secondSideLeads(first: string, second: string): boolean {
  if (first.length !== second.length) {
    return second.length > first.length;
  }
  for (let i = 0; i < first.length; i++) {
    const a = pieceIndex(first[i] ?? '');
    const b = pieceIndex(second[i] ?? '');
    if (a !== b) {
      return b < a;
    }
  }
  return false;
}

/**
 * Canonical form of a material key
 *
 * Pure and idempotent. Keys that do not parse are returned unchanged.
 */
export function normalizeMaterial(key: string): string {
  const sides = parseMaterial(key.toUpperCase().replace('V', 'v'));
  if (!sides) {
    return key;
  }

  const first = sortPieces(sides.first);
  const second = sortPieces(sides.second);

  return secondSideLeads(first, second) ? `${second}v${first}` : `${first}v${second}`;
}

/**
 * Normalized material key of a position
 */
export function normalize<P>(position: P, rules: RulesCapability<P>): string {
  return normalizeMaterial(rules.materialSignature(position));
}

/**
 * Swap the sides of a key (no normalization)
 */
export function mirrorMaterial(key: string): string {
  const sides = parseMaterial(key);
  return sides ? `${sides.second}v${sides.first}` : key;
}

/**
 * Total number of pieces in a key
 */
export function pieceCount(key: string): number {
  const sides = parseMaterial(key);
  return sides ? sides.first.length + sides.second.length : 0;
}

/**
 * Number of pawns in a key
 */
export function pawnCount(key: string): number {
  return [...key].filter((c) => c === 'P').length;
}

/**
 * Whether a key names an endgame that has its own table files
 *
 * Exactly one king per side, at least one other piece and at most seven pieces.
 */
export function isTableMaterial(key: string): boolean {
  const sides = parseMaterial(key);
  if (!sides) {
    return false;
  }

  const kings = (side: string): number => [...side].filter((c) => c === 'K').length;
  const total = sides.first.length + sides.second.length;

  return (
    kings(sides.first) === 1 &&
    kings(sides.second) === 1 &&
    total > 2 &&
    total <= MAX_TABLE_PIECES
  );
}
