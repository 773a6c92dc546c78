/**
 * Tests for material key normalization
 */

import { describe, it, expect } from 'vitest';

import { FakeRules, fakePosition } from '../../__tests__/fake-rules.js';
import {
  buildMaterialKey,
  isTableMaterial,
  mirrorMaterial,
  normalize,
  normalizeMaterial,
  parseMaterial,
  pawnCount,
  pieceCount,
  sortPieces,
} from '../material-key.js';

describe('sortPieces', () => {
  it('should order pieces K, Q, R, B, N, P', () => {
    expect(sortPieces('PNBRQK')).toBe('KQRBNP');
    expect(sortPieces('NKR')).toBe('KRN');
  });
});

describe('buildMaterialKey', () => {
  it('should list white first with sorted, uppercased sides', () => {
    expect(buildMaterialKey('nkn', 'rkn')).toBe('KNNvKRN');
  });
});

describe('parseMaterial', () => {
  it('should split a valid key', () => {
    expect(parseMaterial('KRNvKNN')).toEqual({ first: 'KRN', second: 'KNN' });
  });

  it('should return null for invalid keys', () => {
    expect(parseMaterial('KXvK')).toBeNull();
    expect(parseMaterial('KRK')).toBeNull();
    expect(parseMaterial('KvKvK')).toBeNull();
  });
});

describe('normalizeMaterial', () => {
  it('should put the side with more pieces first', () => {
    expect(normalizeMaterial('KvKQ')).toBe('KQvK');
    expect(normalizeMaterial('KNvKRR')).toBe('KRRvKN');
  });

  it('should put the stronger side first on equal counts', () => {
    expect(normalizeMaterial('KNNvKRN')).toBe('KRNvKNN');
    expect(normalizeMaterial('KNvKB')).toBe('KBvKN');
    expect(normalizeMaterial('KRRvKQP')).toBe('KQPvKRR');
  });

  it('should keep already normalized keys', () => {
    expect(normalizeMaterial('KBvKN')).toBe('KBvKN');
    expect(normalizeMaterial('KRvKR')).toBe('KRvKR');
  });

  it('should sort unsorted sides and accept lowercase', () => {
    expect(normalizeMaterial('KNRvKNN')).toBe('KRNvKNN');
    expect(normalizeMaterial('knnvkrn')).toBe('KRNvKNN');
  });

  it('should return unparsable keys unchanged', () => {
    expect(normalizeMaterial('not a key')).toBe('not a key');
  });

  it('should be idempotent', () => {
    for (const key of ['KNNvKRN', 'KvKQ', 'KPvKP', 'KBNvKQ', 'KRPPvKR']) {
      const once = normalizeMaterial(key);
      expect(normalizeMaterial(once)).toBe(once);
    }
  });

  it('should not depend on which side is listed first', () => {
    for (const key of ['KNNvKRN', 'KQvKR', 'KBPvKN', 'KRvKR', 'KQRvKQ']) {
      expect(normalizeMaterial(mirrorMaterial(key))).toBe(normalizeMaterial(key));
    }
  });
});

describe('normalize', () => {
  it('should normalize the material signature of a position', () => {
    const rules = new FakeRules();
    const position = fakePosition({ material: 'KNNvKRN', turn: 'black' });

    expect(normalize(position, rules)).toBe('KRNvKNN');
  });

  it('should give the same key for either side to move', () => {
    const rules = new FakeRules();

    expect(normalize(fakePosition({ material: 'KNNvKRN', turn: 'white' }), rules)).toBe(
      normalize(fakePosition({ material: 'KNNvKRN', turn: 'black' }), rules),
    );
  });
});

describe('mirrorMaterial', () => {
  it('should swap the sides', () => {
    expect(mirrorMaterial('KRvK')).toBe('KvKR');
  });
});

describe('pieceCount and pawnCount', () => {
  it('should count all pieces including kings', () => {
    expect(pieceCount('KRNvKNN')).toBe(6);
    expect(pieceCount('KvK')).toBe(2);
    expect(pieceCount('invalid')).toBe(0);
  });

  it('should count pawns of both sides', () => {
    expect(pawnCount('KRPPvKP')).toBe(3);
    expect(pawnCount('KRvK')).toBe(0);
  });
});

describe('isTableMaterial', () => {
  it('should accept endgames with one king per side and up to seven pieces', () => {
    expect(isTableMaterial('KQvK')).toBe(true);
    expect(isTableMaterial('KQQQQvKQQ')).toBe(true);
  });

  it('should reject everything else', () => {
    expect(isTableMaterial('KvK')).toBe(false);
    expect(isTableMaterial('KQQQQvKQQQ')).toBe(false);
    expect(isTableMaterial('KKvK')).toBe(false);
    expect(isTableMaterial('QvK')).toBe(false);
  });
});
