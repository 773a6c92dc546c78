/**
 * Tests for fifty-move rule aware outcomes
 */

import { describe, it, expect } from 'vitest';

import {
  compareOutcomes,
  effectiveKind,
  FIFTY_MOVE_PLIES,
  isBeyondFiftyMoveRule,
  negateOutcome,
  outcomeFromWdl,
  outcomeToWdl,
  remainingPlies,
} from '../outcome-rules.js';

describe('isBeyondFiftyMoveRule', () => {
  it('should treat 100 plies as within the rule', () => {
    expect(FIFTY_MOVE_PLIES).toBe(100);
    expect(isBeyondFiftyMoveRule(100)).toBe(false);
    expect(isBeyondFiftyMoveRule(-100)).toBe(false);
  });

  it('should treat more than 100 plies as beyond the rule', () => {
    expect(isBeyondFiftyMoveRule(101)).toBe(true);
    expect(isBeyondFiftyMoveRule(-485)).toBe(true);
  });
});

describe('outcomeFromWdl', () => {
  it('should build a draw without distance', () => {
    expect(outcomeFromWdl(0, 0)).toEqual({ kind: 'draw' });
    expect(outcomeFromWdl(0, 57)).toEqual({ kind: 'draw' });
  });

  it('should let the DTZ magnitude decide frustration', () => {
    expect(outcomeFromWdl(2, 12)).toEqual({ kind: 'win', dtz: 12 });
    expect(outcomeFromWdl(1, 101)).toEqual({ kind: 'cursed-win', dtz: 101 });
    expect(outcomeFromWdl(-2, -100)).toEqual({ kind: 'loss', dtz: -100 });
    expect(outcomeFromWdl(-1, -250)).toEqual({ kind: 'blessed-loss', dtz: -250 });
  });

  it('should override an inconsistent WDL magnitude', () => {
    expect(outcomeFromWdl(2, 150)).toEqual({ kind: 'cursed-win', dtz: 150 });
    expect(outcomeFromWdl(-1, -30)).toEqual({ kind: 'loss', dtz: -30 });
  });

  it('should give the DTZ the sign of the winning side', () => {
    expect(outcomeFromWdl(2, -12)).toEqual({ kind: 'win', dtz: 12 });
    expect(outcomeFromWdl(-2, 12)).toEqual({ kind: 'loss', dtz: -12 });
  });

  it('should fall back to the WDL magnitude without DTZ', () => {
    expect(outcomeFromWdl(2)).toEqual({ kind: 'win', dtz: null });
    expect(outcomeFromWdl(1, null)).toEqual({ kind: 'cursed-win', dtz: null });
    expect(outcomeFromWdl(-1, 0)).toEqual({ kind: 'blessed-loss', dtz: null });
    expect(outcomeFromWdl(-2, Number.NaN)).toEqual({ kind: 'loss', dtz: null });
  });
});

describe('effectiveKind', () => {
  it('should make any variant beyond 100 plies frustrated', () => {
    expect(effectiveKind({ kind: 'win', dtz: 101 })).toBe('cursed-win');
    expect(effectiveKind({ kind: 'loss', dtz: -300 })).toBe('blessed-loss');
  });

  it('should never make a variant within 100 plies frustrated', () => {
    expect(effectiveKind({ kind: 'cursed-win', dtz: 1 })).toBe('win');
    expect(effectiveKind({ kind: 'blessed-loss', dtz: -100 })).toBe('loss');
  });

  it('should keep the kind without distance', () => {
    expect(effectiveKind({ kind: 'cursed-win', dtz: null })).toBe('cursed-win');
    expect(effectiveKind({ kind: 'draw' })).toBe('draw');
  });
});

describe('outcomeToWdl', () => {
  it('should map kinds to the five-valued scale', () => {
    expect(outcomeToWdl({ kind: 'win', dtz: 5 })).toBe(2);
    expect(outcomeToWdl({ kind: 'win', dtz: 105 })).toBe(1);
    expect(outcomeToWdl({ kind: 'draw' })).toBe(0);
    expect(outcomeToWdl({ kind: 'blessed-loss', dtz: null })).toBe(-1);
    expect(outcomeToWdl({ kind: 'loss', dtz: -3 })).toBe(-2);
  });
});

describe('negateOutcome', () => {
  it('should flip perspective', () => {
    expect(negateOutcome({ kind: 'win', dtz: 7 })).toEqual({ kind: 'loss', dtz: -7 });
    expect(negateOutcome({ kind: 'blessed-loss', dtz: -120 })).toEqual({
      kind: 'cursed-win',
      dtz: 120,
    });
    expect(negateOutcome({ kind: 'draw' })).toEqual({ kind: 'draw' });
  });
});

describe('remainingPlies', () => {
  it('should pass through the n / n + 1 ambiguity', () => {
    expect(remainingPlies(37)).toEqual({ min: 37, max: 38 });
    expect(remainingPlies(-100)).toEqual({ min: 100, max: 101 });
  });

  it('should subtract the fifty-move line beyond it', () => {
    expect(remainingPlies(101)).toEqual({ min: 1, max: 2 });
    expect(remainingPlies(-485)).toEqual({ min: 385, max: 386 });
  });

  it('should return null without a distance', () => {
    expect(remainingPlies(0)).toBeNull();
    expect(remainingPlies(null)).toBeNull();
  });
});

describe('compareOutcomes', () => {
  it('should rank win > cursed win > draw > blessed loss > loss', () => {
    expect(compareOutcomes('win', 'cursed-win')).toBeGreaterThan(0);
    expect(compareOutcomes('cursed-win', 'draw')).toBeGreaterThan(0);
    expect(compareOutcomes('draw', 'blessed-loss')).toBeGreaterThan(0);
    expect(compareOutcomes('blessed-loss', 'loss')).toBeGreaterThan(0);
    expect(compareOutcomes('loss', 'loss')).toBe(0);
  });
});
