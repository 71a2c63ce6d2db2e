/**
 * Tests for line glyph rotation.
 */

import { describe, it, expect } from 'vitest';
import {
  LINE_GLYPHS,
  glyphForMask,
  isLineGlyph,
  maskForGlyph,
  rotateGlyph,
  rotateMask,
  splitLinearSuffix,
} from './linework.js';

describe('rotateMask', () => {
  it('leaves every mask unchanged at distance 0 and 4', () => {
    for (let mask = 0; mask < 16; mask++) {
      expect(rotateMask(mask, 0)).toBe(mask);
      expect(rotateMask(mask, 4)).toBe(mask);
    }
  });

  it('wraps the north bit around to west', () => {
    expect(rotateMask(0b1000, 1)).toBe(0b0001);
    expect(rotateMask(0b1100, 1)).toBe(0b1001);
    expect(rotateMask(0b0110, 3)).toBe(0b0011);
  });

  it('treats negative distances as clockwise turns', () => {
    expect(rotateMask(0b1100, -1)).toBe(rotateMask(0b1100, 3));
  });
});

describe('rotateGlyph', () => {
  it('turns a north-south line into east-west and back with period 4', () => {
    expect(rotateGlyph('│', 0)).toBe('│');
    expect(rotateGlyph('│', 1)).toBe('─');
    expect(rotateGlyph('─', 1)).toBe('│');
    expect(rotateGlyph('│', 2)).toBe('│');
    expect(rotateGlyph('│', 4)).toBe('│');
  });

  it('rotates corners counter-clockwise', () => {
    // north-east corner facing west connects north and west
    expect(rotateGlyph('└', 1)).toBe('┘');
    expect(rotateGlyph('└', 2)).toBe('┐');
    expect(rotateGlyph('└', 3)).toBe('┌');
  });

  it('rotates tees', () => {
    expect(rotateGlyph('├', 1)).toBe('┴');
    expect(rotateGlyph('┬', 3)).toBe('┤');
  });

  it('returns undefined for non-line glyphs', () => {
    expect(rotateGlyph('^', 1)).toBeUndefined();
  });
});

describe('glyph tables', () => {
  it('maps masks to the first matching glyph', () => {
    expect(glyphForMask(0b1111)).toBe('┼');
    expect(glyphForMask(0b0000)).toBeUndefined();
    expect(maskForGlyph('┤')).toBe(0b1011);
  });

  it('recognises line glyphs', () => {
    expect(isLineGlyph('┼')).toBe(true);
    expect(isLineGlyph('#')).toBe(false);
  });

  it('has sixteen suffixes', () => {
    expect(LINE_GLYPHS).toHaveLength(16);
  });
});

describe('splitLinearSuffix', () => {
  it('splits known suffixes', () => {
    expect(splitLinearSuffix('road_nesw')).toEqual({ base: 'road', entry: LINE_GLYPHS[15] });
    expect(splitLinearSuffix('road_end_south').base).toBe('road');
    expect(splitLinearSuffix('road_end_south').entry?.glyph).toBe('│');
    expect(splitLinearSuffix('subway_esw').entry?.glyph).toBe('┬');
    expect(splitLinearSuffix('road_end_east')).toEqual({ base: 'road', entry: LINE_GLYPHS[4] });
    expect(splitLinearSuffix('sewer_isolated').entry?.suffix).toBe('isolated');
  });

  it('leaves other types alone', () => {
    expect(splitLinearSuffix('house_north')).toEqual({ base: 'house_north', entry: undefined });
    expect(splitLinearSuffix('field')).toEqual({ base: 'field', entry: undefined });
  });
});
