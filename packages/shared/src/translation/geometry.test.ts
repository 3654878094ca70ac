import { describe, expect, it } from 'vitest';
import { clampBox, clampCorners, isNormalized, toPixelRect, toPlainText } from './geometry';
import type { BilingualSegment } from './types';

function bilingual(id: string, x: number, y: number, original: string, translated: string): BilingualSegment {
  return {
    id,
    original: { id, text: original, bbox: { x, y, w: 0.1, h: 0.02 }, confidence: 1 },
    translated,
    sourceLanguage: 'en',
    targetLanguage: 'pt',
  };
}

describe('clampCorners', () => {
  it('clamps coordinates beyond the image edge', () => {
    expect(clampCorners(0.5, 0.2, 1.3, 0.4)).toEqual({ x: 0.5, y: 0.2, w: 0.5, h: 0.2 });
  });

  it('reorders reversed corners', () => {
    const box = clampCorners(0.6, 0.5, 0.2, 0.1);
    expect(box?.x).toBeCloseTo(0.2);
    expect(box?.y).toBeCloseTo(0.1);
    expect(box?.w).toBeCloseTo(0.4);
    expect(box?.h).toBeCloseTo(0.4);
  });

  it('drops boxes entirely outside the image', () => {
    expect(clampCorners(1.2, 0.1, 1.5, 0.3)).toBeNull();
    expect(clampCorners(0.1, 0.1, 0.1, 0.3)).toBeNull();
  });

  it('treats non-finite coordinates as zero', () => {
    expect(clampCorners(Number.NaN, 0, 0.5, 0.5)).toEqual({ x: 0, y: 0, w: 0.5, h: 0.5 });
  });
});

describe('clampBox', () => {
  it('keeps every clamped box normalized', () => {
    const box = clampBox({ x: 0.9, y: -0.2, w: 0.4, h: 0.5 });
    expect(box).not.toBeNull();
    if (box) {
      expect(isNormalized(box)).toBe(true);
      expect(box.x).toBeCloseTo(0.9);
      expect(box.w).toBeCloseTo(0.1);
      expect(box.y).toBe(0);
      expect(box.h).toBeCloseTo(0.3);
    }
  });
});

describe('toPixelRect', () => {
  it('scales a normalized box to image pixels', () => {
    expect(toPixelRect({ x: 0.25, y: 0.5, w: 0.5, h: 0.25 }, { width: 200, height: 100 })).toEqual({
      left: 50,
      top: 50,
      width: 100,
      height: 25,
    });
  });

  it('never yields an empty rectangle', () => {
    expect(toPixelRect({ x: 0.1, y: 0.1, w: 0.001, h: 0.001 }, { width: 100, height: 100 })).toEqual({
      left: 10,
      top: 10,
      width: 1,
      height: 1,
    });
  });
});

describe('toPlainText', () => {
  it('orders segments top to bottom and left to right', () => {
    const segments = [
      bilingual('c', 0.1, 0.5, 'third', 'terceiro'),
      bilingual('b', 0.6, 0.11, 'second', 'segundo'),
      bilingual('a', 0.1, 0.1, 'first', 'primeiro'),
    ];
    expect(toPlainText(segments)).toBe('primeiro segundo\nterceiro');
    expect(toPlainText(segments, 'original')).toBe('first second\nthird');
  });

  it('returns an empty string for no segments', () => {
    expect(toPlainText([])).toBe('');
  });
});
