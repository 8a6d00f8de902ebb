import { describe, it, expect } from 'vitest';
import {
  clampPointToImage,
  distance,
  fitTransform,
  imageFromScreen,
  panTransform,
  screenFromImage,
  screenRectForImage,
  zoomTransform,
} from './transform';
import { MAX_SCALE, MIN_SCALE } from '@/constants/measurement';

describe('image ↔ screen', () => {
  const t = { scale: 2, tx: 10, ty: 20 };

  it('maps a screen point to image space', () => {
    expect(imageFromScreen({ x: 110, y: 60 }, t)).toEqual({ x: 50, y: 20 });
  });

  it('maps an image point back to screen space', () => {
    expect(screenFromImage({ x: 50, y: 20 }, t)).toEqual({ x: 110, y: 60 });
  });

  it('screenRectForImage covers the scaled image', () => {
    expect(screenRectForImage({ w: 100, h: 50 }, t)).toEqual({ x: 10, y: 20, w: 200, h: 100 });
  });
});

describe('fitTransform', () => {
  it('fits and centers the image in the canvas', () => {
    expect(fitTransform({ w: 200, h: 100 }, { w: 400, h: 400 })).toEqual({ scale: 2, tx: 0, ty: 100 });
  });

  it('keeps the fitted scale within the zoom bounds and centers with it', () => {
    expect(fitTransform({ w: 1, h: 1 }, { w: 400, h: 400 })).toEqual({ scale: MAX_SCALE, tx: 160, ty: 160 });
    expect(fitTransform({ w: 100000, h: 100 }, { w: 400, h: 400 })).toEqual({
      scale: MIN_SCALE,
      tx: (400 - 100000 * MIN_SCALE) * 0.5,
      ty: (400 - 100 * MIN_SCALE) * 0.5,
    });
  });

  it('returns null without a surface', () => {
    expect(fitTransform({ w: 200, h: 100 }, { w: 0, h: 400 })).toBeNull();
    expect(fitTransform({ w: 0, h: 100 }, { w: 400, h: 400 })).toBeNull();
  });
});

describe('panTransform / zoomTransform', () => {
  it('pan shifts the translation only', () => {
    expect(panTransform({ scale: 3, tx: 1, ty: 2 }, { dx: 5, dy: -4 })).toEqual({ scale: 3, tx: 6, ty: -2 });
  });

  it('zoom keeps the image point under the anchor', () => {
    const next = zoomTransform({ scale: 1, tx: 0, ty: 0 }, { x: 100, y: 50 }, 2);
    expect(next).toEqual({ scale: 2, tx: -100, ty: -50 });
    expect(screenFromImage({ x: 100, y: 50 }, next)).toEqual({ x: 100, y: 50 });
  });

  it('clamps the resulting scale', () => {
    expect(zoomTransform({ scale: 1, tx: 0, ty: 0 }, { x: 0, y: 0 }, 1000).scale).toBe(MAX_SCALE);
    expect(zoomTransform({ scale: 1, tx: 0, ty: 0 }, { x: 0, y: 0 }, 0.001).scale).toBe(MIN_SCALE);
  });

  it('ignores a non-finite or non-positive factor', () => {
    const t = { scale: 1.5, tx: 3, ty: 4 };
    expect(zoomTransform(t, { x: 10, y: 10 }, 0)).toBe(t);
    expect(zoomTransform(t, { x: 10, y: 10 }, -2)).toBe(t);
    expect(zoomTransform(t, { x: 10, y: 10 }, Number.NaN)).toBe(t);
  });
});

describe('points', () => {
  it('clampPointToImage keeps points inside [0, W] × [0, H]', () => {
    expect(clampPointToImage({ x: -5, y: 150 }, { w: 100, h: 100 })).toEqual({ x: 0, y: 100 });
    expect(clampPointToImage({ x: 40, y: 60 }, { w: 100, h: 100 })).toEqual({ x: 40, y: 60 });
  });

  it('distance is euclidean', () => {
    expect(distance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
  });
});
