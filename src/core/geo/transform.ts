/**
 * Helpers pour la transformation image ↔ écran d'une session
 * screen = image * scale + t ; image = (screen - t) / scale
 */

import type { Point, Size, ViewTransform } from '@/types/measurement';
import { MIN_SCALE, MAX_SCALE } from '@/constants/measurement';

export const IDENTITY_TRANSFORM: ViewTransform = { scale: 1, tx: 0, ty: 0 };

export function clamp(v: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, v));
}

export function clampScale(scale: number): number {
  return clamp(scale, MIN_SCALE, MAX_SCALE);
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function imageFromScreen(p: Point, t: ViewTransform): Point {
  return { x: (p.x - t.tx) / t.scale, y: (p.y - t.ty) / t.scale };
}

export function screenFromImage(p: Point, t: ViewTransform): Point {
  return { x: p.x * t.scale + t.tx, y: p.y * t.scale + t.ty };
}

/**
 * Ajuste l'image entière dans le canvas (échelle bornée) et la centre.
 * Retourne null si le canvas ou l'image n'ont pas de surface.
 */
export function fitTransform(image: Size, canvas: Size): ViewTransform | null {
  if (canvas.w <= 0 || canvas.h <= 0 || image.w <= 0 || image.h <= 0) return null;
  const scale = clampScale(Math.min(canvas.w / image.w, canvas.h / image.h));
  return {
    scale,
    tx: (canvas.w - image.w * scale) * 0.5,
    ty: (canvas.h - image.h * scale) * 0.5,
  };
}

export function panTransform(t: ViewTransform, delta: { dx: number; dy: number }): ViewTransform {
  return { scale: t.scale, tx: t.tx + delta.dx, ty: t.ty + delta.dy };
}

/**
 * Zoom autour d'un point écran : le point image sous l'ancre reste sous l'ancre.
 * Facteur non fini ou ≤ 0 → transform inchangé.
 */
export function zoomTransform(t: ViewTransform, anchor: Point, factor: number): ViewTransform {
  if (!Number.isFinite(factor) || factor <= 0) return t;

  const imagePt = imageFromScreen(anchor, t);
  const scale = clampScale(t.scale * factor);
  return {
    scale,
    tx: anchor.x - imagePt.x * scale,
    ty: anchor.y - imagePt.y * scale,
  };
}

/** Garde un point image dans [0, W] × [0, H] */
export function clampPointToImage(p: Point, image: Size): Point {
  return { x: clamp(p.x, 0, image.w), y: clamp(p.y, 0, image.h) };
}

/** Rectangle occupé par l'image à l'écran */
export function screenRectForImage(image: Size, t: ViewTransform) {
  return { x: t.tx, y: t.ty, w: image.w * t.scale, h: image.h * t.scale };
}
