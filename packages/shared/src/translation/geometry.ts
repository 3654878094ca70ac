import type { BilingualSegment, BoundingBox, ImageSize } from './types';

export type PixelRect = {
  left: number;
  top: number;
  width: number;
  height: number;
};

/** Limite vertical (normalizado) para considerar dois segmentos na mesma linha. */
export const ROW_THRESHOLD = 0.03;

function clamp01(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Converte cantos [x1,y1,x2,y2] numa caixa normalizada, limitando cada
 * coordenada a [0,1] e reordenando cantos invertidos.
 * Retorna null quando a caixa resultante não tem área.
 */
export function clampCorners(x1: number, y1: number, x2: number, y2: number): BoundingBox | null {
  const [cx1, cy1, cx2, cy2] = [clamp01(x1), clamp01(y1), clamp01(x2), clamp01(y2)];
  const left = Math.min(cx1, cx2);
  const right = Math.max(cx1, cx2);
  const top = Math.min(cy1, cy2);
  const bottom = Math.max(cy1, cy2);

  const w = right - left;
  const h = bottom - top;
  if (w <= 0 || h <= 0) {
    return null;
  }
  return { x: left, y: top, w, h };
}

export function clampBox(box: BoundingBox): BoundingBox | null {
  return clampCorners(box.x, box.y, box.x + box.w, box.y + box.h);
}

export function isNormalized(box: BoundingBox): boolean {
  return box.x >= 0 && box.y >= 0 && box.w >= 0 && box.h >= 0 && box.x + box.w <= 1 && box.y + box.h <= 1;
}

export function toPixelRect(box: BoundingBox, size: ImageSize): PixelRect {
  const left = Math.round(box.x * size.width);
  const top = Math.round(box.y * size.height);
  const right = Math.round((box.x + box.w) * size.width);
  const bottom = Math.round((box.y + box.h) * size.height);
  return {
    left,
    top,
    width: Math.max(1, right - left),
    height: Math.max(1, bottom - top),
  };
}

/**
 * Agrupa segmentos em linhas e ordena de cima para baixo, da esquerda para a direita.
 */
export function groupIntoRows<T extends { original: { bbox: BoundingBox } }>(segments: T[]): T[][] {
  const sorted = [...segments].sort((a, b) => a.original.bbox.y - b.original.bbox.y);
  const rows: T[][] = [];
  let rowTop = 0;

  for (const segment of sorted) {
    const current = rows[rows.length - 1];
    if (current && Math.abs(segment.original.bbox.y - rowTop) <= ROW_THRESHOLD) {
      current.push(segment);
    } else {
      rows.push([segment]);
      rowTop = segment.original.bbox.y;
    }
  }

  return rows.map((row) => row.sort((a, b) => a.original.bbox.x - b.original.bbox.x));
}

export function toPlainText(segments: BilingualSegment[], which: 'original' | 'translated' = 'translated'): string {
  return groupIntoRows(segments)
    .map((row) => row.map((s) => (which === 'original' ? s.original.text : s.translated)).join(' '))
    .join('\n');
}
