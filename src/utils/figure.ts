import type { Band, Figure, RowTick } from "../types/figure";

const EMPTY_FIGURE: Figure = Object.freeze({ bands: [], rows: [] });

export function createFigure(): Figure {
  return EMPTY_FIGURE;
}

/** 기존 band/행 뒤에 이어 붙인 새 Figure (입력 Figure는 그대로) */
export function appendBands(
  figure: Figure,
  bands: readonly Band[],
  rows: readonly RowTick[] = []
): Figure {
  return Object.freeze({
    bands: Object.freeze([...figure.bands, ...bands]),
    rows: Object.freeze([...figure.rows, ...rows]),
  });
}

/** 여러 Figure를 순서대로 합침 — 행별로 따로 만든 Figure를 마지막에 합칠 때 */
export function mergeFigures(figures: readonly Figure[]): Figure {
  return figures.reduce((acc, f) => appendBands(acc, f.bands, f.rows), createFigure());
}

/** 전체 band의 시간 범위, band가 없으면 null */
export function figureTimeRange(figure: Figure): [number, number] | null {
  if (figure.bands.length === 0) return null;
  let lo = Infinity;
  let hi = -Infinity;
  for (const b of figure.bands) {
    lo = Math.min(lo, b.xStart);
    hi = Math.max(hi, b.xEnd);
  }
  return [lo, hi];
}

export function figureYRange(figure: Figure): [number, number] | null {
  if (figure.bands.length === 0) return null;
  let lo = Infinity;
  let hi = -Infinity;
  for (const b of figure.bands) {
    lo = Math.min(lo, b.yMin);
    hi = Math.max(hi, b.yMax);
  }
  return [lo, hi];
}
