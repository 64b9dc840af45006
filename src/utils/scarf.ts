/**
 * Band Compositor — label 시퀀스 → 색 band 행을 Figure에 추가.
 * 검증(경계, 길이, 색)이 모두 끝난 뒤에만 새 Figure를 만든다. 실패 시 입력 Figure는 그대로.
 */
import type { EventMapping, LabelEquals } from "../types/event";
import type { Band, Figure, RowTick, ScarfOptions } from "../types/figure";
import { ROW_GAP, ROW_HEIGHT } from "../config";
import { labelKey, resolveRunColors } from "./colors";
import { InvalidBoundsError } from "./errors";
import { appendBands, createFigure } from "./figure";
import { extractRuns } from "./runs";

export function addScarf<L>(
  figure: Figure | null | undefined,
  time: readonly number[],
  labels: readonly L[],
  options: ScarfOptions<L>
): Figure {
  const { ymin, ymax, mapping, name, equals } = options;
  if (!Number.isFinite(ymin) || !Number.isFinite(ymax) || ymin >= ymax) {
    throw new InvalidBoundsError(ymin, ymax);
  }

  const runs = extractRuns(time, labels, equals);
  const colors = resolveRunColors(mapping, runs);

  const bands: Band[] = runs.map((run, i) => {
    const band: Band = {
      xStart: run.startTime,
      xEnd: run.endTime,
      yMin: ymin,
      yMax: ymax,
      color: colors[i],
      label: labelKey(run.label),
    };
    if (name !== undefined) band.row = name;
    return band;
  });
  const ticks: RowTick[] = name !== undefined ? [{ name, y: (ymin + ymax) / 2 }] : [];

  return appendBands(figure ?? createFigure(), bands, ticks);
}

export interface ScarfRow<L> {
  name: string;
  labels: readonly L[];
}

export interface StackOptions<L> {
  mapping: EventMapping;
  rowHeight?: number;
  rowGap?: number;
  equals?: LabelEquals<L>;
}

/** 행 k(0 = 맨 위)의 세로 범위 */
export function rowBounds(
  k: number,
  rowHeight: number = ROW_HEIGHT,
  rowGap: number = ROW_GAP
): { ymin: number; ymax: number } {
  return {
    ymin: -(k + 1) * rowHeight + rowGap / 2,
    ymax: -k * rowHeight - rowGap / 2,
  };
}

/**
 * 같은 time 축 위에 여러 행을 위에서 아래로 쌓음.
 * figure가 주어지면 그 행들 아래에 이어서 쌓음. 한 행이라도 실패하면 전체 throw.
 */
export function stackScarfRows<L>(
  time: readonly number[],
  rows: readonly ScarfRow<L>[],
  options: StackOptions<L>,
  figure: Figure | null = null
): Figure {
  const { mapping, rowHeight = ROW_HEIGHT, rowGap = ROW_GAP, equals } = options;
  const base = figure ?? createFigure();
  const offset = base.rows.length;
  return rows.reduce<Figure>((acc, row, k) => {
    const { ymin, ymax } = rowBounds(offset + k, rowHeight, rowGap);
    return addScarf(acc, time, row.labels, { ymin, ymax, mapping, name: row.name, equals });
  }, base);
}
