import type { EventMapping, LabelEquals } from "./event";

/** Run 하나를 그리는 사각형. x: 시간(ms), y: 행의 세로 범위 */
export interface Band {
  xStart: number;
  xEnd: number;
  yMin: number;
  yMax: number;
  color: string;
  /** 색 조회에 쓰인 키 (labelKey) */
  label: string;
  /** 행 이름 (addScarf에 name을 준 경우) */
  row?: string;
}

/** y축 눈금 — 행 이름과 행 중앙 y */
export interface RowTick {
  name: string;
  y: number;
}

/**
 * 여러 번의 addScarf 호출로 쌓이는 그림.
 * 불변 값: 호출마다 새 Figure를 돌려주고 입력 Figure는 그대로 둔다.
 */
export interface Figure {
  readonly bands: readonly Band[];
  readonly rows: readonly RowTick[];
}

export interface ScarfOptions<L> {
  ymin: number;
  ymax: number;
  mapping: EventMapping;
  /** 행 이름 — 주면 RowTick 추가 */
  name?: string;
  equals?: LabelEquals<L>;
}
