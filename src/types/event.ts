/**
 * 시선 이벤트 타입 — 검출기가 샘플마다 붙이는 라벨
 * 숫자 코드(0~5)는 EVENT_CODES 순서를 따름
 */
export type EventLabel =
  | "undefined"
  | "fixation"
  | "saccade"
  | "pso"
  | "smooth_pursuit"
  | "blink";

/** 샘플 라벨: null/undefined/NaN은 결측(missing)으로 취급 */
export type SampleLabel = EventLabel | null;

/**
 * Run — 같은 라벨이 연속된 최대 구간
 * startTime: 첫 샘플 시각(ms), endTime: 다음 run의 첫 샘플 시각 (마지막 run은 마지막 샘플 시각)
 * startIndex/endIndex: 샘플 인덱스 [startIndex, endIndex)
 */
export interface Run<L = SampleLabel> {
  startTime: number;
  endTime: number;
  label: L;
  startIndex: number;
  endIndex: number;
}

/** 이벤트 타입별 표시 정보 (label: 표시 이름, color: CSS 색) */
export interface EventStyle {
  label: string;
  color: string;
}

/** labelKey(label) → EventStyle. 모든 행이 공유하는 읽기 전용 테이블 */
export type EventMapping = Readonly<Record<string, Readonly<EventStyle>>>;

/** 두 라벨이 같은 run에 속하는지 판단 */
export type LabelEquals<L> = (a: L, b: L) => boolean;
