/**
 * scarfplot 설정 상수.
 */
import type { EventLabel, EventMapping, EventStyle } from "./types/event";
import type { MatchingOptions } from "./utils/matching";

/** 숫자 코드 순서 (데이터셋에 0~5로 저장됨) */
export const EVENT_CODES: readonly EventLabel[] = [
  "undefined",
  "fixation",
  "saccade",
  "pso",
  "smooth_pursuit",
  "blink",
];

export const DEFAULT_EVENT_MAPPING: EventMapping = Object.freeze({
  undefined: { label: "Undefined", color: "#d3d3d3" },
  fixation: { label: "Fixation", color: "#1f78b4" },
  saccade: { label: "Saccade", color: "#33a02c" },
  pso: { label: "PSO", color: "#fb9a99" },
  smooth_pursuit: { label: "Smooth Pursuit", color: "#e31a1c" },
  blink: { label: "Blink", color: "#222222" },
});

/** stackScarfRows 행 높이 / 행 사이 간격 (y 단위) */
export const ROW_HEIGHT = 1;
export const ROW_GAP = 0.1;

/** 폭 0인 band(마지막 단일 샘플)도 보이도록 하는 최소 px 폭 */
export const MIN_BAND_PX = 1;
export const DEFAULT_PLOT_HEIGHT = 160;
export const LEGEND_WIDTH = 120;

/** 검출기 비교의 run 짝짓기 기본값: 같은 라벨, onset 15ms 이내, 가장 가까운 onset */
export const DEFAULT_MATCHING: Readonly<MatchingOptions> = Object.freeze({
  allowCrossMatching: false,
  maxOnsetLatency: 15,
  reduction: "onsetLatency",
});

/** 기본 매핑 위에 overrides를 덮어쓴 읽기 전용 매핑 */
export function createEventMapping(
  overrides: Record<string, EventStyle> = {}
): EventMapping {
  const merged: Record<string, Readonly<EventStyle>> = {};
  for (const [key, style] of Object.entries({ ...DEFAULT_EVENT_MAPPING, ...overrides })) {
    merged[key] = Object.freeze({ label: style.label, color: style.color });
  }
  return Object.freeze(merged);
}
