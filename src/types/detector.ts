import type { EventLabel } from "./event";

/** 검출 결과 — 샘플당 라벨 하나 (time과 길이 같음) */
export interface DetectionResult {
  detector: string;
  labels: EventLabel[];
}

/**
 * 시선 이벤트 검출기 공통 인터페이스.
 * time: ms, x/y: 화면 좌표 (결측은 NaN)
 */
export interface GazeDetector {
  readonly name: string;
  detect(
    time: readonly number[],
    x: readonly number[],
    y: readonly number[]
  ): DetectionResult;
}

/**
 * 외부 검출기 출력 JSON — 공통 time 축 + 검출기별 label 배열
 * (Engbert, NH, REMoDNaV 등 다른 도구의 결과를 불러올 때)
 */
export interface DetectionsData {
  source: string;
  time: number[];
  detectors: DetectionResult[];
}
