import type { EventMapping } from "../types/event";
import type { DetectionResult, GazeDetector } from "../types/detector";
import type { Figure } from "../types/figure";
import type { MatchingOptions } from "./matching";
import { runDetectors } from "../detectors";
import { DEFAULT_MATCHING } from "../config";
import { balancedAccuracy, cohenKappa, matthewsCorrelation } from "./agreement";
import { matchRatio, matchRuns } from "./matching";
import { extractRuns } from "./runs";
import { stackScarfRows } from "./scarf";

export interface RowAgreement {
  detector: string;
  /** 균형 정확도 */
  accuracy: number;
  kappa: number;
  mcc: number;
  /** 기준 run 중 짝지어진 비율 (0~1) */
  matchRatio: number;
}

export interface DetectorComparison {
  results: DetectionResult[];
  figure: Figure;
  /** 기준 행 대비 나머지 행의 일치도 */
  agreement: RowAgreement[];
  reference: string | null;
}

/** 검출 결과 행들을 쌓고 기준 행(없으면 첫 행)과 비교 */
export function compareDetections(
  time: readonly number[],
  results: DetectionResult[],
  mapping: EventMapping,
  referenceName?: string,
  matching: MatchingOptions = DEFAULT_MATCHING
): DetectorComparison {
  const figure = stackScarfRows(
    time,
    results.map((r) => ({ name: r.detector, labels: r.labels })),
    { mapping }
  );
  const reference = results.find((r) => r.detector === referenceName) ?? results[0];
  const agreement: RowAgreement[] = [];
  if (reference) {
    const referenceRuns = extractRuns(time, reference.labels);
    for (const r of results) {
      if (r === reference) continue;
      const matches = matchRuns(referenceRuns, extractRuns(time, r.labels), matching);
      agreement.push({
        detector: r.detector,
        accuracy: balancedAccuracy(reference.labels, r.labels),
        kappa: cohenKappa(reference.labels, r.labels),
        mcc: matthewsCorrelation(reference.labels, r.labels),
        matchRatio: matchRatio(referenceRuns, matches, matching.ignoreLabels),
      });
    }
  }
  return { results, figure, agreement, reference: reference ? reference.detector : null };
}

export function compareDetectors(
  detectors: readonly GazeDetector[],
  time: readonly number[],
  x: readonly number[],
  y: readonly number[],
  mapping: EventMapping,
  referenceName?: string,
  matching?: MatchingOptions
): DetectorComparison {
  return compareDetections(time, runDetectors(detectors, time, x, y), mapping, referenceName, matching);
}

/** band 개수를 라벨 키별로 셈 (범례 표시용) */
export function countBandsByLabel(figure: Figure): Map<string, number> {
  const counts = new Map<string, number>();
  for (const band of figure.bands) counts.set(band.label, (counts.get(band.label) ?? 0) + 1);
  return counts;
}
