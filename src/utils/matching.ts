/**
 * 기준 행의 run(이벤트)마다 예측 행의 run을 짝지음.
 * 후보 조건(겹침, IoU, onset/offset 지연)을 모두 통과한 run 중에서 reduction으로 고름.
 */
import type { Run } from "../types/event";
import { labelKey } from "./colors";

export type MatchReduction =
  | "all"
  | "first"
  | "last"
  | "longest"
  | "maxOverlap"
  | "iou"
  | "onsetLatency"
  | "offsetLatency";

export interface MatchingOptions {
  /** 다른 라벨끼리도 짝지을지 (기본 false) */
  allowCrossMatching?: boolean;
  /** 최소 겹침 시간(ms) */
  minOverlap?: number;
  minIou?: number;
  /** |onset 차이| 최대값(ms) */
  maxOnsetLatency?: number;
  /** |offset 차이| 최대값(ms) */
  maxOffsetLatency?: number;
  /** 후보가 여럿일 때 고르는 방식 (기본 "all") */
  reduction?: MatchReduction;
  /** 이 라벨 키의 run은 양쪽 모두에서 제외 */
  ignoreLabels?: readonly string[];
}

export interface RunMatch<L> {
  reference: Run<L>;
  /** reduction이 "all"이 아니면 항상 1개 */
  matches: Run<L>[];
}

export function runDuration(run: Run<unknown>): number {
  return run.endTime - run.startTime;
}

export function overlapTime(a: Run<unknown>, b: Run<unknown>): number {
  return Math.max(0, Math.min(a.endTime, b.endTime) - Math.max(a.startTime, b.startTime));
}

/** 겹침 / 합집합 구간 길이. 두 run이 모두 폭 0이면 0 */
export function intersectionOverUnion(a: Run<unknown>, b: Run<unknown>): number {
  const union = Math.max(a.endTime, b.endTime) - Math.min(a.startTime, b.startTime);
  return union > 0 ? overlapTime(a, b) / union : 0;
}

/** onset/offset 차이의 L2 길이 */
export function l2TimingOffset(a: Run<unknown>, b: Run<unknown>): number {
  return Math.hypot(a.startTime - b.startTime, a.endTime - b.endTime);
}

// 동점이면 앞의 run
function pickBy<T>(items: readonly T[], score: (item: T) => number): T {
  return items.reduce((best, item) => (score(item) > score(best) ? item : best));
}

function chooseMatches<L>(reference: Run<L>, candidates: Run<L>[], reduction: MatchReduction): Run<L>[] {
  if (candidates.length <= 1 || reduction === "all") return candidates;
  switch (reduction) {
    case "first":
      return [pickBy(candidates, (r) => -r.startTime)];
    case "last":
      return [pickBy(candidates, (r) => r.startTime)];
    case "longest":
      return [pickBy(candidates, runDuration)];
    case "maxOverlap":
      return [pickBy(candidates, (r) => overlapTime(reference, r))];
    case "iou":
      return [pickBy(candidates, (r) => intersectionOverUnion(reference, r))];
    case "onsetLatency":
      return [pickBy(candidates, (r) => -Math.abs(r.startTime - reference.startTime))];
    case "offsetLatency":
      return [pickBy(candidates, (r) => -Math.abs(r.endTime - reference.endTime))];
  }
}

/**
 * 기준 run마다 조건을 만족하는 예측 run을 찾음.
 * 짝이 없는 기준 run은 결과에서 빠짐. 결과는 기준 run 순서
 */
export function matchRuns<L>(
  reference: readonly Run<L>[],
  predicted: readonly Run<L>[],
  options: MatchingOptions = {}
): RunMatch<L>[] {
  const {
    allowCrossMatching = false,
    minOverlap = -Infinity,
    minIou = -Infinity,
    maxOnsetLatency = Infinity,
    maxOffsetLatency = Infinity,
    reduction = "all",
    ignoreLabels = [],
  } = options;
  const ignored = new Set(ignoreLabels);
  const kept = (run: Run<L>) => !ignored.has(labelKey(run.label));
  const candidatesPool = predicted.filter(kept);

  const result: RunMatch<L>[] = [];
  for (const ref of reference.filter(kept)) {
    const candidates = candidatesPool.filter(
      (p) =>
        (allowCrossMatching || labelKey(p.label) === labelKey(ref.label)) &&
        overlapTime(ref, p) >= minOverlap &&
        intersectionOverUnion(ref, p) >= minIou &&
        Math.abs(p.startTime - ref.startTime) <= maxOnsetLatency &&
        Math.abs(p.endTime - ref.endTime) <= maxOffsetLatency
    );
    const matches = chooseMatches(ref, candidates, reduction);
    if (matches.length > 0) result.push({ reference: ref, matches });
  }
  return result;
}

/** 짝지어진 기준 run 비율 (ignoreLabels 제외 후). 기준 run이 없으면 NaN */
export function matchRatio<L>(
  reference: readonly Run<L>[],
  matches: readonly RunMatch<L>[],
  ignoreLabels: readonly string[] = []
): number {
  const ignored = new Set(ignoreLabels);
  const total = reference.filter((r) => !ignored.has(labelKey(r.label))).length;
  if (total === 0) return NaN;
  const matched = matches.filter((m) => !ignored.has(labelKey(m.reference.label))).length;
  return matched / total;
}

export interface MatchedRunFeatures {
  label: string;
  /** 기준 onset - 예측 onset */
  onsetJitter: number;
  offsetJitter: number;
  durationDifference: number;
  overlapTime: number;
  iou: number;
  l2Timing: number;
}

/** 짝마다 시간 특성 (짝이 여럿이면 첫 번째 run 기준) */
export function matchedRunFeatures<L>(matches: readonly RunMatch<L>[]): MatchedRunFeatures[] {
  return matches.map(({ reference, matches: [match] }) => ({
    label: labelKey(reference.label),
    onsetJitter: reference.startTime - match.startTime,
    offsetJitter: reference.endTime - match.endTime,
    durationDifference: runDuration(reference) - runDuration(match),
    overlapTime: overlapTime(reference, match),
    iou: intersectionOverUnion(reference, match),
    l2Timing: l2TimingOffset(reference, match),
  }));
}
