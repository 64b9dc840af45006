import type { LabelEquals, Run } from "../types/event";
import { InputShapeError } from "./errors";

/** null/undefined/NaN → 결측 */
export function isMissingLabel(label: unknown): boolean {
  return label == null || (typeof label === "number" && Number.isNaN(label));
}

/** 기본 라벨 비교: Object.is + 결측끼리는 같음 */
export function sameLabel<L>(a: L, b: L): boolean {
  if (isMissingLabel(a) || isMissingLabel(b)) return isMissingLabel(a) && isMissingLabel(b);
  return Object.is(a, b);
}

function checkShape(time: readonly number[], labels: readonly unknown[]) {
  if (time.length !== labels.length) {
    throw new InputShapeError(
      `time and labels must have the same length (got ${time.length} and ${labels.length})`
    );
  }
}

function checkTime(time: readonly number[], i: number): number {
  const t = time[i];
  if (!Number.isFinite(t)) {
    throw new InputShapeError(`time[${i}] is not a finite number`);
  }
  if (i > 0 && t < time[i - 1]) {
    throw new InputShapeError(`time must be non-decreasing (time[${i}] = ${t} < time[${i - 1}])`);
  }
  return t;
}

/**
 * label 시퀀스를 run 단위로 순차 스캔.
 * run의 끝은 다음 run의 첫 샘플 시각 [start, end), 마지막 run만 마지막 샘플 시각까지 [start, end].
 */
export function* iterateRuns<L>(
  time: readonly number[],
  labels: readonly L[],
  equals: LabelEquals<L> = sameLabel
): Generator<Run<L>> {
  checkShape(time, labels);
  const n = time.length;
  if (n === 0) return;

  let startIndex = 0;
  let startTime = checkTime(time, 0);
  let current = labels[0];

  for (let i = 1; i < n; i++) {
    const t = checkTime(time, i);
    const label = labels[i];
    if (equals(current, label)) continue;
    yield { startTime, endTime: t, label: current, startIndex, endIndex: i };
    startIndex = i;
    startTime = t;
    current = label;
  }

  yield {
    startTime,
    endTime: checkTime(time, n - 1),
    label: current,
    startIndex,
    endIndex: n,
  };
}

export function extractRuns<L>(
  time: readonly number[],
  labels: readonly L[],
  equals: LabelEquals<L> = sameLabel
): Run<L>[] {
  return Array.from(iterateRuns(time, labels, equals));
}

/**
 * minSamples보다 짧은 chunk를 치환: 양옆 chunk 라벨이 같으면 그 라벨로, 아니면 fillLabel로.
 * 판단은 항상 원본 시퀀스 기준.
 */
export function smoothLabels<L>(
  labels: readonly L[],
  minSamples: number,
  fillLabel: L,
  equals: LabelEquals<L> = sameLabel
): L[] {
  const out = [...labels];
  if (labels.length === 0 || minSamples <= 1) return out;

  const chunks: { start: number; end: number; label: L }[] = [];
  let start = 0;
  for (let i = 1; i <= labels.length; i++) {
    if (i < labels.length && equals(labels[start], labels[i])) continue;
    chunks.push({ start, end: i, label: labels[start] });
    start = i;
  }

  chunks.forEach((chunk, k) => {
    if (chunk.end - chunk.start >= minSamples) return;
    const prev = chunks[k - 1];
    const next = chunks[k + 1];
    const replacement = prev && next && equals(prev.label, next.label) ? prev.label : fillLabel;
    out.fill(replacement, chunk.start, chunk.end);
  });
  return out;
}
