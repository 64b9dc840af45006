/**
 * 두 label 행의 샘플 단위 일치도.
 * 라벨은 labelKey로 비교 (결측끼리는 "undefined"로 같음).
 */
import { labelKey } from "./colors";
import { InputShapeError } from "./errors";

function keysOf(a: readonly unknown[], b: readonly unknown[]): [string[], string[]] {
  if (a.length !== b.length) {
    throw new InputShapeError(`label rows must have the same length (got ${a.length} and ${b.length})`);
  }
  return [a.map(labelKey), b.map(labelKey)];
}

/** 일치 샘플 비율 (클래스 불균형 보정 없음), 빈 입력은 NaN */
export function sampleAccuracy(a: readonly unknown[], b: readonly unknown[]): number {
  const [ka, kb] = keysOf(a, b);
  if (ka.length === 0) return NaN;
  let same = 0;
  ka.forEach((k, i) => {
    if (k === kb[i]) same++;
  });
  return same / ka.length;
}

/**
 * 균형 정확도: 기준(gt) 행에 나타난 라벨별 재현율의 평균.
 * pred에만 있는 라벨은 평균에 들어가지 않음. 빈 입력은 NaN
 */
export function balancedAccuracy(gt: readonly unknown[], pred: readonly unknown[]): number {
  const [kg, kp] = keysOf(gt, pred);
  if (kg.length === 0) return NaN;
  const support = new Map<string, number>();
  const hits = new Map<string, number>();
  kg.forEach((k, i) => {
    support.set(k, (support.get(k) ?? 0) + 1);
    if (k === kp[i]) hits.set(k, (hits.get(k) ?? 0) + 1);
  });
  let recallSum = 0;
  support.forEach((n, k) => {
    recallSum += (hits.get(k) ?? 0) / n;
  });
  return recallSum / support.size;
}

/** Cohen's kappa = (po - pe) / (1 - pe) */
export function cohenKappa(a: readonly unknown[], b: readonly unknown[]): number {
  const [ka, kb] = keysOf(a, b);
  const n = ka.length;
  if (n === 0) return NaN;

  const countA = new Map<string, number>();
  const countB = new Map<string, number>();
  let same = 0;
  ka.forEach((k, i) => {
    countA.set(k, (countA.get(k) ?? 0) + 1);
    countB.set(kb[i], (countB.get(kb[i]) ?? 0) + 1);
    if (k === kb[i]) same++;
  });

  const po = same / n;
  let pe = 0;
  countA.forEach((ca, k) => {
    pe += (ca / n) * ((countB.get(k) ?? 0) / n);
  });
  if (pe === 1) return po === 1 ? 1 : 0;
  return (po - pe) / (1 - pe);
}

/**
 * 다중 클래스 Matthews 상관계수.
 * 분모가 0(한쪽 행이 한 라벨뿐)이면 0
 */
export function matthewsCorrelation(gt: readonly unknown[], pred: readonly unknown[]): number {
  const [kg, kp] = keysOf(gt, pred);
  const n = kg.length;
  if (n === 0) return NaN;

  const trueCounts = new Map<string, number>();
  const predCounts = new Map<string, number>();
  let correct = 0;
  kg.forEach((k, i) => {
    trueCounts.set(k, (trueCounts.get(k) ?? 0) + 1);
    predCounts.set(kp[i], (predCounts.get(kp[i]) ?? 0) + 1);
    if (k === kp[i]) correct++;
  });

  let crossSum = 0;
  predCounts.forEach((p, k) => {
    crossSum += p * (trueCounts.get(k) ?? 0);
  });
  let predSq = 0;
  predCounts.forEach((p) => (predSq += p * p));
  let trueSq = 0;
  trueCounts.forEach((t) => (trueSq += t * t));

  const denom = Math.sqrt((n * n - predSq) * (n * n - trueSq));
  if (denom === 0) return 0;
  return (correct * n - crossSum) / denom;
}

/** 라벨 시퀀스 편집 거리. normalize면 max(길이)로 나눔 */
export function levenshteinDistance(
  a: readonly unknown[],
  b: readonly unknown[],
  normalize = true
): number {
  const ka = a.map(labelKey);
  const kb = b.map(labelKey);
  const longest = Math.max(ka.length, kb.length);
  if (longest === 0) return 0;

  let prev = Array.from({ length: kb.length + 1 }, (_, j) => j);
  for (let i = 1; i <= ka.length; i++) {
    const row = [i];
    for (let j = 1; j <= kb.length; j++) {
      const cost = ka[i - 1] === kb[j - 1] ? 0 : 1;
      row.push(Math.min(prev[j] + 1, row[j - 1] + 1, prev[j - 1] + cost));
    }
    prev = row;
  }
  const d = prev[kb.length];
  return normalize ? d / longest : d;
}

/**
 * 삽입/삭제만 허용한 편집 유사도: 2·LCS / (|a| + |b|).
 * 둘 다 비면 1
 */
export function levenshteinRatio(a: readonly unknown[], b: readonly unknown[]): number {
  const ka = a.map(labelKey);
  const kb = b.map(labelKey);
  const total = ka.length + kb.length;
  if (total === 0) return 1;

  let prev = new Array<number>(kb.length + 1).fill(0);
  for (let i = 1; i <= ka.length; i++) {
    const row = [0];
    for (let j = 1; j <= kb.length; j++) {
      row.push(ka[i - 1] === kb[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], row[j - 1]));
    }
    prev = row;
  }
  return (2 * prev[kb.length]) / total;
}

/** 연속 샘플 사이 전이 횟수 (from → to → count), 자기 전이 포함 */
export function transitionCounts(labels: readonly unknown[]): Map<string, Map<string, number>> {
  const counts = new Map<string, Map<string, number>>();
  for (let i = 0; i + 1 < labels.length; i++) {
    const from = labelKey(labels[i]);
    const to = labelKey(labels[i + 1]);
    const row = counts.get(from) ?? new Map<string, number>();
    row.set(to, (row.get(to) ?? 0) + 1);
    counts.set(from, row);
  }
  return counts;
}

export type TransitionNorm = "fro" | "l1" | "linf" | "kl";

/** 정상분포 0 성분 대체값 (KL 발산이 무한대가 되지 않도록) */
const STATIONARY_FLOOR = 1e-12;
const STATIONARY_MAX_STEPS = 10_000;
const STATIONARY_TOLERANCE = 1e-13;

/** 전이 확률 행렬 P(to | from), keys 순서의 정방 행렬. 나가는 전이가 없는 행은 0 */
export function transitionMatrix(labels: readonly unknown[], keys: readonly string[]): number[][] {
  const counts = transitionCounts(labels);
  return keys.map((from) => {
    const row = counts.get(from);
    const total = row ? [...row.values()].reduce((acc, c) => acc + c, 0) : 0;
    return keys.map((to) => (row && total > 0 ? (row.get(to) ?? 0) / total : 0));
  });
}

/**
 * 정상분포 π (πP = π). lazy chain (P+I)/2 의 거듭제곱 반복으로 구함 —
 * 정상분포는 같고 주기적인 체인에서도 수렴함
 */
function stationaryDistribution(probs: readonly number[][]): number[] {
  const n = probs.length;
  let pi = new Array<number>(n).fill(1 / n);
  for (let step = 0; step < STATIONARY_MAX_STEPS; step++) {
    const next = pi.map((p) => p / 2);
    pi.forEach((p, i) => {
      probs[i].forEach((pij, j) => {
        next[j] += (p * pij) / 2;
      });
    });
    const total = next.reduce((acc, v) => acc + v, 0);
    const normalized = next.map((v) => (total > 0 ? v / total : 1 / n));
    const change = normalized.reduce((acc, v, i) => Math.max(acc, Math.abs(v - pi[i])), 0);
    pi = normalized;
    if (change < STATIONARY_TOLERANCE) break;
  }
  const floored = pi.map((v) => (v > 0 ? v : STATIONARY_FLOOR));
  const total = floored.reduce((acc, v) => acc + v, 0);
  return floored.map((v) => v / total);
}

/**
 * 두 행의 전이 확률 행렬 사이 거리.
 * fro: Frobenius, l1: 최대 열 절댓값 합, linf: 최대 행 절댓값 합,
 * kl: 정상분포 사이 KL(gt ‖ pred)
 */
export function transitionMatrixDistance(
  gt: readonly unknown[],
  pred: readonly unknown[],
  norm: TransitionNorm
): number {
  const keys = [...new Set([...gt.map(labelKey), ...pred.map(labelKey)])];
  if (keys.length === 0) return 0;
  const p1 = transitionMatrix(gt, keys);
  const p2 = transitionMatrix(pred, keys);
  const diff = p1.map((row, i) => row.map((v, j) => Math.abs(v - p2[i][j])));

  switch (norm) {
    case "fro":
      return Math.sqrt(diff.flat().reduce((acc, v) => acc + v * v, 0));
    case "l1":
      return Math.max(...keys.map((_, j) => diff.reduce((acc, row) => acc + row[j], 0)));
    case "linf":
      return Math.max(...diff.map((row) => row.reduce((acc, v) => acc + v, 0)));
    case "kl": {
      const s1 = stationaryDistribution(p1);
      const s2 = stationaryDistribution(p2);
      return s1.reduce((acc, v, i) => acc + v * Math.log(v / s2[i]), 0);
    }
  }
}
