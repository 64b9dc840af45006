import type { EventMapping, Run } from "../types/event";
import { UnmappedLabelError } from "./errors";
import { isMissingLabel } from "./runs";

/** 매핑 조회 키: 결측 → "undefined", 나머지는 문자열 */
export function labelKey(label: unknown): string {
  return isMissingLabel(label) ? "undefined" : String(label);
}

export function resolveColor(mapping: EventMapping, label: unknown): string {
  const key = labelKey(label);
  const style = Object.prototype.hasOwnProperty.call(mapping, key) ? mapping[key] : undefined;
  if (!style) throw new UnmappedLabelError(label, key);
  return style.color;
}

/** 모든 run의 색 — 하나라도 매핑에 없으면 throw (부분 결과 없음) */
export function resolveRunColors<L>(mapping: EventMapping, runs: readonly Run<L>[]): string[] {
  return runs.map((run) => resolveColor(mapping, run.label));
}
