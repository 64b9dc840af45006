import type { EventLabel, EventMapping, EventStyle, SampleLabel } from "../types/event";
import type { DetectionResult, DetectionsData } from "../types/detector";
import { EVENT_CODES } from "../config";

const LABEL_ALIASES: ReadonlyMap<string, EventLabel> = new Map(Object.entries({
  undefined: "undefined",
  unknown: "undefined",
  fixation: "fixation",
  fix: "fixation",
  saccade: "saccade",
  sac: "saccade",
  pso: "pso",
  smooth_pursuit: "smooth_pursuit",
  "smooth pursuit": "smooth_pursuit",
  "smooth-pursuit": "smooth_pursuit",
  sp: "smooth_pursuit",
  blink: "blink",
} satisfies Record<string, EventLabel>));

/**
 * 숫자 코드(0~5) 또는 이름 → EventLabel.
 * 결측(null/undefined/NaN/"")은 null. 모르는 값은 문자열 그대로 반환 → 색 조회에서 UnmappedLabelError
 */
export function parseEventLabel(value: unknown): SampleLabel | string {
  if (value == null) return null;
  if (typeof value === "number") {
    if (Number.isNaN(value)) return null;
    return Number.isInteger(value) && value >= 0 && value < EVENT_CODES.length
      ? EVENT_CODES[value]
      : String(value);
  }
  const raw = String(value).trim();
  if (raw === "") return null;
  return LABEL_ALIASES.get(raw.toLowerCase()) ?? raw;
}

function parseTimeArray(value: unknown): number[] | null {
  if (!Array.isArray(value)) return null;
  const time = value.map((t) => Number(t));
  return time.every((t) => Number.isFinite(t)) ? time : null;
}

function parseLabelArray(value: unknown): EventLabel[] | null {
  if (!Array.isArray(value)) return null;
  const labels = value.map(parseEventLabel);
  // 검출 결과에서 결측은 "undefined" 이벤트로 취급
  const out: EventLabel[] = [];
  for (const label of labels) {
    if (label === null) out.push("undefined");
    else if (isEventLabel(label)) out.push(label);
    else return null;
  }
  return out;
}

export function isEventLabel(value: unknown): value is EventLabel {
  return EVENT_CODES.some((code) => code === value);
}

/**
 * 검출 결과 JSON → DetectionsData, 형식이 아니면 null
 *
 * 수용 형식:
 * 1. { time: number[], detectors: { [name]: labels[] } }
 * 2. { time: number[], detectors: [{ name, labels }] }
 * labels 원소는 숫자 코드 또는 이름. 길이가 time과 다른 검출기가 있으면 null
 */
export function parseDetectionsJson(data: unknown): DetectionsData | null {
  if (!data || typeof data !== "object" || Array.isArray(data)) return null;
  const obj = data as Record<string, unknown>;
  const time = parseTimeArray(obj.time ?? obj.t);
  if (!time) return null;

  const entries: [string, unknown][] = Array.isArray(obj.detectors)
    ? obj.detectors
        .filter((item): item is Record<string, unknown> => item != null && typeof item === "object")
        .map((item): [string, unknown] => [String(item.name ?? item.detector ?? ""), item.labels])
    : obj.detectors != null && typeof obj.detectors === "object"
      ? Object.entries(obj.detectors)
      : [];
  if (entries.length === 0) return null;

  const detectors: DetectionResult[] = [];
  for (const [name, rawLabels] of entries) {
    const labels = parseLabelArray(rawLabels);
    if (!name || !labels || labels.length !== time.length) return null;
    detectors.push({ detector: name, labels });
  }

  return {
    source: typeof obj.source === "string" ? obj.source : "",
    time,
    detectors,
  };
}

/**
 * 색 매핑 JSON → EventMapping, 형식이 아니면 null
 * 값은 "#hex" 문자열 또는 { color, label? }. 키는 이벤트 이름 또는 숫자 코드
 */
export function parseEventMappingJson(data: unknown): EventMapping | null {
  if (!data || typeof data !== "object" || Array.isArray(data)) return null;
  const obj = data as Record<string, unknown>;
  // Object.fromEntries는 "__proto__" 키도 일반 속성으로 정의함
  const entries: [string, Readonly<EventStyle>][] = [];

  for (const [rawKey, value] of Object.entries(obj)) {
    const key = parseEventLabel(/^\d+$/.test(rawKey) ? Number(rawKey) : rawKey) ?? "undefined";
    if (typeof value === "string" && value) {
      entries.push([key, Object.freeze({ label: key, color: value })]);
      continue;
    }
    if (value == null || typeof value !== "object") return null;
    const color = "color" in value ? value.color : undefined;
    const label = "label" in value ? value.label : undefined;
    if (typeof color !== "string" || !color) return null;
    entries.push([
      key,
      Object.freeze({
        label: typeof label === "string" && label ? label : key,
        color,
      }),
    ]);
  }
  if (entries.length === 0) return null;
  return Object.freeze(Object.fromEntries(entries));
}
