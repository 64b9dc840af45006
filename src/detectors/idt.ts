import type { EventLabel } from "../types/event";
import type { GazeDetector } from "../types/detector";
import { checkGazeShape, isMissingSample, requirePositive } from "./common";

export interface IdtOptions {
  /** (maxX - minX) + (maxY - minY) 상한 */
  dispersionThreshold: number;
  /** fixation 최소 길이 (ms) */
  minDurationMs: number;
  name?: string;
}

interface Extent {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

function extend(e: Extent, x: number, y: number): Extent {
  return {
    minX: Math.min(e.minX, x),
    maxX: Math.max(e.maxX, x),
    minY: Math.min(e.minY, y),
    maxY: Math.max(e.maxY, y),
  };
}

function dispersion(e: Extent): number {
  return e.maxX - e.minX + (e.maxY - e.minY);
}

/**
 * I-DT (Salvucci & Goldberg): minDurationMs 이상 이어지는 창의 분산이 임계값 이하이면
 * 임계값을 넘기 직전까지 창을 늘려 fixation으로, 나머지는 saccade.
 * 결측 좌표 샘플은 undefined이고 창을 끊는다.
 */
export function createIdtDetector({
  dispersionThreshold,
  minDurationMs,
  name = "IDT",
}: IdtOptions): GazeDetector {
  requirePositive("dispersionThreshold", dispersionThreshold);
  requirePositive("minDurationMs", minDurationMs);

  return {
    name,
    detect(time, x, y) {
      checkGazeShape(time, x, y);
      const n = time.length;
      const labels: EventLabel[] = time.map((_, i) =>
        isMissingSample(x, y, i) ? "undefined" : "saccade"
      );

      let i = 0;
      while (i < n) {
        if (isMissingSample(x, y, i)) {
          i++;
          continue;
        }
        let extent: Extent = { minX: x[i], maxX: x[i], minY: y[i], maxY: y[i] };
        let j = i;
        while (j + 1 < n && !isMissingSample(x, y, j + 1) && time[j] - time[i] < minDurationMs) {
          j++;
          extent = extend(extent, x[j], y[j]);
        }
        if (time[j] - time[i] < minDurationMs || dispersion(extent) > dispersionThreshold) {
          i++;
          continue;
        }
        while (j + 1 < n && !isMissingSample(x, y, j + 1)) {
          const next = extend(extent, x[j + 1], y[j + 1]);
          if (dispersion(next) > dispersionThreshold) break;
          extent = next;
          j++;
        }
        labels.fill("fixation", i, j + 1);
        i = j + 1;
      }
      return { detector: name, labels };
    },
  };
}
