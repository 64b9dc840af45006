import type { EventLabel } from "../types/event";
import type { GazeDetector } from "../types/detector";
import { checkGazeShape, isMissingSample, requirePositive } from "./common";

export interface IvtOptions {
  /** 좌표 단위/초 */
  velocityThreshold: number;
  name?: string;
}

/**
 * I-VT: 직전 샘플과의 속도가 임계값을 넘으면 saccade, 아니면 fixation.
 * 첫 샘플, 결측 좌표, dt <= 0 구간은 undefined
 */
export function createIvtDetector({ velocityThreshold, name = "IVT" }: IvtOptions): GazeDetector {
  requirePositive("velocityThreshold", velocityThreshold);

  return {
    name,
    detect(time, x, y) {
      checkGazeShape(time, x, y);
      const labels: EventLabel[] = time.map((t, i) => {
        if (i === 0 || isMissingSample(x, y, i) || isMissingSample(x, y, i - 1)) return "undefined";
        const dtSec = (t - time[i - 1]) / 1000;
        if (dtSec <= 0) return "undefined";
        const velocity = Math.hypot(x[i] - x[i - 1], y[i] - y[i - 1]) / dtSec;
        return velocity > velocityThreshold ? "saccade" : "fixation";
      });
      return { detector: name, labels };
    },
  };
}
