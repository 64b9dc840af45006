import type { EventLabel } from "../types/event";
import type { GazeDetector } from "../types/detector";
import { InputShapeError } from "../utils/errors";

/** 다른 도구(Engbert, NH, REMoDNaV 등)가 이미 만든 라벨을 그대로 돌려주는 검출기 */
export function createPrecomputedDetector(name: string, labels: readonly EventLabel[]): GazeDetector {
  return {
    name,
    detect(time) {
      if (labels.length !== time.length) {
        throw new InputShapeError(
          `${name}: precomputed labels cover ${labels.length} samples, time has ${time.length}`
        );
      }
      return { detector: name, labels: [...labels] };
    },
  };
}
