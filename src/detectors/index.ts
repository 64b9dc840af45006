import type { DetectionResult, GazeDetector } from "../types/detector";
import { InputShapeError } from "../utils/errors";

export { createIvtDetector, type IvtOptions } from "./ivt";
export { createIdtDetector, type IdtOptions } from "./idt";
export { createPrecomputedDetector } from "./precomputed";

/** 모든 검출기를 같은 샘플에 돌림 — 결과 길이가 time과 다르면 throw */
export function runDetectors(
  detectors: readonly GazeDetector[],
  time: readonly number[],
  x: readonly number[],
  y: readonly number[]
): DetectionResult[] {
  return detectors.map((detector) => {
    const result = detector.detect(time, x, y);
    if (result.labels.length !== time.length) {
      throw new InputShapeError(
        `${detector.name} returned ${result.labels.length} labels for ${time.length} samples`
      );
    }
    return result;
  });
}
