import { InputShapeError } from "../utils/errors";

export function checkGazeShape(
  time: readonly number[],
  x: readonly number[],
  y: readonly number[]
) {
  if (x.length !== time.length || y.length !== time.length) {
    throw new InputShapeError(
      `time, x and y must have the same length (got ${time.length}, ${x.length}, ${y.length})`
    );
  }
}

/** 좌표 중 하나라도 NaN이면 결측 샘플 */
export function isMissingSample(x: readonly number[], y: readonly number[], i: number): boolean {
  return !Number.isFinite(x[i]) || !Number.isFinite(y[i]);
}

export function requirePositive(name: string, value: number) {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive number (got ${value})`);
  }
}
