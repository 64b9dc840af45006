/** scarf 변환 중 발생하는 모든 오류의 기반 클래스 */
export class ScarfError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** time / label 길이 불일치, 시간 역행 등 입력 형태 오류 */
export class InputShapeError extends ScarfError {}

/** 매핑에 없는 라벨 — 기본색으로 대체하지 않음 */
export class UnmappedLabelError extends ScarfError {
  readonly label: unknown;
  readonly key: string;

  constructor(label: unknown, key: string) {
    super(`No color mapped for event label "${key}"`);
    this.label = label;
    this.key = key;
  }
}

/** ymin >= ymax 또는 유한하지 않은 경계 */
export class InvalidBoundsError extends ScarfError {
  readonly ymin: number;
  readonly ymax: number;

  constructor(ymin: number, ymax: number) {
    super(`Invalid band bounds: ymin (${ymin}) must be less than ymax (${ymax})`);
    this.ymin = ymin;
    this.ymax = ymax;
  }
}
