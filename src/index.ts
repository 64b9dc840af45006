export type { EventLabel, SampleLabel, Run, EventStyle, EventMapping, LabelEquals } from "./types/event";
export type { Band, RowTick, Figure, ScarfOptions } from "./types/figure";
export type { GazeDetector, DetectionResult, DetectionsData } from "./types/detector";

export {
  EVENT_CODES,
  DEFAULT_EVENT_MAPPING,
  ROW_HEIGHT,
  ROW_GAP,
  MIN_BAND_PX,
  DEFAULT_MATCHING,
  createEventMapping,
} from "./config";
export { ScarfError, InputShapeError, UnmappedLabelError, InvalidBoundsError } from "./utils/errors";
export { isMissingLabel, sameLabel, iterateRuns, extractRuns, smoothLabels } from "./utils/runs";
export { labelKey, resolveColor, resolveRunColors } from "./utils/colors";
export { createFigure, appendBands, mergeFigures, figureTimeRange, figureYRange } from "./utils/figure";
export { addScarf, stackScarfRows, rowBounds, type ScarfRow, type StackOptions } from "./utils/scarf";
export {
  sampleAccuracy,
  balancedAccuracy,
  cohenKappa,
  matthewsCorrelation,
  levenshteinDistance,
  levenshteinRatio,
  transitionCounts,
  transitionMatrix,
  transitionMatrixDistance,
  type TransitionNorm,
} from "./utils/agreement";
export {
  matchRuns,
  matchRatio,
  matchedRunFeatures,
  overlapTime,
  intersectionOverUnion,
  l2TimingOffset,
  runDuration,
  type MatchReduction,
  type MatchingOptions,
  type RunMatch,
  type MatchedRunFeatures,
} from "./utils/matching";
export { parseEventLabel, isEventLabel, parseDetectionsJson, parseEventMappingJson } from "./utils/parseEvents";
export {
  compareDetections,
  compareDetectors,
  countBandsByLabel,
  type DetectorComparison,
  type RowAgreement,
} from "./utils/comparison";
export {
  runDetectors,
  createIvtDetector,
  createIdtDetector,
  createPrecomputedDetector,
  type IvtOptions,
  type IdtOptions,
} from "./detectors";
export { ScarfPlot } from "./components/ScarfPlot";
export { EventLegend } from "./components/EventLegend";
export { DetectorComparisonView } from "./components/DetectorComparisonView";
